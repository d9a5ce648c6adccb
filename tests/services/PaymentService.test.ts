import { describe, it, expect } from "vitest";
import { ConflictError, NotFoundError, PaymentValidationError } from "../../src/engine/index.js";
import { alice, setupTrio } from "./harness.js";

describe("PaymentService", () => {
  it("records a payment in the group currency", async () => {
    const { paymentService } = await setupTrio();

    const payment = await paymentService.recordPayment({
      id: "p1",
      groupId: "grp1",
      payerId: "u2",
      recipientId: "u1",
      amount: 30000,
      description: "  ",
      date: new Date("2026-03-16T10:00:00.000Z"),
    });

    expect(payment.currency).toBe("VND");
    expect(payment.description).toBeUndefined();
    expect(payment.createdBy).toBe("u2");

    const [stored] = await paymentService.getGroupPayments("grp1");
    expect(stored.id).toBe("p1");
    expect(stored.amount).toBe(30000);
    expect(stored.description).toBeUndefined();
    expect(stored.date.toISOString()).toBe("2026-03-16T10:00:00.000Z");
  });

  it("validates payments", async () => {
    const { paymentService } = await setupTrio();
    const base = { groupId: "grp1", payerId: "u2", recipientId: "u1", amount: 1000 };

    await expect(paymentService.recordPayment({ ...base, amount: 0 })).rejects.toThrow(
      PaymentValidationError
    );
    await expect(paymentService.recordPayment({ ...base, amount: -5 })).rejects.toThrow(
      "Payment amount must be a positive integer"
    );
    await expect(paymentService.recordPayment({ ...base, recipientId: "u2" })).rejects.toThrow(
      "Cannot make payment to yourself"
    );
    await expect(paymentService.recordPayment({ ...base, recipientId: "u9" })).rejects.toThrow(
      "Payment can only be made between group members"
    );
    await expect(
      paymentService.recordPayment({ ...base, description: "x".repeat(501) })
    ).rejects.toThrow("Payment description cannot exceed 500 characters");
    await expect(paymentService.recordPayment({ ...base, groupId: "nope" })).rejects.toThrow(
      NotFoundError
    );
  });

  it("deletes payments", async () => {
    const { paymentService } = await setupTrio();
    await paymentService.recordPayment({
      id: "p1",
      groupId: "grp1",
      payerId: "u2",
      recipientId: "u1",
      amount: 1000,
    });

    await paymentService.deletePayment("grp1", "p1");

    expect(await paymentService.getGroupPayments("grp1")).toEqual([]);
    await expect(paymentService.deletePayment("grp1", "p1")).rejects.toThrow(
      "Payment p1 not found"
    );
  });

  it("restores a deleted payment into the balances", async () => {
    const services = await setupTrio();
    const { paymentService } = services;
    await paymentService.recordPayment({
      id: "p1",
      groupId: "grp1",
      payerId: "u2",
      recipientId: "u1",
      amount: 1000,
    });
    await paymentService.deletePayment("grp1", "p1", "u1");

    const restored = await paymentService.restorePayment("grp1", "p1", "u1");
    const report = await services.balanceService.getGroupBalances("grp1");

    expect(restored.id).toBe("p1");
    expect(restored.deletedAt).toBeUndefined();
    expect(Object.fromEntries(report.balances)).toEqual({ u1: -1000, u2: 1000, u3: 0 });
    await expect(paymentService.restorePayment("grp1", "p1")).rejects.toThrow(ConflictError);

    const actions = (await services.groupService.getActivity("grp1"))
      .filter((entry) => entry.entityType === "payment")
      .map((entry) => entry.action);
    expect(actions).toEqual(["create", "delete", "restore"]);
  });

  it("only deletes payments through their own group", async () => {
    const services = await setupTrio();
    const { paymentService } = services;
    await services.groupService.createGroup({ id: "grp2", name: "Other", creator: alice });
    await paymentService.recordPayment({
      id: "p1",
      groupId: "grp1",
      payerId: "u2",
      recipientId: "u1",
      amount: 1000,
    });

    await expect(paymentService.deletePayment("grp2", "p1")).rejects.toThrow(NotFoundError);
    expect((await paymentService.getGroupPayments("grp1")).map((p) => p.id)).toEqual(["p1"]);
  });
});
