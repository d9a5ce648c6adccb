import { once } from "node:events";
import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../../src/api/app.js";
import { createServices } from "../../src/services/index.js";
import { createDatabase, ExpenseRepo, type Db } from "../../src/storage/index.js";

interface Reply {
  status: number;
  headers: Headers;
  body: unknown;
  text: string;
}

let db: Db;
let server: Server;
let baseUrl: string;

beforeEach(async () => {
  db = createDatabase(":memory:");
  server = createApp(createServices(db)).listen(0, "127.0.0.1");
  await once(server, "listening");

  const address = server.address();
  if (typeof address !== "object" || address === null) {
    throw new Error("Server is not listening on a port");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  vi.restoreAllMocks();
  server.closeAllConnections();
  server.close();
  await once(server, "close");
});

async function call(
  method: string,
  path: string,
  body?: unknown,
  options: { raw?: string } = {}
): Promise<Reply> {
  const payload = options.raw ?? (body === undefined ? undefined : JSON.stringify(body));
  const res = await fetch(`${baseUrl}${path}`, {
    method,
    headers: payload === undefined ? undefined : { "content-type": "application/json" },
    body: payload,
  });
  const text = await res.text();
  const isJson = res.headers.get("content-type")?.includes("application/json") ?? false;

  return {
    status: res.status,
    headers: res.headers,
    body: isJson && text ? JSON.parse(text) : undefined,
    text,
  };
}

const alice = { id: "u1", displayName: "Alice", email: "alice@test.com" };
const bob = { id: "u2", displayName: "Bob", email: "bob@test.com" };

async function createPair() {
  await call("POST", "/groups", { id: "grp1", name: "Trip", creator: alice });
  await call("POST", "/groups/grp1/members", bob);
}

async function addDinner() {
  return call("POST", "/groups/grp1/expenses", {
    id: "e1",
    payerId: "u1",
    amount: 90000,
    description: "Dinner",
    date: "2026-03-14T19:00:00.000Z",
    participants: ["u1", "u2"],
  });
}

describe("REST API", () => {
  it("answers the health check", async () => {
    const res = await call("GET", "/health");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "ok" });
  });

  describe("groups", () => {
    it("creates, reads and renames a group", async () => {
      const created = await call("POST", "/groups", {
        id: "grp1",
        name: "Trip",
        currency: "usd",
        creator: alice,
      });
      const added = await call("POST", "/groups/grp1/members", bob);
      const renamed = await call("PATCH", "/groups/grp1", { name: "Beach", actorId: "u1" });
      const fetched = await call("GET", "/groups/grp1");

      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({ id: "grp1", currency: "USD", members: ["u1"] });
      expect(added.status).toBe(201);
      expect(added.body).toEqual(bob);
      expect(renamed.body).toMatchObject({ id: "grp1", name: "Beach" });
      expect(fetched.body).toMatchObject({ id: "grp1", name: "Beach", members: [alice, bob] });
    });

    it("removes a settled member", async () => {
      await createPair();

      const removed = await call("DELETE", "/groups/grp1/members/u2?actorId=u1");
      const fetched = await call("GET", "/groups/grp1");

      expect(removed.status).toBe(204);
      expect(fetched.body).toMatchObject({ members: [alice] });
    });

    it("lists the activity log", async () => {
      await createPair();
      await addDinner();

      const res = await call("GET", "/groups/grp1/activity");

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject([
        { entityType: "group", action: "create", entityId: "grp1" },
        { entityType: "group_member", action: "create", entityId: "u2" },
        { entityType: "expense", action: "create", entityId: "e1", actorId: "u1" },
      ]);
    });
  });

  describe("expenses", () => {
    it("creates, filters, edits, deletes and restores expenses", async () => {
      await createPair();

      const created = await addDinner();
      const matching = await call("GET", "/groups/grp1/expenses?q=dinner&minAmount=1000");
      const tooSmall = await call("GET", "/groups/grp1/expenses?maxAmount=500");
      const edited = await call("PUT", "/groups/grp1/expenses/e1", {
        payerId: "u1",
        amount: 60000,
        description: "Dinner",
        splitMethod: "exact",
        shares: { u1: 20000, u2: 40000 },
        actorId: "u2",
      });
      const deleted = await call("DELETE", "/groups/grp1/expenses/e1");
      const afterDelete = await call("GET", "/groups/grp1/expenses");
      const restored = await call("POST", "/groups/grp1/expenses/e1/restore");

      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({
        id: "e1",
        currency: "VND",
        splitMethod: "equal",
        date: "2026-03-14T19:00:00.000Z",
        participants: [
          { memberId: "u1", shareAmount: 45000 },
          { memberId: "u2", shareAmount: 45000 },
        ],
      });
      expect(matching.body).toMatchObject([{ id: "e1" }]);
      expect(tooSmall.body).toEqual([]);
      expect(edited.body).toMatchObject({ amount: 60000, splitMethod: "exact" });
      expect(deleted.status).toBe(204);
      expect(afterDelete.body).toEqual([]);
      expect(restored.status).toBe(200);
      expect(restored.body).toMatchObject({ id: "e1", amount: 60000 });
    });

    it("does not reach an expense through another group", async () => {
      await createPair();
      await call("POST", "/groups", { id: "grp2", name: "Other", creator: alice });
      await addDinner();

      const res = await call("DELETE", "/groups/grp2/expenses/e1");

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "not_found", message: "Expense e1 not found" });
    });
  });

  describe("payments", () => {
    it("records, lists, deletes and restores payments", async () => {
      await createPair();

      const created = await call("POST", "/groups/grp1/payments", {
        id: "p1",
        payerId: "u2",
        recipientId: "u1",
        amount: 5000,
        date: "2026-03-15T09:00:00.000Z",
      });
      const listed = await call("GET", "/groups/grp1/payments");
      const deleted = await call("DELETE", "/groups/grp1/payments/p1?actorId=u2");
      const afterDelete = await call("GET", "/groups/grp1/payments");
      const restored = await call("POST", "/groups/grp1/payments/p1/restore?actorId=u2");

      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({ id: "p1", amount: 5000, currency: "VND" });
      expect(listed.body).toMatchObject([{ id: "p1" }]);
      expect(deleted.status).toBe(204);
      expect(afterDelete.body).toEqual([]);
      expect(restored.body).toMatchObject({ id: "p1", amount: 5000 });
    });
  });

  describe("balances and settlement", () => {
    it("reports balances, plans and executes a settlement", async () => {
      await createPair();
      await addDinner();

      const balances = await call("GET", "/groups/grp1/balances");
      const plan = await call("GET", "/groups/grp1/settlement-plan");
      const executed = await call("POST", "/groups/grp1/settlement-plan/execute", {
        payerId: "u2",
        recipientId: "u1",
        amount: 45000,
        recordedBy: "u1",
      });
      const again = await call("POST", "/groups/grp1/settlement-plan/execute", {
        payerId: "u2",
        recipientId: "u1",
        amount: 45000,
      });
      const after = await call("GET", "/groups/grp1/settlement-plan");

      expect(balances.body).toEqual({
        currency: "VND",
        balances: [
          { memberId: "u1", displayName: "Alice", balance: 45000, status: "owed" },
          { memberId: "u2", displayName: "Bob", balance: -45000, status: "owes" },
        ],
        total: 0,
        hasMixedCurrencyWarning: false,
        unresolved: [],
      });
      expect(plan.body).toEqual([{ payerId: "u2", recipientId: "u1", amount: 45000 }]);
      expect(executed.status).toBe(201);
      expect(executed.body).toMatchObject({ amount: 45000, description: "Settlement", createdBy: "u1" });
      expect(again.status).toBe(409);
      expect(again.body).toEqual({
        error: "conflict",
        message: "No suggested payment from u2 to u1",
      });
      expect(after.body).toEqual([]);
    });

    it("serves the live summary", async () => {
      await createPair();
      await addDinner();

      const res = await call("GET", "/groups/grp1/summary");

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        currency: "VND",
        total: 0,
        plan: [{ payerId: "u2", recipientId: "u1", amount: 45000 }],
      });
    });

    it("stores exchange rates", async () => {
      const res = await call("PUT", "/exchange-rates", {
        from: "usd",
        to: "VND",
        rate: 25000,
        effectiveDate: "2026-03-01T00:00:00.000Z",
      });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        from: "USD",
        to: "VND",
        rate: 25000,
        effectiveDate: "2026-03-01T00:00:00.000Z",
      });
    });

    it("exports the group as CSV", async () => {
      await createPair();

      const res = await call("GET", "/groups/grp1/export.csv");

      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toContain("text/csv");
      expect(res.headers.get("content-disposition")).toBe('attachment; filename="grp1_export.csv"');
      expect(res.text.split("\n")[0]).toBe("Group,Trip");
    });
  });

  describe("errors", () => {
    it("rejects bodies that fail the schema with 400", async () => {
      const missing = await call("POST", "/groups", { name: "Trip" });
      const badRate = await call("PUT", "/exchange-rates", { from: "USD", to: "VND", rate: 0 });
      const badQuery = await call("GET", "/groups/grp1/expenses?minAmount=abc");

      expect(missing.status).toBe(400);
      expect(missing.body).toEqual({ error: "validation_failed", message: "creator: Required" });
      expect(badRate.body).toEqual({
        error: "validation_failed",
        message: "rate: Exchange rate must be positive",
      });
      expect(badQuery.body).toEqual({
        error: "validation_failed",
        message: "minAmount: Expected number, received nan",
      });
    });

    it("maps domain validation errors to 400", async () => {
      await createPair();

      const blankName = await call("POST", "/groups", { name: "  ", creator: alice });
      const zeroAmount = await call("POST", "/groups/grp1/expenses", {
        payerId: "u1",
        amount: 0,
        description: "Nothing",
      });

      expect(blankName.body).toEqual({
        error: "validation_failed",
        message: "Group name is required",
      });
      expect(zeroAmount.status).toBe(400);
      expect(zeroAmount.body).toEqual({
        error: "invalid_expense",
        message: "Amount must be a positive integer in minor units",
      });
    });

    it("answers malformed JSON with 400", async () => {
      const res = await call("POST", "/groups", undefined, { raw: "{" });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "invalid_json", message: "Malformed JSON body" });
    });

    it("answers unknown routes and records with 404", async () => {
      const route = await call("GET", "/nope");
      const group = await call("GET", "/groups/missing");

      expect(route.status).toBe(404);
      expect(route.body).toEqual({ error: "not_found", message: "No route for GET /nope" });
      expect(group.status).toBe(404);
      expect(group.body).toEqual({ error: "not_found", message: "Group missing not found" });
    });

    it("answers conflicts with 409", async () => {
      await createPair();
      await addDinner();

      const res = await call("DELETE", "/groups/grp1/members/u2");

      expect(res.status).toBe(409);
      expect(res.body).toEqual({
        error: "conflict",
        message: "Member u2 still has a balance of -45000 VND",
      });
    });

    it("answers inconsistent stored balances with 500", async () => {
      vi.spyOn(console, "error").mockImplementation(() => {});
      await createPair();
      await new ExpenseRepo(db).create({
        id: "broken",
        groupId: "grp1",
        payerId: "u1",
        amount: 1000,
        currency: "VND",
        description: "Broken",
        date: new Date("2026-03-14T12:00:00.000Z"),
        participants: [{ memberId: "u2", shareAmount: 400 }],
        splitMethod: "exact",
        createdBy: "u1",
      });

      const res = await call("GET", "/groups/grp1/settlement-plan");

      expect(res.status).toBe(500);
      expect(res.body).toEqual({
        error: "settlement_invariant",
        message: "Settlement plan left unmatched balances: u1=600",
      });
    });

    it("reports a failed recomputation instead of an older summary", async () => {
      vi.spyOn(console, "error").mockImplementation(() => {});
      await createPair();
      await addDinner();
      const before = await call("GET", "/groups/grp1/summary");

      await new ExpenseRepo(db).create({
        id: "broken",
        groupId: "grp1",
        payerId: "u1",
        amount: 1000,
        currency: "VND",
        description: "Broken",
        date: new Date("2026-03-14T12:00:00.000Z"),
        participants: [{ memberId: "u2", shareAmount: 400 }],
        splitMethod: "exact",
        createdBy: "u1",
      });
      await call("POST", "/groups/grp1/payments", { payerId: "u2", recipientId: "u1", amount: 100 });
      const after = await call("GET", "/groups/grp1/summary");

      expect(before.status).toBe(200);
      expect(after.status).toBe(500);
      expect(after.body).toMatchObject({ error: "settlement_invariant" });
    });
  });
});
