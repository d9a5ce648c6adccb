import { randomUUID } from "node:crypto";
import { AuditRepo, GroupRepo, PaymentRepo } from "../storage/index.js";
import {
  ConflictError,
  NotFoundError,
  PaymentValidationError,
  normalizeCurrency,
} from "../engine/index.js";
import type { Payment } from "../types/index.js";

const MAX_DESCRIPTION_LENGTH = 500;

export class PaymentService {
  private paymentRepo: PaymentRepo;
  private groupRepo: GroupRepo;
  private onChange?: (groupId: string) => void;
  private auditRepo?: AuditRepo;

  constructor(
    paymentRepo: PaymentRepo,
    groupRepo: GroupRepo,
    options: { onChange?: (groupId: string) => void; auditRepo?: AuditRepo } = {}
  ) {
    this.paymentRepo = paymentRepo;
    this.groupRepo = groupRepo;
    this.onChange = options.onChange;
    this.auditRepo = options.auditRepo;
  }

  async recordPayment(params: {
    id?: string;
    groupId: string;
    payerId: string;
    recipientId: string;
    amount: number;
    currency?: string;
    description?: string;
    date?: Date;
    createdBy?: string;
  }): Promise<Payment> {
    const group = await this.groupRepo.findById(params.groupId);
    if (!group) {
      throw new NotFoundError("Group", params.groupId);
    }

    if (!Number.isInteger(params.amount) || params.amount <= 0) {
      throw new PaymentValidationError("Payment amount must be a positive integer");
    }
    if (params.payerId === params.recipientId) {
      throw new PaymentValidationError("Cannot make payment to yourself");
    }
    if (!group.members.includes(params.payerId) || !group.members.includes(params.recipientId)) {
      throw new PaymentValidationError("Payment can only be made between group members");
    }

    const description = params.description?.trim() || undefined;
    if (description && description.length > MAX_DESCRIPTION_LENGTH) {
      throw new PaymentValidationError(
        `Payment description cannot exceed ${MAX_DESCRIPTION_LENGTH} characters`
      );
    }

    const payment = await this.paymentRepo.create({
      id: params.id ?? randomUUID(),
      groupId: group.id,
      payerId: params.payerId,
      recipientId: params.recipientId,
      amount: params.amount,
      currency: normalizeCurrency(params.currency ?? group.currency),
      description,
      date: params.date ?? new Date(),
      createdBy: params.createdBy ?? params.payerId,
    });

    await this.auditRepo?.record({
      groupId: group.id,
      entityType: "payment",
      entityId: payment.id,
      action: "create",
      actorId: payment.createdBy,
      after: payment,
    });

    this.onChange?.(group.id);
    return payment;
  }

  async getGroupPayments(groupId: string): Promise<Payment[]> {
    return this.paymentRepo.findByGroupId(groupId);
  }

  async deletePayment(groupId: string, paymentId: string, actorId?: string): Promise<void> {
    const existing = await this.paymentRepo.findById(paymentId);
    if (!existing || existing.groupId !== groupId || existing.deletedAt) {
      throw new NotFoundError("Payment", paymentId);
    }

    await this.paymentRepo.softDelete(paymentId);
    await this.auditRepo?.record({
      groupId,
      entityType: "payment",
      entityId: paymentId,
      action: "delete",
      actorId,
      before: existing,
    });

    this.onChange?.(groupId);
  }

  async restorePayment(groupId: string, paymentId: string, actorId?: string): Promise<Payment> {
    const existing = await this.paymentRepo.findById(paymentId);
    if (!existing || existing.groupId !== groupId) {
      throw new NotFoundError("Payment", paymentId);
    }
    if (!existing.deletedAt) {
      throw new ConflictError(`Payment ${paymentId} is not deleted`);
    }

    const group = await this.groupRepo.findById(groupId);
    const departed = [existing.payerId, existing.recipientId].find(
      (id) => !group?.members.includes(id)
    );
    if (departed) {
      throw new ConflictError(`Member ${departed} is no longer in the group`);
    }

    const restored = await this.paymentRepo.restore(paymentId);
    if (!restored) {
      throw new NotFoundError("Payment", paymentId);
    }

    await this.auditRepo?.record({
      groupId,
      entityType: "payment",
      entityId: paymentId,
      action: "restore",
      actorId,
      after: restored,
    });

    this.onChange?.(groupId);
    return restored;
  }
}
