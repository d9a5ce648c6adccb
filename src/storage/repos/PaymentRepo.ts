import { and, eq, desc, isNull } from "drizzle-orm";
import type { Db } from "../db.js";
import { payments } from "../schema.js";
import type { Payment } from "../../types/index.js";

type PaymentRow = typeof payments.$inferSelect;

function toPayment(row: PaymentRow): Payment {
  return {
    id: row.id,
    groupId: row.groupId,
    payerId: row.payerId,
    recipientId: row.recipientId,
    amount: row.amount,
    currency: row.currency,
    description: row.description ?? undefined,
    date: row.paymentDate,
    createdAt: row.createdAt,
    createdBy: row.createdBy,
    deletedAt: row.deletedAt ?? undefined,
  };
}

export class PaymentRepo {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  async create(payment: Omit<Payment, "createdAt">): Promise<Payment> {
    const now = new Date();

    await this.db.insert(payments).values({
      id: payment.id,
      groupId: payment.groupId,
      payerId: payment.payerId,
      recipientId: payment.recipientId,
      amount: payment.amount,
      currency: payment.currency,
      description: payment.description ?? null,
      paymentDate: payment.date,
      createdAt: now,
      createdBy: payment.createdBy,
    });

    return {
      ...payment,
      createdAt: now,
    };
  }

  async findById(id: string): Promise<Payment | null> {
    const payment = this.db.select().from(payments).where(eq(payments.id, id)).get();
    return payment ? toPayment(payment) : null;
  }

  async findByGroupId(groupId: string): Promise<Payment[]> {
    const records = await this.db
      .select()
      .from(payments)
      .where(and(eq(payments.groupId, groupId), isNull(payments.deletedAt)))
      .orderBy(desc(payments.paymentDate), desc(payments.createdAt));

    return records.map(toPayment);
  }

  async softDelete(id: string): Promise<void> {
    await this.db
      .update(payments)
      .set({ deletedAt: new Date() })
      .where(and(eq(payments.id, id), isNull(payments.deletedAt)));
  }

  async restore(id: string): Promise<Payment | null> {
    await this.db.update(payments).set({ deletedAt: null }).where(eq(payments.id, id));
    return this.findById(id);
  }
}
