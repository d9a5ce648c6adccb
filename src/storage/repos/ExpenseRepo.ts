import { randomUUID } from "node:crypto";
import { and, eq, desc, asc, inArray, isNull } from "drizzle-orm";
import type { Db } from "../db.js";
import { expenses, expenseParticipants } from "../schema.js";
import type { Expense, ParticipantShare } from "../../types/index.js";

type ExpenseRow = typeof expenses.$inferSelect;

export type ExpenseUpdate = Pick<
  Expense,
  "payerId" | "amount" | "currency" | "description" | "date" | "participants" | "splitMethod"
>;

function toExpense(row: ExpenseRow, participants: ParticipantShare[]): Expense {
  return {
    id: row.id,
    groupId: row.groupId,
    payerId: row.payerId,
    amount: row.amount,
    currency: row.currency,
    description: row.description,
    date: row.expenseDate,
    participants,
    splitMethod: row.splitMethod,
    createdAt: row.createdAt,
    createdBy: row.createdBy,
    deletedAt: row.deletedAt ?? undefined,
  };
}

function participantRows(expenseId: string, participants: ParticipantShare[]) {
  return participants.map((p) => ({
    id: randomUUID(),
    expenseId,
    memberId: p.memberId,
    shareAmount: p.shareAmount,
  }));
}

export class ExpenseRepo {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  async create(expense: Omit<Expense, "createdAt">): Promise<Expense> {
    const now = new Date();

    this.db.transaction((tx) => {
      tx.insert(expenses)
        .values({
          id: expense.id,
          groupId: expense.groupId,
          payerId: expense.payerId,
          amount: expense.amount,
          currency: expense.currency,
          description: expense.description,
          splitMethod: expense.splitMethod,
          expenseDate: expense.date,
          createdAt: now,
          createdBy: expense.createdBy,
        })
        .run();

      if (expense.participants.length > 0) {
        tx.insert(expenseParticipants)
          .values(participantRows(expense.id, expense.participants))
          .run();
      }
    });

    return {
      ...expense,
      createdAt: now,
    };
  }

  async findById(id: string): Promise<Expense | null> {
    const expense = this.db.select().from(expenses).where(eq(expenses.id, id)).get();

    if (!expense) return null;

    const participants = await this.loadParticipants([id]);
    return toExpense(expense, participants.get(id) ?? []);
  }

  /**
   * Active (not soft-deleted) expenses of a group, newest first
   */
  async findByGroupId(groupId: string): Promise<Expense[]> {
    const rows = await this.db
      .select()
      .from(expenses)
      .where(and(eq(expenses.groupId, groupId), isNull(expenses.deletedAt)))
      .orderBy(desc(expenses.expenseDate), desc(expenses.createdAt));

    const participants = await this.loadParticipants(rows.map((r) => r.id));
    return rows.map((row) => toExpense(row, participants.get(row.id) ?? []));
  }

  /**
   * Replace an expense with a new version under the same id; shares are swapped wholesale
   */
  async update(id: string, data: ExpenseUpdate): Promise<Expense | null> {
    this.db.transaction((tx) => {
      tx.update(expenses)
        .set({
          payerId: data.payerId,
          amount: data.amount,
          currency: data.currency,
          description: data.description,
          splitMethod: data.splitMethod,
          expenseDate: data.date,
        })
        .where(eq(expenses.id, id))
        .run();

      tx.delete(expenseParticipants).where(eq(expenseParticipants.expenseId, id)).run();

      if (data.participants.length > 0) {
        tx.insert(expenseParticipants).values(participantRows(id, data.participants)).run();
      }
    });

    return this.findById(id);
  }

  async softDelete(id: string): Promise<void> {
    await this.db
      .update(expenses)
      .set({ deletedAt: new Date() })
      .where(and(eq(expenses.id, id), isNull(expenses.deletedAt)));
  }

  async restore(id: string): Promise<Expense | null> {
    await this.db.update(expenses).set({ deletedAt: null }).where(eq(expenses.id, id));
    return this.findById(id);
  }

  private async loadParticipants(expenseIds: string[]): Promise<Map<string, ParticipantShare[]>> {
    const byExpense = new Map<string, ParticipantShare[]>();
    if (expenseIds.length === 0) {
      return byExpense;
    }

    const rows = await this.db
      .select()
      .from(expenseParticipants)
      .where(inArray(expenseParticipants.expenseId, expenseIds))
      .orderBy(asc(expenseParticipants.memberId));

    for (const row of rows) {
      const list = byExpense.get(row.expenseId) ?? [];
      list.push({ memberId: row.memberId, shareAmount: row.shareAmount });
      byExpense.set(row.expenseId, list);
    }

    return byExpense;
  }
}
