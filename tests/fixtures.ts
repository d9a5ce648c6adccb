import type { Expense, Member, Payment } from "../src/types/index.js";

export const DAY = new Date("2026-03-14T12:00:00.000Z");

export function member(id: string, displayName = id): Member {
  return { id, displayName, email: `${id.toLowerCase()}@test.com` };
}

export function expense(
  id: string,
  payerId: string,
  shares: Record<string, number>,
  overrides: Partial<Expense> = {}
): Expense {
  const participants = Object.entries(shares).map(([memberId, shareAmount]) => ({
    memberId,
    shareAmount,
  }));

  return {
    id,
    groupId: "grp1",
    payerId,
    amount: participants.reduce((sum, p) => sum + p.shareAmount, 0),
    currency: "VND",
    description: `Expense ${id}`,
    date: DAY,
    participants,
    splitMethod: "exact",
    createdAt: DAY,
    createdBy: payerId,
    ...overrides,
  };
}

export function payment(
  id: string,
  payerId: string,
  recipientId: string,
  amount: number,
  overrides: Partial<Payment> = {}
): Payment {
  return {
    id,
    groupId: "grp1",
    payerId,
    recipientId,
    amount,
    currency: "VND",
    date: DAY,
    createdAt: DAY,
    createdBy: payerId,
    ...overrides,
  };
}
