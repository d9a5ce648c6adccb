import type {
  BalanceReport,
  BalanceStatus,
  Expense,
  ExchangeRateLookup,
  Member,
  ParticipantShare,
  Payment,
  SettlementSuggestion,
  UnresolvedTransaction,
} from "../types/index.js";
import { ExpenseValidationError, SettlementInvariantError } from "./errors.js";
import { conversionFactor, isSupportedCurrency } from "./currency.js";

export * from "./errors.js";
export * from "./currency.js";
export { filterExpenses, type ExpenseFilterCriteria } from "./filters.js";

/**
 * Split an amount equally among participants
 * Handles rounding by giving remainder to the last person
 * @param amount - Total amount in minor units
 * @param participants - Array of participant member IDs
 * @returns Record mapping memberId to their share
 */
export function splitEqually(
  amount: number,
  participants: string[]
): Record<string, number> {
  if (participants.length === 0) {
    throw new ExpenseValidationError("Cannot split among zero participants");
  }

  const baseShare = Math.floor(amount / participants.length);
  const remainder = amount % participants.length;

  const splits: Record<string, number> = {};

  participants.forEach((memberId, index) => {
    // Give remainder to the last person
    splits[memberId] = baseShare + (index === participants.length - 1 ? remainder : 0);
  });

  return splits;
}

/**
 * Split an amount by percentage shares
 * @param amount - Total amount in minor units
 * @param shares - Record mapping memberId to percentage (must sum to 100)
 * @throws ExpenseValidationError if percentages don't sum to exactly 100
 */
export function splitByPercentage(
  amount: number,
  shares: Record<string, number>
): Record<string, number> {
  const totalPercentage = Object.values(shares).reduce((sum, pct) => sum + pct, 0);

  if (Math.abs(totalPercentage - 100) > 0.001) {
    throw new ExpenseValidationError(`Percentages must sum to 100, got ${totalPercentage}`);
  }

  return allocateByWeight(amount, shares, 100);
}

/**
 * Split an amount by integer weights (e.g. 2 shares for a couple, 1 for a single)
 * @throws ExpenseValidationError if a weight is not a non-negative integer or all are zero
 */
export function splitByShares(
  amount: number,
  weights: Record<string, number>
): Record<string, number> {
  const values = Object.values(weights);

  if (values.length === 0) {
    throw new ExpenseValidationError("Cannot split among zero participants");
  }
  if (values.some((w) => !Number.isInteger(w) || w < 0)) {
    throw new ExpenseValidationError("Shares must be non-negative integers");
  }

  const totalWeight = values.reduce((sum, w) => sum + w, 0);
  if (totalWeight === 0) {
    throw new ExpenseValidationError("Total shares cannot be zero");
  }

  return allocateByWeight(amount, weights, totalWeight);
}

function allocateByWeight(
  amount: number,
  weights: Record<string, number>,
  totalWeight: number
): Record<string, number> {
  const splits: Record<string, number> = {};
  let allocated = 0;
  const memberIds = Object.keys(weights);

  memberIds.forEach((memberId, index) => {
    if (index === memberIds.length - 1) {
      // Give remainder to last person to ensure exact total
      splits[memberId] = amount - allocated;
    } else {
      const share = Math.round((amount * weights[memberId]) / totalWeight);
      splits[memberId] = share;
      allocated += share;
    }
  });

  return splits;
}

/**
 * Split an amount by exact amounts
 * @returns The shares record (validated)
 * @throws ExpenseValidationError if shares don't sum to total amount
 */
export function splitByExactAmounts(
  amount: number,
  shares: Record<string, number>
): Record<string, number> {
  const totalShares = Object.values(shares).reduce((sum, amt) => sum + amt, 0);

  if (totalShares !== amount) {
    throw new ExpenseValidationError(
      `Exact amounts must sum to total (${amount}), got ${totalShares}`
    );
  }

  return shares;
}

export interface BalanceOptions {
  /** Group default currency; balances are expressed in it */
  currency?: string;
  exchangeRates?: ExchangeRateLookup;
}

interface ConvertedExpense {
  amount: number;
  participants: ParticipantShare[];
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Distribute `total` over shares scaled by `factor` using largest remainder,
 * so the converted shares still add up to the converted total.
 */
function allocateConvertedShares(
  shares: ParticipantShare[],
  factor: number,
  total: number
): ParticipantShare[] {
  const exact = shares.map((s) => s.shareAmount * factor);
  const allocated = exact.map((value) => Math.floor(value));
  let remainder = total - allocated.reduce((sum, v) => sum + v, 0);

  const order = shares
    .map((share, index) => ({ index, memberId: share.memberId, fraction: exact[index] - allocated[index] }))
    .sort((a, b) => b.fraction - a.fraction || compareIds(a.memberId, b.memberId));

  for (let k = 0; remainder > 0 && order.length > 0; k += 1) {
    allocated[order[k % order.length].index] += 1;
    remainder -= 1;
  }

  return shares.map((share, index) => ({
    memberId: share.memberId,
    shareAmount: allocated[index],
  }));
}

function convertExpense(
  expense: Expense,
  currency: string,
  lookup: ExchangeRateLookup | undefined
): ConvertedExpense | undefined {
  if (expense.currency === currency) {
    return { amount: expense.amount, participants: expense.participants };
  }

  const factor = resolveFactor(expense.currency, currency, expense.date, lookup);
  if (factor === undefined) {
    return undefined;
  }

  const amount = Math.round(expense.amount * factor);
  const shareTotal = expense.participants.reduce((sum, p) => sum + p.shareAmount, 0);

  if (shareTotal !== expense.amount) {
    // Inconsistent input is converted as-is, never repaired
    return {
      amount,
      participants: expense.participants.map((p) => ({
        memberId: p.memberId,
        shareAmount: Math.round(p.shareAmount * factor),
      })),
    };
  }

  return { amount, participants: allocateConvertedShares(expense.participants, factor, amount) };
}

function resolveFactor(
  from: string,
  to: string,
  date: Date,
  lookup: ExchangeRateLookup | undefined
): number | undefined {
  if (!lookup || !isSupportedCurrency(from) || !isSupportedCurrency(to)) {
    return undefined;
  }

  const rate = lookup(from, to, date);
  if (rate === undefined || !Number.isFinite(rate) || rate <= 0) {
    return undefined;
  }

  return conversionFactor(from, to, rate);
}

/**
 * Compute every member's net balance in the group's default currency.
 *
 * Expenses credit the payer with the full amount and debit each participant
 * their share. Payments credit the payer and debit the recipient. Transactions
 * in another currency are converted through `options.exchangeRates`; those
 * without a rate are left out and reported in `unresolved`.
 *
 * Input is trusted: shares that do not add up to the expense amount are not
 * corrected, so the balances will not sum to zero.
 */
export function computeBalances(
  members: Member[],
  expenses: Expense[],
  payments: Payment[],
  options: BalanceOptions = {}
): BalanceReport {
  const currency =
    options.currency ?? expenses[0]?.currency ?? payments[0]?.currency ?? "USD";
  const balances = new Map<string, number>();
  const unresolved: UnresolvedTransaction[] = [];

  for (const member of members) {
    balances.set(member.id, 0);
  }

  const adjust = (memberId: string, delta: number) => {
    balances.set(memberId, (balances.get(memberId) ?? 0) + delta);
  };

  for (const expense of expenses) {
    const converted = convertExpense(expense, currency, options.exchangeRates);
    if (!converted) {
      unresolved.push({
        kind: "expense",
        id: expense.id,
        currency: expense.currency,
        memberIds: [...new Set([expense.payerId, ...expense.participants.map((p) => p.memberId)])],
      });
      continue;
    }

    // Payer gets credited the full amount
    adjust(expense.payerId, converted.amount);

    // Each participant gets debited their share
    for (const share of converted.participants) {
      adjust(share.memberId, -share.shareAmount);
    }
  }

  for (const payment of payments) {
    let amount = payment.amount;

    if (payment.currency !== currency) {
      const factor = resolveFactor(payment.currency, currency, payment.date, options.exchangeRates);
      if (factor === undefined) {
        unresolved.push({
          kind: "payment",
          id: payment.id,
          currency: payment.currency,
          memberIds: [payment.payerId, payment.recipientId],
        });
        continue;
      }
      amount = Math.round(payment.amount * factor);
    }

    adjust(payment.payerId, amount);
    adjust(payment.recipientId, -amount);
  }

  return {
    currency,
    balances,
    hasMixedCurrencyWarning: unresolved.length > 0,
    unresolved,
  };
}

interface Position {
  memberId: string;
  amount: number; // magnitude, always > 0
}

// Largest amount first, lowest member ID on ties
function takeLargest(positions: Position[]): Position {
  return positions.reduce((best, p) =>
    p.amount > best.amount ||
    (p.amount === best.amount && compareIds(p.memberId, best.memberId) < 0)
      ? p
      : best
  );
}

function remove(positions: Position[], position: Position): void {
  positions.splice(positions.indexOf(position), 1);
}

/**
 * Build a settlement plan with the greedy largest-debtor/largest-creditor match.
 * Produces at most n - 1 transfers for n members with a nonzero balance.
 * @throws SettlementInvariantError if the balances do not sum to zero
 */
export function computeSettlementPlan(
  balances: Map<string, number>
): SettlementSuggestion[] {
  const creditors: Position[] = [];
  const debtors: Position[] = [];

  for (const [memberId, balance] of balances) {
    if (balance > 0) {
      creditors.push({ memberId, amount: balance });
    } else if (balance < 0) {
      debtors.push({ memberId, amount: -balance });
    }
  }

  const plan: SettlementSuggestion[] = [];

  while (creditors.length > 0 && debtors.length > 0) {
    const creditor = takeLargest(creditors);
    const debtor = takeLargest(debtors);
    const amount = Math.min(creditor.amount, debtor.amount);

    plan.push({
      payerId: debtor.memberId,
      recipientId: creditor.memberId,
      amount,
    });

    creditor.amount -= amount;
    debtor.amount -= amount;

    if (creditor.amount === 0) remove(creditors, creditor);
    if (debtor.amount === 0) remove(debtors, debtor);
  }

  if (creditors.length > 0 || debtors.length > 0) {
    const residual = new Map<string, number>();
    for (const c of creditors) residual.set(c.memberId, c.amount);
    for (const d of debtors) residual.set(d.memberId, -d.amount);
    throw new SettlementInvariantError(residual);
  }

  return plan;
}

/**
 * Apply a transfer to balances
 * @returns Updated balances (the input map is left untouched)
 */
export function applyPayment(
  balances: Map<string, number>,
  transfer: SettlementSuggestion
): Map<string, number> {
  const next = new Map(balances);

  // Person paying reduces their negative balance (or increases positive)
  next.set(transfer.payerId, (next.get(transfer.payerId) ?? 0) + transfer.amount);

  // Person receiving reduces their positive balance (or increases negative)
  next.set(transfer.recipientId, (next.get(transfer.recipientId) ?? 0) - transfer.amount);

  return next;
}

export function sumBalances(balances: Map<string, number>): number {
  let total = 0;
  for (const balance of balances.values()) {
    total += balance;
  }
  return total;
}

export function countNonZero(balances: Map<string, number>): number {
  let count = 0;
  for (const balance of balances.values()) {
    if (balance !== 0) count += 1;
  }
  return count;
}

export function balanceStatus(balance: number): BalanceStatus {
  if (balance === 0) return "settled";
  return balance < 0 ? "owes" : "owed";
}
