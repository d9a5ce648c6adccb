import type { Expense, Member } from "../types/index.js";

export interface ExpenseFilterCriteria {
  /** Matches description, amount digits, or payer/participant display name */
  query?: string;
  startDate?: Date;
  endDate?: Date;
  /** Keeps expenses the member paid for or takes part in */
  memberId?: string;
  minAmount?: number;
  maxAmount?: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function startOfUtcDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

function matchesQuery(
  expense: Expense,
  query: string,
  namesById: Map<string, string>
): boolean {
  if (expense.description.toLowerCase().includes(query)) {
    return true;
  }

  if (String(expense.amount).includes(query)) {
    return true;
  }

  const involved = [expense.payerId, ...expense.participants.map((p) => p.memberId)];
  return involved.some((id) => (namesById.get(id) ?? "").toLowerCase().includes(query));
}

/**
 * Filter expenses by any combination of criteria. Date bounds cover whole UTC days.
 */
export function filterExpenses(
  expenses: Expense[],
  criteria: ExpenseFilterCriteria,
  members: Member[] = []
): Expense[] {
  const query = criteria.query?.trim().toLowerCase() ?? "";
  const namesById = new Map(members.map((m) => [m.id, m.displayName]));
  const from = criteria.startDate ? startOfUtcDay(criteria.startDate) : undefined;
  const until = criteria.endDate ? startOfUtcDay(criteria.endDate) + DAY_MS : undefined;
  const memberId = criteria.memberId?.trim();

  return expenses.filter((expense) => {
    if (query && !matchesQuery(expense, query, namesById)) {
      return false;
    }

    const time = expense.date.getTime();
    if (from !== undefined && time < from) return false;
    if (until !== undefined && time >= until) return false;

    if (
      memberId &&
      expense.payerId !== memberId &&
      !expense.participants.some((p) => p.memberId === memberId)
    ) {
      return false;
    }

    if (criteria.minAmount !== undefined && expense.amount < criteria.minAmount) return false;
    if (criteria.maxAmount !== undefined && expense.amount > criteria.maxAmount) return false;

    return true;
  });
}
