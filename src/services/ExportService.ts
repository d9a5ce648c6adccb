import { formatAmount } from "../engine/index.js";
import { reportForSnapshot, toBalanceRows, type BalanceService } from "./BalanceService.js";
import type { GroupSnapshot } from "../types/index.js";

export function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function row(values: string[]): string {
  return values.map(escapeCsv).join(",");
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

const STATUS_LABELS = { owes: "Owes", owed: "Is owed", settled: "Settled" } as const;

/**
 * Render a group as a sectioned CSV document: members, expenses, payments, balances
 */
export function renderGroupCsv(snapshot: GroupSnapshot, generatedAt: Date): string {
  const { group, members } = snapshot;
  const names = new Map(members.map((m) => [m.id, m.displayName]));
  const nameOf = (id: string) => names.get(id) ?? id;
  const report = reportForSnapshot(snapshot);

  const lines: string[] = [
    row(["Group", group.name]),
    row(["Generated", generatedAt.toISOString()]),
    row(["Currency", group.currency]),
    "",
    "MEMBERS",
    row(["Name", "Email"]),
    ...members.map((m) => row([m.displayName, m.email])),
    "",
    "EXPENSES",
    row(["Date", "Description", "Amount", "Currency", "Payer", "Participants"]),
    ...snapshot.expenses.map((e) =>
      row([
        isoDate(e.date),
        e.description,
        formatAmount(e.amount, e.currency),
        e.currency,
        nameOf(e.payerId),
        e.participants.map((p) => nameOf(p.memberId)).join(";"),
      ])
    ),
    "",
    "PAYMENTS",
    row(["Date", "Payer", "Recipient", "Amount", "Currency", "Description"]),
    ...snapshot.payments.map((p) =>
      row([
        isoDate(p.date),
        nameOf(p.payerId),
        nameOf(p.recipientId),
        formatAmount(p.amount, p.currency),
        p.currency,
        p.description ?? "",
      ])
    ),
    "",
    "BALANCES",
    row(["Member", "Balance", "Currency", "Status"]),
    ...toBalanceRows(report, members).map((b) =>
      row([
        b.displayName,
        formatAmount(b.balance, report.currency),
        report.currency,
        STATUS_LABELS[b.status],
      ])
    ),
  ];

  if (report.hasMixedCurrencyWarning) {
    lines.push("", row(["Warning", "Some transactions use currencies without an exchange rate"]));
  }

  return lines.join("\n") + "\n";
}

export class ExportService {
  private balanceService: BalanceService;

  constructor(balanceService: BalanceService) {
    this.balanceService = balanceService;
  }

  async exportGroupCsv(groupId: string, generatedAt: Date = new Date()): Promise<string> {
    const snapshot = await this.balanceService.getGroupSnapshot(groupId);
    return renderGroupCsv(snapshot, generatedAt);
  }
}
