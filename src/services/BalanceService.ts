import {
  ExchangeRateRepo,
  ExpenseRepo,
  GroupRepo,
  MemberRepo,
  PaymentRepo,
} from "../storage/index.js";
import {
  ConflictError,
  NotFoundError,
  SettlementInvariantError,
  ValidationError,
  balanceStatus,
  computeBalances,
  computeSettlementPlan,
  createRateLookup,
  normalizeCurrency,
} from "../engine/index.js";
import type {
  BalanceReport,
  BalanceStatus,
  ExchangeRate,
  GroupSnapshot,
  Member,
  Payment,
  SettlementSuggestion,
} from "../types/index.js";
import type { PaymentService } from "./PaymentService.js";

export interface BalanceRow {
  memberId: string;
  displayName: string;
  balance: number;
  status: BalanceStatus;
}

export interface SnapshotEvaluation {
  report: BalanceReport;
  plan: SettlementSuggestion[];
}

export function reportForSnapshot(snapshot: GroupSnapshot): BalanceReport {
  return computeBalances(snapshot.members, snapshot.expenses, snapshot.payments, {
    currency: snapshot.group.currency,
    exchangeRates: createRateLookup(snapshot.exchangeRates),
  });
}

/**
 * Run the calculator and planner over one snapshot
 */
export function evaluateSnapshot(snapshot: GroupSnapshot): SnapshotEvaluation {
  const report = reportForSnapshot(snapshot);
  return { report, plan: computeSettlementPlan(report.balances) };
}

/**
 * Pair balances with display names, in member order
 */
export function toBalanceRows(report: BalanceReport, members: Member[]): BalanceRow[] {
  const names = new Map(members.map((m) => [m.id, m.displayName]));

  return Array.from(report.balances.entries()).map(([memberId, balance]) => ({
    memberId,
    displayName: names.get(memberId) ?? memberId,
    balance,
    status: balanceStatus(balance),
  }));
}

export class BalanceService {
  private groupRepo: GroupRepo;
  private memberRepo: MemberRepo;
  private expenseRepo: ExpenseRepo;
  private paymentRepo: PaymentRepo;
  private exchangeRateRepo: ExchangeRateRepo;
  private paymentService: PaymentService;
  // Tail of the pending settlement executions per group
  private settling: Map<string, Promise<void>> = new Map();

  constructor(
    repos: {
      groupRepo: GroupRepo;
      memberRepo: MemberRepo;
      expenseRepo: ExpenseRepo;
      paymentRepo: PaymentRepo;
      exchangeRateRepo: ExchangeRateRepo;
    },
    paymentService: PaymentService
  ) {
    this.groupRepo = repos.groupRepo;
    this.memberRepo = repos.memberRepo;
    this.expenseRepo = repos.expenseRepo;
    this.paymentRepo = repos.paymentRepo;
    this.exchangeRateRepo = repos.exchangeRateRepo;
    this.paymentService = paymentService;
  }

  async getGroupSnapshot(groupId: string): Promise<GroupSnapshot> {
    const group = await this.groupRepo.findById(groupId);
    if (!group) {
      throw new NotFoundError("Group", groupId);
    }

    const [members, expenses, payments, exchangeRates] = await Promise.all([
      this.memberRepo.findByIds(group.members),
      this.expenseRepo.findByGroupId(groupId),
      this.paymentRepo.findByGroupId(groupId),
      this.exchangeRateRepo.findForCurrency(group.currency),
    ]);

    return { group, members, expenses, payments, exchangeRates };
  }

  async getGroupBalances(groupId: string): Promise<BalanceReport> {
    const report = reportForSnapshot(await this.getGroupSnapshot(groupId));

    if (report.hasMixedCurrencyWarning) {
      console.warn(
        `[BalanceService] Group ${groupId} has ${report.unresolved.length} transaction(s) without an exchange rate to ${report.currency}`
      );
    }

    return report;
  }

  async getSettlementPlan(groupId: string): Promise<SettlementSuggestion[]> {
    const report = await this.getGroupBalances(groupId);

    try {
      return computeSettlementPlan(report.balances);
    } catch (error) {
      if (error instanceof SettlementInvariantError) {
        console.error(`[BalanceService] Inconsistent balances in group ${groupId}:`, error.message);
      }
      throw error;
    }
  }

  /**
   * Record a real payment for a suggested transfer. A smaller amount records a
   * partial settlement; the next plan shrinks accordingly.
   *
   * Executions for the same group run one at a time, each against the plan
   * left by the previous one.
   */
  executeSuggestion(
    groupId: string,
    suggestion: SettlementSuggestion,
    recordedBy?: string
  ): Promise<Payment> {
    return this.serialize(groupId, () => this.settle(groupId, suggestion, recordedBy));
  }

  private async settle(
    groupId: string,
    suggestion: SettlementSuggestion,
    recordedBy?: string
  ): Promise<Payment> {
    const plan = await this.getSettlementPlan(groupId);
    const match = plan.find(
      (s) => s.payerId === suggestion.payerId && s.recipientId === suggestion.recipientId
    );

    if (!match) {
      throw new ConflictError(
        `No suggested payment from ${suggestion.payerId} to ${suggestion.recipientId}`
      );
    }
    if (suggestion.amount > match.amount) {
      throw new ConflictError(
        `Amount ${suggestion.amount} exceeds suggested ${match.amount}`
      );
    }

    // Suggestions are in the group currency, which recordPayment defaults to
    return this.paymentService.recordPayment({
      groupId,
      payerId: suggestion.payerId,
      recipientId: suggestion.recipientId,
      amount: suggestion.amount,
      description: "Settlement",
      createdBy: recordedBy,
    });
  }

  private serialize<T>(groupId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.settling.get(groupId) ?? Promise.resolve();
    const run = previous.then(task);
    // The caller sees the rejection through `run`; the chain only tracks completion
    const tail = run.then(
      () => undefined,
      () => undefined
    );

    this.settling.set(groupId, tail);
    void tail.then(() => {
      if (this.settling.get(groupId) === tail) {
        this.settling.delete(groupId);
      }
    });

    return run;
  }

  async setExchangeRate(rate: ExchangeRate): Promise<ExchangeRate> {
    if (!Number.isFinite(rate.rate) || rate.rate <= 0) {
      throw new ValidationError("Exchange rate must be a positive number");
    }

    const from = normalizeCurrency(rate.from);
    const to = normalizeCurrency(rate.to);
    if (from === to) {
      throw new ValidationError("Exchange rate needs two different currencies");
    }

    return this.exchangeRateRepo.upsert({ ...rate, from, to });
  }
}
