import { randomUUID } from "node:crypto";
import { AuditRepo, ExpenseRepo, GroupRepo, MemberRepo } from "../storage/index.js";
import {
  ConflictError,
  ExpenseValidationError,
  NotFoundError,
  filterExpenses,
  normalizeCurrency,
  splitByExactAmounts,
  splitByPercentage,
  splitByShares,
  splitEqually,
  type ExpenseFilterCriteria,
} from "../engine/index.js";
import type { Expense, Group, ParticipantShare, SplitMethod } from "../types/index.js";

const MAX_DESCRIPTION_LENGTH = 200;

export interface ExpenseInput {
  payerId: string;
  amount: number;
  currency?: string; // defaults to the group currency
  description: string;
  date?: Date;
  splitMethod: SplitMethod;
  participants?: string[]; // For equal splits
  shares?: Record<string, number>; // For percentage, exact or shares splits
}

export class ExpenseService {
  private expenseRepo: ExpenseRepo;
  private groupRepo: GroupRepo;
  private memberRepo: MemberRepo;
  private onChange?: (groupId: string) => void;
  private auditRepo?: AuditRepo;

  constructor(
    expenseRepo: ExpenseRepo,
    groupRepo: GroupRepo,
    memberRepo: MemberRepo,
    options: { onChange?: (groupId: string) => void; auditRepo?: AuditRepo } = {}
  ) {
    this.expenseRepo = expenseRepo;
    this.groupRepo = groupRepo;
    this.memberRepo = memberRepo;
    this.onChange = options.onChange;
    this.auditRepo = options.auditRepo;
  }

  async createExpense(
    params: ExpenseInput & { id?: string; groupId: string; createdBy?: string }
  ): Promise<Expense> {
    const group = await this.requireGroup(params.groupId);
    const fields = this.buildExpenseFields(group, params);

    const expense = await this.expenseRepo.create({
      id: params.id ?? randomUUID(),
      groupId: group.id,
      ...fields,
      createdBy: params.createdBy ?? params.payerId,
    });

    await this.auditRepo?.record({
      groupId: group.id,
      entityType: "expense",
      entityId: expense.id,
      action: "create",
      actorId: expense.createdBy,
      after: expense,
    });

    this.onChange?.(group.id);
    return expense;
  }

  /**
   * Edit an expense. The stored record is replaced by a new version with the same id.
   */
  async updateExpense(
    groupId: string,
    expenseId: string,
    params: ExpenseInput,
    actorId?: string
  ): Promise<Expense> {
    const existing = await this.requireActiveExpense(groupId, expenseId);
    const group = await this.requireGroup(groupId);

    const updated = await this.expenseRepo.update(expenseId, this.buildExpenseFields(group, params));
    if (!updated) {
      throw new NotFoundError("Expense", expenseId);
    }

    await this.auditRepo?.record({
      groupId,
      entityType: "expense",
      entityId: expenseId,
      action: "update",
      actorId,
      before: existing,
      after: updated,
    });

    this.onChange?.(groupId);
    return updated;
  }

  async getExpense(expenseId: string): Promise<Expense | null> {
    const expense = await this.expenseRepo.findById(expenseId);
    return expense && !expense.deletedAt ? expense : null;
  }

  async getGroupExpenses(
    groupId: string,
    criteria: ExpenseFilterCriteria = {}
  ): Promise<Expense[]> {
    const group = await this.requireGroup(groupId);
    const expenses = await this.expenseRepo.findByGroupId(groupId);

    if (Object.values(criteria).every((value) => value === undefined)) {
      return expenses;
    }

    const members = await this.memberRepo.findByIds(group.members);
    return filterExpenses(expenses, criteria, members);
  }

  /**
   * Soft-delete an expense; it drops out of balances until restored
   */
  async deleteExpense(groupId: string, expenseId: string, actorId?: string): Promise<void> {
    const existing = await this.requireActiveExpense(groupId, expenseId);

    await this.expenseRepo.softDelete(expenseId);
    await this.auditRepo?.record({
      groupId,
      entityType: "expense",
      entityId: expenseId,
      action: "delete",
      actorId,
      before: existing,
    });

    this.onChange?.(groupId);
  }

  async restoreExpense(groupId: string, expenseId: string, actorId?: string): Promise<Expense> {
    const existing = await this.expenseRepo.findById(expenseId);
    if (!existing || existing.groupId !== groupId) {
      throw new NotFoundError("Expense", expenseId);
    }
    if (!existing.deletedAt) {
      throw new ConflictError(`Expense ${expenseId} is not deleted`);
    }

    const group = await this.requireGroup(groupId);
    const involved = [existing.payerId, ...existing.participants.map((p) => p.memberId)];
    const departed = involved.find((id) => !group.members.includes(id));
    if (departed) {
      throw new ConflictError(`Member ${departed} is no longer in the group`);
    }

    const restored = await this.expenseRepo.restore(expenseId);
    if (!restored) {
      throw new NotFoundError("Expense", expenseId);
    }

    await this.auditRepo?.record({
      groupId,
      entityType: "expense",
      entityId: expenseId,
      action: "restore",
      actorId,
      after: restored,
    });

    this.onChange?.(groupId);
    return restored;
  }

  // Expenses of other groups and deleted ones are reported as missing
  private async requireActiveExpense(groupId: string, expenseId: string): Promise<Expense> {
    const existing = await this.expenseRepo.findById(expenseId);
    if (!existing || existing.groupId !== groupId || existing.deletedAt) {
      throw new NotFoundError("Expense", expenseId);
    }
    return existing;
  }

  private async requireGroup(groupId: string): Promise<Group> {
    const group = await this.groupRepo.findById(groupId);
    if (!group) {
      throw new NotFoundError("Group", groupId);
    }
    return group;
  }

  private buildExpenseFields(group: Group, params: ExpenseInput) {
    if (!Number.isInteger(params.amount) || params.amount <= 0) {
      throw new ExpenseValidationError("Amount must be a positive integer in minor units");
    }

    const description = params.description.trim();
    if (!description) {
      throw new ExpenseValidationError("Description is required");
    }
    if (description.length > MAX_DESCRIPTION_LENGTH) {
      throw new ExpenseValidationError(
        `Description cannot exceed ${MAX_DESCRIPTION_LENGTH} characters`
      );
    }

    if (!group.members.includes(params.payerId)) {
      throw new ExpenseValidationError(`Payer ${params.payerId} is not a member of the group`);
    }

    const participants = this.computeShares(params);
    for (const share of participants) {
      if (!group.members.includes(share.memberId)) {
        throw new ExpenseValidationError(
          `Participant ${share.memberId} is not a member of the group`
        );
      }
      if (!Number.isInteger(share.shareAmount) || share.shareAmount < 0) {
        throw new ExpenseValidationError(
          `Share for ${share.memberId} must be a non-negative integer`
        );
      }
    }

    const shareTotal = participants.reduce((sum, p) => sum + p.shareAmount, 0);
    if (shareTotal !== params.amount) {
      throw new ExpenseValidationError(
        `Shares must sum to total (${params.amount}), got ${shareTotal}`
      );
    }

    return {
      payerId: params.payerId,
      amount: params.amount,
      currency: normalizeCurrency(params.currency ?? group.currency),
      description,
      date: params.date ?? new Date(),
      participants,
      splitMethod: params.splitMethod,
    };
  }

  private computeShares(params: ExpenseInput): ParticipantShare[] {
    // Calculate splits based on method
    let splits: Record<string, number>;

    switch (params.splitMethod) {
      case "equal": {
        const participants = params.participants ?? [];
        if (new Set(participants).size !== participants.length) {
          throw new ExpenseValidationError("Participants must be unique");
        }
        splits = splitEqually(params.amount, participants);
        break;
      }

      case "percentage":
        if (!params.shares) {
          throw new ExpenseValidationError("Shares required for percentage split");
        }
        splits = splitByPercentage(params.amount, params.shares);
        break;

      case "exact":
        if (!params.shares) {
          throw new ExpenseValidationError("Shares required for exact split");
        }
        splits = splitByExactAmounts(params.amount, params.shares);
        break;

      case "shares":
        if (!params.shares) {
          throw new ExpenseValidationError("Shares required for shares split");
        }
        splits = splitByShares(params.amount, params.shares);
        break;

      default:
        throw new ExpenseValidationError(`Unknown split method: ${String(params.splitMethod)}`);
    }

    return Object.entries(splits).map(([memberId, shareAmount]) => ({ memberId, shareAmount }));
  }
}
