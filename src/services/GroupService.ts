import { randomUUID } from "node:crypto";
import { AuditRepo, GroupRepo, MemberRepo } from "../storage/index.js";
import {
  ConflictError,
  NotFoundError,
  ValidationError,
  normalizeCurrency,
} from "../engine/index.js";
import type { AuditEntry, Group, Member } from "../types/index.js";
import type { BalanceService } from "./BalanceService.js";

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export class GroupService {
  private groupRepo: GroupRepo;
  private memberRepo: MemberRepo;
  private balanceService: BalanceService;
  private defaultCurrency: string;
  private onChange?: (groupId: string) => void;
  private auditRepo?: AuditRepo;

  constructor(
    groupRepo: GroupRepo,
    memberRepo: MemberRepo,
    balanceService: BalanceService,
    options: {
      defaultCurrency?: string;
      onChange?: (groupId: string) => void;
      auditRepo?: AuditRepo;
    } = {}
  ) {
    this.groupRepo = groupRepo;
    this.memberRepo = memberRepo;
    this.balanceService = balanceService;
    this.defaultCurrency = options.defaultCurrency ?? "VND";
    this.onChange = options.onChange;
    this.auditRepo = options.auditRepo;
  }

  async createGroup(params: {
    id?: string;
    name: string;
    currency?: string;
    creator: Member;
  }): Promise<Group> {
    const name = params.name.trim();
    if (!name) {
      throw new ValidationError("Group name is required");
    }

    const currency = normalizeCurrency(params.currency ?? this.defaultCurrency);
    const creator = await this.ensureMember(params.creator);

    const group = await this.groupRepo.create({
      id: params.id ?? randomUUID(),
      name,
      currency,
      members: [creator.id],
      createdBy: creator.id,
    });

    await this.auditRepo?.record({
      groupId: group.id,
      entityType: "group",
      entityId: group.id,
      action: "create",
      actorId: creator.id,
      after: group,
    });

    return group;
  }

  async getGroup(groupId: string): Promise<Group | null> {
    return this.groupRepo.findById(groupId);
  }

  async requireGroup(groupId: string): Promise<Group> {
    const group = await this.groupRepo.findById(groupId);
    if (!group) {
      throw new NotFoundError("Group", groupId);
    }
    return group;
  }

  async getMembers(groupId: string): Promise<Member[]> {
    const group = await this.requireGroup(groupId);
    return this.memberRepo.findByIds(group.members);
  }

  async addMember(groupId: string, member: Member, actorId?: string): Promise<Member> {
    const group = await this.requireGroup(groupId);
    const stored = await this.ensureMember(member);

    if (!group.members.includes(stored.id)) {
      await this.groupRepo.addMember(groupId, stored.id);
      await this.auditRepo?.record({
        groupId,
        entityType: "group_member",
        entityId: stored.id,
        action: "create",
        actorId,
        after: stored,
      });
      this.onChange?.(groupId);
    }

    return stored;
  }

  /**
   * Remove a member; refused while they still owe or are owed money, including
   * through transactions that cannot be converted yet
   */
  async removeMember(groupId: string, memberId: string, actorId?: string): Promise<void> {
    const group = await this.requireGroup(groupId);
    if (!group.members.includes(memberId)) {
      throw new NotFoundError("Member", memberId);
    }

    const report = await this.balanceService.getGroupBalances(groupId);
    const balance = report.balances.get(memberId) ?? 0;
    if (balance !== 0) {
      throw new ConflictError(
        `Member ${memberId} still has a balance of ${balance} ${report.currency}`
      );
    }

    const unconverted = report.unresolved.filter((t) => t.memberIds.includes(memberId));
    if (unconverted.length > 0) {
      throw new ConflictError(
        `Member ${memberId} is part of ${unconverted.length} transaction(s) without an exchange rate to ${report.currency}`
      );
    }

    const [member] = await this.memberRepo.findByIds([memberId]);
    await this.groupRepo.removeMember(groupId, memberId);
    await this.auditRepo?.record({
      groupId,
      entityType: "group_member",
      entityId: memberId,
      action: "delete",
      actorId,
      before: member ?? { id: memberId },
    });
    this.onChange?.(groupId);
  }

  async updateGroup(
    groupId: string,
    data: { name?: string; currency?: string },
    actorId?: string
  ): Promise<Group> {
    const existing = await this.requireGroup(groupId);

    const update: { name?: string; currency?: string } = {};
    if (data.name !== undefined) {
      const name = data.name.trim();
      if (!name) {
        throw new ValidationError("Group name is required");
      }
      update.name = name;
    }
    if (data.currency !== undefined) {
      update.currency = normalizeCurrency(data.currency);
    }

    const updated = await this.groupRepo.update(groupId, update);
    if (!updated) {
      throw new NotFoundError("Group", groupId);
    }

    await this.auditRepo?.record({
      groupId,
      entityType: "group",
      entityId: groupId,
      action: "update",
      actorId,
      before: existing,
      after: updated,
    });

    if (update.currency !== undefined) {
      this.onChange?.(groupId);
    }

    return updated;
  }

  /**
   * Change history of a group, oldest first
   */
  async getActivity(groupId: string): Promise<AuditEntry[]> {
    await this.requireGroup(groupId);
    return (await this.auditRepo?.findByGroupId(groupId)) ?? [];
  }

  private async ensureMember(member: Member): Promise<Member> {
    // Members are immutable once added, so an existing record wins
    const existing = await this.memberRepo.findById(member.id);
    if (existing) {
      return existing;
    }

    if (!member.displayName.trim()) {
      throw new ValidationError("Member display name is required");
    }
    if (!EMAIL_PATTERN.test(member.email.trim())) {
      throw new ValidationError(`Invalid email: ${member.email}`);
    }

    return this.memberRepo.create({
      id: member.id,
      displayName: member.displayName.trim(),
      email: member.email,
    });
  }
}
