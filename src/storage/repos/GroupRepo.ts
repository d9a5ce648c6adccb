import { randomUUID } from "node:crypto";
import { eq, and, asc } from "drizzle-orm";
import type { Db } from "../db.js";
import { groups, groupMembers } from "../schema.js";
import type { Group } from "../../types/index.js";

export class GroupRepo {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  async create(group: Omit<Group, "createdAt">): Promise<Group> {
    const now = new Date();

    await this.db.insert(groups).values({
      id: group.id,
      name: group.name,
      currency: group.currency,
      createdBy: group.createdBy,
      createdAt: now,
    });

    // Add members
    if (group.members.length > 0) {
      await this.db.insert(groupMembers).values(
        group.members.map((memberId) => ({
          id: randomUUID(),
          groupId: group.id,
          memberId,
          joinedAt: now,
        }))
      );
    }

    return {
      ...group,
      createdAt: now,
    };
  }

  async findById(id: string): Promise<Group | null> {
    const group = this.db.select().from(groups).where(eq(groups.id, id)).get();

    if (!group) return null;

    const memberRows = await this.db
      .select({ memberId: groupMembers.memberId })
      .from(groupMembers)
      .where(eq(groupMembers.groupId, id))
      .orderBy(asc(groupMembers.joinedAt), asc(groupMembers.memberId));

    return {
      id: group.id,
      name: group.name,
      currency: group.currency,
      members: memberRows.map((m) => m.memberId),
      createdAt: group.createdAt,
      createdBy: group.createdBy,
    };
  }

  async addMember(groupId: string, memberId: string): Promise<void> {
    await this.db
      .insert(groupMembers)
      .values({
        id: randomUUID(),
        groupId,
        memberId,
        joinedAt: new Date(),
      })
      .onConflictDoNothing({ target: [groupMembers.groupId, groupMembers.memberId] });
  }

  async removeMember(groupId: string, memberId: string): Promise<void> {
    await this.db
      .delete(groupMembers)
      .where(and(eq(groupMembers.groupId, groupId), eq(groupMembers.memberId, memberId)));
  }

  async update(
    id: string,
    data: Partial<Pick<Group, "name" | "currency">>
  ): Promise<Group | null> {
    if (Object.keys(data).length === 0) {
      return this.findById(id);
    }

    await this.db.update(groups).set(data).where(eq(groups.id, id));
    return this.findById(id);
  }
}
