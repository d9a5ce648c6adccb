import { eq, inArray } from "drizzle-orm";
import type { Db } from "../db.js";
import { members } from "../schema.js";
import type { Member } from "../../types/index.js";

type MemberRow = typeof members.$inferSelect;

function toMember(row: MemberRow): Member {
  return {
    id: row.id,
    displayName: row.displayName,
    email: row.email,
  };
}

export class MemberRepo {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  async create(member: Member): Promise<Member> {
    const normalizedEmail = member.email.trim().toLowerCase();

    await this.db.insert(members).values({
      id: member.id,
      displayName: member.displayName,
      email: normalizedEmail,
      createdAt: new Date(),
    });

    return {
      ...member,
      email: normalizedEmail,
    };
  }

  async findById(id: string): Promise<Member | null> {
    const result = this.db.select().from(members).where(eq(members.id, id)).get();
    return result ? toMember(result) : null;
  }

  async findByIds(ids: string[]): Promise<Member[]> {
    if (ids.length === 0) {
      return [];
    }

    const rows = await this.db.select().from(members).where(inArray(members.id, ids));
    const byId = new Map(rows.map((row) => [row.id, toMember(row)]));

    // Preserve the caller's order
    return ids.flatMap((id) => byId.get(id) ?? []);
  }
}
