import { sqliteTable, text, integer, real, uniqueIndex } from "drizzle-orm/sqlite-core";

export const members = sqliteTable("members", {
  id: text("id").primaryKey(),
  displayName: text("display_name").notNull(),
  email: text("email").notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
});

export const groups = sqliteTable("groups", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  currency: text("currency").notNull().default("VND"),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  createdBy: text("created_by").notNull().references(() => members.id),
});

export const groupMembers = sqliteTable(
  "group_members",
  {
    id: text("id").primaryKey(),
    groupId: text("group_id").notNull().references(() => groups.id, { onDelete: "cascade" }),
    memberId: text("member_id").notNull().references(() => members.id, { onDelete: "cascade" }),
    joinedAt: integer("joined_at", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => ({
    groupMemberUnique: uniqueIndex("group_members_group_member_idx").on(table.groupId, table.memberId),
  })
);

export const expenses = sqliteTable("expenses", {
  id: text("id").primaryKey(),
  groupId: text("group_id").notNull().references(() => groups.id, { onDelete: "cascade" }),
  payerId: text("payer_id").notNull().references(() => members.id),
  amount: integer("amount").notNull(), // minor units
  currency: text("currency").notNull(),
  description: text("description").notNull(),
  splitMethod: text("split_method", { enum: ["equal", "percentage", "exact", "shares"] }).notNull(),
  expenseDate: integer("expense_date", { mode: "timestamp_ms" }).notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  createdBy: text("created_by").notNull().references(() => members.id),
  deletedAt: integer("deleted_at", { mode: "timestamp_ms" }),
});

export const expenseParticipants = sqliteTable("expense_participants", {
  id: text("id").primaryKey(),
  expenseId: text("expense_id").notNull().references(() => expenses.id, { onDelete: "cascade" }),
  memberId: text("member_id").notNull().references(() => members.id),
  shareAmount: integer("share_amount").notNull(), // minor units
});

export const payments = sqliteTable("payments", {
  id: text("id").primaryKey(),
  groupId: text("group_id").notNull().references(() => groups.id, { onDelete: "cascade" }),
  payerId: text("payer_id").notNull().references(() => members.id),
  recipientId: text("recipient_id").notNull().references(() => members.id),
  amount: integer("amount").notNull(), // minor units
  currency: text("currency").notNull(),
  description: text("description"),
  paymentDate: integer("payment_date", { mode: "timestamp_ms" }).notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  createdBy: text("created_by").notNull().references(() => members.id),
  deletedAt: integer("deleted_at", { mode: "timestamp_ms" }),
});

export const exchangeRates = sqliteTable(
  "exchange_rates",
  {
    id: text("id").primaryKey(),
    fromCurrency: text("from_currency").notNull(),
    toCurrency: text("to_currency").notNull(),
    rate: real("rate").notNull(),
    effectiveDate: integer("effective_date", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => ({
    pairDateUnique: uniqueIndex("exchange_rates_pair_date_idx").on(
      table.fromCurrency,
      table.toCurrency,
      table.effectiveDate
    ),
  })
);

export const auditLogs = sqliteTable("audit_logs", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  groupId: text("group_id").notNull().references(() => groups.id, { onDelete: "cascade" }),
  entityType: text("entity_type", {
    enum: ["group", "group_member", "expense", "payment"],
  }).notNull(),
  entityId: text("entity_id").notNull(),
  action: text("action", { enum: ["create", "update", "delete", "restore"] }).notNull(),
  actorId: text("actor_id"),
  beforeState: text("before_state", { mode: "json" }),
  afterState: text("after_state", { mode: "json" }),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
});
