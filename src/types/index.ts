// All amounts are INTEGERS in the currency's minor unit (cents, or whole units for VND/JPY)
export type SplitMethod = "equal" | "percentage" | "exact" | "shares";

export interface Member {
  id: string;
  displayName: string;
  email: string;
}

export interface Group {
  id: string;
  name: string;
  currency: string; // default currency code
  members: string[]; // Member IDs
  createdAt: Date;
  createdBy: string; // Member ID
}

export interface ParticipantShare {
  memberId: string;
  shareAmount: number;
}

export interface Expense {
  id: string;
  groupId: string;
  payerId: string;
  amount: number;
  currency: string;
  description: string;
  date: Date;
  participants: ParticipantShare[];
  splitMethod: SplitMethod;
  createdAt: Date;
  createdBy: string;
  deletedAt?: Date; // soft-deleted expenses are left out of balances
}

export interface Payment {
  id: string;
  groupId: string;
  payerId: string;
  recipientId: string;
  amount: number;
  currency: string;
  description?: string;
  date: Date;
  createdAt: Date;
  createdBy: string;
  deletedAt?: Date;
}

export interface SettlementSuggestion {
  payerId: string;
  recipientId: string;
  amount: number; // always > 0
}

export interface ExchangeRate {
  from: string;
  to: string;
  rate: number; // major units of `to` per major unit of `from`
  effectiveDate: Date;
}

export type ExchangeRateLookup = (
  from: string,
  to: string,
  date: Date
) => number | undefined;

export interface UnresolvedTransaction {
  kind: "expense" | "payment";
  id: string;
  currency: string;
  memberIds: string[]; // payer and participants, or payer and recipient
}

export interface BalanceReport {
  currency: string;
  balances: Map<string, number>; // positive = owed money, negative = owes money
  hasMixedCurrencyWarning: boolean;
  unresolved: UnresolvedTransaction[];
}

export type BalanceStatus = "owes" | "owed" | "settled";

export interface GroupSnapshot {
  group: Group;
  members: Member[];
  expenses: Expense[];
  payments: Payment[];
  exchangeRates: ExchangeRate[];
}

export type AuditEntityType = "group" | "group_member" | "expense" | "payment";
export type AuditAction = "create" | "update" | "delete" | "restore";

export interface AuditEntry {
  id: number;
  groupId: string;
  entityType: AuditEntityType;
  entityId: string;
  action: AuditAction;
  actorId?: string;
  before?: unknown;
  after?: unknown;
  createdAt: Date;
}
