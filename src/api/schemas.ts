import { z } from "zod";

// Request payload contracts for the REST API. Domain rules (email format,
// split totals, membership) stay in the services.

const requiredText = z.string().trim().min(1, "Required");

const isoDate = z.string().pipe(z.coerce.date());

// Query-string values arrive as strings; an empty one counts as absent
const queryText = z
  .string()
  .optional()
  .transform((value) => value || undefined);

const queryNumber = z.string().min(1).pipe(z.coerce.number()).optional();

export const memberSchema = z.object({
  id: requiredText,
  displayName: requiredText,
  email: requiredText,
});

export const createGroupSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string(),
  currency: z.string().optional(),
  creator: memberSchema,
});

export const updateGroupSchema = z.object({
  name: z.string().optional(),
  currency: z.string().optional(),
  actorId: z.string().min(1).optional(),
});

export const expenseInputSchema = z.object({
  payerId: requiredText,
  amount: z.number().int("Amount must be an integer in minor units"),
  currency: z.string().optional(),
  description: z.string(),
  date: isoDate.optional(),
  splitMethod: z.enum(["equal", "percentage", "exact", "shares"]).default("equal"),
  participants: z.array(z.string()).optional(),
  shares: z.record(z.number().finite()).optional(),
});

export const createExpenseSchema = expenseInputSchema.extend({
  id: z.string().min(1).optional(),
  createdBy: z.string().min(1).optional(),
});

export const updateExpenseSchema = expenseInputSchema.extend({
  actorId: z.string().min(1).optional(),
});

export const paymentSchema = z.object({
  id: z.string().min(1).optional(),
  payerId: requiredText,
  recipientId: requiredText,
  amount: z.number().int("Amount must be an integer in minor units"),
  currency: z.string().optional(),
  description: z.string().optional(),
  date: isoDate.optional(),
  createdBy: z.string().min(1).optional(),
});

export const executeSchema = z.object({
  payerId: requiredText,
  recipientId: requiredText,
  amount: z.number().int("Amount must be an integer in minor units"),
  recordedBy: z.string().min(1).optional(),
});

export const exchangeRateSchema = z.object({
  from: requiredText,
  to: requiredText,
  rate: z.number().positive("Exchange rate must be positive"),
  effectiveDate: isoDate.optional(),
});

export const expenseQuerySchema = z.object({
  q: queryText,
  memberId: queryText,
  from: isoDate.optional(),
  to: isoDate.optional(),
  minAmount: queryNumber,
  maxAmount: queryNumber,
});

export const actorQuerySchema = z.object({
  actorId: queryText,
});
