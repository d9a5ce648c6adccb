export { createDatabase, type Db } from "./db.js";
export * from "./schema.js";
export { MemberRepo } from "./repos/MemberRepo.js";
export { GroupRepo } from "./repos/GroupRepo.js";
export { ExpenseRepo } from "./repos/ExpenseRepo.js";
export { PaymentRepo } from "./repos/PaymentRepo.js";
export { ExchangeRateRepo } from "./repos/ExchangeRateRepo.js";
export { AuditRepo } from "./repos/AuditRepo.js";
