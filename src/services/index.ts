import {
  AuditRepo,
  ExchangeRateRepo,
  ExpenseRepo,
  GroupRepo,
  MemberRepo,
  PaymentRepo,
  type Db,
} from "../storage/index.js";
import { BalanceService } from "./BalanceService.js";
import { ExpenseService } from "./ExpenseService.js";
import { ExportService } from "./ExportService.js";
import { GroupService } from "./GroupService.js";
import { LiveBalanceFeed, type LiveBalanceResult } from "./LiveBalanceFeed.js";
import { PaymentService } from "./PaymentService.js";

export { BalanceService, evaluateSnapshot, reportForSnapshot, toBalanceRows } from "./BalanceService.js";
export type { BalanceRow, SnapshotEvaluation } from "./BalanceService.js";
export { ExpenseService, type ExpenseInput } from "./ExpenseService.js";
export { ExportService, escapeCsv, renderGroupCsv } from "./ExportService.js";
export { GroupService } from "./GroupService.js";
export { LiveBalanceFeed } from "./LiveBalanceFeed.js";
export type {
  LiveBalanceFailure,
  LiveBalanceFeedConfig,
  LiveBalanceResult,
} from "./LiveBalanceFeed.js";
export { PaymentService } from "./PaymentService.js";

export interface Services {
  groupService: GroupService;
  expenseService: ExpenseService;
  paymentService: PaymentService;
  balanceService: BalanceService;
  exportService: ExportService;
  liveFeed: LiveBalanceFeed;
}

/**
 * Wire repositories and services over one database. Every mutation pushes
 * the affected group through the live feed.
 */
export function createServices(
  db: Db,
  options: {
    defaultCurrency?: string;
    onResult?: (result: LiveBalanceResult) => void;
  } = {}
): Services {
  const memberRepo = new MemberRepo(db);
  const groupRepo = new GroupRepo(db);
  const expenseRepo = new ExpenseRepo(db);
  const paymentRepo = new PaymentRepo(db);
  const exchangeRateRepo = new ExchangeRateRepo(db);
  const auditRepo = new AuditRepo(db);

  let liveFeed: LiveBalanceFeed | undefined;
  const onChange = (groupId: string) => {
    // push() never rejects; failures go to the feed's onError
    void liveFeed?.push(groupId);
  };

  const paymentService = new PaymentService(paymentRepo, groupRepo, { onChange, auditRepo });
  const balanceService = new BalanceService(
    { groupRepo, memberRepo, expenseRepo, paymentRepo, exchangeRateRepo },
    paymentService
  );

  liveFeed = new LiveBalanceFeed({
    loadSnapshot: (groupId) => balanceService.getGroupSnapshot(groupId),
    onResult: options.onResult,
  });

  return {
    groupService: new GroupService(groupRepo, memberRepo, balanceService, {
      defaultCurrency: options.defaultCurrency,
      onChange,
      auditRepo,
    }),
    expenseService: new ExpenseService(expenseRepo, groupRepo, memberRepo, {
      onChange,
      auditRepo,
    }),
    paymentService,
    balanceService,
    exportService: new ExportService(balanceService),
    liveFeed,
  };
}
