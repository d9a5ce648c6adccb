import express, { type NextFunction, type Request, type Response } from "express";
import { ZodError } from "zod";
import { AppError } from "../engine/index.js";
import { toBalanceRows, type Services } from "../services/index.js";
import type { BalanceReport, Member } from "../types/index.js";
import {
  actorQuerySchema,
  createExpenseSchema,
  createGroupSchema,
  exchangeRateSchema,
  executeSchema,
  expenseQuerySchema,
  memberSchema,
  paymentSchema,
  updateExpenseSchema,
  updateGroupSchema,
} from "./schemas.js";

type Handler = (req: Request, res: Response) => Promise<void>;

// express 4 does not forward rejected promises to the error middleware
function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function balancesJson(report: BalanceReport, members: Member[]) {
  const rows = toBalanceRows(report, members);
  return {
    currency: report.currency,
    balances: rows,
    total: rows.reduce((sum, r) => sum + r.balance, 0),
    hasMixedCurrencyWarning: report.hasMixedCurrencyWarning,
    unresolved: report.unresolved,
  };
}

export function createApp(services: Services) {
  const { groupService, expenseService, paymentService, balanceService, exportService, liveFeed } =
    services;
  const app = express();

  app.use(express.json());

  // Health check
  app.get("/health", (req, res) => {
    res.json({ status: "ok" });
  });

  app.post(
    "/groups",
    route(async (req, res) => {
      const group = await groupService.createGroup(createGroupSchema.parse(req.body));
      res.status(201).json(group);
    })
  );

  app.get(
    "/groups/:id",
    route(async (req, res) => {
      const group = await groupService.requireGroup(req.params.id);
      const members = await groupService.getMembers(group.id);
      res.json({ ...group, members });
    })
  );

  app.patch(
    "/groups/:id",
    route(async (req, res) => {
      const { actorId, ...data } = updateGroupSchema.parse(req.body);
      const group = await groupService.updateGroup(req.params.id, data, actorId);
      res.json(group);
    })
  );

  app.post(
    "/groups/:id/members",
    route(async (req, res) => {
      const { actorId } = actorQuerySchema.parse(req.query);
      const member = await groupService.addMember(
        req.params.id,
        memberSchema.parse(req.body),
        actorId
      );
      res.status(201).json(member);
    })
  );

  app.delete(
    "/groups/:id/members/:memberId",
    route(async (req, res) => {
      const { actorId } = actorQuerySchema.parse(req.query);
      await groupService.removeMember(req.params.id, req.params.memberId, actorId);
      res.status(204).end();
    })
  );

  app.get(
    "/groups/:id/expenses",
    route(async (req, res) => {
      const query = expenseQuerySchema.parse(req.query);
      const expenses = await expenseService.getGroupExpenses(req.params.id, {
        query: query.q,
        memberId: query.memberId,
        startDate: query.from,
        endDate: query.to,
        minAmount: query.minAmount,
        maxAmount: query.maxAmount,
      });
      res.json(expenses);
    })
  );

  app.post(
    "/groups/:id/expenses",
    route(async (req, res) => {
      const expense = await expenseService.createExpense({
        ...createExpenseSchema.parse(req.body),
        groupId: req.params.id,
      });
      res.status(201).json(expense);
    })
  );

  app.put(
    "/groups/:id/expenses/:expenseId",
    route(async (req, res) => {
      const { actorId, ...input } = updateExpenseSchema.parse(req.body);
      const expense = await expenseService.updateExpense(
        req.params.id,
        req.params.expenseId,
        input,
        actorId
      );
      res.json(expense);
    })
  );

  app.delete(
    "/groups/:id/expenses/:expenseId",
    route(async (req, res) => {
      const { actorId } = actorQuerySchema.parse(req.query);
      await expenseService.deleteExpense(req.params.id, req.params.expenseId, actorId);
      res.status(204).end();
    })
  );

  app.post(
    "/groups/:id/expenses/:expenseId/restore",
    route(async (req, res) => {
      const { actorId } = actorQuerySchema.parse(req.query);
      res.json(await expenseService.restoreExpense(req.params.id, req.params.expenseId, actorId));
    })
  );

  app.get(
    "/groups/:id/payments",
    route(async (req, res) => {
      await groupService.requireGroup(req.params.id);
      res.json(await paymentService.getGroupPayments(req.params.id));
    })
  );

  app.post(
    "/groups/:id/payments",
    route(async (req, res) => {
      const payment = await paymentService.recordPayment({
        ...paymentSchema.parse(req.body),
        groupId: req.params.id,
      });
      res.status(201).json(payment);
    })
  );

  app.delete(
    "/groups/:id/payments/:paymentId",
    route(async (req, res) => {
      const { actorId } = actorQuerySchema.parse(req.query);
      await paymentService.deletePayment(req.params.id, req.params.paymentId, actorId);
      res.status(204).end();
    })
  );

  app.post(
    "/groups/:id/payments/:paymentId/restore",
    route(async (req, res) => {
      const { actorId } = actorQuerySchema.parse(req.query);
      res.json(await paymentService.restorePayment(req.params.id, req.params.paymentId, actorId));
    })
  );

  app.get(
    "/groups/:id/balances",
    route(async (req, res) => {
      const report = await balanceService.getGroupBalances(req.params.id);
      const members = await groupService.getMembers(req.params.id);
      res.json(balancesJson(report, members));
    })
  );

  app.get(
    "/groups/:id/settlement-plan",
    route(async (req, res) => {
      res.json(await balanceService.getSettlementPlan(req.params.id));
    })
  );

  app.post(
    "/groups/:id/settlement-plan/execute",
    route(async (req, res) => {
      const { recordedBy, ...suggestion } = executeSchema.parse(req.body);
      const payment = await balanceService.executeSuggestion(req.params.id, suggestion, recordedBy);
      res.status(201).json(payment);
    })
  );

  app.get(
    "/groups/:id/activity",
    route(async (req, res) => {
      res.json(await groupService.getActivity(req.params.id));
    })
  );

  // Latest result published by the live feed. Recomputes when there is none
  // yet or the newest computation failed, and reports that failure if it recurs.
  app.get(
    "/groups/:id/summary",
    route(async (req, res) => {
      const groupId = req.params.id;
      await groupService.requireGroup(groupId);

      const cached = liveFeed.latestFailure(groupId) ? undefined : liveFeed.latest(groupId);
      const result = cached ?? (await liveFeed.push(groupId));
      if (!result) {
        const failure = liveFeed.latestFailure(groupId);
        if (failure) {
          throw failure.error;
        }
        res.status(503).json({ error: "unavailable", message: "Summary is being recomputed" });
        return;
      }

      const members = await groupService.getMembers(groupId);
      res.json({
        token: result.token,
        computedAt: result.computedAt.toISOString(),
        ...balancesJson(result.report, members),
        plan: result.plan,
      });
    })
  );

  app.get(
    "/groups/:id/export.csv",
    route(async (req, res) => {
      const csv = await exportService.exportGroupCsv(req.params.id);
      res.type("text/csv").attachment(`${req.params.id}_export.csv`).send(csv);
    })
  );

  app.put(
    "/exchange-rates",
    route(async (req, res) => {
      const { effectiveDate, ...pair } = exchangeRateSchema.parse(req.body);
      const rate = await balanceService.setExchangeRate({
        ...pair,
        effectiveDate: effectiveDate ?? new Date(),
      });
      res.json(rate);
    })
  );

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: "not_found",
      message: `No route for ${req.method} ${req.path}`,
    });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof AppError) {
      if (error.status >= 500) {
        console.error(`[api] ${req.method} ${req.path} failed:`, error);
      }
      res.status(error.status).json({ error: error.code, message: error.message });
      return;
    }

    if (error instanceof ZodError) {
      res.status(400).json({ error: "validation_failed", message: describeIssues(error) });
      return;
    }

    if (error instanceof SyntaxError) {
      res.status(400).json({ error: "invalid_json", message: "Malformed JSON body" });
      return;
    }

    console.error(`[api] ${req.method} ${req.path} failed:`, error);
    res.status(500).json({ error: "internal", message: "Internal server error" });
  });

  return app;
}
