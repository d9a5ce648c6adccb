export class AppError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(message: string, code: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, code = "validation_failed") {
    super(message, code, 400);
  }
}

export class ExpenseValidationError extends ValidationError {
  constructor(message: string) {
    super(message, "invalid_expense");
  }
}

export class PaymentValidationError extends ValidationError {
  constructor(message: string) {
    super(message, "invalid_payment");
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`, "not_found", 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, "conflict", 409);
  }
}

/**
 * Raised by the settlement planner when balances left over after matching
 * mean the input did not sum to zero.
 */
export class SettlementInvariantError extends AppError {
  readonly residual: Map<string, number>;

  constructor(residual: Map<string, number>) {
    const detail = Array.from(residual.entries())
      .map(([memberId, amount]) => `${memberId}=${amount}`)
      .join(", ");
    super(
      `Settlement plan left unmatched balances: ${detail}`,
      "settlement_invariant",
      500
    );
    this.residual = residual;
  }
}
