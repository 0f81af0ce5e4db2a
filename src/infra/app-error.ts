export type ErrorDetails = Record<string, string | number | boolean | null>;

export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details: ErrorDetails = {},
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed input; raised before any state is touched. */
export class ValidationError extends AppError {
  constructor(code: string, message: string, details?: ErrorDetails) {
    super(422, code, message, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, "resource_not_found", message);
  }
}

/**
 * Version mismatch, idempotency key reuse with another payload, or an illegal
 * transition. Safe to retry after re-reading the current state.
 */
export class ConflictError extends AppError {
  constructor(code: string, message: string, details?: ErrorDetails) {
    super(409, code, message, details);
  }
}

/** Terminal: re-submitting the same instruction will not change the outcome. */
export class RiskBlockedError extends AppError {
  constructor(paymentIntentId: string) {
    super(402, "risk_blocked", `Payment intent '${paymentIntentId}' was blocked by risk screening.`, {
      payment_intent_id: paymentIntentId,
    });
  }
}

export class RateLimitedError extends AppError {
  constructor(public readonly retryAfterSeconds: number) {
    super(429, "rate_limit_exceeded", "Rate limit exceeded. Retry later.", {
      retry_after_seconds: retryAfterSeconds,
    });
  }
}

export class AuthenticationError extends AppError {
  constructor(code: string, message: string) {
    super(401, code, message);
  }
}

export class DownstreamTimeoutError extends AppError {
  constructor(dependency: string, timeoutMs: number) {
    super(504, "downstream_timeout", `${dependency} did not answer within ${timeoutMs}ms.`, {
      dependency,
      timeout_ms: timeoutMs,
    });
  }
}

export class DownstreamUnavailableError extends AppError {
  constructor(dependency: string, reason: string) {
    super(503, "downstream_unavailable", `${dependency} is unavailable: ${reason}.`, { dependency });
  }
}
