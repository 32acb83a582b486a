export class EngineError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, statusCode = 500, details?: Record<string, unknown>) {
    super(message);
    this.name = "EngineError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class ValidationError extends EngineError {
  constructor(message: string, field?: string) {
    super(message, "validation_error", 400, field ? { field } : undefined);
    this.name = "ValidationError";
  }
}

export class AuthenticationError extends EngineError {
  constructor(message = "Unauthorized") {
    super(message, "unauthorized", 401);
    this.name = "AuthenticationError";
  }
}

// Store I/O failed. Safe for the caller to retry; the engine never retries by itself.
export class StoreError extends EngineError {
  constructor(operation: string, cause?: unknown) {
    super(`Store operation failed: ${operation}`, "store_unavailable", 503, {
      operation,
      cause: describeCause(cause)
    });
    this.name = "StoreError";
  }
}

function describeCause(cause: unknown): string | undefined {
  if (cause === undefined || cause === null) return undefined;
  if (cause instanceof Error) return cause.message;
  if (typeof cause === "object" && "message" in cause) return String(cause.message);
  return String(cause);
}
