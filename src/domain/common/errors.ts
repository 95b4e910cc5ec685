export type ErrorKind =
  | "config"
  | "validation"
  | "transport"
  | "malformed_response"
  | "empty_content"
  | "exhausted_retries"
  | "unknown";

export class AppError extends Error {
  readonly kind: ErrorKind;
  override readonly cause?: unknown;

  constructor(kind: ErrorKind, message: string, cause?: unknown) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.cause = cause;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("config", message, cause);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("validation", message, cause);
  }
}

export type TransportFailureReason = "connect" | "read" | "status";

export class TransportError extends AppError {
  readonly provider?: string;
  readonly statusCode?: number;
  readonly reason: TransportFailureReason;
  /** Whether the transport tier itself would retry this failure. */
  readonly retryable: boolean;
  readonly attempts: number;

  constructor(params: {
    message: string;
    reason: TransportFailureReason;
    retryable: boolean;
    attempts?: number;
    provider?: string;
    statusCode?: number;
    cause?: unknown;
  }) {
    super("transport", params.message, params.cause);
    this.provider = params.provider;
    this.statusCode = params.statusCode;
    this.reason = params.reason;
    this.retryable = params.retryable;
    this.attempts = params.attempts ?? 1;
  }
}

export class MalformedResponseError extends AppError {
  readonly statusCode: number;
  readonly body: string;

  constructor(params: {
    message: string;
    statusCode: number;
    body: string;
    cause?: unknown;
  }) {
    super("malformed_response", params.message, params.cause);
    this.statusCode = params.statusCode;
    this.body = params.body;
  }
}

export class EmptyContentError extends AppError {
  constructor(message = "Model returned empty content") {
    super("empty_content", message);
  }
}

export class ExhaustedRetriesError extends AppError {
  readonly description: string;
  readonly attempts: number;

  constructor(params: {
    description: string;
    attempts: number;
    lastError: unknown;
  }) {
    super(
      "exhausted_retries",
      `${params.description}: failed after ${params.attempts} attempt(s): ${describeError(params.lastError)}`,
      params.lastError,
    );
    this.description = params.description;
    this.attempts = params.attempts;
  }

  get lastError(): unknown {
    return this.cause;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  if (error instanceof Error)
    return new AppError("unknown", error.message, error);
  return new AppError("unknown", String(error));
}
