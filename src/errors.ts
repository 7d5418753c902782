import type { Status } from "./types";

export type ErrorCode =
  | "NOT_FOUND"
  | "TRANSPORT"
  | "CLASSIFIER_TIMEOUT"
  | "RATE_LIMIT_EXCEEDED"
  | "CLASSIFIER_PARSE"
  | "GENERATION"
  | "CIRCUIT_OPEN"
  | "ILLEGAL_TRANSITION"
  | "CONFIG";

export class AppError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Remote resource is gone (404 equivalent). */
export class NotFoundError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("NOT_FOUND", message, options);
  }
}

export class TransportError extends AppError {
  readonly statusCode: number | null;

  constructor(
    message: string,
    options?: {
      cause?: unknown;
      statusCode?: number;
      code?: "TRANSPORT" | "CLASSIFIER_TIMEOUT";
    },
  ) {
    super(options?.code ?? "TRANSPORT", message, options);
    this.statusCode = options?.statusCode ?? null;
  }
}

export class ClassifierTimeoutError extends TransportError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Classifier call timed out after ${timeoutMs}ms`, {
      code: "CLASSIFIER_TIMEOUT",
    });
    this.timeoutMs = timeoutMs;
  }
}

export class RateLimitExceededError extends AppError {
  constructor(message = "Rate limit exceeded") {
    super("RATE_LIMIT_EXCEEDED", message);
  }
}

export class ClassifierParseError extends AppError {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super("CLASSIFIER_PARSE", message);
    this.raw = raw;
  }
}

export class GenerationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GENERATION", message, options);
  }
}

export class CircuitOpenError extends AppError {
  constructor(name: string) {
    super("CIRCUIT_OPEN", `Circuit "${name}" is open`);
  }
}

export class IllegalTransitionError extends AppError {
  readonly from: Status;
  readonly to: Status;

  constructor(itemId: string, from: Status, to: Status) {
    super(
      "ILLEGAL_TRANSITION",
      `Illegal transition ${from} -> ${to} for item ${itemId}`,
    );
    this.from = from;
    this.to = to;
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
