import type { FailureKind } from "../types.js";

/**
 * Raised when input or configuration cannot be prepared before any chunk is
 * translated. This is the only error that leaves the pipeline.
 */
export class SetupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SetupError";
  }
}

/**
 * A failed translation attempt, tagged with whether it may be retried.
 * The retry loop branches on `kind`.
 */
export class TranslationFailure extends Error {
  readonly kind: FailureKind;
  readonly status?: number;

  constructor(
    kind: FailureKind,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, { cause: options?.cause });
    this.name = "TranslationFailure";
    this.kind = kind;
    this.status = options?.status;
  }

  get retryable(): boolean {
    return this.kind === "transient";
  }

  static transient(message: string, cause?: unknown): TranslationFailure {
    return new TranslationFailure("transient", message, { cause });
  }

  static permanent(message: string, cause?: unknown): TranslationFailure {
    return new TranslationFailure("permanent", message, { cause });
  }
}

// Request timeout, conflict and rate limiting are worth another attempt
const TRANSIENT_STATUSES = new Set([408, 409, 429]);

const TRANSIENT_MESSAGE_PATTERNS = [
  "rate limit",
  "too many requests",
  "timeout",
  "timed out",
  "network",
  "econnreset",
  "econnrefused",
  "socket hang up",
  "overloaded",
  "connection error",
];

/** HTTP status carried by SDK errors (openai, anthropic and genai all expose `status`). */
export function statusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

export function classifyError(error: unknown): FailureKind {
  if (error instanceof TranslationFailure) return error.kind;

  const status = statusOf(error);
  if (status !== undefined) {
    if (TRANSIENT_STATUSES.has(status) || status >= 500) return "transient";
    if (status >= 400) return "permanent";
  }

  if (error instanceof Error) {
    const text = `${error.name} ${error.message}`.toLowerCase();
    if (TRANSIENT_MESSAGE_PATTERNS.some((pattern) => text.includes(pattern))) {
      return "transient";
    }
  }

  return "permanent";
}

/** Wraps anything a provider threw into a tagged failure. */
export function toTranslationFailure(error: unknown): TranslationFailure {
  if (error instanceof TranslationFailure) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new TranslationFailure(classifyError(error), message, {
    cause: error,
    status: statusOf(error),
  });
}
