/**
 * Error taxonomy for conversation clients.
 *
 * Every contract-level failure is a ConversationError with a `code`
 * discriminant. Transport failures from the completion endpoint are
 * mapped onto the same hierarchy (see backends/transport-errors.ts).
 */

export type ConversationErrorCode =
  | "not-found"
  | "invalid-argument"
  | "missing-resource"
  | "unsupported-operation"
  | "transient-failure"
  | "authentication-failure"
  | "authorization-failure"
  | "model-not-found"
  | "rate-limit-exceeded"
  | "upstream-server-error"
  | "malformed-response"
  | "generic-failure";

export class ConversationError extends Error {
  readonly code: ConversationErrorCode;

  constructor(code: ConversationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export function isConversationError(value: unknown): value is ConversationError {
  return value instanceof ConversationError;
}

// ── Caller errors ─────────────────────────────────────────────────

export class SessionNotFoundError extends ConversationError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super("not-found", `Session ${sessionId} does not exist`);
    this.sessionId = sessionId;
  }
}

export class InvalidArgumentError extends ConversationError {
  constructor(message: string) {
    super("invalid-argument", message);
  }
}

export class MissingResourceError extends ConversationError {
  readonly path: string;

  constructor(path: string) {
    super("missing-resource", `File not found: ${path}`);
    this.path = path;
  }
}

export class UnsupportedOperationError extends ConversationError {
  constructor(message: string) {
    super("unsupported-operation", message);
  }
}

// ── Transport errors ──────────────────────────────────────────────

/** Timeouts and connection failures; the caller may retry */
export class TransientError extends ConversationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transient-failure", message, options);
  }
}

export class AuthenticationError extends ConversationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("authentication-failure", message, options);
  }
}

export class AuthorizationError extends ConversationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("authorization-failure", message, options);
  }
}

export class ModelNotFoundError extends ConversationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("model-not-found", message, options);
  }
}

export class RateLimitError extends ConversationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("rate-limit-exceeded", message, options);
  }
}

export class UpstreamServerError extends ConversationError {
  readonly statusCode: number;

  constructor(statusCode: number, message: string, options?: { cause?: unknown }) {
    super("upstream-server-error", message, options);
    this.statusCode = statusCode;
  }
}

export class MalformedResponseError extends ConversationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("malformed-response", message, options);
  }
}

/** Anything the transport raised that has no more specific mapping */
export class CompletionRequestError extends ConversationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("generic-failure", message, options);
  }
}
