/**
 * Error taxonomy shared by the stores and the session runner.
 *
 * Only ConcurrencyConflict is ever retried, and only inside the store that
 * raised it. Everything else surfaces to the caller as-is.
 */

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INVALID_TRANSITION"
  | "CONCURRENCY_CONFLICT"
  | "EXTERNAL_INVOCATION_ERROR"
  | "CONFIG_ERROR";

export class MemoryLayerError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options: { code: ErrorCode; details?: Record<string, unknown>; cause?: unknown },
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "MemoryLayerError";
    this.code = options.code;
    this.details = options.details;
  }
}

/**
 * Malformed or out-of-range input
 */
export class ValidationError extends MemoryLayerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: "VALIDATION_ERROR", details });
    this.name = "ValidationError";
  }
}

/**
 * Reference to a session, user or memory that does not exist
 */
export class NotFoundError extends MemoryLayerError {
  readonly entity: "session" | "user" | "memory";
  readonly id: string;

  constructor(entity: "session" | "user" | "memory", id: string) {
    super(`${entity} not found: ${id}`, { code: "NOT_FOUND", details: { entity, id } });
    this.name = "NotFoundError";
    this.entity = entity;
    this.id = id;
  }
}

export class InvalidTransitionError extends MemoryLayerError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string, message?: string) {
    super(message ?? `Invalid status transition: ${from} -> ${to}`, {
      code: "INVALID_TRANSITION",
      details: { from, to },
    });
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

/**
 * Lost race on a serialized write. Stores retry these internally a bounded
 * number of times before letting one escape as a transient failure.
 */
export class ConcurrencyConflict extends MemoryLayerError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, { code: "CONCURRENCY_CONFLICT", details, cause });
    this.name = "ConcurrencyConflict";
  }
}

export type InvocationFailureReason = "timeout" | "aborted" | "failed";

export class ExternalInvocationError extends MemoryLayerError {
  readonly reason: InvocationFailureReason;

  constructor(reason: InvocationFailureReason, message: string, cause?: unknown) {
    super(message, { code: "EXTERNAL_INVOCATION_ERROR", details: { reason }, cause });
    this.name = "ExternalInvocationError";
    this.reason = reason;
  }
}

/**
 * Unreadable or invalid configuration file
 */
export class ConfigError extends MemoryLayerError {
  readonly configPath: string;

  constructor(message: string, configPath: string, cause?: unknown) {
    super(message, { code: "CONFIG_ERROR", details: { configPath }, cause });
    this.name = "ConfigError";
    this.configPath = configPath;
  }
}

export function isMemoryLayerError(err: unknown): err is MemoryLayerError {
  return err instanceof MemoryLayerError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
