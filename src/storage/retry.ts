import { ConcurrencyConflict, errorMessage } from "../errors.js";
import type { Logger } from "../log.js";
import { isBusy, isUniqueViolation } from "./database.js";

export const DEFAULT_CONFLICT_RETRIES = 3;

export type ConflictRetryOptions = {
  /** Retries after the first attempt */
  retries: number;
  /** Base delay, doubled per retry */
  backoffMs?: number;
  label: string;
  logger?: Logger;
};

export function isConflict(err: unknown): boolean {
  return err instanceof ConcurrencyConflict || isUniqueViolation(err) || isBusy(err);
}

/**
 * Run a write that can lose a race, retrying conflicts a bounded number of
 * times. Non-conflict errors are rethrown untouched.
 */
export async function withConflictRetry<T>(
  operation: () => T | Promise<T>,
  options: ConflictRetryOptions,
): Promise<T> {
  const retries = Math.max(0, options.retries);
  const backoffMs = options.backoffMs ?? 5;
  let lastError: unknown;

  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (!isConflict(err)) throw err;
      lastError = err;
      options.logger?.debug(
        { label: options.label, attempt: attempt + 1, error: errorMessage(err) },
        "Write conflict, retrying",
      );
      if (attempt < retries) {
        await new Promise((resolve) => setTimeout(resolve, backoffMs * 2 ** attempt));
      }
    }
  }

  throw new ConcurrencyConflict(
    `${options.label} failed after ${retries + 1} attempt(s)`,
    { label: options.label, attempts: retries + 1 },
    lastError,
  );
}
