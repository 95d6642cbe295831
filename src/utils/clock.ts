/**
 * Time helpers for TTL handling. Everything is epoch milliseconds.
 */

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export const MS_PER_HOUR = 60 * 60 * 1000;

/** Largest delay setTimeout honours; anything above fires after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Whole milliseconds. A positive TTL never rounds down to 0.
 */
export function hoursToMs(hours: number): number {
  const ms = Math.round(hours * MS_PER_HOUR);
  return hours > 0 ? Math.max(ms, 1) : ms;
}

/**
 * Absolute expiry for a TTL, or null when no TTL applies.
 */
export function computeExpiry(now: number, ttlMs: number | null | undefined): number | null {
  if (ttlMs === null || ttlMs === undefined) return null;
  return now + ttlMs;
}

/**
 * A record is dead from its expiry instant onwards. Null never expires.
 */
export function isExpired(expiresAt: number | null, now: number): boolean {
  return expiresAt !== null && expiresAt <= now;
}

export function isFresh(expiresAt: number | null, now: number): boolean {
  return !isExpired(expiresAt, now);
}
