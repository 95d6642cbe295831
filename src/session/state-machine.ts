import type { SessionStatus } from "./types.js";

const STATUS_ORDER: Record<SessionStatus, number> = {
  active: 0,
  completed: 1,
  archived: 2,
};

export const SESSION_STATUSES: readonly SessionStatus[] = ["active", "completed", "archived"];

export function isSessionStatus(value: string): value is SessionStatus {
  return Object.prototype.hasOwnProperty.call(STATUS_ORDER, value);
}

/**
 * Status only moves forward. Staying put is allowed and is a no-op.
 */
export function canTransition(from: SessionStatus, to: SessionStatus): boolean {
  return STATUS_ORDER[to] >= STATUS_ORDER[from];
}
