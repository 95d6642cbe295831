import { errorMessage } from "../errors.js";
import type { Logger } from "../log.js";
import type { MemoryStore } from "../memory/memory-store.js";
import type { SessionStore } from "../session/session-store.js";
import type { Session } from "../session/types.js";

export type ClosedSession = {
  session: Session;
  /** Short-term memories removed; null when clearing failed */
  cleared: number | null;
};

/**
 * Complete the session, then drop its short-term memories. The status change
 * stands even when clearing fails; that failure is only logged.
 */
export async function closeSessionAndClearMemories(
  deps: { sessions: SessionStore; memories: MemoryStore; logger: Logger },
  sessionId: string,
): Promise<ClosedSession> {
  const session = await deps.sessions.closeSession(sessionId);
  try {
    const cleared = await deps.memories.clearSessionMemories(sessionId);
    return { session, cleared };
  } catch (err) {
    deps.logger.warn({ sessionId, error: errorMessage(err) }, "Failed to clear session memories");
    return { session, cleared: null };
  }
}
