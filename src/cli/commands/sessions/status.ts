/**
 * Session status commands: close (completed) and archive
 */

import type { ConvoConfig } from "../../../config.js";
import { closeSessionAndClearMemories } from "../../../runtime/close-session.js";
import { withRuntime } from "../../open-runtime.js";
import { OutputFormatter } from "../../output-formatter.js";

export interface SessionStatusOptions {
  json?: boolean;
  quiet?: boolean;
}

/**
 * Marks the session completed and drops its short-term memories.
 */
export async function sessionsClose(
  cfg: ConvoConfig,
  sessionId: string,
  options: SessionStatusOptions = {},
): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  const result = await withRuntime(cfg, (runtime) => closeSessionAndClearMemories(runtime, sessionId));

  if (options.json) {
    out.json(result);
    return;
  }
  if (result.cleared === null) {
    out.success(`Session ${sessionId} closed`);
    out.warn("Its short-term memories could not be cleared.");
    return;
  }
  out.success(`Session ${sessionId} closed (${result.cleared} short-term memories cleared)`);
}

export async function sessionsArchive(
  cfg: ConvoConfig,
  sessionId: string,
  options: SessionStatusOptions = {},
): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  const session = await withRuntime(cfg, (runtime) => runtime.sessions.setStatus(sessionId, "archived"));

  if (options.json) {
    out.json(session);
    return;
  }
  out.success(`Session ${sessionId} archived`);
}
