/**
 * Sessions View Command - Show a session and its recent turns
 */

import type { ConvoConfig } from "../../../config.js";
import { parseNumberArg } from "../../error-handler.js";
import { withRuntime } from "../../open-runtime.js";
import { OutputFormatter } from "../../output-formatter.js";

export interface SessionsViewOptions {
  limit?: string;
  json?: boolean;
  quiet?: boolean;
}

const DEFAULT_VIEW_LIMIT = 20;

export async function sessionsView(
  cfg: ConvoConfig,
  sessionId: string,
  options: SessionsViewOptions = {},
): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  const limit = parseNumberArg(options.limit, "limit") ?? DEFAULT_VIEW_LIMIT;

  const { session, turns } = await withRuntime(cfg, async (runtime) => {
    const session = await runtime.sessions.getSession(sessionId);
    const turns = await runtime.sessions.getHistory(sessionId, { limit });
    return { session, turns: turns.reverse() };
  });

  if (options.json) {
    out.json({ session, turns });
    return;
  }

  out.header(`Session ${session.sessionId}`);
  out.keyValue("User", session.userId ?? "(anonymous)");
  out.keyValue("Agent", session.agentName);
  out.keyValue("Status", session.status);
  out.keyValue("Created", out.formatTime(session.createdAt));
  out.keyValue("Updated", out.formatTime(session.updatedAt));
  out.newline();

  if (turns.length === 0) {
    out.info("No turns yet.");
    return;
  }

  for (const turn of turns) {
    const speaker = turn.role === "user" ? "User" : "Assistant";
    out.listItem(`#${turn.turnNumber} ${speaker}: ${turn.content}`);
  }
}
