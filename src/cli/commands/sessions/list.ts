/**
 * Sessions List Command - List a user's sessions, newest first
 */

import type { ConvoConfig } from "../../../config.js";
import { ValidationError } from "../../../errors.js";
import { isSessionStatus } from "../../../session/state-machine.js";
import type { SessionStatus } from "../../../session/types.js";
import { parseNumberArg } from "../../error-handler.js";
import { withRuntime } from "../../open-runtime.js";
import { OutputFormatter } from "../../output-formatter.js";

export interface SessionsListOptions {
  status?: string;
  limit?: string;
  json?: boolean;
  quiet?: boolean;
}

export async function sessionsList(
  cfg: ConvoConfig,
  userId: string,
  options: SessionsListOptions = {},
): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  const status = parseStatus(options.status);
  const limit = parseNumberArg(options.limit, "limit");

  const sessions = await withRuntime(cfg, (runtime) =>
    runtime.sessions.listSessionsForUser(userId, { status, limit }),
  );

  if (options.json) {
    out.json(sessions);
    return;
  }

  if (sessions.length === 0) {
    out.info(`No sessions found for ${userId}.`);
    return;
  }

  out.header(`Sessions for ${userId}`);
  out.table(
    sessions.map((session) => ({
      id: session.sessionId,
      agent: session.agentName,
      status: session.status,
      created: out.formatTime(session.createdAt),
      updated: out.formatTime(session.updatedAt),
    })),
    [
      { key: "id", header: "Session" },
      { key: "agent", header: "Agent" },
      { key: "status", header: "Status" },
      { key: "created", header: "Created" },
      { key: "updated", header: "Updated" },
    ],
  );
}

function parseStatus(value: string | undefined): SessionStatus | undefined {
  if (value === undefined) return undefined;
  if (!isSessionStatus(value)) {
    throw new ValidationError(`Unknown session status: ${value}`, { status: value });
  }
  return value;
}
