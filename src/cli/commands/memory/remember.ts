/**
 * Memory Remember Command - Store a long-term memory for a user
 */

import type { ConvoConfig } from "../../../config.js";
import { decodeValue } from "../../../storage/payload.js";
import { hoursToMs } from "../../../utils/clock.js";
import { parseNumberArg } from "../../error-handler.js";
import { withRuntime } from "../../open-runtime.js";
import { OutputFormatter } from "../../output-formatter.js";
import { parseLongTermType } from "./options.js";

export interface RememberOptions {
  type?: string;
  importance?: string;
  session?: string;
  ttlHours?: string;
  json?: boolean;
  quiet?: boolean;
}

/**
 * The value is parsed as JSON when it is JSON, else stored as text.
 */
export async function remember(
  cfg: ConvoConfig,
  userId: string,
  key: string,
  value: string,
  options: RememberOptions = {},
): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  const memoryType = parseLongTermType(options.type);
  const importance = parseNumberArg(options.importance, "importance");
  const ttlHours = parseNumberArg(options.ttlHours, "ttlHours");

  const memory = await withRuntime(cfg, async (runtime) => {
    const memoryId = await runtime.memories.storeLongTermMemory({
      userId,
      sessionId: options.session ?? null,
      key,
      value: decodeValue(value),
      memoryType,
      importance,
      ttlMs: ttlHours === undefined ? undefined : hoursToMs(ttlHours),
    });
    return runtime.memories.getLongTermMemory(memoryId);
  });

  if (options.json) {
    out.json(memory);
    return;
  }

  out.success("Memory saved");
  out.keyValue("ID", memory.memoryId);
  out.keyValue("Type", memory.memoryType);
  out.keyValue("Importance", memory.importance);
  if (memory.expiresAt !== null) out.keyValue("Expires", out.formatTime(memory.expiresAt));
}
