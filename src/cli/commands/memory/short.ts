/**
 * Memory Short Command - Live short-term memories of a session
 */

import type { ConvoConfig } from "../../../config.js";
import { parseNumberArg } from "../../error-handler.js";
import { withRuntime } from "../../open-runtime.js";
import { OutputFormatter } from "../../output-formatter.js";
import { parseShortTermType } from "./options.js";

export interface ShortTermOptions {
  top?: string;
  key?: string;
  type?: string;
  json?: boolean;
  quiet?: boolean;
}

const DEFAULT_TOP_N = 10;

export async function shortTerm(cfg: ConvoConfig, sessionId: string, options: ShortTermOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  const topN = parseNumberArg(options.top, "top") ?? DEFAULT_TOP_N;

  const memories = await withRuntime(cfg, (runtime) =>
    runtime.memories.retrieveShortTermMemories(sessionId, {
      topN,
      key: options.key,
      memoryType: parseShortTermType(options.type),
    }),
  );

  if (options.json) {
    out.json(memories);
    return;
  }

  if (memories.length === 0) {
    out.info(`No short-term memories for ${sessionId}.`);
    return;
  }

  out.header(`Short-term memories for ${sessionId}`);
  for (const memory of memories) {
    const value = typeof memory.value === "string" ? memory.value : JSON.stringify(memory.value);
    out.listItem(`${memory.key} (${memory.memoryType}, expires ${out.formatTime(memory.expiresAt)}): ${value}`);
  }
}
