/**
 * Memory Recall Command - Top long-term memories for a user
 */

import type { ConvoConfig } from "../../../config.js";
import { parseNumberArg } from "../../error-handler.js";
import { withRuntime } from "../../open-runtime.js";
import { OutputFormatter } from "../../output-formatter.js";
import { parseLongTermType } from "./options.js";

export interface RecallOptions {
  top?: string;
  key?: string;
  type?: string;
  minImportance?: string;
  json?: boolean;
  quiet?: boolean;
}

const DEFAULT_TOP_K = 5;

export async function recall(cfg: ConvoConfig, userId: string, options: RecallOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  const topK = parseNumberArg(options.top, "top") ?? DEFAULT_TOP_K;

  const memories = await withRuntime(cfg, (runtime) =>
    runtime.memories.retrieveLongTermMemories(userId, {
      topK,
      key: options.key,
      memoryType: parseLongTermType(options.type),
      minImportance: parseNumberArg(options.minImportance, "minImportance"),
    }),
  );

  if (options.json) {
    out.json(memories);
    return;
  }

  if (memories.length === 0) {
    out.info(`No memories found for ${userId}.`);
    return;
  }

  out.header(`Memories for ${userId}`);
  out.table(
    memories.map((memory) => ({
      id: memory.memoryId,
      key: memory.key,
      value: typeof memory.value === "string" ? memory.value : JSON.stringify(memory.value),
      type: memory.memoryType,
      importance: memory.importance.toFixed(2),
      uses: memory.accessCount,
    })),
    [
      { key: "id", header: "ID" },
      { key: "key", header: "Key" },
      { key: "value", header: "Value", width: 40 },
      { key: "type", header: "Type" },
      { key: "importance", header: "Importance", align: "right" },
      { key: "uses", header: "Uses", align: "right" },
    ],
  );
}
