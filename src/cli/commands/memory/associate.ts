/**
 * Memory Associate Command - Link two memories, or list a memory's links
 */

import type { ConvoConfig } from "../../../config.js";
import { parseNumberArg } from "../../error-handler.js";
import { withRuntime } from "../../open-runtime.js";
import { OutputFormatter } from "../../output-formatter.js";

export interface AssociateOptions {
  type?: string;
  strength?: string;
  json?: boolean;
  quiet?: boolean;
}

export async function associate(
  cfg: ConvoConfig,
  memoryId1: string,
  memoryId2: string,
  options: AssociateOptions = {},
): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  const strength = parseNumberArg(options.strength, "strength");

  const association = await withRuntime(cfg, (runtime) =>
    runtime.memories.associateMemories(memoryId1, memoryId2, options.type, strength),
  );

  if (options.json) {
    out.json(association);
    return;
  }
  out.success(
    `Linked ${association.memoryId1} and ${association.memoryId2} (${association.associationType}, ${association.strength})`,
  );
}

export interface LinksOptions {
  type?: string;
  minStrength?: string;
  json?: boolean;
  quiet?: boolean;
}

export async function links(cfg: ConvoConfig, memoryId: string, options: LinksOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });

  const related = await withRuntime(cfg, (runtime) =>
    runtime.memories.getAssociatedMemories(memoryId, {
      associationType: options.type,
      minStrength: parseNumberArg(options.minStrength, "minStrength"),
    }),
  );

  if (options.json) {
    out.json(related);
    return;
  }

  if (related.length === 0) {
    out.info(`No associated memories for ${memoryId}.`);
    return;
  }

  out.header(`Associated with ${memoryId}`);
  for (const entry of related) {
    out.listItem(
      `${entry.memory.memoryId} [${entry.kind}] ${entry.memory.key} (${entry.associationType}, ${entry.strength})`,
    );
  }
}
