/**
 * Memory Purge Commands - One-off purge, or run the purge schedule
 */

import type { ConvoConfig } from "../../../config.js";
import { createLogger } from "../../../log.js";
import { PurgeScheduler } from "../../../memory/purge-scheduler.js";
import { createMemoryRuntime, type MemoryRuntime } from "../../../runtime/index.js";
import { withRuntime } from "../../open-runtime.js";
import { OutputFormatter } from "../../output-formatter.js";

export interface PurgeOptions {
  json?: boolean;
  quiet?: boolean;
}

export async function purge(cfg: ConvoConfig, options: PurgeOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  const removed = await withRuntime(cfg, (runtime) => runtime.memories.purgeExpiredShortTermMemories());

  if (options.json) {
    out.json({ removed });
    return;
  }
  out.success(`Purged ${removed} expired short-term memories`);
}

export interface WatchOptions {
  schedule?: string;
  quiet?: boolean;
}

/**
 * The scheduler `watch` drives: the runtime's own, built from
 * memory.purgeSchedule, unless a schedule override is given.
 */
export function resolveWatchScheduler(runtime: MemoryRuntime, scheduleOverride?: string): PurgeScheduler | null {
  const schedule = scheduleOverride?.trim();
  if (!schedule) return runtime.purgeScheduler;
  return new PurgeScheduler({ store: runtime.memories, schedule, logger: runtime.logger });
}

/**
 * Purge on the configured cron schedule until SIGINT or SIGTERM.
 */
export async function watch(cfg: ConvoConfig, options: WatchOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  const logger = createLogger(cfg.logging.level, cfg.resolved.logFilePath, cfg.logging.fileLevel);
  const runtime = createMemoryRuntime(cfg, { logger });

  let scheduler: PurgeScheduler | null;
  try {
    scheduler = resolveWatchScheduler(runtime, options.schedule);
  } catch (err) {
    runtime.close();
    throw err;
  }
  if (!scheduler) {
    runtime.close();
    out.warn("memory.purgeSchedule is empty; nothing to watch.");
    return;
  }
  const active = scheduler;
  const schedule = options.schedule?.trim() || cfg.memory.purgeSchedule.trim();

  active.onEvent((event) => {
    if (event.type === "purge_completed") {
      if (event.removed > 0) out.info(`Purged ${event.removed} expired short-term memories`);
    } else {
      out.error(`Purge failed: ${event.error}`);
    }
  });

  await new Promise<void>((resolve) => {
    const shutdown = () => {
      process.off("SIGINT", shutdown);
      process.off("SIGTERM", shutdown);
      active.stop();
      runtime.close();
      resolve();
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);

    active.start();
    out.success(`Purging expired short-term memories on "${schedule}" (Ctrl+C to stop)`);
  });
}
