/**
 * Wires the stores, the purge scheduler and (given a model) the session
 * runner from a loaded config.
 */

import type { ConvoConfig } from "../config.js";
import { createLogger, type Logger } from "../log.js";
import { MemoryStore } from "../memory/memory-store.js";
import { PurgeScheduler } from "../memory/purge-scheduler.js";
import { SessionStore } from "../session/session-store.js";
import type { Clock } from "../utils/clock.js";
import type { ModelInvoker } from "./invoke.js";
import { SessionRunner, type StageListener } from "./session-runner.js";

export type MemoryRuntime = {
  config: ConvoConfig;
  logger: Logger;
  sessions: SessionStore;
  memories: MemoryStore;
  /** Only when an invoker was supplied */
  runner: SessionRunner | null;
  /** Null when memory.purgeSchedule is empty */
  purgeScheduler: PurgeScheduler | null;
  close: () => void;
};

export function createMemoryRuntime(
  cfg: ConvoConfig,
  options: { logger?: Logger; invoker?: ModelInvoker; clock?: Clock; onStage?: StageListener } = {},
): MemoryRuntime {
  const logger =
    options.logger ??
    createLogger(cfg.logging.level, cfg.resolved.logFilePath, cfg.logging.fileLevel);

  const sessions = new SessionStore({
    dbPath: cfg.resolved.sessionsDbPath,
    logger,
    clock: options.clock,
    busyTimeoutMs: cfg.storage.busyTimeoutMs,
    conflictRetries: cfg.storage.conflictRetries,
  });
  const memories = new MemoryStore({
    dbPath: cfg.resolved.memoryDbPath,
    logger,
    clock: options.clock,
    busyTimeoutMs: cfg.storage.busyTimeoutMs,
    defaultShortTermTtlHours: cfg.memory.shortTermTtlHours,
  });

  const runner = options.invoker
    ? new SessionRunner({
        sessions,
        memories,
        invoker: options.invoker,
        logger,
        agentName: cfg.runner.agentName,
        invokeTimeoutMs: cfg.runner.invokeTimeoutMs,
        onStage: options.onStage,
      })
    : null;

  const schedule = cfg.memory.purgeSchedule.trim();
  const purgeScheduler = schedule ? new PurgeScheduler({ store: memories, schedule, logger }) : null;

  return {
    config: cfg,
    logger,
    sessions,
    memories,
    runner,
    purgeScheduler,
    close: () => {
      purgeScheduler?.stop();
      sessions.close();
      memories.close();
    },
  };
}
