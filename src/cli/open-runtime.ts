import type { ConvoConfig } from "../config.js";
import { createSilentLogger, type Logger } from "../log.js";
import { createMemoryRuntime, type MemoryRuntime } from "../runtime/index.js";

/**
 * Run a command body against freshly opened stores and close them afterwards.
 * One-shot commands log nothing unless a logger is passed in.
 */
export async function withRuntime<T>(
  cfg: ConvoConfig,
  fn: (runtime: MemoryRuntime) => Promise<T>,
  logger: Logger = createSilentLogger(),
): Promise<T> {
  const runtime = createMemoryRuntime(cfg, { logger });
  try {
    return await fn(runtime);
  } finally {
    runtime.close();
  }
}
