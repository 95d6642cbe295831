export { defaultConfig, loadConfig, resolveConfigPath, type ConvoConfig } from "./config.js";
export {
  ConcurrencyConflict,
  ConfigError,
  ExternalInvocationError,
  InvalidTransitionError,
  MemoryLayerError,
  NotFoundError,
  ValidationError,
  isMemoryLayerError,
  type ErrorCode,
  type InvocationFailureReason,
} from "./errors.js";
export { createLogger, createSilentLogger, type Logger, type LogLevel } from "./log.js";

export { SessionStore, type SessionStoreParams } from "./session/session-store.js";
export { canTransition, isSessionStatus, SESSION_STATUSES } from "./session/state-machine.js";
export type * from "./session/types.js";

export { clampImportance, MemoryStore, type MemoryStoreParams } from "./memory/memory-store.js";
export { PurgeScheduler, type PurgeSchedulerEvent } from "./memory/purge-scheduler.js";
export type * from "./memory/types.js";

export { closeSessionAndClearMemories, type ClosedSession } from "./runtime/close-session.js";
export { createMemoryRuntime, type MemoryRuntime } from "./runtime/index.js";
export { invokeModel, type ModelInvoker } from "./runtime/invoke.js";
export { buildPrompt, type AdditionalContext, type PromptInput } from "./runtime/prompt-builder.js";
export {
  CONTEXT_LIMITS,
  SessionRunner,
  type RunRequest,
  type RunResult,
  type RunStage,
  type SessionMetadata,
} from "./runtime/session-runner.js";

export type { JsonValue, Metadata } from "./storage/payload.js";
export type { Clock } from "./utils/clock.js";
