import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

import { ConfigError } from "./errors.js";
import { MAX_TIMER_MS } from "./utils/clock.js";

const DEFAULT_CONFIG_PATH = "convo.config.json";
const IN_MEMORY = ":memory:";

const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "silent"]);

const StorageSchema = z
  .object({
    sessionsDbPath: z.string().min(1).default("sessions.sqlite"),
    memoryDbPath: z.string().min(1).default("memory.sqlite"),
    busyTimeoutMs: z.number().int().positive().default(5_000),
    conflictRetries: z.number().int().min(0).max(10).default(3),
  })
  .default({});

const MemorySchema = z
  .object({
    shortTermTtlHours: z.number().positive().default(24),
    /** Cron expression for the expired short-term purge; empty disables it */
    purgeSchedule: z.string().default("*/15 * * * *"),
  })
  .default({});

const RunnerSchema = z
  .object({
    agentName: z.string().min(1).default("assistant"),
    invokeTimeoutMs: z.number().int().positive().max(MAX_TIMER_MS).default(60_000),
  })
  .default({});

const LoggingSchema = z
  .object({
    level: LogLevelSchema.default("info"),
    filePath: z.string().optional(),
    fileLevel: LogLevelSchema.optional(),
  })
  .default({});

const ConfigSchema = z.object({
  stateDir: z.string().default(".convo"),
  storage: StorageSchema,
  memory: MemorySchema,
  runner: RunnerSchema,
  logging: LoggingSchema,
});

export type ConvoConfig = z.infer<typeof ConfigSchema> & {
  resolved: {
    configPath: string;
    stateDir: string;
    sessionsDbPath: string;
    memoryDbPath: string;
    logFilePath?: string;
  };
};

/**
 * Load and validate the config file. A missing file at the default location
 * yields the defaults; a missing explicit file is an error.
 */
export async function loadConfig(explicitPath?: string): Promise<ConvoConfig> {
  const configPath = resolveConfigPath(explicitPath);
  const isExplicit = Boolean(explicitPath?.trim() || process.env.CONVO_CONFIG?.trim());

  let raw: string | undefined;
  try {
    raw = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    const missing = err instanceof Error && "code" in err && err.code === "ENOENT";
    if (isExplicit || !missing) {
      throw new ConfigError(`Cannot read config file: ${configPath}`, configPath, err);
    }
  }

  let parsed: unknown = {};
  if (raw !== undefined) {
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ConfigError(`Config file is not valid JSON: ${configPath}`, configPath, err);
    }
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config: ${issues}`, configPath, result.error);
  }
  return resolveConfig(result.data, configPath);
}

export function resolveConfigPath(explicitPath?: string): string {
  const envPath = process.env.CONVO_CONFIG?.trim();
  const pathToUse = explicitPath?.trim() || envPath || DEFAULT_CONFIG_PATH;
  return resolveUserPath(pathToUse);
}

export function resolveConfig(base: z.infer<typeof ConfigSchema>, configPath: string): ConvoConfig {
  const stateDir = resolveUserPath(base.stateDir || ".convo");
  const sessionsDbPath = resolveDbPath(base.storage.sessionsDbPath, stateDir);
  const memoryDbPath = resolveDbPath(base.storage.memoryDbPath, stateDir);
  const logFilePath = base.logging.filePath?.trim()
    ? resolveUserPath(base.logging.filePath, stateDir)
    : undefined;

  return {
    ...base,
    resolved: {
      configPath,
      stateDir,
      sessionsDbPath,
      memoryDbPath,
      logFilePath,
    },
  };
}

/**
 * Config with every default applied, for embedding without a file.
 */
export function defaultConfig(overrides: unknown = {}): ConvoConfig {
  return resolveConfig(ConfigSchema.parse(overrides), resolveConfigPath());
}

function resolveDbPath(value: string, stateDir: string): string {
  return value.trim() === IN_MEMORY ? IN_MEMORY : resolveUserPath(value, stateDir);
}

function resolveUserPath(value: string, baseDir?: string): string {
  const trimmed = value.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith("~")) {
    return path.join(os.homedir(), trimmed.slice(1));
  }
  if (path.isAbsolute(trimmed)) {
    return path.normalize(trimmed);
  }
  if (baseDir) {
    return path.resolve(baseDir, trimmed);
  }
  return path.resolve(trimmed);
}
