import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { defaultConfig, loadConfig, resolveConfigPath } from "../../src/config.js";
import { ConfigError } from "../../src/errors.js";
import { MAX_TIMER_MS } from "../../src/utils/clock.js";
import { makeTempDir, removeTempDir } from "./helpers.js";

describe("config", () => {
  let dir: string;
  let originalEnv: string | undefined;

  beforeEach(async () => {
    dir = await makeTempDir("config");
    originalEnv = process.env.CONVO_CONFIG;
    delete process.env.CONVO_CONFIG;
  });

  afterEach(async () => {
    if (originalEnv === undefined) {
      delete process.env.CONVO_CONFIG;
    } else {
      process.env.CONVO_CONFIG = originalEnv;
    }
    await removeTempDir(dir);
  });

  it("fills every default", () => {
    const cfg = defaultConfig();

    expect(cfg.storage).toEqual({
      sessionsDbPath: "sessions.sqlite",
      memoryDbPath: "memory.sqlite",
      busyTimeoutMs: 5_000,
      conflictRetries: 3,
    });
    expect(cfg.memory).toEqual({ shortTermTtlHours: 24, purgeSchedule: "*/15 * * * *" });
    expect(cfg.runner).toEqual({ agentName: "assistant", invokeTimeoutMs: 60_000 });
    expect(cfg.logging.level).toBe("info");
    expect(cfg.resolved.stateDir).toBe(path.resolve(".convo"));
    expect(cfg.resolved.sessionsDbPath).toBe(path.resolve(".convo", "sessions.sqlite"));
  });

  it("resolves relative paths against stateDir and keeps :memory:", async () => {
    const configPath = path.join(dir, "convo.config.json");
    await fs.writeFile(
      configPath,
      JSON.stringify({
        stateDir: dir,
        storage: { sessionsDbPath: "db/sessions.sqlite", memoryDbPath: ":memory:" },
        logging: { level: "debug", filePath: "logs/convo.log" },
      }),
      "utf-8",
    );

    const cfg = await loadConfig(configPath);

    expect(cfg.resolved.configPath).toBe(configPath);
    expect(cfg.resolved.sessionsDbPath).toBe(path.join(dir, "db", "sessions.sqlite"));
    expect(cfg.resolved.memoryDbPath).toBe(":memory:");
    expect(cfg.resolved.logFilePath).toBe(path.join(dir, "logs", "convo.log"));
    expect(cfg.logging.level).toBe("debug");
  });

  it("expands ~ in paths", () => {
    expect(resolveConfigPath("~/convo/convo.config.json")).toBe(path.join(os.homedir(), "convo", "convo.config.json"));
  });

  it("reads the path from CONVO_CONFIG", async () => {
    const configPath = path.join(dir, "from-env.json");
    await fs.writeFile(configPath, JSON.stringify({ runner: { agentName: "tutor" } }), "utf-8");
    process.env.CONVO_CONFIG = configPath;

    const cfg = await loadConfig();
    expect(cfg.runner.agentName).toBe("tutor");
  });

  it("fails on a missing explicit file", async () => {
    await expect(loadConfig(path.join(dir, "nope.json"))).rejects.toBeInstanceOf(ConfigError);
  });

  it("fails on invalid JSON", async () => {
    const configPath = path.join(dir, "broken.json");
    await fs.writeFile(configPath, "{ nope", "utf-8");

    await expect(loadConfig(configPath)).rejects.toMatchObject({
      code: "CONFIG_ERROR",
      message: `Config file is not valid JSON: ${configPath}`,
    });
  });

  it("lists schema violations", async () => {
    const configPath = path.join(dir, "invalid.json");
    await fs.writeFile(
      configPath,
      JSON.stringify({ memory: { shortTermTtlHours: -1 }, storage: { conflictRetries: 20 } }),
      "utf-8",
    );

    const error = await loadConfig(configPath).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toHaveProperty("message", expect.stringContaining("memory.shortTermTtlHours"));
    expect(error).toHaveProperty("message", expect.stringContaining("storage.conflictRetries"));
  });

  it("rejects an invoke timeout beyond what a timer can hold", () => {
    expect(defaultConfig({ runner: { invokeTimeoutMs: MAX_TIMER_MS } }).runner.invokeTimeoutMs).toBe(MAX_TIMER_MS);
    expect(() => defaultConfig({ runner: { invokeTimeoutMs: 3_000_000_000 } })).toThrow();
  });

  it("reports an oversized invoke timeout from the file", async () => {
    const configPath = path.join(dir, "slow.json");
    await fs.writeFile(configPath, JSON.stringify({ runner: { invokeTimeoutMs: 3_000_000_000 } }), "utf-8");

    const error = await loadConfig(configPath).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toHaveProperty("message", expect.stringContaining("runner.invokeTimeoutMs"));
  });
});
