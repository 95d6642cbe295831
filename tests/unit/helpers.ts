import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { Clock } from "../../src/utils/clock.js";

export type FakeClock = Clock & {
  set: (value: number) => void;
  advance: (ms: number) => void;
};

/**
 * Manually driven clock. Starts at a fixed instant so timestamps are exact.
 */
export function createFakeClock(start = 1_700_000_000_000): FakeClock {
  let current = start;
  const clock = () => current;
  return Object.assign(clock, {
    set: (value: number) => {
      current = value;
    },
    advance: (ms: number) => {
      current += ms;
    },
  });
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `convo-${prefix}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
