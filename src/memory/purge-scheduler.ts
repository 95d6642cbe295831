/**
 * Periodic purge of expired short-term memories on a cron schedule
 */

import cron, { type ScheduledTask } from "node-cron";

import { errorMessage, ValidationError } from "../errors.js";
import type { Logger } from "../log.js";
import type { MemoryStore } from "./memory-store.js";

export type PurgeTarget = Pick<MemoryStore, "purgeExpiredShortTermMemories">;

export type PurgeSchedulerEvent =
  | { type: "purge_completed"; timestamp: number; removed: number }
  | { type: "purge_failed"; timestamp: number; error: string };

export class PurgeScheduler {
  private readonly store: PurgeTarget;
  private readonly schedule: string;
  private readonly logger: Logger;
  private readonly listeners: Array<(event: PurgeSchedulerEvent) => void> = [];
  private task: ScheduledTask | null = null;
  private running = false;

  constructor(params: { store: PurgeTarget; schedule: string; logger: Logger }) {
    if (!cron.validate(params.schedule)) {
      throw new ValidationError(`Invalid cron expression: ${params.schedule}`);
    }
    this.store = params.store;
    this.schedule = params.schedule;
    this.logger = params.logger.child({ component: "purge-scheduler" });
  }

  start(): void {
    if (this.task) return;

    this.task = cron.schedule(
      this.schedule,
      () => {
        this.runOnce().catch((err) => {
          this.logger.error({ error: errorMessage(err) }, "Scheduled purge failed");
        });
      },
      { timezone: process.env.TZ || "UTC" },
    );
    this.logger.info({ schedule: this.schedule }, "Purge scheduler started");
  }

  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = null;
    this.logger.info("Purge scheduler stopped");
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  onEvent(listener: (event: PurgeSchedulerEvent) => void): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) this.listeners.splice(index, 1);
    };
  }

  /**
   * Run one purge now. Overlapping runs are skipped and report 0.
   */
  async runOnce(): Promise<number> {
    if (this.running) {
      this.logger.debug("Purge already in progress, skipping");
      return 0;
    }
    this.running = true;
    try {
      const removed = await this.store.purgeExpiredShortTermMemories();
      this.emit({ type: "purge_completed", timestamp: Date.now(), removed });
      return removed;
    } catch (err) {
      this.emit({ type: "purge_failed", timestamp: Date.now(), error: errorMessage(err) });
      throw err;
    } finally {
      this.running = false;
    }
  }

  private emit(event: PurgeSchedulerEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.logger.warn({ error: errorMessage(err) }, "Purge listener threw");
      }
    }
  }
}
