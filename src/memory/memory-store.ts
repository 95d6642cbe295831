/**
 * Memory Store
 *
 * Two tiers backed by SQLite:
 * - Long-term: user-scoped, ranked by importance, access-tracked. Expired rows
 *   are hidden from retrieval but kept for audit.
 * - Short-term: session-scoped, TTL-bound, physically purged once expired.
 *
 * Associations link any two memories of either tier. They are advisory: an
 * endpoint that has since been purged or expired is treated as absent.
 */

import crypto from "node:crypto";

import { NotFoundError, ValidationError } from "../errors.js";
import type { Logger } from "../log.js";
import { ensureColumns, openDatabase, type SqliteDatabase } from "../storage/database.js";
import {
  decodeMetadata,
  decodeValue,
  encodeMetadata,
  encodeValue,
} from "../storage/payload.js";
import { computeExpiry, hoursToMs, isFresh, systemClock, type Clock } from "../utils/clock.js";
import type {
  AssociatedMemory,
  AssociationQuery,
  LongTermMemory,
  LongTermMemoryType,
  LongTermQuery,
  MemoryAssociation,
  ShortTermMemory,
  ShortTermMemoryType,
  ShortTermQuery,
  StoreLongTermInput,
  StoreShortTermInput,
} from "./types.js";

const LONG_TERM_TYPES: readonly LongTermMemoryType[] = ["fact", "preference", "skill", "other"];
const SHORT_TERM_TYPES: readonly ShortTermMemoryType[] = ["context", "event", "state", "other"];

export const DEFAULT_IMPORTANCE = 0.5;
export const DEFAULT_SHORT_TERM_TTL_HOURS = 24;

type LongTermRow = {
  memory_id: string;
  user_id: string;
  session_id: string | null;
  key: string;
  value: string;
  memory_type: string;
  importance: number;
  created_at: number;
  updated_at: number;
  accessed_at: number;
  access_count: number;
  expires_at: number | null;
  metadata: string | null;
};

type ShortTermRow = {
  memory_id: string;
  session_id: string;
  key: string;
  value: string;
  memory_type: string;
  created_at: number;
  expires_at: number | null;
  metadata: string | null;
};

type AssociationRow = {
  memory_id_1: string;
  memory_id_2: string;
  association_type: string;
  strength: number;
  created_at: number;
};

const LONG_TERM_COLUMNS =
  "memory_id, user_id, session_id, key, value, memory_type, importance, created_at, updated_at, accessed_at, access_count, expires_at, metadata";
const SHORT_TERM_COLUMNS = "memory_id, session_id, key, value, memory_type, created_at, expires_at, metadata";

export type MemoryStoreParams = {
  dbPath: string;
  logger: Logger;
  clock?: Clock;
  busyTimeoutMs?: number;
  /** TTL applied when storeShortTermMemory is called without one */
  defaultShortTermTtlHours?: number;
};

export class MemoryStore {
  private readonly db: SqliteDatabase;
  private readonly logger: Logger;
  private readonly now: Clock;
  private readonly defaultShortTermTtlHours: number;

  constructor(params: MemoryStoreParams) {
    this.logger = params.logger.child({ component: "memory-store" });
    this.now = params.clock ?? systemClock;
    this.defaultShortTermTtlHours = params.defaultShortTermTtlHours ?? DEFAULT_SHORT_TERM_TTL_HOURS;
    assertPositiveFinite(this.defaultShortTermTtlHours, "defaultShortTermTtlHours");
    this.db = openDatabase({
      path: params.dbPath,
      busyTimeoutMs: params.busyTimeoutMs,
      logger: this.logger,
    });
    this.ensureSchema();
  }

  private ensureSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS long_term_memories (
        memory_id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        session_id TEXT,
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        memory_type TEXT NOT NULL DEFAULT 'fact',
        importance REAL NOT NULL DEFAULT 0.5,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        accessed_at INTEGER NOT NULL,
        access_count INTEGER NOT NULL DEFAULT 0,
        expires_at INTEGER,
        metadata TEXT
      );

      CREATE TABLE IF NOT EXISTS short_term_memories (
        memory_id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        memory_type TEXT NOT NULL DEFAULT 'context',
        created_at INTEGER NOT NULL,
        expires_at INTEGER,
        metadata TEXT
      );

      -- Pair stored in sorted order, so the key is the unordered pair + type
      CREATE TABLE IF NOT EXISTS memory_associations (
        memory_id_1 TEXT NOT NULL,
        memory_id_2 TEXT NOT NULL,
        association_type TEXT NOT NULL DEFAULT 'related',
        strength REAL NOT NULL DEFAULT 0.5,
        created_at INTEGER NOT NULL,
        PRIMARY KEY (memory_id_1, memory_id_2, association_type)
      );

      CREATE INDEX IF NOT EXISTS idx_ltm_user_rank ON long_term_memories(user_id, importance, accessed_at);
      CREATE INDEX IF NOT EXISTS idx_ltm_key ON long_term_memories(key);
      CREATE INDEX IF NOT EXISTS idx_stm_session ON short_term_memories(session_id, created_at);
      CREATE INDEX IF NOT EXISTS idx_stm_expires ON short_term_memories(expires_at);
      CREATE INDEX IF NOT EXISTS idx_assoc_second ON memory_associations(memory_id_2);
    `);

    ensureColumns(this.db, "long_term_memories", { expires_at: "INTEGER", metadata: "TEXT" });
    ensureColumns(this.db, "short_term_memories", { metadata: "TEXT" });
  }

  // ==========================================================================
  // Long-term
  // ==========================================================================

  async storeLongTermMemory(input: StoreLongTermInput): Promise<string> {
    const userId = requireText(input.userId, "userId");
    const key = requireText(input.key, "key");
    const memoryType = input.memoryType ?? "fact";
    if (!LONG_TERM_TYPES.includes(memoryType)) {
      throw new ValidationError(`Unknown long-term memory type: ${String(memoryType)}`);
    }
    const importance = clampImportance(input.importance ?? DEFAULT_IMPORTANCE);
    if (input.ttlMs !== undefined) assertPositiveFinite(input.ttlMs, "ttlMs");

    const now = this.now();
    const memoryId = crypto.randomUUID();
    this.db
      .prepare(
        `INSERT INTO long_term_memories (${LONG_TERM_COLUMNS})
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 0, ?, ?)`,
      )
      .run(
        memoryId,
        userId,
        input.sessionId ?? null,
        key,
        encodeValue(input.value),
        memoryType,
        importance,
        now,
        now,
        now,
        computeExpiry(now, input.ttlMs),
        encodeMetadata(input.metadata),
      );

    this.logger.debug({ memoryId, userId, key, memoryType, importance }, "Long-term memory stored");
    return memoryId;
  }

  /**
   * Top memories for a user by importance, then most recently accessed.
   *
   * Every call counts as a use: returned rows get accessedAt = now and
   * accessCount + 1 in the same transaction as the read.
   */
  async retrieveLongTermMemories(userId: string, query: LongTermQuery): Promise<LongTermMemory[]> {
    assertPositiveInt(query.topK, "topK");

    const clauses = ["user_id = ?", "(expires_at IS NULL OR expires_at > ?)"];
    const now = this.now();
    const params: Array<string | number> = [userId, now];
    if (query.key !== undefined) {
      clauses.push("key = ?");
      params.push(query.key);
    }
    if (query.memoryType !== undefined) {
      clauses.push("memory_type = ?");
      params.push(query.memoryType);
    }
    if (query.minImportance !== undefined) {
      clauses.push("importance >= ?");
      params.push(query.minImportance);
    }
    params.push(query.topK);

    const retrieve = this.db.transaction((): LongTermMemory[] => {
      const rows = this.db
        .prepare<Array<string | number>, LongTermRow>(
          `SELECT ${LONG_TERM_COLUMNS} FROM long_term_memories
           WHERE ${clauses.join(" AND ")}
           ORDER BY importance DESC, accessed_at DESC, created_at DESC, rowid DESC
           LIMIT ?`,
        )
        .all(...params);

      const touch = this.db.prepare(
        `UPDATE long_term_memories
         SET accessed_at = ?, access_count = access_count + 1
         WHERE memory_id = ?`,
      );
      const read = this.db.prepare<[string], { access_count: number }>(
        "SELECT access_count FROM long_term_memories WHERE memory_id = ?",
      );

      return rows.map((row) => {
        touch.run(now, row.memory_id);
        const accessCount = read.get(row.memory_id)?.access_count ?? row.access_count + 1;
        return { ...toLongTerm(row), accessedAt: now, accessCount };
      });
    });

    const memories = retrieve.immediate();
    this.logger.debug({ userId, count: memories.length }, "Long-term memories retrieved");
    return memories;
  }

  /**
   * Direct lookup by id. An audit read: access counters are left alone and
   * expired memories are still returned.
   */
  async getLongTermMemory(memoryId: string): Promise<LongTermMemory> {
    const row = this.findLongTerm(memoryId);
    if (!row) throw new NotFoundError("memory", memoryId);
    return toLongTerm(row);
  }

  async updateImportance(memoryId: string, importance: number): Promise<LongTermMemory> {
    const clamped = clampImportance(importance);
    const now = this.now();
    const result = this.db
      .prepare(
        `UPDATE long_term_memories
         SET importance = ?, updated_at = MAX(updated_at, ?)
         WHERE memory_id = ?`,
      )
      .run(clamped, now, memoryId);
    if (result.changes === 0) throw new NotFoundError("memory", memoryId);

    this.logger.debug({ memoryId, importance: clamped }, "Memory importance updated");
    return this.getLongTermMemory(memoryId);
  }

  // ==========================================================================
  // Short-term
  // ==========================================================================

  async storeShortTermMemory(input: StoreShortTermInput): Promise<string> {
    const sessionId = requireText(input.sessionId, "sessionId");
    const key = requireText(input.key, "key");
    const memoryType = input.memoryType ?? "context";
    if (!SHORT_TERM_TYPES.includes(memoryType)) {
      throw new ValidationError(`Unknown short-term memory type: ${String(memoryType)}`);
    }

    const ttlHours = input.ttlHours === undefined ? this.defaultShortTermTtlHours : input.ttlHours;
    if (ttlHours !== null) assertPositiveFinite(ttlHours, "ttlHours");

    const now = this.now();
    const memoryId = crypto.randomUUID();
    this.db
      .prepare(`INSERT INTO short_term_memories (${SHORT_TERM_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`)
      .run(
        memoryId,
        sessionId,
        key,
        encodeValue(input.value),
        memoryType,
        now,
        ttlHours === null ? null : computeExpiry(now, hoursToMs(ttlHours)),
        encodeMetadata(input.metadata),
      );

    this.logger.debug({ memoryId, sessionId, key, memoryType }, "Short-term memory stored");
    return memoryId;
  }

  /**
   * Newest unexpired memories of a session first.
   */
  async retrieveShortTermMemories(sessionId: string, query: ShortTermQuery): Promise<ShortTermMemory[]> {
    assertPositiveInt(query.topN, "topN");

    const clauses = ["session_id = ?", "(expires_at IS NULL OR expires_at > ?)"];
    const params: Array<string | number> = [sessionId, this.now()];
    if (query.key !== undefined) {
      clauses.push("key = ?");
      params.push(query.key);
    }
    if (query.memoryType !== undefined) {
      clauses.push("memory_type = ?");
      params.push(query.memoryType);
    }
    params.push(query.topN);

    return this.db
      .prepare<Array<string | number>, ShortTermRow>(
        `SELECT ${SHORT_TERM_COLUMNS} FROM short_term_memories
         WHERE ${clauses.join(" AND ")}
         ORDER BY created_at DESC, rowid DESC
         LIMIT ?`,
      )
      .all(...params)
      .map(toShortTerm);
  }

  /**
   * Delete short-term memories whose expiry has passed. One statement, so
   * the set of rows removed is fixed when it starts. Long-term memories are
   * never purged.
   */
  async purgeExpiredShortTermMemories(): Promise<number> {
    const result = this.db
      .prepare("DELETE FROM short_term_memories WHERE expires_at IS NOT NULL AND expires_at < ?")
      .run(this.now());
    const removed = result.changes;
    if (removed > 0) {
      this.logger.info({ removed }, "Expired short-term memories purged");
    }
    return removed;
  }

  /**
   * Drop every short-term memory of a session, expired or not.
   */
  async clearSessionMemories(sessionId: string): Promise<number> {
    const result = this.db.prepare("DELETE FROM short_term_memories WHERE session_id = ?").run(sessionId);
    this.logger.debug({ sessionId, removed: result.changes }, "Session short-term memories cleared");
    return result.changes;
  }

  // ==========================================================================
  // Associations
  // ==========================================================================

  /**
   * Link two memories. Calling again with the same pair (in either order)
   * and type updates strength and createdAt in place.
   */
  async associateMemories(
    memoryId1: string,
    memoryId2: string,
    associationType = "related",
    strength = 0.5,
  ): Promise<MemoryAssociation> {
    const type = requireText(associationType, "associationType");
    if (!Number.isFinite(strength) || strength < 0 || strength > 1) {
      throw new ValidationError("strength must be within [0, 1]", { strength });
    }
    if (memoryId1 === memoryId2) {
      throw new ValidationError("A memory cannot be associated with itself", { memoryId: memoryId1 });
    }

    const [first, second] = memoryId1 < memoryId2 ? [memoryId1, memoryId2] : [memoryId2, memoryId1];
    const association: MemoryAssociation = {
      memoryId1: first,
      memoryId2: second,
      associationType: type,
      strength,
      createdAt: this.now(),
    };

    const upsert = this.db.transaction(() => {
      for (const id of [first, second]) {
        if (!this.memoryExists(id)) throw new NotFoundError("memory", id);
      }
      this.db
        .prepare(
          `INSERT INTO memory_associations (memory_id_1, memory_id_2, association_type, strength, created_at)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(memory_id_1, memory_id_2, association_type) DO UPDATE SET
             strength = excluded.strength,
             created_at = excluded.created_at`,
        )
        .run(first, second, type, strength, association.createdAt);
    });
    upsert.immediate();

    this.logger.debug({ memoryId1: first, memoryId2: second, type, strength }, "Memories associated");
    return association;
  }

  /**
   * Raw association rows touching a memory, including ones whose other end
   * no longer exists.
   */
  async getAssociations(memoryId: string): Promise<MemoryAssociation[]> {
    return this.db
      .prepare<[string, string], AssociationRow>(
        `SELECT memory_id_1, memory_id_2, association_type, strength, created_at
         FROM memory_associations
         WHERE memory_id_1 = ? OR memory_id_2 = ?
         ORDER BY strength DESC, created_at DESC`,
      )
      .all(memoryId, memoryId)
      .map(toAssociation);
  }

  /**
   * Memories linked to the given one, strongest first. Dangling or expired
   * endpoints are skipped. Does not count as a use of the returned memories.
   */
  async getAssociatedMemories(memoryId: string, query: AssociationQuery = {}): Promise<AssociatedMemory[]> {
    const now = this.now();
    const minStrength = query.minStrength ?? 0;
    const associations = (await this.getAssociations(memoryId)).filter(
      (a) =>
        a.strength >= minStrength &&
        (query.associationType === undefined || a.associationType === query.associationType),
    );

    const results: AssociatedMemory[] = [];
    for (const association of associations) {
      const otherId = association.memoryId1 === memoryId ? association.memoryId2 : association.memoryId1;
      const { associationType, strength } = association;

      const longTerm = this.findLongTerm(otherId);
      if (longTerm) {
        if (isFresh(longTerm.expires_at, now)) {
          results.push({ kind: "long-term", memory: toLongTerm(longTerm), associationType, strength });
        }
        continue;
      }

      const shortTerm = this.findShortTerm(otherId);
      if (shortTerm && isFresh(shortTerm.expires_at, now)) {
        results.push({ kind: "short-term", memory: toShortTerm(shortTerm), associationType, strength });
      }
    }
    return results;
  }

  close(): void {
    this.db.close();
  }

  private findLongTerm(memoryId: string): LongTermRow | undefined {
    return this.db
      .prepare<[string], LongTermRow>(`SELECT ${LONG_TERM_COLUMNS} FROM long_term_memories WHERE memory_id = ?`)
      .get(memoryId);
  }

  private findShortTerm(memoryId: string): ShortTermRow | undefined {
    return this.db
      .prepare<[string], ShortTermRow>(`SELECT ${SHORT_TERM_COLUMNS} FROM short_term_memories WHERE memory_id = ?`)
      .get(memoryId);
  }

  private memoryExists(memoryId: string): boolean {
    return Boolean(this.findLongTerm(memoryId) ?? this.findShortTerm(memoryId));
  }
}

/**
 * Clamp into [0, 1]. NaN has no sensible clamp and is rejected.
 */
export function clampImportance(importance: number): number {
  if (Number.isNaN(importance)) {
    throw new ValidationError("importance must be a number");
  }
  return Math.min(1, Math.max(0, importance));
}

function toLongTerm(row: LongTermRow): LongTermMemory {
  return {
    memoryId: row.memory_id,
    userId: row.user_id,
    sessionId: row.session_id,
    key: row.key,
    value: decodeValue(row.value),
    memoryType: LONG_TERM_TYPES.find((t) => t === row.memory_type) ?? "other",
    importance: row.importance,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    accessedAt: row.accessed_at,
    accessCount: row.access_count,
    expiresAt: row.expires_at,
    metadata: decodeMetadata(row.metadata),
  };
}

function toShortTerm(row: ShortTermRow): ShortTermMemory {
  return {
    memoryId: row.memory_id,
    sessionId: row.session_id,
    key: row.key,
    value: decodeValue(row.value),
    memoryType: SHORT_TERM_TYPES.find((t) => t === row.memory_type) ?? "other",
    createdAt: row.created_at,
    expiresAt: row.expires_at,
    metadata: decodeMetadata(row.metadata),
  };
}

function toAssociation(row: AssociationRow): MemoryAssociation {
  return {
    memoryId1: row.memory_id_1,
    memoryId2: row.memory_id_2,
    associationType: row.association_type,
    strength: row.strength,
    createdAt: row.created_at,
  };
}

function requireText(value: string, name: string): string {
  const trimmed = typeof value === "string" ? value.trim() : "";
  if (!trimmed) throw new ValidationError(`${name} is required`);
  return trimmed;
}

function assertPositiveInt(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer`, { [name]: value });
  }
}

function assertPositiveFinite(value: number, name: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${name} must be greater than zero`, { [name]: value });
  }
}
