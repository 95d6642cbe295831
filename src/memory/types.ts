/**
 * Memory Store Types
 */

import type { JsonValue, Metadata } from "../storage/payload.js";

export type LongTermMemoryType = "fact" | "preference" | "skill" | "other";

export type ShortTermMemoryType = "context" | "event" | "state" | "other";

export type MemoryKind = "long-term" | "short-term";

/**
 * User-scoped memory, ranked by importance and retrieved across sessions
 */
export type LongTermMemory = {
  memoryId: string;
  userId: string;
  /** Session that created the memory. Provenance only */
  sessionId: string | null;
  key: string;
  value: JsonValue;
  memoryType: LongTermMemoryType;
  /** Clamped to [0, 1] */
  importance: number;
  createdAt: number;
  updatedAt: number;
  accessedAt: number;
  /** Incremented by every retrieval that returns the memory */
  accessCount: number;
  expiresAt: number | null;
  metadata: Metadata;
};

/**
 * Session-scoped memory that dies at its expiry instant
 */
export type ShortTermMemory = {
  memoryId: string;
  sessionId: string;
  key: string;
  value: JsonValue;
  memoryType: ShortTermMemoryType;
  createdAt: number;
  /** Null: lives as long as the session */
  expiresAt: number | null;
  metadata: Metadata;
};

export type MemoryAssociation = {
  memoryId1: string;
  memoryId2: string;
  associationType: string;
  strength: number;
  createdAt: number;
};

export type AssociatedMemory =
  | { kind: "long-term"; memory: LongTermMemory; associationType: string; strength: number }
  | { kind: "short-term"; memory: ShortTermMemory; associationType: string; strength: number };

export type StoreLongTermInput = {
  userId: string;
  sessionId?: string | null;
  key: string;
  value: JsonValue;
  memoryType?: LongTermMemoryType;
  /** Defaults to 0.5, clamped to [0, 1] */
  importance?: number;
  /** Omitted: never expires */
  ttlMs?: number;
  metadata?: Metadata;
};

export type StoreShortTermInput = {
  sessionId: string;
  key: string;
  value: JsonValue;
  memoryType?: ShortTermMemoryType;
  /** Omitted: store default. Null: no expiry */
  ttlHours?: number | null;
  metadata?: Metadata;
};

export type LongTermQuery = {
  topK: number;
  key?: string;
  memoryType?: LongTermMemoryType;
  minImportance?: number;
};

export type ShortTermQuery = {
  topN: number;
  key?: string;
  memoryType?: ShortTermMemoryType;
};

export type AssociationQuery = {
  associationType?: string;
  minStrength?: number;
};
