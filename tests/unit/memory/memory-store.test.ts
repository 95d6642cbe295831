import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { NotFoundError, ValidationError } from "../../../src/errors.js";
import { createSilentLogger } from "../../../src/log.js";
import { clampImportance, MemoryStore } from "../../../src/memory/memory-store.js";
import { createFakeClock, makeTempDir, removeTempDir, type FakeClock } from "../helpers.js";

const T0 = 1_700_000_000_000;
const HOUR = 3_600_000;

describe("MemoryStore", () => {
  let dir: string;
  let clock: FakeClock;
  let store: MemoryStore;

  beforeEach(async () => {
    dir = await makeTempDir("memory-store");
    clock = createFakeClock(T0);
    store = new MemoryStore({
      dbPath: path.join(dir, "memory.sqlite"),
      logger: createSilentLogger(),
      clock,
    });
  });

  afterEach(async () => {
    store.close();
    await removeTempDir(dir);
  });

  describe("long-term memories", () => {
    it("stores with defaults and reads back by id", async () => {
      const id = await store.storeLongTermMemory({
        userId: "u-1",
        sessionId: "s-1",
        key: "favorite_color",
        value: { color: "teal" },
        metadata: { source: "chat" },
      });

      expect(await store.getLongTermMemory(id)).toEqual({
        memoryId: id,
        userId: "u-1",
        sessionId: "s-1",
        key: "favorite_color",
        value: { color: "teal" },
        memoryType: "fact",
        importance: 0.5,
        createdAt: T0,
        updatedAt: T0,
        accessedAt: T0,
        accessCount: 0,
        expiresAt: null,
        metadata: { source: "chat" },
      });
    });

    it("clamps importance into [0, 1]", async () => {
      const high = await store.storeLongTermMemory({ userId: "u-1", key: "high", value: "x", importance: 1.7 });
      const low = await store.storeLongTermMemory({ userId: "u-1", key: "low", value: "x", importance: -0.3 });

      expect((await store.getLongTermMemory(high)).importance).toBe(1);
      expect((await store.getLongTermMemory(low)).importance).toBe(0);
    });

    it("rejects NaN importance and non-positive TTLs", async () => {
      await expect(
        store.storeLongTermMemory({ userId: "u-1", key: "k", value: "x", importance: Number.NaN }),
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(store.storeLongTermMemory({ userId: "u-1", key: "k", value: "x", ttlMs: 0 })).rejects.toBeInstanceOf(
        ValidationError,
      );
      await expect(store.storeLongTermMemory({ userId: " ", key: "k", value: "x" })).rejects.toBeInstanceOf(
        ValidationError,
      );
    });

    it("returns the top K by importance and counts each retrieval as a use", async () => {
      const importances = [0.1, 0.9, 0.5, 0.7, 0.3, 0.8, 0.2, 0.6];
      for (const [i, importance] of importances.entries()) {
        await store.storeLongTermMemory({ userId: "u-1", key: `k${i}`, value: i, importance });
        clock.advance(1);
      }
      await store.storeLongTermMemory({ userId: "u-2", key: "other", value: "x", importance: 1 });

      clock.set(T0 + 1_000);
      const top = await store.retrieveLongTermMemories("u-1", { topK: 5 });

      expect(top.map((m) => m.key)).toEqual(["k1", "k5", "k3", "k7", "k2"]);
      expect(top.map((m) => m.accessCount)).toEqual([1, 1, 1, 1, 1]);
      expect(top.every((m) => m.accessedAt === T0 + 1_000)).toBe(true);

      clock.set(T0 + 2_000);
      const again = await store.retrieveLongTermMemories("u-1", { topK: 5 });
      expect(again.map((m) => m.accessCount)).toEqual([2, 2, 2, 2, 2]);

      const untouched = await store.retrieveLongTermMemories("u-1", { topK: 8, key: "k0" });
      expect(untouched[0]?.accessCount).toBe(1);
    });

    it("breaks importance ties by most recent access", async () => {
      await store.storeLongTermMemory({ userId: "u-1", key: "a", value: "a" });
      clock.advance(1);
      await store.storeLongTermMemory({ userId: "u-1", key: "b", value: "b" });

      clock.advance(10);
      await store.retrieveLongTermMemories("u-1", { topK: 1, key: "a" });

      clock.advance(10);
      const ranked = await store.retrieveLongTermMemories("u-1", { topK: 2 });
      expect(ranked.map((m) => m.key)).toEqual(["a", "b"]);
    });

    it("filters by key, type and minimum importance", async () => {
      await store.storeLongTermMemory({ userId: "u-1", key: "lang", value: "TS", memoryType: "skill", importance: 0.9 });
      await store.storeLongTermMemory({ userId: "u-1", key: "tea", value: "green", memoryType: "preference", importance: 0.4 });
      await store.storeLongTermMemory({ userId: "u-1", key: "city", value: "Oslo", importance: 0.8 });

      const skills = await store.retrieveLongTermMemories("u-1", { topK: 5, memoryType: "skill" });
      expect(skills.map((m) => m.key)).toEqual(["lang"]);

      const important = await store.retrieveLongTermMemories("u-1", { topK: 5, minImportance: 0.5 });
      expect(important.map((m) => m.key)).toEqual(["lang", "city"]);

      const tea = await store.retrieveLongTermMemories("u-1", { topK: 5, key: "tea" });
      expect(tea.map((m) => m.value)).toEqual(["green"]);
    });

    it("hides expired memories from retrieval but keeps them for audit", async () => {
      const id = await store.storeLongTermMemory({ userId: "u-1", key: "promo", value: "x", ttlMs: 1_000 });
      expect((await store.getLongTermMemory(id)).expiresAt).toBe(T0 + 1_000);

      clock.set(T0 + 1_000);
      expect(await store.retrieveLongTermMemories("u-1", { topK: 5 })).toEqual([]);
      expect(await store.purgeExpiredShortTermMemories()).toBe(0);
      expect((await store.getLongTermMemory(id)).key).toBe("promo");
    });

    it("does not count a lookup by id as a use", async () => {
      const id = await store.storeLongTermMemory({ userId: "u-1", key: "k", value: "x" });
      await store.getLongTermMemory(id);
      expect((await store.getLongTermMemory(id)).accessCount).toBe(0);
    });

    it("updates importance with clamping", async () => {
      const id = await store.storeLongTermMemory({ userId: "u-1", key: "k", value: "x" });
      clock.advance(500);

      const updated = await store.updateImportance(id, 3);
      expect(updated.importance).toBe(1);
      expect(updated.updatedAt).toBe(T0 + 500);

      await expect(store.updateImportance("missing", 0.2)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("short-term memories", () => {
    it("applies the default TTL", async () => {
      const id = await store.storeShortTermMemory({ sessionId: "s-1", key: "topic", value: "travel" });

      const [memory] = await store.retrieveShortTermMemories("s-1", { topN: 1 });
      expect(memory).toEqual({
        memoryId: id,
        sessionId: "s-1",
        key: "topic",
        value: "travel",
        memoryType: "context",
        createdAt: T0,
        expiresAt: T0 + 24 * HOUR,
        metadata: {},
      });
    });

    it("expires tiny TTLs and purges them", async () => {
      await store.storeShortTermMemory({ sessionId: "s-1", key: "flash", value: "x", ttlHours: 0.0001 });
      expect(await store.retrieveShortTermMemories("s-1", { topN: 5 })).toHaveLength(1);

      clock.advance(361);
      expect(await store.retrieveShortTermMemories("s-1", { topN: 5 })).toEqual([]);
      expect(await store.purgeExpiredShortTermMemories()).toBe(1);
      expect(await store.purgeExpiredShortTermMemories()).toBe(0);
    });

    it("keeps a sub-millisecond TTL visible until the next millisecond", async () => {
      await store.storeShortTermMemory({ sessionId: "s-1", key: "blink", value: "x", ttlHours: 1e-8 });

      const [memory] = await store.retrieveShortTermMemories("s-1", { topN: 5 });
      expect(memory?.expiresAt).toBe(T0 + 1);

      clock.advance(1);
      expect(await store.retrieveShortTermMemories("s-1", { topN: 5 })).toEqual([]);
    });

    it("keeps memories without expiry through purges", async () => {
      await store.storeShortTermMemory({ sessionId: "s-1", key: "pinned", value: "x", ttlHours: null });

      clock.advance(365 * 24 * HOUR);
      expect(await store.purgeExpiredShortTermMemories()).toBe(0);
      const [memory] = await store.retrieveShortTermMemories("s-1", { topN: 5 });
      expect(memory?.expiresAt).toBeNull();
    });

    it("rejects non-positive TTLs", async () => {
      await expect(
        store.storeShortTermMemory({ sessionId: "s-1", key: "k", value: "x", ttlHours: 0 }),
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(
        store.storeShortTermMemory({ sessionId: "s-1", key: "k", value: "x", ttlHours: -1 }),
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it("returns the newest first with filters", async () => {
      await store.storeShortTermMemory({ sessionId: "s-1", key: "a", value: 1, memoryType: "event" });
      clock.advance(1);
      await store.storeShortTermMemory({ sessionId: "s-1", key: "b", value: 2, memoryType: "state" });
      clock.advance(1);
      await store.storeShortTermMemory({ sessionId: "s-1", key: "c", value: 3, memoryType: "event" });
      await store.storeShortTermMemory({ sessionId: "s-2", key: "d", value: 4 });

      const recent = await store.retrieveShortTermMemories("s-1", { topN: 2 });
      expect(recent.map((m) => m.key)).toEqual(["c", "b"]);

      const events = await store.retrieveShortTermMemories("s-1", { topN: 5, memoryType: "event" });
      expect(events.map((m) => m.key)).toEqual(["c", "a"]);

      const byKey = await store.retrieveShortTermMemories("s-1", { topN: 5, key: "b" });
      expect(byKey.map((m) => m.value)).toEqual([2]);
    });

    it("clears one session's memories", async () => {
      await store.storeShortTermMemory({ sessionId: "s-1", key: "a", value: 1 });
      await store.storeShortTermMemory({ sessionId: "s-1", key: "b", value: 2, ttlHours: null });
      await store.storeShortTermMemory({ sessionId: "s-2", key: "c", value: 3 });

      expect(await store.clearSessionMemories("s-1")).toBe(2);
      expect(await store.retrieveShortTermMemories("s-1", { topN: 5 })).toEqual([]);
      expect(await store.retrieveShortTermMemories("s-2", { topN: 5 })).toHaveLength(1);
    });

    it("rejects a non-positive topN", async () => {
      await expect(store.retrieveShortTermMemories("s-1", { topN: 0 })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("associations", () => {
    it("stores the pair in sorted order and upserts on repeat", async () => {
      const a = await store.storeLongTermMemory({ userId: "u-1", key: "a", value: "a" });
      const b = await store.storeLongTermMemory({ userId: "u-1", key: "b", value: "b" });
      const [first, second] = [a, b].sort();

      const link = await store.associateMemories(a, b, "related", 0.4);
      expect(link).toEqual({ memoryId1: first, memoryId2: second, associationType: "related", strength: 0.4, createdAt: T0 });

      clock.advance(100);
      await store.associateMemories(b, a, "related", 0.9);

      const rows = await store.getAssociations(a);
      expect(rows).toEqual([
        { memoryId1: first, memoryId2: second, associationType: "related", strength: 0.9, createdAt: T0 + 100 },
      ]);
    });

    it("keeps different association types apart", async () => {
      const a = await store.storeLongTermMemory({ userId: "u-1", key: "a", value: "a" });
      const b = await store.storeLongTermMemory({ userId: "u-1", key: "b", value: "b" });

      await store.associateMemories(a, b, "related", 0.3);
      await store.associateMemories(a, b, "causes", 0.7);

      expect((await store.getAssociations(b)).map((r) => r.associationType)).toEqual(["causes", "related"]);
    });

    it("links across tiers and filters by type and strength", async () => {
      const fact = await store.storeLongTermMemory({ userId: "u-1", key: "fact", value: "f" });
      const pref = await store.storeLongTermMemory({ userId: "u-1", key: "pref", value: "p" });
      const event = await store.storeShortTermMemory({ sessionId: "s-1", key: "event", value: "e" });

      await store.associateMemories(fact, pref, "related", 0.2);
      await store.associateMemories(fact, event, "mentioned_in", 0.8);

      const all = await store.getAssociatedMemories(fact);
      expect(all.map((r) => [r.kind, r.memory.key, r.strength])).toEqual([
        ["short-term", "event", 0.8],
        ["long-term", "pref", 0.2],
      ]);

      const strong = await store.getAssociatedMemories(fact, { minStrength: 0.5 });
      expect(strong.map((r) => r.memory.key)).toEqual(["event"]);

      const related = await store.getAssociatedMemories(fact, { associationType: "related" });
      expect(related.map((r) => r.memory.key)).toEqual(["pref"]);
    });

    it("skips endpoints that were purged", async () => {
      const fact = await store.storeLongTermMemory({ userId: "u-1", key: "fact", value: "f" });
      const flash = await store.storeShortTermMemory({ sessionId: "s-1", key: "flash", value: "x", ttlHours: 0.0001 });
      await store.associateMemories(fact, flash);

      clock.advance(1_000);
      expect(await store.getAssociatedMemories(fact)).toEqual([]);

      await store.purgeExpiredShortTermMemories();
      expect(await store.getAssociations(fact)).toHaveLength(1);
      expect(await store.getAssociatedMemories(fact)).toEqual([]);
    });

    it("validates strength, endpoints and self-links", async () => {
      const a = await store.storeLongTermMemory({ userId: "u-1", key: "a", value: "a" });
      const b = await store.storeLongTermMemory({ userId: "u-1", key: "b", value: "b" });

      await expect(store.associateMemories(a, b, "related", 1.5)).rejects.toBeInstanceOf(ValidationError);
      await expect(store.associateMemories(a, a)).rejects.toBeInstanceOf(ValidationError);
      await expect(store.associateMemories(a, b, " ")).rejects.toBeInstanceOf(ValidationError);
      await expect(store.associateMemories(a, "missing")).rejects.toMatchObject({
        code: "NOT_FOUND",
        entity: "memory",
        id: "missing",
      });
      expect(await store.getAssociations(a)).toEqual([]);
    });

    it("defaults to a related link of strength 0.5", async () => {
      const a = await store.storeLongTermMemory({ userId: "u-1", key: "a", value: "a" });
      const b = await store.storeLongTermMemory({ userId: "u-1", key: "b", value: "b" });

      const link = await store.associateMemories(a, b);
      expect(link.associationType).toBe("related");
      expect(link.strength).toBe(0.5);
    });
  });

  it("sees writes made through another handle on the same file", async () => {
    const shared = new MemoryStore({ dbPath: path.join(dir, "memory.sqlite"), logger: createSilentLogger(), clock });
    const id = await shared.storeLongTermMemory({ userId: "u-1", key: "k", value: "x" });
    shared.close();

    expect((await store.getLongTermMemory(id)).key).toBe("k");
  });
});

describe("clampImportance()", () => {
  it("clamps and rejects NaN", () => {
    expect(clampImportance(1.7)).toBe(1);
    expect(clampImportance(-0.3)).toBe(0);
    expect(clampImportance(0.25)).toBe(0.25);
    expect(() => clampImportance(Number.NaN)).toThrow(ValidationError);
  });
});
