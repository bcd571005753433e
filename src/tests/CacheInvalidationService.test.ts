import { jest } from "@jest/globals";
import { CacheInvalidationService } from "../cache/CacheInvalidationService.js";
import { LruCacheStore } from "../cache/CacheStore.js";
import type { CompiledArtifact } from "../types.js";

function artifact(unitId: string, contentHash = "hash-1"): CompiledArtifact {
    return { unitId, contentHash, createdAt: new Date(0), payload: { unitId } };
}

describe("CacheInvalidationService", () => {
    const createService = (maxEntries = 100) =>
        new CacheInvalidationService(new LruCacheStore({ maxEntries, ttlMs: 60_000 }));

    it("stores and returns artifacts per session and unit", () => {
        const cache = createService();
        cache.put("s1", "A", artifact("A"));

        expect(cache.get("s1", "A")?.unitId).toBe("A");
        expect(cache.get("s2", "A")).toBeUndefined();
        expect(cache.getStats().hits).toBe(1);
        expect(cache.getStats().misses).toBe(1);
    });

    it("invalidates a unit idempotently", () => {
        const cache = createService();
        cache.put("s1", "A", artifact("A"));
        cache.put("s1", "B", artifact("B"));

        expect(cache.invalidateUnit("s1", "A")).toBe(true);
        const afterFirst = cache.getStats();
        expect(cache.invalidateUnit("s1", "A")).toBe(false);
        const afterSecond = cache.getStats();

        expect(afterSecond).toEqual(afterFirst);
        expect(afterSecond.entryCount).toBe(1);
        expect(cache.has("s1", "B")).toBe(true);
    });

    it("counts removed entries when invalidating several units", () => {
        const cache = createService();
        cache.put("s1", "A", artifact("A"));
        cache.put("s1", "B", artifact("B"));

        expect(cache.invalidateUnits("s1", ["A", "B", "C"])).toBe(2);
        expect(cache.getStats().invalidations).toBe(2);
    });

    it("invalidates every entry of one session only", () => {
        const cache = createService();
        cache.put("s1", "A", artifact("A"));
        cache.put("s1", "B", artifact("B"));
        cache.put("s2", "A", artifact("A"));

        expect(cache.invalidateAll("s1")).toBe(2);

        const stats = cache.getStats();
        expect(stats.entryCount).toBe(1);
        expect(stats.sessionCount).toBe(1);
        expect(stats.sessionBreakdown).toEqual({ s2: 1 });
    });

    it("clears all sessions", () => {
        const cache = createService();
        cache.put("s1", "A", artifact("A"));
        cache.put("s2", "B", artifact("B"));

        expect(cache.clearAll()).toBe(2);
        expect(cache.getStats().entryCount).toBe(0);
    });

    it("reuses an artifact only while its content hash matches", async () => {
        const cache = createService();
        const compute = jest.fn(async () => "compiled");

        const first = await cache.getOrCompute("s1", "A", "h1", compute);
        const second = await cache.getOrCompute("s1", "A", "h1", compute);
        const third = await cache.getOrCompute("s1", "A", "h2", compute);

        expect(compute).toHaveBeenCalledTimes(2);
        expect(second).toBe(first);
        expect(third.contentHash).toBe("h2");
        expect(cache.get("s1", "A")?.contentHash).toBe("h2");
    });

    it("recomputes lazily after invalidation", async () => {
        const cache = createService();
        const compute = jest.fn(async () => "compiled");

        await cache.getOrCompute("s1", "A", "h1", compute);
        cache.invalidateUnit("s1", "A");
        await cache.getOrCompute("s1", "A", "h1", compute);

        expect(compute).toHaveBeenCalledTimes(2);
    });

    it("evicts the least recently used entry when full", () => {
        const cache = createService(2);
        cache.put("s1", "A", artifact("A"));
        cache.put("s1", "B", artifact("B"));
        cache.get("s1", "A");
        cache.put("s1", "C", artifact("C"));

        expect(cache.has("s1", "A")).toBe(true);
        expect(cache.has("s1", "B")).toBe(false);
        expect(cache.has("s1", "C")).toBe(true);
    });
});
