import type { CompiledArtifact, UnitId } from "../types.js";
import { metrics } from "../utils/MetricsCollector.js";
import { createLogger } from "../utils/StructuredLogger.js";
import type { CacheStore } from "./CacheStore.js";

export interface CacheStats {
    entryCount: number;
    sessionCount: number;
    sessionBreakdown: Record<string, number>;
    hits: number;
    misses: number;
    invalidations: number;
}

const KEY_SEPARATOR = ":";

function cacheKey(sessionId: string, unitId: UnitId): string {
    return `${sessionId}${KEY_SEPARATOR}${unitId}`;
}

function sessionOf(key: string): string {
    const index = key.indexOf(KEY_SEPARATOR);
    return index === -1 ? key : key.slice(0, index);
}

/**
 * Compiled artifacts keyed by (session, unit).
 *
 * Invalidation removes entries and never recomputes them; a missing entry
 * means the artifact is rebuilt the next time someone asks for it.
 */
export class CacheInvalidationService {
    private readonly log = createLogger("CacheInvalidationService");
    private hits = 0;
    private misses = 0;
    private invalidations = 0;

    constructor(private readonly store: CacheStore) {}

    get(sessionId: string, unitId: UnitId): CompiledArtifact | undefined {
        const artifact = this.store.get(cacheKey(sessionId, unitId));
        if (artifact) {
            this.hits += 1;
            metrics.inc("cache.hits");
        } else {
            this.misses += 1;
            metrics.inc("cache.misses");
        }
        return artifact;
    }

    has(sessionId: string, unitId: UnitId): boolean {
        return this.store.get(cacheKey(sessionId, unitId)) !== undefined;
    }

    put(sessionId: string, unitId: UnitId, artifact: CompiledArtifact): void {
        this.store.set(cacheKey(sessionId, unitId), artifact);
    }

    /**
     * Returns the stored artifact when its content hash matches, otherwise
     * computes a new payload and stores it.
     */
    async getOrCompute(
        sessionId: string,
        unitId: UnitId,
        contentHash: string,
        compute: () => Promise<unknown>
    ): Promise<CompiledArtifact> {
        const cached = this.get(sessionId, unitId);
        if (cached && cached.contentHash === contentHash) {
            return cached;
        }
        const payload = await compute();
        const artifact: CompiledArtifact = { unitId, contentHash, createdAt: new Date(), payload };
        this.put(sessionId, unitId, artifact);
        return artifact;
    }

    invalidateUnit(sessionId: string, unitId: UnitId): boolean {
        const removed = this.store.delete(cacheKey(sessionId, unitId));
        if (removed) {
            this.invalidations += 1;
            metrics.inc("cache.invalidations");
        }
        return removed;
    }

    invalidateUnits(sessionId: string, unitIds: Iterable<UnitId>): number {
        let removed = 0;
        for (const unitId of unitIds) {
            if (this.invalidateUnit(sessionId, unitId)) {
                removed += 1;
            }
        }
        this.log.debug("Invalidated unit entries", { sessionId, removed });
        return removed;
    }

    invalidateAll(sessionId: string): number {
        const prefix = `${sessionId}${KEY_SEPARATOR}`;
        let removed = 0;
        for (const key of this.store.keys()) {
            if (key.startsWith(prefix) && this.store.delete(key)) {
                removed += 1;
            }
        }
        this.invalidations += removed;
        metrics.inc("cache.invalidations", removed);
        this.log.info("Invalidated all session entries", { sessionId, removed });
        return removed;
    }

    clearAll(): number {
        const removed = this.store.size;
        this.store.clear();
        this.invalidations += removed;
        metrics.inc("cache.invalidations", removed);
        this.log.info("Cleared compilation cache", { removed });
        return removed;
    }

    getStats(): CacheStats {
        const sessionBreakdown: Record<string, number> = {};
        const keys = this.store.keys();
        for (const key of keys) {
            const sessionId = sessionOf(key);
            sessionBreakdown[sessionId] = (sessionBreakdown[sessionId] ?? 0) + 1;
        }
        return {
            entryCount: keys.length,
            sessionCount: Object.keys(sessionBreakdown).length,
            sessionBreakdown,
            hits: this.hits,
            misses: this.misses,
            invalidations: this.invalidations
        };
    }
}
