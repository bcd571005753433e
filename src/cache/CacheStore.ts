import { LRUCache } from "lru-cache";
import type { CompiledArtifact } from "../types.js";

/**
 * Key/value storage for compiled artifacts. Per-key operations are atomic;
 * nothing else is guaranteed.
 */
export interface CacheStore {
    get(key: string): CompiledArtifact | undefined;
    set(key: string, artifact: CompiledArtifact): void;
    delete(key: string): boolean;
    keys(): string[];
    clear(): void;
    readonly size: number;
}

export interface LruCacheStoreOptions {
    maxEntries: number;
    ttlMs: number;
}

export class LruCacheStore implements CacheStore {
    private readonly cache: LRUCache<string, CompiledArtifact>;

    constructor(options: LruCacheStoreOptions) {
        this.cache = new LRUCache({
            max: options.maxEntries,
            ttl: options.ttlMs,
            updateAgeOnGet: true
        });
    }

    get(key: string): CompiledArtifact | undefined {
        return this.cache.get(key);
    }

    set(key: string, artifact: CompiledArtifact): void {
        this.cache.set(key, artifact);
    }

    delete(key: string): boolean {
        return this.cache.delete(key);
    }

    keys(): string[] {
        return [...this.cache.keys()];
    }

    clear(): void {
        this.cache.clear();
    }

    get size(): number {
        return this.cache.size;
    }
}
