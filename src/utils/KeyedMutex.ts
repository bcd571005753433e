/**
 * FIFO mutual exclusion per key. Tasks under the same key run one at a time in
 * arrival order; tasks under different keys never wait on each other.
 */
export class KeyedMutex {
    private readonly waiters = new Map<string, Array<() => void>>();
    private readonly held = new Set<string>();

    public async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
        await this.acquire(key);
        try {
            return await task();
        } finally {
            this.release(key);
        }
    }

    public isLocked(key: string): boolean {
        return this.held.has(key);
    }

    public pending(key: string): number {
        return this.waiters.get(key)?.length ?? 0;
    }

    private acquire(key: string): Promise<void> {
        if (!this.held.has(key)) {
            this.held.add(key);
            return Promise.resolve();
        }
        return new Promise<void>(resolve => {
            const queue = this.waiters.get(key) ?? [];
            queue.push(resolve);
            this.waiters.set(key, queue);
        });
    }

    private release(key: string): void {
        const queue = this.waiters.get(key);
        const next = queue?.shift();
        if (queue && queue.length === 0) {
            this.waiters.delete(key);
        }
        if (next) {
            // ownership passes straight to the next waiter
            next();
            return;
        }
        this.held.delete(key);
    }
}
