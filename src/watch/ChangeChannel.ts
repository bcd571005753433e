import type { ChangeBatch } from "../types.js";

type Waiter = (batch: ChangeBatch | undefined) => void;

/**
 * Per-session queue of change batches. The watcher side pushes; the consumer
 * either awaits `next()` or polls with `drain()`/`peek()`.
 */
export class ChangeChannel {
    private buffer: ChangeBatch[] = [];
    private waiters: Waiter[] = [];
    private closed = false;

    push(batch: ChangeBatch): boolean {
        if (this.closed) {
            return false;
        }
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter(batch);
        } else {
            this.buffer.push(batch);
        }
        return true;
    }

    /** Removes and returns every buffered batch. */
    drain(): ChangeBatch[] {
        const batches = this.buffer;
        this.buffer = [];
        return batches;
    }

    peek(): readonly ChangeBatch[] {
        return [...this.buffer];
    }

    /**
     * Resolves with the next batch, or `undefined` once the channel is closed
     * and empty.
     */
    next(): Promise<ChangeBatch | undefined> {
        const buffered = this.buffer.shift();
        if (buffered) {
            return Promise.resolve(buffered);
        }
        if (this.closed) {
            return Promise.resolve(undefined);
        }
        return new Promise(resolve => this.waiters.push(resolve));
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        const waiters = this.waiters;
        this.waiters = [];
        for (const waiter of waiters) {
            waiter(undefined);
        }
    }

    get isClosed(): boolean {
        return this.closed;
    }

    get pending(): number {
        return this.buffer.length;
    }
}

/**
 * Flattens single and batch messages into one path set.
 */
export function collectPaths(batches: Iterable<ChangeBatch>): Set<string> {
    const paths = new Set<string>();
    for (const batch of batches) {
        for (const filePath of batch.filePaths) {
            paths.add(filePath);
        }
    }
    return paths;
}
