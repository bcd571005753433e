export interface TimingSummary {
    count: number;
    totalMs: number;
    maxMs: number;
}

export interface MetricsSnapshot {
    counters: Record<string, number>;
    gauges: Record<string, number>;
    timings: Record<string, TimingSummary>;
}

export class MetricsCollector {
    private readonly counters = new Map<string, number>();
    private readonly gauges = new Map<string, number>();
    private readonly timings = new Map<string, TimingSummary>();

    public inc(name: string, by: number = 1): void {
        this.counters.set(name, (this.counters.get(name) ?? 0) + by);
    }

    public gauge(name: string, value: number): void {
        this.gauges.set(name, value);
    }

    public observe(name: string, elapsedMs: number): void {
        const current = this.timings.get(name) ?? { count: 0, totalMs: 0, maxMs: 0 };
        this.timings.set(name, {
            count: current.count + 1,
            totalMs: current.totalMs + elapsedMs,
            maxMs: Math.max(current.maxMs, elapsedMs)
        });
    }

    /**
     * Runs `task` and records its wall time under `name`, whether it resolves or throws.
     */
    public async time<T>(name: string, task: () => Promise<T>): Promise<T> {
        const startedAt = Date.now();
        try {
            return await task();
        } finally {
            this.observe(name, Date.now() - startedAt);
        }
    }

    public snapshot(): MetricsSnapshot {
        return {
            counters: Object.fromEntries(this.counters),
            gauges: Object.fromEntries(this.gauges),
            timings: Object.fromEntries(
                Array.from(this.timings.entries()).map(([name, summary]) => [name, { ...summary }])
            )
        };
    }

    public reset(): void {
        this.counters.clear();
        this.gauges.clear();
        this.timings.clear();
    }
}

export const metrics = new MetricsCollector();
