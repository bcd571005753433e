import { DEFAULT_QUIESCENCE_MS } from "../config/ServerConfig.js";
import { OperationCancelledError, WatchSetupError } from "../errors/SessionErrors.js";
import type { ChangeBatch } from "../types.js";
import { metrics } from "../utils/MetricsCollector.js";
import { PathNormalizer } from "../utils/PathNormalizer.js";
import { createLogger, errorFields } from "../utils/StructuredLogger.js";
import { ChangeChannel } from "./ChangeChannel.js";
import { ChokidarWatchBackend, type FileWatchBackend, type WatchEvent, type WatchSubscription } from "./FileWatchBackend.js";
import { WatchFilter } from "./WatchFilter.js";

export interface ChangeTrackerOptions {
    backend?: FileWatchBackend;
    quiescenceMs?: number;
    now?: () => number;
    normalizer?: PathNormalizer;
    /** Builds the path filter for a watch. Defaults to {@link WatchFilter.load}. */
    filterFactory?: (rootPath: string, patterns: readonly string[]) => WatchFilter;
}

interface WatchState {
    sessionId: string;
    rootPath: string;
    filter: WatchFilter;
    /** Canonical path -> timestamp of the latest event for it. */
    records: Map<string, number>;
    pending: Set<string>;
    timer?: NodeJS.Timeout;
    channel: ChangeChannel;
    subscription?: WatchSubscription;
    closed: boolean;
}

/**
 * Records file changes under a session's root while the session is paused.
 *
 * Every accepted event is recorded right away, so `getRecentChanges` sees it
 * immediately. Notifications are debounced: once no event has arrived for the
 * quiescence window the accumulated paths go onto the session's channel as a
 * single message.
 */
export class ChangeTracker {
    private readonly states = new Map<string, WatchState>();
    private readonly backend: FileWatchBackend;
    private readonly quiescenceMs: number;
    private readonly now: () => number;
    private readonly normalizer: PathNormalizer;
    private readonly filterFactory: (rootPath: string, patterns: readonly string[]) => WatchFilter;
    private readonly log = createLogger("ChangeTracker");

    constructor(options: ChangeTrackerOptions = {}) {
        this.backend = options.backend ?? new ChokidarWatchBackend();
        this.quiescenceMs = options.quiescenceMs ?? DEFAULT_QUIESCENCE_MS;
        this.now = options.now ?? Date.now;
        this.normalizer = options.normalizer ?? new PathNormalizer();
        this.filterFactory = options.filterFactory
            ?? ((rootPath, patterns) => WatchFilter.load(rootPath, patterns, this.normalizer));
    }

    async startWatching(sessionId: string, rootPath: string, patterns: readonly string[], signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) {
            throw new OperationCancelledError("Watch setup");
        }
        if (this.states.has(sessionId)) {
            await this.stopWatching(sessionId);
        }

        const state: WatchState = {
            sessionId,
            rootPath,
            filter: this.filterFactory(rootPath, patterns),
            records: new Map(),
            pending: new Set(),
            channel: new ChangeChannel(),
            closed: false
        };

        let subscription: WatchSubscription;
        try {
            subscription = await this.backend.subscribe(
                rootPath,
                { ignored: candidate => state.filter.isIgnored(candidate) },
                event => this.handleEvent(state, event),
                error => this.log.warn("File watcher error", { sessionId, rootPath, ...errorFields(error) })
            );
        } catch (error) {
            this.discard(state);
            metrics.inc("watch.setup_failures");
            throw new WatchSetupError(rootPath, error);
        }

        if (signal?.aborted) {
            this.discard(state);
            await subscription.close();
            throw new OperationCancelledError("Watch setup");
        }

        state.subscription = subscription;
        this.states.set(sessionId, state);
        metrics.gauge("watch.active_sessions", this.states.size);
        this.log.info("Started watching", { sessionId, rootPath, patterns: [...patterns] });
    }

    async stopWatching(sessionId: string): Promise<void> {
        const state = this.states.get(sessionId);
        if (!state) {
            return;
        }
        this.states.delete(sessionId);
        metrics.gauge("watch.active_sessions", this.states.size);
        this.discard(state);
        try {
            await state.subscription?.close();
        } catch (error) {
            this.log.warn("Failed to close file watcher", { sessionId, ...errorFields(error) });
        }
        this.log.info("Stopped watching", { sessionId, recordedFiles: state.records.size });
    }

    isWatching(sessionId: string): boolean {
        return this.states.has(sessionId);
    }

    /**
     * Paths changed within the last `sinceMs` milliseconds, one entry per
     * path, sorted.
     */
    getRecentChanges(sessionId: string, sinceMs: number): string[] {
        const state = this.states.get(sessionId);
        if (!state) {
            return [];
        }
        const cutoff = this.now() - sinceMs;
        const result: string[] = [];
        for (const [filePath, timestamp] of state.records) {
            if (timestamp >= cutoff) {
                result.push(filePath);
            }
        }
        return result.sort();
    }

    getChannel(sessionId: string): ChangeChannel | undefined {
        return this.states.get(sessionId)?.channel;
    }

    async dispose(): Promise<void> {
        await Promise.all([...this.states.keys()].map(sessionId => this.stopWatching(sessionId)));
    }

    private handleEvent(state: WatchState, event: WatchEvent): void {
        if (state.closed || !state.filter.matches(event.path)) {
            return;
        }
        const filePath = this.normalizer.canonical(event.path, state.rootPath);
        state.records.set(filePath, this.now());
        state.pending.add(filePath);
        metrics.inc("watch.events");

        if (state.timer) {
            clearTimeout(state.timer);
        }
        state.timer = setTimeout(() => this.flush(state), this.quiescenceMs);
    }

    private flush(state: WatchState): void {
        state.timer = undefined;
        if (state.closed || state.pending.size === 0) {
            return;
        }
        const filePaths = [...state.pending].sort();
        state.pending.clear();
        const batch: ChangeBatch = {
            sessionId: state.sessionId,
            kind: filePaths.length === 1 ? "single" : "batch",
            filePaths,
            emittedAt: this.now()
        };
        state.channel.push(batch);
        metrics.inc("watch.batches");
        this.log.debug("Change batch emitted", { sessionId: state.sessionId, kind: batch.kind, count: filePaths.length });
    }

    private discard(state: WatchState): void {
        state.closed = true;
        if (state.timer) {
            clearTimeout(state.timer);
            state.timer = undefined;
        }
        state.pending.clear();
        state.channel.close();
    }
}
