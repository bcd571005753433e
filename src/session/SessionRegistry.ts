import { randomUUID } from "crypto";
import { InvalidStateError, NotFoundError } from "../errors/SessionErrors.js";
import type { SessionStatus, SessionView, WorkspaceSnapshot } from "../types.js";
import { KeyedMutex } from "../utils/KeyedMutex.js";
import { metrics } from "../utils/MetricsCollector.js";

interface SessionRecord {
    id: string;
    rootPath: string;
    status: SessionStatus;
    createdAt: Date;
    lastAccessedAt: Date;
    pausedAt: Date | null;
    snapshot?: WorkspaceSnapshot;
}

export interface SessionRegistryOptions {
    now?: () => Date;
    idFactory?: () => string;
}

/**
 * Owns every session and its lifecycle state:
 *
 *   created -> active <-> paused -> disposed
 *
 * Nothing outside this class mutates a session. Callers that read state,
 * do work and then transition must hold the session's lock through
 * {@link runExclusive}; the transition methods themselves only validate and
 * apply, so a rejected call leaves the session untouched.
 */
export class SessionRegistry {
    private readonly sessions = new Map<string, SessionRecord>();
    private readonly mutex = new KeyedMutex();
    private readonly now: () => Date;
    private readonly idFactory: () => string;

    constructor(options: SessionRegistryOptions = {}) {
        this.now = options.now ?? (() => new Date());
        this.idFactory = options.idFactory ?? randomUUID;
    }

    create(rootPath: string): SessionView {
        const timestamp = this.now();
        const record: SessionRecord = {
            id: this.idFactory(),
            rootPath,
            status: "created",
            createdAt: timestamp,
            lastAccessedAt: timestamp,
            pausedAt: null
        };
        this.sessions.set(record.id, record);
        this.updateGauge();
        return toView(record);
    }

    activate(id: string, snapshot: WorkspaceSnapshot): SessionView {
        const record = this.require(id);
        if (record.status !== "created") {
            throw new InvalidStateError(`Session '${id}' is already ${record.status}`, id, record.status, "activate");
        }
        record.snapshot = snapshot;
        record.status = "active";
        record.lastAccessedAt = this.now();
        return toView(record);
    }

    get(id: string): SessionView {
        return toView(this.require(id));
    }

    find(id: string): SessionView | undefined {
        const record = this.sessions.get(id);
        return record ? toView(record) : undefined;
    }

    list(): SessionView[] {
        return [...this.sessions.values()].map(toView);
    }

    touch(id: string): void {
        this.require(id).lastAccessedAt = this.now();
    }

    pause(id: string, pausedAt: Date): SessionView {
        const record = this.validatePause(id);
        record.status = "paused";
        record.pausedAt = pausedAt;
        record.lastAccessedAt = this.now();
        metrics.inc("session.pauses");
        return toView(record);
    }

    /**
     * Fails the way {@link pause} would, without changing anything.
     */
    assertCanPause(id: string): SessionView {
        return toView(this.validatePause(id));
    }

    private validatePause(id: string): SessionRecord {
        const record = this.require(id);
        if (record.status === "paused") {
            throw new InvalidStateError(
                `Session '${id}' is already paused since ${record.pausedAt?.toISOString() ?? "unknown"}`,
                id,
                record.status,
                "pause"
            );
        }
        if (record.status !== "active") {
            throw new InvalidStateError(`Session '${id}' cannot be paused while ${record.status}`, id, record.status, "pause");
        }
        return record;
    }

    resume(id: string): SessionView {
        const record = this.require(id);
        if (record.status !== "paused") {
            throw new InvalidStateError(`Session '${id}' is not paused`, id, record.status, "resume");
        }
        record.status = "active";
        record.pausedAt = null;
        record.lastAccessedAt = this.now();
        metrics.inc("session.resumes");
        return toView(record);
    }

    /**
     * Fails with InvalidStateError unless the session is paused.
     */
    assertPaused(id: string, attempted: string): SessionView {
        const record = this.require(id);
        if (record.status !== "paused") {
            throw new InvalidStateError(`Session '${id}' is not paused`, id, record.status, attempted);
        }
        return toView(record);
    }

    replaceSnapshot(id: string, snapshot: WorkspaceSnapshot): SessionView {
        const record = this.require(id);
        record.snapshot = snapshot;
        record.lastAccessedAt = this.now();
        return toView(record);
    }

    dispose(id: string): boolean {
        const record = this.sessions.get(id);
        if (!record) {
            return false;
        }
        record.status = "disposed";
        record.snapshot = undefined;
        this.sessions.delete(id);
        this.updateGauge();
        return true;
    }

    findIdleSessions(cutoff: Date): string[] {
        return [...this.sessions.values()]
            .filter(record => record.lastAccessedAt.getTime() < cutoff.getTime())
            .map(record => record.id);
    }

    runExclusive<T>(id: string, task: () => Promise<T>): Promise<T> {
        return this.mutex.runExclusive(id, task);
    }

    get size(): number {
        return this.sessions.size;
    }

    private require(id: string): SessionRecord {
        const record = this.sessions.get(id);
        if (!record) {
            throw new NotFoundError("session", id);
        }
        return record;
    }

    private updateGauge(): void {
        metrics.gauge("session.count", this.sessions.size);
    }
}

function toView(record: SessionRecord): SessionView {
    return {
        id: record.id,
        rootPath: record.rootPath,
        status: record.status,
        createdAt: record.createdAt,
        lastAccessedAt: record.lastAccessedAt,
        isPaused: record.status === "paused",
        pausedAt: record.pausedAt,
        ...(record.snapshot ? { snapshot: record.snapshot } : {})
    };
}
