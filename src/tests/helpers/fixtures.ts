import type { UnitDescriptor, UnitId, WorkspaceSnapshot } from "../../types.js";
import type { FileWatchBackend, WatchEvent, WatchSubscribeOptions, WatchSubscription } from "../../watch/FileWatchBackend.js";
import type { WorkspaceModel } from "../../workspace/WorkspaceModel.js";

export function unit(
    id: UnitId,
    references: UnitId[] = [],
    options: { documents?: string[]; rootDir?: string; externalReferenceCount?: number } = {}
): UnitDescriptor {
    return {
        id,
        name: id,
        language: "typescript",
        documents: options.documents ?? [],
        references,
        externalReferenceCount: options.externalReferenceCount ?? 0,
        ...(options.rootDir !== undefined ? { rootDir: options.rootDir } : {})
    };
}

interface FakeSubscription {
    rootPath: string;
    options: WatchSubscribeOptions;
    onEvent: (event: WatchEvent) => void;
    onError: (error: unknown) => void;
    closed: boolean;
}

/**
 * In-process watch backend; tests drive it with `emit`.
 */
export class FakeWatchBackend implements FileWatchBackend {
    public readonly subscriptions: FakeSubscription[] = [];
    public failWith?: unknown;
    public onSubscribe?: () => void;

    async subscribe(
        rootPath: string,
        options: WatchSubscribeOptions,
        onEvent: (event: WatchEvent) => void,
        onError: (error: unknown) => void
    ): Promise<WatchSubscription> {
        this.onSubscribe?.();
        if (this.failWith !== undefined) {
            throw this.failWith;
        }
        const subscription: FakeSubscription = { rootPath, options, onEvent, onError, closed: false };
        this.subscriptions.push(subscription);
        return {
            close: async () => {
                subscription.closed = true;
            }
        };
    }

    emit(filePath: string, kind: WatchEvent["kind"] = "change"): void {
        for (const subscription of this.subscriptions) {
            if (!subscription.closed && !subscription.options.ignored(filePath)) {
                subscription.onEvent({ kind, path: filePath });
            }
        }
    }

    get openCount(): number {
        return this.subscriptions.filter(subscription => !subscription.closed).length;
    }
}

/**
 * Returns queued snapshots in order, repeating the last one.
 */
export class FakeWorkspaceModel implements WorkspaceModel {
    public loads = 0;
    private readonly snapshots: WorkspaceSnapshot[];

    constructor(...snapshots: WorkspaceSnapshot[]) {
        this.snapshots = snapshots;
    }

    enqueue(snapshot: WorkspaceSnapshot): void {
        this.snapshots.push(snapshot);
    }

    async loadSnapshot(rootPath: string): Promise<WorkspaceSnapshot> {
        const index = Math.min(this.loads, this.snapshots.length - 1);
        this.loads += 1;
        const snapshot = this.snapshots[index];
        if (!snapshot) {
            throw new Error(`no snapshot queued for ${rootPath}`);
        }
        return snapshot;
    }
}
