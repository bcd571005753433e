export type UnitId = string;

/**
 * Node payload of the dependency graph.
 */
export interface CompilationUnitInfo {
    id: UnitId;
    name: string;
    language: string;
    documentCount: number;
    /** External (non-workspace) references declared by the unit. */
    referenceCount: number;
    rootDir?: string;
}

/**
 * A unit as enumerated by the workspace model.
 */
export interface UnitDescriptor {
    id: UnitId;
    name: string;
    language: string;
    rootDir?: string;
    /** Absolute paths of the unit's source documents. */
    documents: readonly string[];
    /** Declared references to other units, in declaration order. */
    references: readonly UnitId[];
    externalReferenceCount: number;
}

/**
 * Immutable view of every unit in a workspace at one point in time.
 */
export interface WorkspaceSnapshot {
    readonly rootPath: string;
    readonly loadedAt: Date;
    readonly units: readonly UnitDescriptor[];
    findUnitsContainingFile(filePath: string): UnitId[];
}

export type SessionStatus = "created" | "active" | "paused" | "disposed";

export interface SessionView {
    id: string;
    rootPath: string;
    status: SessionStatus;
    createdAt: Date;
    lastAccessedAt: Date;
    isPaused: boolean;
    pausedAt: Date | null;
    snapshot?: WorkspaceSnapshot;
}

export interface ChangeRecord {
    filePath: string;
    timestamp: number;
}

export type FileChangeKind = "add" | "change" | "unlink";

export interface ChangeBatch {
    sessionId: string;
    kind: "single" | "batch";
    filePaths: string[];
    emittedAt: number;
}

export interface CompiledArtifact {
    unitId: UnitId;
    contentHash: string;
    createdAt: Date;
    payload: unknown;
}
