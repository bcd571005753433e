export type SessionErrorCode =
    | "NotFound"
    | "InvalidState"
    | "GraphUnavailable"
    | "GraphCycle"
    | "PartialMapping"
    | "WatchSetupFailed"
    | "Cancelled"
    | "WorkspaceLoadFailed";

export abstract class SessionError extends Error {
    public abstract readonly code: SessionErrorCode;

    constructor(message: string, public readonly details?: Record<string, unknown>) {
        super(message);
    }
}

export class NotFoundError extends SessionError {
    public readonly name = "NotFoundError";
    public readonly code = "NotFound";

    constructor(public readonly kind: "session" | "unit", public readonly id: string) {
        super(`${kind === "session" ? "Session" : "Unit"} '${id}' not found`, { kind, id });
    }
}

export class InvalidStateError extends SessionError {
    public readonly name = "InvalidStateError";
    public readonly code = "InvalidState";

    constructor(
        message: string,
        public readonly sessionId: string,
        public readonly currentState: string,
        public readonly attempted: string
    ) {
        super(message, { sessionId, currentState, attempted });
    }
}

export class GraphUnavailableError extends SessionError {
    public readonly name = "GraphUnavailableError";
    public readonly code = "GraphUnavailable";

    constructor(public readonly sessionId: string) {
        super(`Dependency graph not built for session '${sessionId}'. Refresh the session first.`, { sessionId });
    }
}

/**
 * Raised when a topological sort finds a cycle. The graph is supposed to be
 * acyclic, so this marks a bug in graph construction rather than bad input.
 */
export class GraphCycleError extends SessionError {
    public readonly name = "GraphCycleError";
    public readonly code = "GraphCycle";

    constructor(public readonly sessionId: string, public readonly unresolvedUnits: readonly string[]) {
        super(
            `Dependency cycle detected in session '${sessionId}' among: ${unresolvedUnits.join(", ")}`,
            { sessionId, unresolvedUnits: [...unresolvedUnits] }
        );
    }
}

export class PartialMappingError extends SessionError {
    public readonly name = "PartialMappingError";
    public readonly code = "PartialMapping";

    constructor(public readonly unmappedFiles: readonly string[]) {
        super(`${unmappedFiles.length} changed file(s) do not belong to any unit`, {
            unmappedFiles: [...unmappedFiles]
        });
    }
}

export class WatchSetupError extends SessionError {
    public readonly name = "WatchSetupError";
    public readonly code = "WatchSetupFailed";

    constructor(public readonly rootPath: string, cause: unknown) {
        super(
            `Failed to watch '${rootPath}': ${cause instanceof Error ? cause.message : String(cause)}`,
            { rootPath }
        );
    }
}

export class OperationCancelledError extends SessionError {
    public readonly name = "OperationCancelledError";
    public readonly code = "Cancelled";

    constructor(operation: string) {
        super(`${operation} was cancelled before it took effect`, { operation });
    }
}

export class WorkspaceLoadError extends SessionError {
    public readonly name = "WorkspaceLoadError";
    public readonly code = "WorkspaceLoadFailed";

    constructor(public readonly rootPath: string, reason: string) {
        super(`Failed to load workspace at '${rootPath}': ${reason}`, { rootPath });
    }
}

export function isSessionError(error: unknown): error is SessionError {
    return error instanceof SessionError;
}

/**
 * A non-fatal problem attached to a successful result.
 */
export interface OperationWarning {
    code: SessionErrorCode;
    message: string;
    details?: Record<string, unknown>;
}

export function toWarning(error: SessionError): OperationWarning {
    return { code: error.code, message: error.message, details: error.details };
}
