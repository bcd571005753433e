import { InvalidStateError, NotFoundError, SessionError } from "./SessionErrors.js";

export interface ToolSuggestion {
    toolName: string;
    rationale: string;
    exampleArgs?: Record<string, unknown>;
    priority: "high" | "medium" | "low";
}

export interface EnhancedErrorDetails {
    nextActionHint: string;
    toolSuggestions: ToolSuggestion[];
}

export class ErrorEnhancer {
    static enhance(error: SessionError): EnhancedErrorDetails {
        if (error instanceof NotFoundError) {
            return error.kind === "session"
                ? this.enhanceSessionNotFound(error.id)
                : this.enhanceUnitNotFound();
        }
        if (error instanceof InvalidStateError) {
            return this.enhanceInvalidState(error);
        }
        switch (error.code) {
            case "GraphUnavailable":
                return {
                    nextActionHint: "No dependency graph exists for this session yet. Refresh the session to build one.",
                    toolSuggestions: [{
                        toolName: "refresh_session",
                        rationale: "Reloads the workspace and rebuilds the dependency graph.",
                        exampleArgs: { sessionId: error.details?.sessionId },
                        priority: "high"
                    }]
                };
            case "WorkspaceLoadFailed":
                return {
                    nextActionHint: "Check that the path is a directory containing a package.json.",
                    toolSuggestions: []
                };
            case "Cancelled":
                return {
                    nextActionHint: "The request was cancelled before it changed anything. Retry when ready.",
                    toolSuggestions: []
                };
            default:
                return { nextActionHint: error.message, toolSuggestions: [] };
        }
    }

    private static enhanceSessionNotFound(sessionId: string): EnhancedErrorDetails {
        return {
            nextActionHint: `Session '${sessionId}' does not exist or was ended after being idle.`,
            toolSuggestions: [
                {
                    toolName: "list_sessions",
                    rationale: "Shows the sessions that are still open.",
                    priority: "high"
                },
                {
                    toolName: "start_session",
                    rationale: "Opens a new session for the workspace.",
                    priority: "medium"
                }
            ]
        };
    }

    private static enhanceUnitNotFound(): EnhancedErrorDetails {
        return {
            nextActionHint: "Unit ids are package names. List them with get_dependency_graph.",
            toolSuggestions: [{
                toolName: "get_dependency_graph",
                rationale: "Lists every unit id known to the session's graph.",
                priority: "high"
            }]
        };
    }

    private static enhanceInvalidState(error: InvalidStateError): EnhancedErrorDetails {
        const sessionId = error.sessionId;
        if (error.attempted === "pause" && error.currentState === "paused") {
            return {
                nextActionHint: "The session is already paused; its original pause time is kept.",
                toolSuggestions: [
                    {
                        toolName: "get_pause_changes",
                        rationale: "Shows what changed since the session was paused.",
                        exampleArgs: { sessionId },
                        priority: "high"
                    },
                    {
                        toolName: "resume_session",
                        rationale: "Applies the tracked changes and resumes the session.",
                        exampleArgs: { sessionId },
                        priority: "medium"
                    }
                ]
            };
        }
        if (error.currentState === "active") {
            return {
                nextActionHint: "The session is not paused.",
                toolSuggestions: [{
                    toolName: "pause_session",
                    rationale: "Pause first so external edits are tracked.",
                    exampleArgs: { sessionId, watchFiles: true },
                    priority: "medium"
                }]
            };
        }
        return { nextActionHint: error.message, toolSuggestions: [] };
    }
}
