import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { ErrorEnhancer } from "../errors/ErrorEnhancer.js";
import { GraphCycleError, isSessionError } from "../errors/SessionErrors.js";
import type { SessionOrchestrator } from "../session/SessionOrchestrator.js";
import { createLogger, errorFields } from "../utils/StructuredLogger.js";
import { TOOL_DEFINITIONS, type ToolDefinition } from "./ToolDefinitions.js";

export interface ToolResponse {
    [key: string]: unknown;
    content: Array<{ type: "text"; text: string }>;
    isError?: boolean;
}

type ToolHandler = (args: unknown, signal?: AbortSignal) => Promise<object>;

const sessionId = z.string().min(1, "sessionId must not be empty");
const SessionArgs = z.object({ sessionId });
const StartSessionArgs = z.object({ rootPath: z.string().min(1).optional() });
const PauseArgs = SessionArgs.extend({ watchFiles: z.boolean().default(true) });
const ResumeArgs = SessionArgs.extend({ forceFullRebuild: z.boolean().default(false) });
const UnitArgs = SessionArgs.extend({ unitId: z.string().min(1, "unitId must not be empty") });
const ClearCacheArgs = z.object({ sessionId: sessionId.optional() });

/**
 * Maps MCP tool calls onto the orchestrator and wraps every outcome in the
 * `{ success, ... }` envelope.
 */
export class SessionTools {
    private readonly handlers: Map<string, ToolHandler>;
    private readonly log = createLogger("SessionTools");

    constructor(private readonly orchestrator: SessionOrchestrator) {
        this.handlers = new Map<string, ToolHandler>([
            ["start_session", async args => this.orchestrator.startSession(StartSessionArgs.parse(args).rootPath)],
            ["get_session_status", async args => this.orchestrator.getSessionStatus(SessionArgs.parse(args).sessionId)],
            ["list_sessions", async () => ({ sessions: this.orchestrator.listSessions() })],
            ["refresh_session", async args => this.orchestrator.refreshSession(SessionArgs.parse(args).sessionId)],
            ["end_session", async args => this.orchestrator.endSession(SessionArgs.parse(args).sessionId)],
            ["pause_session", async (args, signal) => {
                const parsed = PauseArgs.parse(args);
                return this.orchestrator.pause(parsed.sessionId, parsed.watchFiles, signal);
            }],
            ["resume_session", async args => {
                const parsed = ResumeArgs.parse(args);
                return this.orchestrator.resume(parsed.sessionId, parsed.forceFullRebuild);
            }],
            ["get_pause_changes", async args => this.orchestrator.previewPauseChanges(SessionArgs.parse(args).sessionId)],
            ["get_dependency_graph", async args => this.orchestrator.getDependencyGraph(SessionArgs.parse(args).sessionId)],
            ["get_impact_analysis", async args => {
                const parsed = UnitArgs.parse(args);
                return this.orchestrator.getImpactAnalysis(parsed.sessionId, parsed.unitId);
            }],
            ["get_compilation_order", async args => {
                const parsed = SessionArgs.parse(args);
                return { sessionId: parsed.sessionId, compilationOrder: this.orchestrator.getCompilationOrder(parsed.sessionId) };
            }],
            ["get_unit_details", async args => {
                const parsed = UnitArgs.parse(args);
                return this.orchestrator.getUnitDetails(parsed.sessionId, parsed.unitId);
            }],
            ["get_cache_stats", async () => this.orchestrator.getCacheStats()],
            ["clear_cache", async args => this.orchestrator.clearCache(ClearCacheArgs.parse(args).sessionId)]
        ]);
    }

    listTools(): ToolDefinition[] {
        return TOOL_DEFINITIONS;
    }

    async call(name: string, args: unknown, signal?: AbortSignal): Promise<ToolResponse> {
        const handler = this.handlers.get(name);
        if (!handler) {
            throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
        }
        try {
            const payload = await handler(args ?? {}, signal);
            return jsonResponse({ success: true, ...payload });
        } catch (error) {
            if (error instanceof GraphCycleError) {
                throw error;
            }
            if (error instanceof z.ZodError) {
                return errorResponse("InvalidArguments", describeIssues(error), { issues: error.issues });
            }
            if (isSessionError(error)) {
                this.log.debug("Tool call failed", { tool: name, code: error.code, message: error.message });
                const enhanced = ErrorEnhancer.enhance(error);
                return errorResponse(error.code, error.message, error.details, enhanced);
            }
            this.log.error("Unexpected tool failure", { tool: name, ...errorFields(error) });
            return errorResponse("InternalError", error instanceof Error ? error.message : String(error));
        }
    }
}

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; ");
}

function jsonResponse(payload: object): ToolResponse {
    return { content: [{ type: "text", text: JSON.stringify(payload, null, 2) }] };
}

function errorResponse(
    errorCode: string,
    message: string,
    details?: Record<string, unknown>,
    enhanced?: { nextActionHint: string; toolSuggestions: unknown[] }
): ToolResponse {
    return {
        isError: true,
        content: [{
            type: "text",
            text: JSON.stringify({ success: false, errorCode, message, details, ...(enhanced ?? {}) }, null, 2)
        }]
    };
}
