import "./utils/StdoutGuard.js";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ErrorCode, ListToolsRequestSchema, McpError } from "@modelcontextprotocol/sdk/types.js";
import { resolveServerConfigFromEnv, type ServerConfig } from "./config/ServerConfig.js";
import { GraphCycleError } from "./errors/SessionErrors.js";
import { SessionOrchestrator, type SessionCollaborators } from "./session/SessionOrchestrator.js";
import { SessionTools, type ToolResponse } from "./tools/SessionTools.js";
import { createLogger, errorFields } from "./utils/StructuredLogger.js";

const SERVER_NAME = "workspace-session-mcp";
const SERVER_VERSION = "1.0.0";

export class WorkspaceSessionServer {
    private readonly server: Server;
    private readonly orchestrator: SessionOrchestrator;
    private readonly tools: SessionTools;
    private readonly log = createLogger("WorkspaceSessionServer");
    private cleanupTimer?: NodeJS.Timeout;
    private shutdownRequested = false;
    private shutdownTimer?: NodeJS.Timeout;

    constructor(private readonly config: ServerConfig, collaborators: Partial<SessionCollaborators> = {}) {
        this.server = new Server({
            name: SERVER_NAME,
            version: SERVER_VERSION,
        }, {
            capabilities: { tools: {} },
        });
        this.orchestrator = new SessionOrchestrator(config, collaborators);
        this.tools = new SessionTools(this.orchestrator);
        this.setupHandlers();
        this.setupShutdownHooks();
    }

    private setupHandlers(): void {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools: this.tools.listTools(),
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
            return this.handleCallTool(request.params.name, request.params.arguments, extra.signal);
        });
    }

    async handleCallTool(name: string, args: unknown, signal?: AbortSignal): Promise<ToolResponse> {
        try {
            return await this.tools.call(name, args, signal);
        } catch (error) {
            if (error instanceof GraphCycleError) {
                this.log.error("Dependency graph invariant violated", { tool: name, ...errorFields(error), ...error.details });
                throw new McpError(ErrorCode.InternalError, error.message, error.details);
            }
            throw error;
        }
    }

    private startIdleCleanup(): void {
        const intervalMs = this.config.cleanupIntervalMinutes * 60_000;
        this.cleanupTimer = setInterval(() => {
            this.orchestrator.cleanupIdleSessions().catch(error => {
                this.log.error("Idle session cleanup failed", errorFields(error));
            });
        }, intervalMs);
        this.cleanupTimer.unref?.();
    }

    private isTestEnv(): boolean {
        return process.env.NODE_ENV === "test" || process.env.JEST_WORKER_ID !== undefined;
    }

    private setupShutdownHooks(): void {
        if (this.isTestEnv()) return;
        const handle = (reason: string, error?: unknown) => {
            if (this.shutdownRequested) return;
            this.shutdownRequested = true;
            const timeoutMs = this.config.shutdownTimeoutMs;
            this.shutdownTimer = setTimeout(() => {
                this.log.warn("Shutdown timeout exceeded; forcing exit", { timeoutMs });
                process.exit(1);
            }, timeoutMs);
            this.shutdownTimer.unref?.();
            this.log.warn("Shutdown requested", { reason, ...(error ? errorFields(error) : {}) });
            this.shutdown()
                .catch(shutdownError => {
                    this.log.error("Shutdown failed", errorFields(shutdownError));
                })
                .finally(() => {
                    if (this.shutdownTimer) {
                        clearTimeout(this.shutdownTimer);
                        this.shutdownTimer = undefined;
                    }
                    process.exit(0);
                });
        };

        process.on("SIGTERM", () => handle("SIGTERM"));
        process.on("SIGINT", () => handle("SIGINT"));
        process.on("SIGHUP", () => handle("SIGHUP"));

        process.stdin.on("end", () => handle("stdin_end"));
        process.stdin.on("close", () => handle("stdin_close"));
        process.stdin.on("error", (err) => handle("stdin_error", err));
    }

    async shutdown(): Promise<void> {
        if (this.cleanupTimer) {
            clearInterval(this.cleanupTimer);
            this.cleanupTimer = undefined;
        }
        await this.orchestrator.dispose();
        await this.server.close();
    }

    public async run(): Promise<void> {
        this.startIdleCleanup();
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        this.log.info("Workspace session MCP server running on stdio", { rootPath: this.config.rootPath });
    }
}

if (require.main === module) {
    const server = new WorkspaceSessionServer(resolveServerConfigFromEnv());
    server.run().catch(error => {
        console.error(error);
        process.exit(1);
    });
}
