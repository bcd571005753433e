export interface ToolDefinition {
    name: string;
    description: string;
    inputSchema: {
        type: "object";
        properties: Record<string, unknown>;
        required?: string[];
    };
}

const sessionIdProperty = { type: "string", description: "Session ID returned by start_session" };
const unitIdProperty = { type: "string", description: "Unit (package) ID as listed by get_dependency_graph" };

const sessionOnly = (description: string, name: string): ToolDefinition => ({
    name,
    description,
    inputSchema: {
        type: "object",
        properties: { sessionId: sessionIdProperty },
        required: ["sessionId"]
    }
});

export const TOOL_DEFINITIONS: ToolDefinition[] = [
    {
        name: "start_session",
        description: "Load a workspace and open a session over it. Units are the workspace packages; the dependency graph is built up front unless prewarming is disabled.",
        inputSchema: {
            type: "object",
            properties: {
                rootPath: { type: "string", description: "Workspace directory. Relative paths resolve against the server root." }
            }
        }
    },
    sessionOnly("Show a session's state, unit count and whether it is paused or watching files.", "get_session_status"),
    {
        name: "list_sessions",
        description: "List every open session.",
        inputSchema: { type: "object", properties: {} }
    },
    sessionOnly("Reload the workspace, rebuild the dependency graph and drop the session's cached artifacts.", "refresh_session"),
    sessionOnly("Close a session, stop watching its files and drop its cache and graph.", "end_session"),
    {
        name: "pause_session",
        description: "Pause a session so files can be edited outside the server. Changes are tracked while paused.",
        inputSchema: {
            type: "object",
            properties: {
                sessionId: sessionIdProperty,
                watchFiles: { type: "boolean", description: "Track file changes while paused (default true)" }
            },
            required: ["sessionId"]
        }
    },
    {
        name: "resume_session",
        description: "Resume a paused session and invalidate only the units affected by files changed while paused.",
        inputSchema: {
            type: "object",
            properties: {
                sessionId: sessionIdProperty,
                forceFullRebuild: { type: "boolean", description: "Invalidate every cached unit instead (default false)" }
            },
            required: ["sessionId"]
        }
    },
    sessionOnly("Preview the files changed so far in a paused session and the units a resume would invalidate.", "get_pause_changes"),
    sessionOnly("Dependency graph statistics, leaf and root units, and per-unit info.", "get_dependency_graph"),
    {
        name: "get_impact_analysis",
        description: "Units affected by a change to one unit: the unit itself plus every transitive dependent.",
        inputSchema: {
            type: "object",
            properties: { sessionId: sessionIdProperty, unitId: unitIdProperty },
            required: ["sessionId", "unitId"]
        }
    },
    sessionOnly("Units in an order where every unit comes after its dependencies.", "get_compilation_order"),
    {
        name: "get_unit_details",
        description: "Direct dependencies and dependents of one unit, with transitive counts.",
        inputSchema: {
            type: "object",
            properties: { sessionId: sessionIdProperty, unitId: unitIdProperty },
            required: ["sessionId", "unitId"]
        }
    },
    {
        name: "get_cache_stats",
        description: "Cached artifact counts per session and server metrics.",
        inputSchema: { type: "object", properties: {} }
    },
    {
        name: "clear_cache",
        description: "Drop cached artifacts for one session, or for every session when sessionId is omitted.",
        inputSchema: {
            type: "object",
            properties: { sessionId: sessionIdProperty }
        }
    }
];
