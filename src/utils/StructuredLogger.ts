const ENABLE_DEBUG_LOGS = process.env.WORKSPACE_SESSION_DEBUG === "true";
const ENV_LOG_LEVEL = (process.env.WORKSPACE_SESSION_LOG_LEVEL ?? "").toLowerCase();

export type LogLevel = "debug" | "info" | "warn" | "error";
type ConfiguredLevel = LogLevel | "silent";

export interface Logger {
    debug(message: string, fields?: Record<string, unknown>): void;
    info(message: string, fields?: Record<string, unknown>): void;
    warn(message: string, fields?: Record<string, unknown>): void;
    error(message: string, fields?: Record<string, unknown>): void;
    child(component: string): Logger;
}

const levelPriority: Record<ConfiguredLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

function isConfiguredLevel(value: string): value is ConfiguredLevel {
    return Object.prototype.hasOwnProperty.call(levelPriority, value);
}

function resolveConfiguredLevel(): ConfiguredLevel {
    if (ENV_LOG_LEVEL && isConfiguredLevel(ENV_LOG_LEVEL)) {
        return ENV_LOG_LEVEL;
    }
    return ENABLE_DEBUG_LOGS ? "debug" : "info";
}

export function createLogger(component: string): Logger {
    const configuredLevel = resolveConfiguredLevel();
    const log = (level: LogLevel, message: string, fields?: Record<string, unknown>) => {
        if (levelPriority[level] < levelPriority[configuredLevel]) {
            return;
        }
        const payload = {
            timestamp: new Date().toISOString(),
            level,
            component,
            message,
            ...(fields ?? {})
        };
        const sink = level === "error" ? console.error
            : level === "warn" ? console.warn
            : level === "debug" ? console.debug
            : console.info;
        sink(payload);
    };

    return {
        debug: (message, fields) => log("debug", message, fields),
        info: (message, fields) => log("info", message, fields),
        warn: (message, fields) => log("warn", message, fields),
        error: (message, fields) => log("error", message, fields),
        child: (name) => createLogger(`${component}.${name}`)
    };
}

/**
 * Serializes an unknown thrown value into log fields.
 */
export function errorFields(error: unknown): Record<string, unknown> {
    if (error instanceof Error) {
        return { error: error.message, errorName: error.name };
    }
    return { error: String(error) };
}
