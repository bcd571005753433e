export interface ServerConfig {
    rootPath: string;
    quiescenceMs: number;
    watchPatterns: string[];
    idleTimeoutMinutes: number;
    cleanupIntervalMinutes: number;
    cache: {
        maxEntries: number;
        ttlMinutes: number;
    };
    prewarmGraph: boolean;
    shutdownTimeoutMs: number;
}

export const DEFAULT_QUIESCENCE_MS = 300;
export const MIN_QUIESCENCE_MS = 25;
export const DEFAULT_IDLE_TIMEOUT_MINUTES = 360;
export const DEFAULT_CLEANUP_INTERVAL_MINUTES = 30;
export const DEFAULT_CACHE_MAX_ENTRIES = 1000;
export const DEFAULT_CACHE_TTL_MINUTES = 120;
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;

export const DEFAULT_WATCH_PATTERNS: readonly string[] = [
    "**/*.ts",
    "**/*.tsx",
    "**/*.mts",
    "**/*.cts",
    "**/*.js",
    "**/*.jsx",
    "**/*.mjs",
    "**/*.cjs",
    "**/package.json",
    "**/tsconfig*.json"
];

type Env = Record<string, string | undefined>;

export function resolveServerConfigFromEnv(env: Env = process.env, cwd: string = process.cwd()): ServerConfig {
    const root = env.WORKSPACE_SESSION_ROOT?.trim();
    return {
        rootPath: root && root.length > 0 ? root : cwd,
        quiescenceMs: Math.max(
            MIN_QUIESCENCE_MS,
            parseOptionalInt(env.WORKSPACE_SESSION_QUIESCENCE_MS) ?? DEFAULT_QUIESCENCE_MS
        ),
        watchPatterns: parsePatternList(env.WORKSPACE_SESSION_WATCH_PATTERNS) ?? [...DEFAULT_WATCH_PATTERNS],
        idleTimeoutMinutes: positiveOr(
            parseOptionalInt(env.WORKSPACE_SESSION_IDLE_TIMEOUT_MINUTES),
            DEFAULT_IDLE_TIMEOUT_MINUTES
        ),
        cleanupIntervalMinutes: positiveOr(
            parseOptionalInt(env.WORKSPACE_SESSION_CLEANUP_INTERVAL_MINUTES),
            DEFAULT_CLEANUP_INTERVAL_MINUTES
        ),
        cache: {
            maxEntries: positiveOr(parseOptionalInt(env.WORKSPACE_SESSION_CACHE_MAX_ENTRIES), DEFAULT_CACHE_MAX_ENTRIES),
            ttlMinutes: positiveOr(parseOptionalInt(env.WORKSPACE_SESSION_CACHE_TTL_MINUTES), DEFAULT_CACHE_TTL_MINUTES)
        },
        prewarmGraph: env.WORKSPACE_SESSION_PREWARM_GRAPH !== "false",
        shutdownTimeoutMs: positiveOr(
            parseOptionalInt(env.WORKSPACE_SESSION_SHUTDOWN_TIMEOUT_MS),
            DEFAULT_SHUTDOWN_TIMEOUT_MS
        )
    };
}

function parseOptionalInt(value: string | undefined): number | undefined {
    if (!value) return undefined;
    const parsed = Number.parseInt(value, 10);
    return Number.isFinite(parsed) ? parsed : undefined;
}

function positiveOr(value: number | undefined, fallback: number): number {
    return value !== undefined && value > 0 ? value : fallback;
}

function parsePatternList(value: string | undefined): string[] | undefined {
    if (!value) return undefined;
    const patterns = value
        .split(",")
        .map(pattern => pattern.trim())
        .filter(pattern => pattern.length > 0);
    return patterns.length > 0 ? patterns : undefined;
}
