import ignore from "ignore";
import * as fs from "fs";
import * as path from "path";
import { createLogger, errorFields } from "../utils/StructuredLogger.js";

const IGNORE_FILES = [".gitignore", ".mcpignore"];
const IGNORE_SCAN_EXCLUDES = new Set([
    ".git",
    "node_modules",
    "dist",
    "coverage"
]);

const log = createLogger("IgnoreRules");

export type IgnoreMatcher = ReturnType<typeof ignore>;

export const ALWAYS_IGNORED = ["node_modules", ".git", "dist", "build", "coverage"];

/**
 * Collects the patterns of every `.gitignore`/`.mcpignore` under `rootPath`,
 * each rewritten relative to the root so one matcher covers the whole tree.
 */
export function loadIgnorePatterns(rootPath: string): string[] {
    const patterns: string[] = [];
    for (const absPath of collectIgnoreFiles(rootPath)) {
        let content: string;
        try {
            content = fs.readFileSync(absPath, "utf-8");
        } catch (error) {
            log.warn("Failed to read ignore file", { path: absPath, ...errorFields(error) });
            continue;
        }
        const relDir = path.relative(rootPath, path.dirname(absPath)).replace(/\\/g, "/");
        patterns.push(
            ...content
                .split(/\r?\n/)
                .map(line => line.trim())
                .filter(line => line.length > 0 && !line.startsWith("#"))
                .map(line => normalizeIgnorePattern(line, relDir))
        );
    }
    return patterns;
}

export function createIgnoreMatcher(patterns: readonly string[]): IgnoreMatcher {
    return ignore().add([...ALWAYS_IGNORED, ...patterns]);
}

function collectIgnoreFiles(rootPath: string): string[] {
    const ignoreFiles: string[] = [];
    const stack = [rootPath];
    while (stack.length > 0) {
        const current = stack.pop();
        if (current === undefined) break;
        let entries: fs.Dirent[] = [];
        try {
            entries = fs.readdirSync(current, { withFileTypes: true });
        } catch {
            continue;
        }
        for (const entry of entries) {
            if (entry.isSymbolicLink()) {
                continue;
            }
            const entryPath = path.join(current, entry.name);
            if (entry.isDirectory()) {
                if (!IGNORE_SCAN_EXCLUDES.has(entry.name)) {
                    stack.push(entryPath);
                }
                continue;
            }
            if (IGNORE_FILES.includes(entry.name)) {
                ignoreFiles.push(entryPath);
            }
        }
    }
    return ignoreFiles.sort();
}

function normalizeIgnorePattern(pattern: string, relDir: string): string {
    let negation = "";
    let normalized = pattern;
    if (normalized.startsWith("!")) {
        negation = "!";
        normalized = normalized.slice(1);
    }
    if (normalized.startsWith("/")) {
        normalized = normalized.slice(1);
    }
    if (relDir && relDir.length > 0) {
        normalized = `${relDir}/${normalized}`;
    }
    return `${negation}${normalized}`;
}
