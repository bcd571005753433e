import * as path from "path";

/**
 * Canonical form for file paths compared across the watcher, the workspace
 * model and tool arguments: absolute, forward slashes, no trailing slash, and
 * lower-cased on case-insensitive filesystems.
 */
export class PathNormalizer {
    constructor(private readonly caseInsensitive: boolean = process.platform === "win32") {}

    canonical(inputPath: string, baseDir?: string): string {
        if (!inputPath || typeof inputPath !== "string") {
            throw new Error(`Invalid input path: ${inputPath}`);
        }
        const absolute = baseDir ? path.resolve(baseDir, inputPath) : path.resolve(inputPath);
        let normalized = absolute.split(path.sep).join("/");
        if (normalized.length > 1 && normalized.endsWith("/")) {
            normalized = normalized.slice(0, -1);
        }
        return this.caseInsensitive ? normalized.toLowerCase() : normalized;
    }

    /**
     * Root-relative POSIX path, or undefined when `inputPath` lies outside `rootDir`.
     */
    relativeTo(rootDir: string, inputPath: string): string | undefined {
        const root = this.canonical(rootDir);
        const target = this.canonical(inputPath, rootDir);
        if (target === root) {
            return ".";
        }
        const prefix = root.endsWith("/") ? root : `${root}/`;
        if (!target.startsWith(prefix)) {
            return undefined;
        }
        return target.slice(prefix.length);
    }

    isWithin(parentDir: string, inputPath: string): boolean {
        const relative = this.relativeTo(parentDir, inputPath);
        return relative !== undefined && relative !== ".";
    }
}
