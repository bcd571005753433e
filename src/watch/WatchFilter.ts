import { minimatch } from "minimatch";
import { createIgnoreMatcher, loadIgnorePatterns, type IgnoreMatcher } from "../config/IgnoreRules.js";
import { PathNormalizer } from "../utils/PathNormalizer.js";

/**
 * Decides which paths under a watched root produce change records: the path
 * must not be ignored and must match one of the include patterns.
 */
export class WatchFilter {
    private readonly root: string;

    constructor(
        rootPath: string,
        private readonly patterns: readonly string[],
        private readonly ignoreMatcher: IgnoreMatcher = createIgnoreMatcher([]),
        private readonly normalizer: PathNormalizer = new PathNormalizer()
    ) {
        this.root = this.normalizer.canonical(rootPath);
    }

    static load(rootPath: string, patterns: readonly string[], normalizer?: PathNormalizer): WatchFilter {
        return new WatchFilter(rootPath, patterns, createIgnoreMatcher(loadIgnorePatterns(rootPath)), normalizer);
    }

    isIgnored(absolutePath: string): boolean {
        const relative = this.normalizer.relativeTo(this.root, absolutePath);
        if (relative === undefined) {
            return true;
        }
        if (relative === ".") {
            return false;
        }
        return this.ignoreMatcher.ignores(relative);
    }

    matches(absolutePath: string): boolean {
        if (this.isIgnored(absolutePath)) {
            return false;
        }
        const relative = this.normalizer.relativeTo(this.root, absolutePath);
        if (relative === undefined || relative === ".") {
            return false;
        }
        if (this.patterns.length === 0) {
            return true;
        }
        return this.patterns.some(pattern =>
            minimatch(relative, pattern, { dot: true, matchBase: !pattern.includes("/") })
        );
    }
}
