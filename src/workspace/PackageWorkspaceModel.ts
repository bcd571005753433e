import * as fs from "fs";
import * as path from "path";
import { minimatch } from "minimatch";
import { z } from "zod";
import { createIgnoreMatcher, loadIgnorePatterns, type IgnoreMatcher } from "../config/IgnoreRules.js";
import { WorkspaceLoadError } from "../errors/SessionErrors.js";
import type { UnitDescriptor, WorkspaceSnapshot } from "../types.js";
import { PathNormalizer } from "../utils/PathNormalizer.js";
import { createLogger } from "../utils/StructuredLogger.js";
import { StaticWorkspaceSnapshot } from "./StaticWorkspaceSnapshot.js";
import type { WorkspaceModel } from "./WorkspaceModel.js";

const DEFAULT_SOURCE_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs"];
const TYPESCRIPT_EXTENSIONS = new Set([".ts", ".tsx", ".mts", ".cts"]);
const SKIPPED_DIRECTORIES = new Set(["node_modules", ".git", "dist", "build", "coverage", "out"]);
const DEFAULT_MAX_DEPTH = 6;

const dependencyMap = z.record(z.string()).optional();

const PackageManifestSchema = z.object({
    name: z.string().min(1).optional(),
    workspaces: z.union([
        z.array(z.string()),
        z.object({ packages: z.array(z.string()).optional() }).passthrough()
    ]).optional(),
    dependencies: dependencyMap,
    devDependencies: dependencyMap,
    peerDependencies: dependencyMap,
    optionalDependencies: dependencyMap
}).passthrough();

type PackageManifest = z.infer<typeof PackageManifestSchema>;

interface DiscoveredPackage {
    dir: string;
    relDir: string;
    manifest: PackageManifest;
}

export interface PackageWorkspaceModelOptions {
    sourceExtensions?: string[];
    maxDepth?: number;
    normalizer?: PathNormalizer;
}

/**
 * Reads an npm workspace: every package matched by the root manifest's
 * `workspaces` globs is a compilation unit, and a dependency on another
 * workspace package is a reference. A root without `workspaces` is a single
 * unit.
 */
export class PackageWorkspaceModel implements WorkspaceModel {
    private readonly sourceExtensions: Set<string>;
    private readonly maxDepth: number;
    private readonly normalizer: PathNormalizer;
    private readonly log = createLogger("PackageWorkspaceModel");

    constructor(options: PackageWorkspaceModelOptions = {}) {
        this.sourceExtensions = new Set(options.sourceExtensions ?? DEFAULT_SOURCE_EXTENSIONS);
        this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
        this.normalizer = options.normalizer ?? new PathNormalizer();
    }

    async loadSnapshot(rootPath: string): Promise<WorkspaceSnapshot> {
        const root = path.resolve(rootPath);
        let stats: fs.Stats;
        try {
            stats = await fs.promises.stat(root);
        } catch {
            throw new WorkspaceLoadError(rootPath, "path does not exist");
        }
        if (!stats.isDirectory()) {
            throw new WorkspaceLoadError(rootPath, "path is not a directory");
        }

        const rootManifest = await this.readManifest(root);
        const ignoreMatcher = createIgnoreMatcher(loadIgnorePatterns(root));
        const patterns = workspacePatterns(rootManifest);

        const packages = patterns.length > 0
            ? await this.discoverPackages(root, patterns, ignoreMatcher)
            : [{ dir: root, relDir: ".", manifest: rootManifest }];

        const packageDirs = new Set(packages.map(pkg => this.normalizer.canonical(pkg.dir)));
        const ids = new Set<string>();
        const namedPackages = packages.map(pkg => {
            let id = pkg.manifest.name ?? (pkg.relDir === "." ? path.basename(root) : pkg.relDir);
            if (ids.has(id)) {
                this.log.warn("Duplicate package name; using directory as unit id", { name: id, dir: pkg.relDir });
                id = pkg.relDir;
            }
            ids.add(id);
            return { ...pkg, id };
        });
        const workspaceNames = new Set(namedPackages.map(pkg => pkg.manifest.name).filter(isString));

        const units: UnitDescriptor[] = [];
        for (const pkg of namedPackages) {
            const documents = await this.collectDocuments(root, pkg.dir, packageDirs, ignoreMatcher);
            const { references, externalReferenceCount } = splitDependencies(pkg.manifest, workspaceNames);
            const hasTsconfig = fs.existsSync(path.join(pkg.dir, "tsconfig.json"));
            const hasTypeScriptSources = documents.some(doc => TYPESCRIPT_EXTENSIONS.has(path.extname(doc)));
            units.push({
                id: pkg.id,
                name: pkg.manifest.name ?? pkg.id,
                language: hasTsconfig || hasTypeScriptSources ? "typescript" : "javascript",
                rootDir: pkg.dir,
                documents,
                references: references.filter(ref => ref !== pkg.manifest.name),
                externalReferenceCount
            });
        }

        this.log.info("Workspace loaded", { rootPath: root, units: units.length });
        return new StaticWorkspaceSnapshot(root, units, { normalizer: this.normalizer });
    }

    private async readManifest(dir: string): Promise<PackageManifest> {
        const manifestPath = path.join(dir, "package.json");
        let raw: string;
        try {
            raw = await fs.promises.readFile(manifestPath, "utf-8");
        } catch {
            throw new WorkspaceLoadError(dir, "package.json not found");
        }
        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error) {
            throw new WorkspaceLoadError(dir, `package.json is not valid JSON (${error instanceof Error ? error.message : String(error)})`);
        }
        const parsed = PackageManifestSchema.safeParse(json);
        if (!parsed.success) {
            throw new WorkspaceLoadError(dir, `package.json is malformed: ${parsed.error.issues.map(issue => issue.message).join("; ")}`);
        }
        return parsed.data;
    }

    private async discoverPackages(root: string, patterns: string[], ignoreMatcher: IgnoreMatcher): Promise<DiscoveredPackage[]> {
        const includes = patterns.filter(p => !p.startsWith("!")).map(normalizeWorkspacePattern);
        const excludes = patterns.filter(p => p.startsWith("!")).map(p => normalizeWorkspacePattern(p.slice(1)));
        const found: DiscoveredPackage[] = [];

        const visit = async (dir: string, depth: number): Promise<void> => {
            if (depth > this.maxDepth) return;
            const entries = await fs.promises.readdir(dir, { withFileTypes: true });
            for (const entry of entries) {
                if (!entry.isDirectory() || SKIPPED_DIRECTORIES.has(entry.name)) continue;
                const child = path.join(dir, entry.name);
                const relDir = path.relative(root, child).split(path.sep).join("/");
                if (ignoreMatcher.ignores(relDir)) continue;

                const included = includes.some(p => minimatch(relDir, p, { dot: true }));
                const excluded = excludes.some(p => minimatch(relDir, p, { dot: true }));
                if (included && !excluded && fs.existsSync(path.join(child, "package.json"))) {
                    found.push({ dir: child, relDir, manifest: await this.readManifest(child) });
                }
                await visit(child, depth + 1);
            }
        };

        await visit(root, 1);
        return found.sort((a, b) => a.relDir.localeCompare(b.relDir));
    }

    private async collectDocuments(
        root: string,
        packageDir: string,
        packageDirs: Set<string>,
        ignoreMatcher: IgnoreMatcher
    ): Promise<string[]> {
        const documents: string[] = [];
        const stack = [packageDir];
        while (stack.length > 0) {
            const dir = stack.pop();
            if (dir === undefined) break;
            const entries = await fs.promises.readdir(dir, { withFileTypes: true });
            for (const entry of entries) {
                const entryPath = path.join(dir, entry.name);
                const relPath = path.relative(root, entryPath).split(path.sep).join("/");
                if (entry.isDirectory()) {
                    if (SKIPPED_DIRECTORIES.has(entry.name) || ignoreMatcher.ignores(relPath)) continue;
                    if (packageDirs.has(this.normalizer.canonical(entryPath))) continue;
                    stack.push(entryPath);
                } else if (entry.isFile() && this.sourceExtensions.has(path.extname(entry.name))) {
                    if (!ignoreMatcher.ignores(relPath)) {
                        documents.push(entryPath);
                    }
                }
            }
        }
        return documents.sort();
    }
}

function workspacePatterns(manifest: PackageManifest): string[] {
    const { workspaces } = manifest;
    if (!workspaces) return [];
    if (Array.isArray(workspaces)) return workspaces;
    return workspaces.packages ?? [];
}

function normalizeWorkspacePattern(pattern: string): string {
    return pattern.replace(/^\.\//, "").replace(/\/+$/, "");
}

function splitDependencies(manifest: PackageManifest, workspaceNames: Set<string>): { references: string[]; externalReferenceCount: number } {
    const references: string[] = [];
    const external = new Set<string>();
    const groups = [
        manifest.dependencies,
        manifest.devDependencies,
        manifest.peerDependencies,
        manifest.optionalDependencies
    ];
    for (const group of groups) {
        for (const name of Object.keys(group ?? {})) {
            if (workspaceNames.has(name)) {
                if (!references.includes(name)) references.push(name);
            } else {
                external.add(name);
            }
        }
    }
    return { references, externalReferenceCount: external.size };
}

function isString(value: string | undefined): value is string {
    return typeof value === "string";
}
