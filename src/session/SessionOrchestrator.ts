import * as fs from "fs";
import * as path from "path";
import { CacheInvalidationService, type CacheStats } from "../cache/CacheInvalidationService.js";
import { LruCacheStore } from "../cache/CacheStore.js";
import type { ServerConfig } from "../config/ServerConfig.js";
import {
    InvalidStateError,
    NotFoundError,
    OperationCancelledError,
    PartialMappingError,
    WatchSetupError,
    WorkspaceLoadError,
    toWarning,
    type OperationWarning
} from "../errors/SessionErrors.js";
import type { DependencyGraph } from "../graph/DependencyGraph.js";
import { DependencyGraphService, type DependencyGraphStats } from "../graph/DependencyGraphService.js";
import type { CompilationUnitInfo, SessionStatus, SessionView, UnitId, WorkspaceSnapshot } from "../types.js";
import { metrics, type MetricsSnapshot } from "../utils/MetricsCollector.js";
import { createLogger, errorFields } from "../utils/StructuredLogger.js";
import { collectPaths } from "../watch/ChangeChannel.js";
import { ChangeTracker } from "../watch/ChangeTracker.js";
import { PackageWorkspaceModel } from "../workspace/PackageWorkspaceModel.js";
import type { WorkspaceModel } from "../workspace/WorkspaceModel.js";
import { SessionRegistry } from "./SessionRegistry.js";

const RESUME_LIST_LIMIT = 10;
const PREVIEW_FILE_LIMIT = 20;
const PREVIEW_UNIT_LIMIT = 10;

export interface SessionCollaborators {
    registry: SessionRegistry;
    graphs: DependencyGraphService;
    cache: CacheInvalidationService;
    tracker: ChangeTracker;
    workspace: WorkspaceModel;
    now: () => Date;
}

export interface SessionSummary {
    sessionId: string;
    rootPath: string;
    status: SessionStatus;
    isPaused: boolean;
    pausedAt: string | null;
    createdAt: string;
    lastAccessedAt: string;
    unitCount: number;
    hasGraph: boolean;
    watchingFiles: boolean;
}

export interface StartSessionResult extends SessionSummary {
    graphBuilt: boolean;
}

export interface RefreshSessionResult {
    sessionId: string;
    unitCount: number;
    edgeCount: number;
    invalidatedEntries: number;
    isPaused: boolean;
}

export interface EndSessionResult {
    sessionId: string;
    invalidatedEntries: number;
}

export interface PauseResult {
    success: true;
    sessionId: string;
    watchingFiles: boolean;
    pausedAt: string;
    warnings: OperationWarning[];
}

export type ResumeType = "incremental" | "full_rebuild";

export interface ResumeResult {
    success: true;
    sessionId: string;
    resumeType: ResumeType;
    changedFiles: number;
    affectedProjects: number;
    fileList: string[];
    projectList: UnitId[];
    invalidatedEntries: number;
    rebuildStats: {
        fullRebuild: boolean;
        incrementalChanges: boolean;
        noChangesDetected: boolean;
        totalUnits: number;
    };
    warnings: OperationWarning[];
}

export interface PauseChangesPreview {
    success: true;
    sessionId: string;
    isPaused: boolean;
    pausedAt: string | null;
    pausedDurationMinutes: number;
    changedFiles: { count: number; files: string[] };
    affectedProjects: { count: number; projects: UnitId[] };
    impact: { low: boolean; medium: boolean; high: boolean };
    warnings: OperationWarning[];
}

export interface DependencyGraphReport {
    sessionId: string;
    stats: DependencyGraphStats;
    leafUnitIds: UnitId[];
    rootUnitIds: UnitId[];
    unitInfo: CompilationUnitInfo[];
}

export interface UnitSummary {
    id: UnitId;
    name: string;
    language: string;
    documentCount: number;
}

export interface ImpactAnalysisReport {
    sessionId: string;
    targetUnit: { id: UnitId; name: string; language: string };
    affectedUnitCount: number;
    affectedUnits: UnitSummary[];
}

export interface CompilationOrderEntry extends UnitSummary {
    order: number;
}

export interface UnitDetailsReport {
    sessionId: string;
    unit: CompilationUnitInfo;
    directDependencies: UnitSummary[];
    directDependents: UnitSummary[];
    transitiveDependencyCount: number;
    transitiveDependentCount: number;
    isLeaf: boolean;
    isRoot: boolean;
}

export interface CacheStatsReport {
    cache: CacheStats;
    metrics: MetricsSnapshot;
}

interface ChangeSet {
    files: string[];
    units: Set<UnitId>;
    warnings: OperationWarning[];
}

/**
 * Composes the registry, graph service, cache and change tracker into the
 * session operations exposed by the server.
 *
 * Operations that read and then transition a session run under that
 * session's lock. Each one validates first and applies the registry
 * transition last, so a failure part-way leaves the session as it was.
 */
export class SessionOrchestrator {
    private readonly registry: SessionRegistry;
    private readonly graphs: DependencyGraphService;
    private readonly cache: CacheInvalidationService;
    private readonly tracker: ChangeTracker;
    private readonly workspace: WorkspaceModel;
    private readonly now: () => Date;
    private readonly log = createLogger("SessionOrchestrator");

    constructor(private readonly config: ServerConfig, collaborators: Partial<SessionCollaborators> = {}) {
        this.registry = collaborators.registry ?? new SessionRegistry();
        this.graphs = collaborators.graphs ?? new DependencyGraphService();
        this.cache = collaborators.cache ?? new CacheInvalidationService(new LruCacheStore({
            maxEntries: config.cache.maxEntries,
            ttlMs: config.cache.ttlMinutes * 60_000
        }));
        this.tracker = collaborators.tracker ?? new ChangeTracker({ quiescenceMs: config.quiescenceMs });
        this.workspace = collaborators.workspace ?? new PackageWorkspaceModel();
        this.now = collaborators.now ?? (() => new Date());
    }

    async startSession(rootPath?: string): Promise<StartSessionResult> {
        const resolved = path.resolve(this.config.rootPath, rootPath ?? ".");
        if (!fs.existsSync(resolved) || !fs.statSync(resolved).isDirectory()) {
            throw new WorkspaceLoadError(resolved, "path is not an existing directory");
        }

        const created = this.registry.create(resolved);
        let snapshot: WorkspaceSnapshot;
        try {
            snapshot = await metrics.time("workspace.load_ms", () => this.workspace.loadSnapshot(resolved));
        } catch (error) {
            this.registry.dispose(created.id);
            this.log.error("Failed to load workspace", { sessionId: created.id, rootPath: resolved, ...errorFields(error) });
            throw error;
        }

        const session = this.registry.activate(created.id, snapshot);
        let graphBuilt = false;
        if (this.config.prewarmGraph) {
            this.graphs.buildGraph(session.id, snapshot);
            graphBuilt = true;
        }
        metrics.inc("session.started");
        this.log.info("Session started", { sessionId: session.id, rootPath: resolved, units: snapshot.units.length });
        return { ...this.summarize(session), graphBuilt };
    }

    async refreshSession(sessionId: string): Promise<RefreshSessionResult> {
        return this.registry.runExclusive(sessionId, async () => {
            const session = this.registry.get(sessionId);
            const snapshot = await this.workspace.loadSnapshot(session.rootPath);
            const graph = this.graphs.buildGraph(sessionId, snapshot);
            const invalidatedEntries = this.cache.invalidateAll(sessionId);
            const updated = this.registry.replaceSnapshot(sessionId, snapshot);
            this.log.info("Session refreshed", { sessionId, units: graph.size, invalidatedEntries });
            return {
                sessionId,
                unitCount: graph.size,
                edgeCount: graph.edgeCount,
                invalidatedEntries,
                isPaused: updated.isPaused
            };
        });
    }

    async endSession(sessionId: string): Promise<EndSessionResult> {
        return this.registry.runExclusive(sessionId, async () => {
            this.registry.get(sessionId);
            await this.tracker.stopWatching(sessionId);
            const invalidatedEntries = this.cache.invalidateAll(sessionId);
            this.graphs.removeGraph(sessionId);
            this.registry.dispose(sessionId);
            metrics.inc("session.ended");
            this.log.info("Session ended", { sessionId, invalidatedEntries });
            return { sessionId, invalidatedEntries };
        });
    }

    async pause(sessionId: string, watchFiles: boolean, signal?: AbortSignal): Promise<PauseResult> {
        return this.registry.runExclusive(sessionId, async () => {
            const session = this.registry.assertCanPause(sessionId);
            if (signal?.aborted) {
                throw new OperationCancelledError("Pause");
            }
            const pausedAt = this.now();
            const warnings: OperationWarning[] = [];
            let watchingFiles = false;

            if (watchFiles) {
                try {
                    await this.tracker.startWatching(sessionId, session.rootPath, this.config.watchPatterns, signal);
                    watchingFiles = true;
                } catch (error) {
                    if (!(error instanceof WatchSetupError)) {
                        throw error;
                    }
                    this.log.warn("Pausing without file watching", { sessionId, ...errorFields(error) });
                    warnings.push(toWarning(error));
                }
            }

            try {
                this.registry.pause(sessionId, pausedAt);
            } catch (error) {
                await this.tracker.stopWatching(sessionId);
                throw error;
            }

            this.log.info("Session paused", { sessionId, watchingFiles });
            return {
                success: true,
                sessionId,
                watchingFiles,
                pausedAt: pausedAt.toISOString(),
                warnings
            };
        });
    }

    async resume(sessionId: string, forceFullRebuild: boolean): Promise<ResumeResult> {
        return this.registry.runExclusive(sessionId, async () => {
            const started = Date.now();
            const session = this.registry.assertPaused(sessionId, "resume");
            const graph = this.graphs.requireGraph(sessionId);
            const changes = this.collectChanges(session, true);

            let affected: UnitId[];
            let invalidatedEntries: number;
            if (forceFullRebuild) {
                invalidatedEntries = this.cache.invalidateAll(sessionId);
                affected = graph.unitIds();
            } else {
                const affectedSet = this.graphs.getAffectedUnits(sessionId, changes.units);
                affected = inEnumerationOrder(graph, affectedSet);
                invalidatedEntries = this.cache.invalidateUnits(sessionId, affected);
            }

            await this.tracker.stopWatching(sessionId);
            this.registry.resume(sessionId);

            metrics.observe("session.resume_ms", Date.now() - started);
            this.log.info("Session resumed", {
                sessionId,
                changedFiles: changes.files.length,
                affectedUnits: affected.length,
                fullRebuild: forceFullRebuild,
                invalidatedEntries
            });

            return {
                success: true,
                sessionId,
                resumeType: forceFullRebuild ? "full_rebuild" : "incremental",
                changedFiles: changes.files.length,
                affectedProjects: affected.length,
                fileList: changes.files.slice(0, RESUME_LIST_LIMIT),
                projectList: affected.slice(0, RESUME_LIST_LIMIT),
                invalidatedEntries,
                rebuildStats: {
                    fullRebuild: forceFullRebuild,
                    incrementalChanges: !forceFullRebuild && changes.files.length > 0,
                    noChangesDetected: !forceFullRebuild && changes.files.length === 0,
                    totalUnits: graph.size
                },
                warnings: changes.warnings
            };
        });
    }

    async previewPauseChanges(sessionId: string): Promise<PauseChangesPreview> {
        return this.registry.runExclusive(sessionId, async () => {
            const session = this.registry.assertPaused(sessionId, "preview");
            const graph = this.graphs.requireGraph(sessionId);
            const changes = this.collectChanges(session, false);
            const { affected } = graph.getAffectedUnits(changes.units);
            const affectedIds = inEnumerationOrder(graph, affected);
            const count = changes.files.length;

            return {
                success: true,
                sessionId,
                isPaused: session.isPaused,
                pausedAt: session.pausedAt?.toISOString() ?? null,
                pausedDurationMinutes: this.pausedDurationMs(session) / 60_000,
                changedFiles: { count, files: changes.files.slice(0, PREVIEW_FILE_LIMIT) },
                affectedProjects: { count: affectedIds.length, projects: affectedIds.slice(0, PREVIEW_UNIT_LIMIT) },
                impact: {
                    low: count <= 5,
                    medium: count > 5 && count <= 20,
                    high: count > 20
                },
                warnings: changes.warnings
            };
        });
    }

    getDependencyGraph(sessionId: string): DependencyGraphReport {
        const graph = this.graphFor(sessionId);
        return {
            sessionId,
            stats: this.graphs.getStats(sessionId),
            leafUnitIds: graph.getLeafUnits(),
            rootUnitIds: graph.getRootUnits(),
            unitInfo: graph.unitIds().map(id => this.requireUnit(graph, id))
        };
    }

    getImpactAnalysis(sessionId: string, unitId: UnitId): ImpactAnalysisReport {
        const graph = this.graphFor(sessionId);
        const target = this.requireUnit(graph, unitId);
        const affected = inEnumerationOrder(graph, this.graphs.getAffectedUnits(sessionId, [unitId]));
        return {
            sessionId,
            targetUnit: { id: target.id, name: target.name, language: target.language },
            affectedUnitCount: affected.length,
            affectedUnits: affected.map(id => summarizeUnit(this.requireUnit(graph, id)))
        };
    }

    getCompilationOrder(sessionId: string): CompilationOrderEntry[] {
        const graph = this.graphFor(sessionId);
        return graph.getCompilationOrder().map((id, index) => ({
            order: index + 1,
            ...summarizeUnit(this.requireUnit(graph, id))
        }));
    }

    getUnitDetails(sessionId: string, unitId: UnitId): UnitDetailsReport {
        const graph = this.graphFor(sessionId);
        const unit = this.requireUnit(graph, unitId);
        const dependencies = graph.getDirectDependencies(unitId);
        const dependents = graph.getDirectDependents(unitId);
        return {
            sessionId,
            unit,
            directDependencies: dependencies.map(id => summarizeUnit(this.requireUnit(graph, id))),
            directDependents: dependents.map(id => summarizeUnit(this.requireUnit(graph, id))),
            transitiveDependencyCount: graph.getTransitiveDependencies(unitId).length,
            transitiveDependentCount: graph.getTransitiveDependents(unitId).length,
            isLeaf: dependencies.length === 0,
            isRoot: dependents.length === 0
        };
    }

    getSessionStatus(sessionId: string): SessionSummary {
        const session = this.registry.get(sessionId);
        this.registry.touch(sessionId);
        return this.summarize(session);
    }

    listSessions(): SessionSummary[] {
        return this.registry.list().map(session => this.summarize(session));
    }

    getCacheStats(): CacheStatsReport {
        return { cache: this.cache.getStats(), metrics: metrics.snapshot() };
    }

    clearCache(sessionId?: string): { sessionId: string | null; removedEntries: number } {
        if (sessionId !== undefined) {
            this.registry.get(sessionId);
            return { sessionId, removedEntries: this.cache.invalidateAll(sessionId) };
        }
        return { sessionId: null, removedEntries: this.cache.clearAll() };
    }

    /**
     * Ends every session idle for longer than the configured timeout.
     */
    async cleanupIdleSessions(now: Date = this.now()): Promise<string[]> {
        const cutoff = new Date(now.getTime() - this.config.idleTimeoutMinutes * 60_000);
        const idle = this.registry.findIdleSessions(cutoff);
        const ended: string[] = [];
        for (const sessionId of idle) {
            try {
                await this.endSession(sessionId);
                ended.push(sessionId);
            } catch (error) {
                // ended by a concurrent end_session
                if (!(error instanceof NotFoundError)) {
                    throw error;
                }
            }
        }
        if (ended.length > 0) {
            this.log.info("Cleaned up idle sessions", { count: ended.length, sessionIds: ended });
        }
        return ended;
    }

    async dispose(): Promise<void> {
        for (const session of this.registry.list()) {
            await this.endSession(session.id);
        }
        await this.tracker.dispose();
    }

    private graphFor(sessionId: string): DependencyGraph {
        const session = this.registry.get(sessionId);
        this.registry.touch(sessionId);
        return this.graphs.getOrBuildGraph(sessionId, requireSnapshot(session));
    }

    private requireUnit(graph: DependencyGraph, unitId: UnitId): CompilationUnitInfo {
        const unit = graph.getUnit(unitId);
        if (!unit) {
            throw new NotFoundError("unit", unitId);
        }
        return unit;
    }

    /**
     * Union of the tracker's records since the pause began and every batch
     * on the session's channel. Draining happens only when `consume` is set.
     */
    private collectChanges(session: SessionView, consume: boolean): ChangeSet {
        const sinceMs = this.pausedDurationMs(session);
        const paths = new Set(this.tracker.getRecentChanges(session.id, sinceMs));
        const channel = this.tracker.getChannel(session.id);
        if (channel) {
            for (const filePath of collectPaths(consume ? channel.drain() : channel.peek())) {
                paths.add(filePath);
            }
        }
        const files = [...paths].sort();

        const snapshot = requireSnapshot(session);
        const units = new Set<UnitId>();
        const unmapped: string[] = [];
        for (const filePath of files) {
            const owners = snapshot.findUnitsContainingFile(filePath);
            if (owners.length === 0) {
                unmapped.push(filePath);
                continue;
            }
            for (const owner of owners) {
                units.add(owner);
            }
        }

        const warnings: OperationWarning[] = [];
        if (unmapped.length > 0) {
            const partial = new PartialMappingError(unmapped);
            this.log.warn("Changed files without an owning unit", { sessionId: session.id, unmapped });
            warnings.push(toWarning(partial));
        }
        return { files, units, warnings };
    }

    private pausedDurationMs(session: SessionView): number {
        if (!session.pausedAt) return 0;
        return Math.max(0, this.now().getTime() - session.pausedAt.getTime());
    }

    private summarize(session: SessionView): SessionSummary {
        return {
            sessionId: session.id,
            rootPath: session.rootPath,
            status: session.status,
            isPaused: session.isPaused,
            pausedAt: session.pausedAt?.toISOString() ?? null,
            createdAt: session.createdAt.toISOString(),
            lastAccessedAt: session.lastAccessedAt.toISOString(),
            unitCount: session.snapshot?.units.length ?? 0,
            hasGraph: this.graphs.hasGraph(session.id),
            watchingFiles: this.tracker.isWatching(session.id)
        };
    }
}

function requireSnapshot(session: SessionView): WorkspaceSnapshot {
    if (!session.snapshot) {
        throw new InvalidStateError(`Session '${session.id}' has no workspace loaded`, session.id, session.status, "query");
    }
    return session.snapshot;
}

function inEnumerationOrder(graph: DependencyGraph, ids: ReadonlySet<UnitId>): UnitId[] {
    return graph.unitIds().filter(id => ids.has(id));
}

function summarizeUnit(unit: CompilationUnitInfo): UnitSummary {
    return {
        id: unit.id,
        name: unit.name,
        language: unit.language,
        documentCount: unit.documentCount
    };
}
