import { GraphUnavailableError, NotFoundError } from "../errors/SessionErrors.js";
import type { CompilationUnitInfo, UnitId, WorkspaceSnapshot } from "../types.js";
import { createLogger } from "../utils/StructuredLogger.js";
import { metrics } from "../utils/MetricsCollector.js";
import { DependencyGraph } from "./DependencyGraph.js";

export interface DependencyGraphStats {
    sessionId: string;
    hasGraph: boolean;
    totalUnits: number;
    leafUnits: number;
    rootUnits: number;
    edgeCount: number;
    maxDepth: number;
    createdAt: string | null;
}

/**
 * Holds the current dependency graph of every session.
 *
 * Each session points at one immutable {@link DependencyGraph}. Rebuilding
 * replaces the pointer, so a caller that already obtained a graph keeps a
 * complete, consistent view until it asks again.
 */
export class DependencyGraphService {
    private readonly graphs = new Map<string, DependencyGraph>();
    private readonly log = createLogger("DependencyGraphService");

    buildGraph(sessionId: string, snapshot: WorkspaceSnapshot): DependencyGraph {
        const started = Date.now();
        const graph = DependencyGraph.build(sessionId, snapshot.units);
        this.graphs.set(sessionId, graph);
        const elapsed = Date.now() - started;
        metrics.inc("graph.builds");
        metrics.observe("graph.build_ms", elapsed);
        this.log.info("Dependency graph built", {
            sessionId,
            units: graph.size,
            edges: graph.edgeCount,
            durationMs: elapsed
        });
        return graph;
    }

    getOrBuildGraph(sessionId: string, snapshot: WorkspaceSnapshot): DependencyGraph {
        return this.graphs.get(sessionId) ?? this.buildGraph(sessionId, snapshot);
    }

    getGraph(sessionId: string): DependencyGraph | undefined {
        return this.graphs.get(sessionId);
    }

    requireGraph(sessionId: string): DependencyGraph {
        const graph = this.graphs.get(sessionId);
        if (!graph) {
            throw new GraphUnavailableError(sessionId);
        }
        return graph;
    }

    hasGraph(sessionId: string): boolean {
        return this.graphs.has(sessionId);
    }

    getUnit(sessionId: string, unitId: UnitId): CompilationUnitInfo {
        const unit = this.requireGraph(sessionId).getUnit(unitId);
        if (!unit) {
            throw new NotFoundError("unit", unitId);
        }
        return unit;
    }

    getDirectDependencies(sessionId: string, unitId: UnitId): UnitId[] {
        const graph = this.requireKnownUnit(sessionId, unitId);
        return graph.getDirectDependencies(unitId);
    }

    getDirectDependents(sessionId: string, unitId: UnitId): UnitId[] {
        const graph = this.requireKnownUnit(sessionId, unitId);
        return graph.getDirectDependents(unitId);
    }

    /**
     * Units affected by a change to any of `changed`. Ids the graph does not
     * know (removed units, stale mappings) are logged and left out.
     */
    getAffectedUnits(sessionId: string, changed: Iterable<UnitId>): Set<UnitId> {
        const { affected, unknown } = this.requireGraph(sessionId).getAffectedUnits(changed);
        if (unknown.length > 0) {
            this.log.warn("Skipping units missing from dependency graph", { sessionId, unknown });
        }
        return affected;
    }

    getLeafUnits(sessionId: string): UnitId[] {
        return this.requireGraph(sessionId).getLeafUnits();
    }

    getRootUnits(sessionId: string): UnitId[] {
        return this.requireGraph(sessionId).getRootUnits();
    }

    getCompilationOrder(sessionId: string): UnitId[] {
        return this.requireGraph(sessionId).getCompilationOrder();
    }

    getStats(sessionId: string): DependencyGraphStats {
        const graph = this.graphs.get(sessionId);
        if (!graph) {
            return {
                sessionId,
                hasGraph: false,
                totalUnits: 0,
                leafUnits: 0,
                rootUnits: 0,
                edgeCount: 0,
                maxDepth: 0,
                createdAt: null
            };
        }
        return {
            sessionId,
            hasGraph: true,
            totalUnits: graph.size,
            leafUnits: graph.getLeafUnits().length,
            rootUnits: graph.getRootUnits().length,
            edgeCount: graph.edgeCount,
            maxDepth: graph.getMaxDepth(),
            createdAt: graph.createdAt.toISOString()
        };
    }

    removeGraph(sessionId: string): boolean {
        return this.graphs.delete(sessionId);
    }

    private requireKnownUnit(sessionId: string, unitId: UnitId): DependencyGraph {
        const graph = this.requireGraph(sessionId);
        if (!graph.has(unitId)) {
            throw new NotFoundError("unit", unitId);
        }
        return graph;
    }
}
