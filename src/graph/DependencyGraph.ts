import { GraphCycleError } from "../errors/SessionErrors.js";
import type { CompilationUnitInfo, UnitDescriptor, UnitId } from "../types.js";

export interface AffectedUnitsResult {
    affected: Set<UnitId>;
    /** Requested ids that are not part of this graph. */
    unknown: UnitId[];
}

/**
 * Immutable dependency graph of compilation units.
 *
 * Forward edges point from a unit to the units it references; the reverse
 * index is derived by inversion at construction time and is never updated
 * afterwards. A structural change produces a new graph instead.
 */
export class DependencyGraph {
    private readonly units: ReadonlyMap<UnitId, CompilationUnitInfo>;
    private readonly order: readonly UnitId[];
    private readonly orderIndex: ReadonlyMap<UnitId, number>;
    private readonly forward: ReadonlyMap<UnitId, ReadonlySet<UnitId>>;
    private readonly reverse: ReadonlyMap<UnitId, ReadonlySet<UnitId>>;
    public readonly edgeCount: number;

    private constructor(
        public readonly sessionId: string,
        units: Map<UnitId, CompilationUnitInfo>,
        order: UnitId[],
        forward: Map<UnitId, Set<UnitId>>,
        reverse: Map<UnitId, Set<UnitId>>,
        public readonly createdAt: Date
    ) {
        this.units = units;
        this.order = Object.freeze(order);
        this.orderIndex = new Map(order.map((id, index) => [id, index]));
        this.forward = forward;
        this.reverse = reverse;
        let edges = 0;
        for (const deps of forward.values()) {
            edges += deps.size;
        }
        this.edgeCount = edges;
        Object.freeze(this);
    }

    static build(sessionId: string, descriptors: readonly UnitDescriptor[], createdAt: Date = new Date()): DependencyGraph {
        const units = new Map<UnitId, CompilationUnitInfo>();
        const order: UnitId[] = [];
        const declared = new Map<UnitId, readonly UnitId[]>();

        for (const descriptor of descriptors) {
            if (units.has(descriptor.id)) {
                continue;
            }
            units.set(descriptor.id, Object.freeze({
                id: descriptor.id,
                name: descriptor.name,
                language: descriptor.language,
                documentCount: descriptor.documents.length,
                referenceCount: descriptor.externalReferenceCount,
                ...(descriptor.rootDir !== undefined ? { rootDir: descriptor.rootDir } : {})
            }));
            order.push(descriptor.id);
            declared.set(descriptor.id, descriptor.references);
        }

        const forward = new Map<UnitId, Set<UnitId>>();
        const reverse = new Map<UnitId, Set<UnitId>>();
        for (const id of order) {
            forward.set(id, new Set());
            reverse.set(id, new Set());
        }

        for (const id of order) {
            const deps = forward.get(id);
            for (const ref of declared.get(id) ?? []) {
                if (ref === id || !units.has(ref) || !deps) {
                    continue;
                }
                deps.add(ref);
                reverse.get(ref)?.add(id);
            }
        }

        return new DependencyGraph(sessionId, units, order, forward, reverse, createdAt);
    }

    get size(): number {
        return this.order.length;
    }

    has(unitId: UnitId): boolean {
        return this.units.has(unitId);
    }

    getUnit(unitId: UnitId): CompilationUnitInfo | undefined {
        return this.units.get(unitId);
    }

    unitIds(): UnitId[] {
        return [...this.order];
    }

    getDirectDependencies(unitId: UnitId): UnitId[] {
        return this.sorted(this.forward.get(unitId));
    }

    getDirectDependents(unitId: UnitId): UnitId[] {
        return this.sorted(this.reverse.get(unitId));
    }

    /**
     * Transitive closure over the reverse index, seeded with every known id in
     * `changed`. Changed units are part of their own impact set.
     */
    getAffectedUnits(changed: Iterable<UnitId>): AffectedUnitsResult {
        const affected = new Set<UnitId>();
        const unknown: UnitId[] = [];
        const queue: UnitId[] = [];

        for (const id of changed) {
            if (!this.units.has(id)) {
                if (!unknown.includes(id)) unknown.push(id);
                continue;
            }
            if (!affected.has(id)) {
                affected.add(id);
                queue.push(id);
            }
        }

        while (queue.length > 0) {
            const current = queue.shift();
            if (current === undefined) break;
            for (const dependent of this.reverse.get(current) ?? []) {
                if (!affected.has(dependent)) {
                    affected.add(dependent);
                    queue.push(dependent);
                }
            }
        }

        return { affected, unknown };
    }

    getTransitiveDependencies(unitId: UnitId): UnitId[] {
        const visited = new Set<UnitId>();
        const stack = [...(this.forward.get(unitId) ?? [])];
        while (stack.length > 0) {
            const current = stack.pop();
            if (current === undefined || visited.has(current)) continue;
            visited.add(current);
            stack.push(...(this.forward.get(current) ?? []));
        }
        visited.delete(unitId);
        return this.sorted(visited);
    }

    getTransitiveDependents(unitId: UnitId): UnitId[] {
        const { affected } = this.getAffectedUnits([unitId]);
        affected.delete(unitId);
        return this.sorted(affected);
    }

    getLeafUnits(): UnitId[] {
        return this.order.filter(id => (this.forward.get(id)?.size ?? 0) === 0);
    }

    getRootUnits(): UnitId[] {
        return this.order.filter(id => (this.reverse.get(id)?.size ?? 0) === 0);
    }

    /**
     * Kahn's algorithm. Among units whose dependencies are all emitted, the one
     * enumerated first goes next.
     */
    getCompilationOrder(): UnitId[] {
        const remaining = new Map<UnitId, number>();
        const ready: UnitId[] = [];
        for (const id of this.order) {
            const count = this.forward.get(id)?.size ?? 0;
            remaining.set(id, count);
            if (count === 0) ready.push(id);
        }

        const result: UnitId[] = [];
        while (ready.length > 0) {
            const next = ready.shift();
            if (next === undefined) break;
            result.push(next);
            let released = false;
            for (const dependent of this.reverse.get(next) ?? []) {
                const count = (remaining.get(dependent) ?? 0) - 1;
                remaining.set(dependent, count);
                if (count === 0) {
                    ready.push(dependent);
                    released = true;
                }
            }
            if (released) {
                ready.sort((a, b) => this.indexOf(a) - this.indexOf(b));
            }
        }

        if (result.length !== this.order.length) {
            const emitted = new Set(result);
            throw new GraphCycleError(this.sessionId, this.order.filter(id => !emitted.has(id)));
        }
        return result;
    }

    /**
     * Length, in units, of the longest dependency chain. Zero for an empty graph.
     */
    getMaxDepth(): number {
        const depth = new Map<UnitId, number>();
        let max = 0;
        for (const id of this.getCompilationOrder()) {
            let own = 1;
            for (const dep of this.forward.get(id) ?? []) {
                own = Math.max(own, (depth.get(dep) ?? 0) + 1);
            }
            depth.set(id, own);
            max = Math.max(max, own);
        }
        return max;
    }

    private indexOf(unitId: UnitId): number {
        return this.orderIndex.get(unitId) ?? Number.MAX_SAFE_INTEGER;
    }

    private sorted(ids: Iterable<UnitId> | undefined): UnitId[] {
        if (!ids) return [];
        return [...ids].sort((a, b) => this.indexOf(a) - this.indexOf(b));
    }
}
