import type { UnitDescriptor, UnitId, WorkspaceSnapshot } from "../types.js";
import { PathNormalizer } from "../utils/PathNormalizer.js";

export interface StaticWorkspaceSnapshotOptions {
    normalizer?: PathNormalizer;
    loadedAt?: Date;
}

/**
 * Snapshot over a fixed list of unit descriptors.
 *
 * File ownership is resolved by exact document membership first. A file that
 * is not a known document (for example one created after the snapshot was
 * taken) belongs to the unit with the deepest root directory containing it.
 */
export class StaticWorkspaceSnapshot implements WorkspaceSnapshot {
    public readonly units: readonly UnitDescriptor[];
    public readonly loadedAt: Date;
    private readonly normalizer: PathNormalizer;
    private readonly documentOwners = new Map<string, UnitId[]>();
    private readonly unitRoots: Array<{ root: string; id: UnitId }> = [];

    constructor(public readonly rootPath: string, units: readonly UnitDescriptor[], options: StaticWorkspaceSnapshotOptions = {}) {
        this.normalizer = options.normalizer ?? new PathNormalizer();
        this.loadedAt = options.loadedAt ?? new Date();
        this.units = Object.freeze(units.map(unit => Object.freeze({
            ...unit,
            documents: Object.freeze([...unit.documents]),
            references: Object.freeze([...unit.references])
        })));

        for (const unit of this.units) {
            for (const document of unit.documents) {
                const key = this.normalizer.canonical(document, rootPath);
                const owners = this.documentOwners.get(key) ?? [];
                if (!owners.includes(unit.id)) {
                    owners.push(unit.id);
                }
                this.documentOwners.set(key, owners);
            }
            if (unit.rootDir) {
                this.unitRoots.push({ root: this.normalizer.canonical(unit.rootDir, rootPath), id: unit.id });
            }
        }
        this.unitRoots.sort((a, b) => b.root.length - a.root.length);
    }

    findUnitsContainingFile(filePath: string): UnitId[] {
        const key = this.normalizer.canonical(filePath, this.rootPath);
        const owners = this.documentOwners.get(key);
        if (owners) {
            return [...owners];
        }
        for (const entry of this.unitRoots) {
            if (key.startsWith(entry.root.endsWith("/") ? entry.root : `${entry.root}/`)) {
                return [entry.id];
            }
        }
        return [];
    }
}
