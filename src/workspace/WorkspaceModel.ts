import type { WorkspaceSnapshot } from "../types.js";

/**
 * Source of workspace snapshots. Implementations enumerate units, their
 * declared references and their documents; the session layer never parses
 * source itself.
 */
export interface WorkspaceModel {
    loadSnapshot(rootPath: string): Promise<WorkspaceSnapshot>;
}
