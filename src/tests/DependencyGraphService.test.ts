import { DependencyGraphService } from "../graph/DependencyGraphService.js";
import { GraphUnavailableError, NotFoundError } from "../errors/SessionErrors.js";
import { StaticWorkspaceSnapshot } from "../workspace/StaticWorkspaceSnapshot.js";
import { unit } from "./helpers/fixtures.js";

describe("DependencyGraphService", () => {
    const chainSnapshot = () => new StaticWorkspaceSnapshot("/ws", [unit("A"), unit("B", ["A"]), unit("C", ["B"])]);

    it("reports a missing graph until one is built", () => {
        const service = new DependencyGraphService();

        expect(service.getGraph("s1")).toBeUndefined();
        expect(() => service.requireGraph("s1")).toThrow(GraphUnavailableError);
        expect(service.getStats("s1")).toEqual({
            sessionId: "s1",
            hasGraph: false,
            totalUnits: 0,
            leafUnits: 0,
            rootUnits: 0,
            edgeCount: 0,
            maxDepth: 0,
            createdAt: null
        });
    });

    it("builds lazily once and reuses the graph", () => {
        const service = new DependencyGraphService();
        const snapshot = chainSnapshot();

        const first = service.getOrBuildGraph("s1", snapshot);
        const second = service.getOrBuildGraph("s1", snapshot);

        expect(second).toBe(first);
        expect(service.hasGraph("s1")).toBe(true);
    });

    it("swaps in a new graph on rebuild and leaves the old value intact", () => {
        const service = new DependencyGraphService();
        const before = service.buildGraph("s1", chainSnapshot());
        const after = service.buildGraph("s1", new StaticWorkspaceSnapshot("/ws", [unit("A")]));

        expect(service.getGraph("s1")).toBe(after);
        expect(before.size).toBe(3);
        expect(before.getCompilationOrder()).toEqual(["A", "B", "C"]);
        expect(after.size).toBe(1);
    });

    it("answers per-session queries", () => {
        const service = new DependencyGraphService();
        service.buildGraph("s1", chainSnapshot());

        expect(service.getDirectDependencies("s1", "B")).toEqual(["A"]);
        expect(service.getDirectDependents("s1", "B")).toEqual(["C"]);
        expect(service.getLeafUnits("s1")).toEqual(["A"]);
        expect(service.getRootUnits("s1")).toEqual(["C"]);
        expect(service.getCompilationOrder("s1")).toEqual(["A", "B", "C"]);
        expect(service.getUnit("s1", "C").name).toBe("C");
    });

    it("rejects unknown units in direct lookups", () => {
        const service = new DependencyGraphService();
        service.buildGraph("s1", chainSnapshot());

        expect(() => service.getDirectDependencies("s1", "Z")).toThrow(NotFoundError);
        expect(() => service.getDirectDependents("s1", "Z")).toThrow("Unit 'Z' not found");
    });

    it("skips unknown ids when computing the affected set", () => {
        const service = new DependencyGraphService();
        service.buildGraph("s1", chainSnapshot());

        expect([...service.getAffectedUnits("s1", ["B", "removed"])].sort()).toEqual(["B", "C"]);
    });

    it("keeps sessions separate", () => {
        const service = new DependencyGraphService();
        service.buildGraph("s1", chainSnapshot());
        service.buildGraph("s2", new StaticWorkspaceSnapshot("/other", [unit("X")]));

        expect(service.removeGraph("s1")).toBe(true);
        expect(service.removeGraph("s1")).toBe(false);
        expect(service.hasGraph("s2")).toBe(true);
    });

    it("summarizes graph statistics", () => {
        const service = new DependencyGraphService();
        const graph = service.buildGraph("s1", chainSnapshot());

        expect(service.getStats("s1")).toEqual({
            sessionId: "s1",
            hasGraph: true,
            totalUnits: 3,
            leafUnits: 1,
            rootUnits: 1,
            edgeCount: 2,
            maxDepth: 3,
            createdAt: graph.createdAt.toISOString()
        });
    });
});
