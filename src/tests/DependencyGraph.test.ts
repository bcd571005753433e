import { DependencyGraph } from "../graph/DependencyGraph.js";
import { GraphCycleError } from "../errors/SessionErrors.js";
import { unit } from "./helpers/fixtures.js";

describe("DependencyGraph", () => {
    const chain = () => DependencyGraph.build("s1", [unit("A"), unit("B", ["A"]), unit("C", ["B"])]);
    const diamond = () => DependencyGraph.build("s1", [
        unit("A"),
        unit("B", ["A"]),
        unit("C", ["A"]),
        unit("D", ["B", "C"])
    ]);

    it("computes the impact set and compile order of a simple chain", () => {
        const graph = chain();

        expect([...graph.getAffectedUnits(["A"]).affected].sort()).toEqual(["A", "B", "C"]);
        expect(graph.getCompilationOrder()).toEqual(["A", "B", "C"]);
    });

    it("derives the reverse index as the exact inverse of forward references", () => {
        const graph = diamond();
        const ids = graph.unitIds();

        for (const u of ids) {
            for (const v of ids) {
                expect(graph.getDirectDependents(u).includes(v)).toBe(graph.getDirectDependencies(v).includes(u));
            }
        }
        expect(graph.getDirectDependents("A")).toEqual(["B", "C"]);
        expect(graph.getDirectDependencies("D")).toEqual(["B", "C"]);
    });

    it("returns the transitive dependents closure including the changed unit", () => {
        const graph = diamond();

        expect([...graph.getAffectedUnits(["A"]).affected].sort()).toEqual(["A", "B", "C", "D"]);
        expect([...graph.getAffectedUnits(["B"]).affected].sort()).toEqual(["B", "D"]);
        expect([...graph.getAffectedUnits(["D"]).affected]).toEqual(["D"]);
    });

    it("returns an empty impact set for an empty change set", () => {
        const result = diamond().getAffectedUnits([]);

        expect(result.affected.size).toBe(0);
        expect(result.unknown).toEqual([]);
    });

    it("reports ids missing from the graph instead of failing", () => {
        const result = chain().getAffectedUnits(["ghost", "A", "ghost"]);

        expect(result.unknown).toEqual(["ghost"]);
        expect([...result.affected].sort()).toEqual(["A", "B", "C"]);
    });

    it("drops self references and references to unknown units", () => {
        const graph = DependencyGraph.build("s1", [unit("A", ["A", "missing"]), unit("B", ["A", "A"])]);

        expect(graph.getDirectDependencies("A")).toEqual([]);
        expect(graph.getDirectDependencies("B")).toEqual(["A"]);
        expect(graph.edgeCount).toBe(1);
    });

    it("keeps the first unit when ids are duplicated", () => {
        const graph = DependencyGraph.build("s1", [
            unit("A", [], { documents: ["/ws/a.ts"] }),
            unit("A", [], { documents: ["/ws/x.ts", "/ws/y.ts"] })
        ]);

        expect(graph.size).toBe(1);
        expect(graph.getUnit("A")?.documentCount).toBe(1);
    });

    it("breaks ties in compile order by enumeration order", () => {
        const independent = DependencyGraph.build("s1", [unit("X"), unit("Y"), unit("Z")]);
        const late = DependencyGraph.build("s1", [unit("C", ["A"]), unit("A"), unit("B")]);

        expect(independent.getCompilationOrder()).toEqual(["X", "Y", "Z"]);
        expect(late.getCompilationOrder()).toEqual(["A", "C", "B"]);
    });

    it("orders every dependency before its dependents", () => {
        const graph = DependencyGraph.build("s1", [
            unit("app", ["ui", "api"]),
            unit("ui", ["core", "theme"]),
            unit("api", ["core", "db"]),
            unit("db", ["core"]),
            unit("theme"),
            unit("core")
        ]);
        const order = graph.getCompilationOrder();

        expect(order).toHaveLength(6);
        for (const id of graph.unitIds()) {
            for (const dep of graph.getDirectDependencies(id)) {
                expect(order.indexOf(dep)).toBeLessThan(order.indexOf(id));
            }
        }
        expect(order).toEqual(["theme", "core", "ui", "db", "api", "app"]);
    });

    it("raises GraphCycleError naming the units caught in a cycle", () => {
        const graph = DependencyGraph.build("s1", [unit("A", ["B"]), unit("B", ["A"]), unit("C")]);

        expect(() => graph.getCompilationOrder()).toThrow(GraphCycleError);
        try {
            graph.getCompilationOrder();
        } catch (error) {
            expect(error).toBeInstanceOf(GraphCycleError);
            if (error instanceof GraphCycleError) {
                expect(error.unresolvedUnits).toEqual(["A", "B"]);
                expect(error.code).toBe("GraphCycle");
            }
        }
    });

    it("identifies leaf and root units", () => {
        const graph = diamond();

        expect(graph.getLeafUnits()).toEqual(["A"]);
        expect(graph.getRootUnits()).toEqual(["D"]);
    });

    it("computes transitive dependencies, dependents and depth", () => {
        const graph = chain();

        expect(graph.getTransitiveDependencies("C")).toEqual(["A", "B"]);
        expect(graph.getTransitiveDependents("A")).toEqual(["B", "C"]);
        expect(graph.getMaxDepth()).toBe(3);
        expect(DependencyGraph.build("s1", []).getMaxDepth()).toBe(0);
    });

    it("is frozen after construction", () => {
        const graph = chain();

        expect(Object.isFrozen(graph)).toBe(true);
        expect(graph.sessionId).toBe("s1");
    });
});
