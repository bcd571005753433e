import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { WorkspaceLoadError } from "../errors/SessionErrors.js";
import { DependencyGraph } from "../graph/DependencyGraph.js";
import { PackageWorkspaceModel } from "../workspace/PackageWorkspaceModel.js";

describe("PackageWorkspaceModel", () => {
    let root: string;
    const model = new PackageWorkspaceModel();

    const write = (relPath: string, content: string | object = "") => {
        const target = path.join(root, relPath);
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.writeFileSync(target, typeof content === "string" ? content : JSON.stringify(content));
    };
    const abs = (relPath: string) => path.join(root, relPath);

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), "workspace-model-"));
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    describe("npm workspaces", () => {
        beforeEach(() => {
            write("package.json", { name: "demo-root", private: true, workspaces: ["packages/*"] });

            write("packages/core/package.json", { name: "@demo/core", dependencies: { lodash: "^4.17.21" } });
            write("packages/core/tsconfig.json", {});
            write("packages/core/src/index.ts", "export const core = 1;\n");

            write("packages/api/package.json", {
                name: "@demo/api",
                dependencies: { "@demo/core": "*", express: "^4.19.0" },
                devDependencies: { "@demo/core": "*", jest: "^29.7.0" }
            });
            write("packages/api/src/server.ts", "export {};\n");
            write("packages/api/src/routes.ts", "export {};\n");
            write("packages/api/dist/server.js", "");
            write("packages/api/node_modules/express/index.js", "");

            write("packages/web/package.json", {
                name: "@demo/web",
                dependencies: { "@demo/api": "*", "@demo/core": "*", "@demo/web": "*" }
            });
            write("packages/web/.gitignore", "src/generated/\n");
            write("packages/web/src/app.js", "");
            write("packages/web/src/generated/schema.js", "");
        });

        it("turns each workspace package into a unit", async () => {
            const snapshot = await model.loadSnapshot(root);

            expect(snapshot.units).toEqual([
                {
                    id: "@demo/api",
                    name: "@demo/api",
                    language: "typescript",
                    rootDir: abs("packages/api"),
                    documents: [abs("packages/api/src/routes.ts"), abs("packages/api/src/server.ts")],
                    references: ["@demo/core"],
                    externalReferenceCount: 2
                },
                {
                    id: "@demo/core",
                    name: "@demo/core",
                    language: "typescript",
                    rootDir: abs("packages/core"),
                    documents: [abs("packages/core/src/index.ts")],
                    references: [],
                    externalReferenceCount: 1
                },
                {
                    id: "@demo/web",
                    name: "@demo/web",
                    language: "javascript",
                    rootDir: abs("packages/web"),
                    documents: [abs("packages/web/src/app.js")],
                    references: ["@demo/api", "@demo/core"],
                    externalReferenceCount: 0
                }
            ]);
        });

        it("yields a graph that orders packages after their dependencies", async () => {
            const snapshot = await model.loadSnapshot(root);

            const graph = DependencyGraph.build("s1", snapshot.units);

            expect(graph.getCompilationOrder()).toEqual(["@demo/core", "@demo/api", "@demo/web"]);
            expect(graph.getDirectDependents("@demo/core")).toEqual(["@demo/api", "@demo/web"]);
        });

        it("maps new files to the package that contains them", async () => {
            const snapshot = await model.loadSnapshot(root);

            expect(snapshot.findUnitsContainingFile(abs("packages/web/src/pages/home.ts"))).toEqual(["@demo/web"]);
            expect(snapshot.findUnitsContainingFile(abs("packages/core/src/index.ts"))).toEqual(["@demo/core"]);
            expect(snapshot.findUnitsContainingFile(abs("scripts/release.ts"))).toEqual([]);
        });
    });

    it("honours object-form workspaces with exclusions", async () => {
        write("package.json", { workspaces: { packages: ["libs/*", "!libs/legacy"] } });
        write("libs/a/package.json", { name: "a" });
        write("libs/legacy/package.json", { name: "legacy" });

        const snapshot = await model.loadSnapshot(root);

        expect(snapshot.units.map(u => u.id)).toEqual(["a"]);
    });

    it("falls back to the directory for duplicate package names", async () => {
        write("package.json", { workspaces: ["libs/*"] });
        write("libs/a/package.json", { name: "dup" });
        write("libs/b/package.json", { name: "dup" });

        const snapshot = await model.loadSnapshot(root);

        expect(snapshot.units.map(u => u.id)).toEqual(["dup", "libs/b"]);
    });

    it("treats a root without workspaces as a single unit", async () => {
        write("package.json", { dependencies: { zod: "^3.23.8" } });
        write("src/index.ts", "");
        write("test/util.test.ts", "");
        write("README.md", "");

        const snapshot = await model.loadSnapshot(root);

        expect(snapshot.units).toEqual([{
            id: path.basename(root),
            name: path.basename(root),
            language: "typescript",
            rootDir: root,
            documents: [abs("src/index.ts"), abs("test/util.test.ts")],
            references: [],
            externalReferenceCount: 1
        }]);
    });

    describe("load failures", () => {
        it("rejects a missing directory", async () => {
            const missing = abs("missing");

            await expect(model.loadSnapshot(missing)).rejects.toThrow(
                new WorkspaceLoadError(missing, "path does not exist").message
            );
        });

        it("rejects a file path", async () => {
            write("notes.txt", "");

            await expect(model.loadSnapshot(abs("notes.txt"))).rejects.toThrow("path is not a directory");
        });

        it("requires a package.json", async () => {
            await expect(model.loadSnapshot(root)).rejects.toBeInstanceOf(WorkspaceLoadError);
            await expect(model.loadSnapshot(root)).rejects.toThrow("package.json not found");
        });

        it("rejects invalid JSON", async () => {
            write("package.json", "{ not json");

            await expect(model.loadSnapshot(root)).rejects.toThrow("package.json is not valid JSON");
        });

        it("rejects a manifest with the wrong shape", async () => {
            write("package.json", { name: 42 });

            await expect(model.loadSnapshot(root)).rejects.toThrow("package.json is malformed");
        });
    });
});
