import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { WatchFilter } from "../watch/WatchFilter.js";
import { createIgnoreMatcher } from "../config/IgnoreRules.js";
import { PathNormalizer } from "../utils/PathNormalizer.js";

describe("WatchFilter", () => {
    const normalizer = new PathNormalizer(false);

    it("matches include patterns at any depth", () => {
        const filter = new WatchFilter("/ws", ["**/*.ts", "*.json"], undefined, normalizer);

        expect(filter.matches("/ws/index.ts")).toBe(true);
        expect(filter.matches("/ws/packages/a/src/deep/file.ts")).toBe(true);
        expect(filter.matches("/ws/packages/a/package.json")).toBe(true);
        expect(filter.matches("/ws/packages/a/README.md")).toBe(false);
    });

    it("rejects paths outside the root and in excluded directories", () => {
        const filter = new WatchFilter("/ws", ["**/*.ts"], undefined, normalizer);

        expect(filter.isIgnored("/other/index.ts")).toBe(true);
        expect(filter.matches("/ws/dist/index.ts")).toBe(false);
        expect(filter.matches("/ws/packages/a/node_modules/x/index.ts")).toBe(false);
        expect(filter.isIgnored("/ws")).toBe(false);
    });

    it("applies extra ignore patterns", () => {
        const filter = new WatchFilter("/ws", ["**/*.ts"], createIgnoreMatcher(["generated/"]), normalizer);

        expect(filter.matches("/ws/generated/schema.ts")).toBe(false);
        expect(filter.matches("/ws/src/schema.ts")).toBe(true);
    });

    it("accepts every non-ignored file when no patterns are given", () => {
        const filter = new WatchFilter("/ws", [], undefined, normalizer);

        expect(filter.matches("/ws/notes.txt")).toBe(true);
    });

    describe("with ignore files on disk", () => {
        let root: string;

        beforeEach(() => {
            root = fs.mkdtempSync(path.join(os.tmpdir(), "watch-filter-"));
            fs.mkdirSync(path.join(root, "pkg"), { recursive: true });
            fs.writeFileSync(path.join(root, ".gitignore"), "# output\ntmp-output/\n");
            fs.writeFileSync(path.join(root, "pkg", ".gitignore"), "*.gen.ts\n");
        });

        afterEach(() => {
            fs.rmSync(root, { recursive: true, force: true });
        });

        it("scopes nested ignore files to their directory", () => {
            const filter = WatchFilter.load(root, ["**/*.ts"], normalizer);

            expect(filter.matches(path.join(root, "pkg", "api.gen.ts"))).toBe(false);
            expect(filter.matches(path.join(root, "other", "api.gen.ts"))).toBe(true);
            expect(filter.matches(path.join(root, "tmp-output", "x.ts"))).toBe(false);
        });
    });
});
