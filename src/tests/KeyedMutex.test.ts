import { KeyedMutex } from "../utils/KeyedMutex.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>(r => {
        resolve = () => r();
    });
    return { promise, resolve };
}

describe("KeyedMutex", () => {
    it("runs tasks under the same key one at a time in arrival order", async () => {
        const mutex = new KeyedMutex();
        const gate = deferred();
        const events: string[] = [];

        const first = mutex.runExclusive("s1", async () => {
            events.push("first:start");
            await gate.promise;
            events.push("first:end");
        });
        const second = mutex.runExclusive("s1", async () => {
            events.push("second:start");
        });

        await Promise.resolve();
        expect(mutex.isLocked("s1")).toBe(true);
        expect(mutex.pending("s1")).toBe(1);

        gate.resolve();
        await Promise.all([first, second]);

        expect(events).toEqual(["first:start", "first:end", "second:start"]);
        expect(mutex.isLocked("s1")).toBe(false);
    });

    it("does not block tasks under other keys", async () => {
        const mutex = new KeyedMutex();
        const gate = deferred();

        const blocked = mutex.runExclusive("s1", () => gate.promise);
        const other = await mutex.runExclusive("s2", async () => "done");

        expect(other).toBe("done");
        gate.resolve();
        await blocked;
    });

    it("releases the lock when a task throws", async () => {
        const mutex = new KeyedMutex();

        await expect(mutex.runExclusive("s1", async () => {
            throw new Error("boom");
        })).rejects.toThrow("boom");

        await expect(mutex.runExclusive("s1", async () => 42)).resolves.toBe(42);
        expect(mutex.isLocked("s1")).toBe(false);
    });
});
