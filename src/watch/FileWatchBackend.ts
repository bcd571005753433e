import * as chokidar from "chokidar";
import type { FileChangeKind } from "../types.js";

export interface WatchEvent {
    kind: FileChangeKind;
    path: string;
}

export interface WatchSubscription {
    close(): Promise<void>;
}

export interface WatchSubscribeOptions {
    ignored: (absolutePath: string) => boolean;
}

export interface FileWatchBackend {
    /**
     * Resolves once the watch is established. Errors raised after that point
     * are reported through `onError`.
     */
    subscribe(
        rootPath: string,
        options: WatchSubscribeOptions,
        onEvent: (event: WatchEvent) => void,
        onError: (error: unknown) => void
    ): Promise<WatchSubscription>;
}

export class ChokidarWatchBackend implements FileWatchBackend {
    async subscribe(
        rootPath: string,
        options: WatchSubscribeOptions,
        onEvent: (event: WatchEvent) => void,
        onError: (error: unknown) => void
    ): Promise<WatchSubscription> {
        const watcher = chokidar.watch(rootPath, {
            ignored: (candidate: string) => options.ignored(candidate),
            persistent: true,
            ignoreInitial: true,
            awaitWriteFinish: {
                stabilityThreshold: 100,
                pollInterval: 50
            },
            atomic: true
        });

        watcher
            .on("add", file => onEvent({ kind: "add", path: file }))
            .on("change", file => onEvent({ kind: "change", path: file }))
            .on("unlink", file => onEvent({ kind: "unlink", path: file }));

        try {
            await new Promise<void>((resolve, reject) => {
                const onReady = () => {
                    watcher.off("error", onSetupError);
                    resolve();
                };
                const onSetupError = (error: unknown) => {
                    watcher.off("ready", onReady);
                    reject(error);
                };
                watcher.once("ready", onReady);
                watcher.once("error", onSetupError);
            });
        } catch (error) {
            await watcher.close();
            throw error;
        }

        watcher.on("error", error => onError(error));
        return {
            close: () => watcher.close()
        };
    }
}
