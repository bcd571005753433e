import util from "util";

// stdout carries JSON-RPC frames; anything else printed there corrupts the stream.
const ALLOW_STDOUT_LOGS = process.env.WORKSPACE_SESSION_ALLOW_STDOUT_LOGS === "true";
const DEBUG_LOGS_ENABLED = process.env.WORKSPACE_SESSION_DEBUG === "true";

if (!ALLOW_STDOUT_LOGS) {
    const redirect = (level: "info" | "debug") => (...args: unknown[]) => {
        if (level === "debug" && !DEBUG_LOGS_ENABLED) {
            return;
        }
        process.stderr.write(util.format(...args) + "\n");
    };

    console.log = redirect("info");
    console.info = redirect("info");
    console.debug = redirect("debug");
}
