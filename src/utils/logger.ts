// src/utils/logger.ts
// Console logger for the simulation tooling scripts.
//
// LOG_LEVEL=debug|info|warn|error picks the threshold (default info);
// DEBUG=1 is kept as a shorthand for LOG_LEVEL=debug. Both are read on every
// call so a .env loaded after import still applies.

import type { ToolFailure } from "./errors.js";

const LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
    return LEVELS.some(l => l === value);
}

export function activeLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    if (env.DEBUG === "1") return "debug";
    const requested = env.LOG_LEVEL?.trim().toLowerCase() ?? "";
    return isLogLevel(requested) ? requested : "info";
}

function enabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(activeLogLevel());
}

export const logger = {
    debug: (...args: unknown[]) => {
        if (enabled("debug")) console.log("[debug]", ...args);
    },
    info: (...args: unknown[]) => {
        if (enabled("info")) console.log("[info]", ...args);
    },
    // errors always print
    error: (...args: unknown[]) => console.error("[error]", ...args),
};

export function logFailure(failure: ToolFailure): void {
    logger.error(failure.message);

    const parts: string[] = [`kind=${failure.kind}`];
    if (failure.path) parts.push(`path=${failure.path}`);
    logger.debug(parts.join(" | "));
}
