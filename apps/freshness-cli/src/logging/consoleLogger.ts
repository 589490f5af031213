/**
 * @fileoverview Console logger
 *
 * FreshnessLogger that writes `[LEVEL] message {data}` lines to stderr,
 * dropping messages below the configured level.
 *
 * @module freshness-cli/logging/consoleLogger
 */

import type { FreshnessLogger } from "@freshness/core";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/**
 * Levels from most to least verbose.
 */
export const LOG_LEVELS: readonly LogLevel[] = Object.freeze(["debug", "info", "warn", "error", "silent"]);

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

type MessageLevel = Exclude<LogLevel, "silent">;

function writeToStderr(line: string): void {
    process.stderr.write(`${line}\n`);
}

/**
 * Create a level-filtered logger.
 *
 * @param level - Lowest level that is written (default: "warn")
 * @param write - Line sink (default: stderr)
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger("info");
 * logger.info("Dataset evaluated", { staleEntries: 3 });
 * // [INFO] Dataset evaluated {"staleEntries":3}
 * ```
 */
export function createConsoleLogger(
    level: LogLevel = "warn",
    write: (line: string) => void = writeToStderr
): FreshnessLogger {
    const minimum = LOG_LEVELS.indexOf(level);

    const log = (messageLevel: MessageLevel, message: string, data?: Record<string, unknown>): void => {
        if (LOG_LEVELS.indexOf(messageLevel) < minimum) {
            return;
        }
        const suffix = data === undefined ? "" : ` ${JSON.stringify(data)}`;
        write(`[${messageLevel.toUpperCase()}] ${message}${suffix}`);
    };

    return Object.freeze({
        debug: (message: string, data?: Record<string, unknown>) => log("debug", message, data),
        info : (message: string, data?: Record<string, unknown>) => log("info", message, data),
        warn : (message: string, data?: Record<string, unknown>) => log("warn", message, data),
        error: (message: string, data?: Record<string, unknown>) => log("error", message, data),
    });
}
