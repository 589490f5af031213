/**
 * @fileoverview Command context
 *
 * What every command needs from its surroundings: configuration, a
 * logger, a chalk instance and somewhere to write. Tests pass their own.
 *
 * @module commands/context
 */

import type { ChalkInstance } from "chalk";
import { FreshnessError, type FreshnessLogger } from "@freshness/core";
import type { CliConfig } from "../config/index.js";
import { CliError, InvalidOptionError } from "../errors.js";

export interface CliContext {
    readonly config: CliConfig;
    readonly logger: FreshnessLogger;
    readonly chalk: ChalkInstance;

    /** Write one line of regular output */
    out(line: string): void;

    /** Write one line of diagnostics */
    err(line: string): void;
}

/**
 * Exit codes shared by all commands.
 */
export const EXIT_OK = 0;
export const EXIT_STALE = 1;
export const EXIT_ERROR = 2;

/**
 * Render an error as "Error [kind]: message".
 */
export function formatError(error: unknown): string {
    if (error instanceof FreshnessError || error instanceof CliError) {
        return `Error [${error.kind}]: ${error.message}`;
    }
    return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Report a failed command and set the error exit code.
 */
export function failCommand(context: CliContext, error: unknown): void {
    context.err(context.chalk.red(formatError(error)));
    process.exitCode = EXIT_ERROR;
}

/**
 * Parse a numeric option value.
 *
 * @throws InvalidOptionError if the text is not a finite number
 */
export function parseNumberOption(value: string, option: string): number {
    const parsed = Number(value);
    if (value.trim() === "" || !Number.isFinite(parsed)) {
        throw new InvalidOptionError(option, value, "a number");
    }
    return parsed;
}

export function parseOptionalNumber(value: string | undefined, option: string): number | undefined {
    return value === undefined ? undefined : parseNumberOption(value, option);
}

/**
 * Parse a non-negative integer option value.
 */
export function parseCountOption(value: string, option: string): number {
    const parsed = parseNumberOption(value, option);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidOptionError(option, value, "a non-negative integer");
    }
    return parsed;
}
