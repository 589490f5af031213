/**
 * @fileoverview CLI program
 *
 * Builds the commander program with every command registered against
 * one CliContext.
 *
 * @module program
 */

import { Command } from "commander";
import chalk from "chalk";
import type { FreshnessLogger } from "@freshness/core";
import { resolveCliConfig, type CliConfig } from "./config/index.js";
import { createConsoleLogger } from "./logging/consoleLogger.js";
import {
    registerCalculateCommand,
    registerCheckCommand,
    registerDemoCommand,
    registerPoliciesCommand,
    type CliContext,
} from "./commands/index.js";

export const VERSION = "0.1.0";

/**
 * Context for a real run: configuration from the environment, a stderr
 * logger at the configured level, colours as the terminal supports them.
 */
export function createDefaultContext(env: NodeJS.ProcessEnv = process.env): CliContext {
    const bootstrapLogger: FreshnessLogger = createConsoleLogger("warn");
    const config: CliConfig = resolveCliConfig(env, bootstrapLogger);

    return {
        config,
        logger: createConsoleLogger(config.logLevel),
        chalk,
        out   : (line) => {
            process.stdout.write(`${line}\n`);
        },
        err: (line) => {
            process.stderr.write(`${line}\n`);
        },
    };
}

/**
 * Create the program. Commander errors (unknown command, missing
 * option) are thrown as CommanderError instead of exiting the process.
 */
export function createProgram(context: CliContext = createDefaultContext()): Command {
    const program = new Command();

    program
        .name("freshness")
        .description("Detect stale data with topic-aware confidence decay")
        .version(VERSION)
        .exitOverride()
        .configureOutput({
            writeOut: (text) => context.out(text.trimEnd()),
            writeErr: (text) => context.err(text.trimEnd()),
        });

    registerCalculateCommand(program, context);
    registerCheckCommand(program, context);
    registerPoliciesCommand(program, context);
    registerDemoCommand(program, context);

    return program;
}
