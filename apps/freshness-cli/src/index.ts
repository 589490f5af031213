#!/usr/bin/env -S node --import tsx
/**
 * @fileoverview Freshness CLI - Main Entry Point
 *
 * Usage:
 *   freshness calculate -t 2024-01-01 -c 0.9 -p ai_training
 *   freshness check dataset.jsonl -p news -T 0.4 -v
 *   freshness policies
 *   freshness demo
 *
 * @module freshness-cli
 */

// Load .env before the configuration is resolved
import "dotenv/config";

import { CommanderError } from "commander";
import { createProgram } from "./program.js";
import { EXIT_ERROR, EXIT_OK, formatError } from "./commands/index.js";

async function main(): Promise<void> {
    const program = createProgram();

    try {
        await program.parseAsync(process.argv);
    }
    catch (error) {
        if (error instanceof CommanderError) {
            // Commander has already printed the message
            process.exitCode = error.exitCode === 0 ? EXIT_OK : EXIT_ERROR;
            return;
        }
        throw error;
    }
}

main().catch((error: unknown) => {
    process.stderr.write(`${formatError(error)}\n`);
    process.exitCode = EXIT_ERROR;
});
