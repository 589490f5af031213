/**
 * freshness policies — list the decay policy catalog.
 */

import type { Command } from "commander";
import { listPolicies } from "@freshness/core";
import { formatPolicies } from "../format/report.js";
import { EXIT_OK, type CliContext } from "./context.js";

export function registerPoliciesCommand(program: Command, context: CliContext): void {
    program
        .command("policies")
        .description("List available decay policies")
        .action(() => {
            context.out(formatPolicies(listPolicies(), context.chalk));
            process.exitCode = EXIT_OK;
        });
}
