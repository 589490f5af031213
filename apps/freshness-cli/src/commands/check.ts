/**
 * freshness check — evaluate a dataset file and report stale entries.
 *
 * Exit codes: 0 = no stale entries, 1 = stale entries found, 2 = error.
 */

import type { Command } from "commander";
import { InMemoryEventBus, checkDataset } from "@freshness/core";
import { exportReport, loadDataset } from "../io/dataset.js";
import { formatAlerts } from "../format/report.js";
import {
    EXIT_OK,
    EXIT_STALE,
    failCommand,
    parseCountOption,
    parseNumberOption,
    type CliContext,
} from "./context.js";

interface CheckOptions {
    threshold: string;
    topic: string;
    verbose?: boolean;
    maxAlerts: string;
    output?: string;
    now?: string;
}

export function registerCheckCommand(program: Command, context: CliContext): void {
    const { config, chalk } = context;

    program
        .command("check <dataset>")
        .description("Check a JSON or JSONL dataset for stale entries")
        .option("-T, --threshold <threshold>", "Staleness threshold, 0.0 - 1.0", String(config.threshold))
        .option("-p, --topic <topic>", "Decay policy topic", config.topic)
        .option("-v, --verbose", "List stale entries and skipped records")
        .option("--max-alerts <count>", "Stale entries to list with --verbose", String(config.maxAlerts))
        .option("-o, --output <file>", "Export the full report as JSON")
        .option("--now <date>", "Reference instant (default: current time)")
        .action((dataset: string, opts: CheckOptions) => {
            try {
                const threshold = parseNumberOption(opts.threshold, "--threshold");
                const maxAlerts = parseCountOption(opts.maxAlerts, "--max-alerts");
                const records = loadDataset(dataset);

                let eventBus: InMemoryEventBus | undefined;
                if (opts.verbose) {
                    eventBus = new InMemoryEventBus({ logger: context.logger });
                    eventBus.subscribe("record:skipped", (event) => {
                        const { index, kind, message } = event.data;
                        context.err(chalk.yellow(`Skipped entry #${index} [${kind}]: ${message}`));
                    });
                }

                const report = checkDataset(records, opts.topic, {
                    threshold,
                    referenceInstant: opts.now,
                    timestampFields : config.timestampFields,
                    confidenceField : config.confidenceField,
                    logger          : context.logger,
                    eventBus,
                });

                context.out(report.summary);

                if (opts.verbose) {
                    const alerts = formatAlerts(report, maxAlerts, chalk);
                    if (alerts) {
                        context.out(alerts);
                    }
                }

                if (opts.output) {
                    exportReport(opts.output, report);
                    context.out("");
                    context.out(chalk.green(`Results exported to ${opts.output}`));
                }

                process.exitCode = report.staleEntries > 0 ? EXIT_STALE : EXIT_OK;
            }
            catch (error) {
                failCommand(context, error);
            }
        });
}
