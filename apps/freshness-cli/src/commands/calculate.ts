/**
 * freshness calculate — current confidence of a single data point.
 *
 * Exit codes: 0 = done, 2 = error.
 */

import type { Command } from "commander";
import { calculate, resolveDecayParameters } from "@freshness/core";
import { formatCalculation } from "../format/report.js";
import {
    EXIT_OK,
    failCommand,
    parseNumberOption,
    parseOptionalNumber,
    type CliContext,
} from "./context.js";

interface CalculateOptions {
    timestamp: string;
    confidence: string;
    topic: string;
    lambda?: string;
    floor?: string;
    now?: string;
}

export function registerCalculateCommand(program: Command, context: CliContext): void {
    program
        .command("calculate")
        .description("Calculate the current confidence of a single data point")
        .requiredOption("-t, --timestamp <timestamp>", "Capture timestamp (e.g. 2024-01-01)")
        .option("-c, --confidence <confidence>", "Initial confidence, 0.0 - 1.0", "1.0")
        .option("-p, --topic <topic>", "Decay policy topic", context.config.topic)
        .option("--lambda <rate>", "Custom decay rate per day")
        .option("--floor <floor>", "Custom minimum confidence, 0.0 - 1.0")
        .option("--now <date>", "Reference instant (default: current time)")
        .action((opts: CalculateOptions) => {
            try {
                const overrides = {
                    customLambda: parseOptionalNumber(opts.lambda, "--lambda"),
                    customFloor : parseOptionalNumber(opts.floor, "--floor"),
                };
                const initialConfidence = parseNumberOption(opts.confidence, "--confidence");
                const parameters = resolveDecayParameters(opts.topic, overrides);
                const result = calculate(initialConfidence, opts.timestamp, opts.topic, {
                    ...overrides,
                    referenceInstant: opts.now,
                });

                context.logger.debug("Calculated freshness", {
                    topicId          : result.topicId,
                    ageDays          : result.ageDays,
                    currentConfidence: result.currentConfidence,
                });
                context.out(formatCalculation(result, parameters, opts.timestamp, context.chalk));
                process.exitCode = EXIT_OK;
            }
            catch (error) {
                failCommand(context, error);
            }
        });
}
