/**
 * freshness demo — evaluate a handful of sample data points.
 *
 * Exit codes: 0 = done, 2 = error.
 */

import type { Command } from "commander";
import { calculate, type TopicId } from "@freshness/core";
import { formatDemo, type DemoEntry } from "../format/report.js";
import { EXIT_OK, failCommand, type CliContext } from "./context.js";

interface DemoSample {
    readonly label: string;
    readonly timestamp: string;
    readonly confidence: number;
    readonly topicId: TopicId;
}

export const DEMO_SAMPLES: readonly DemoSample[] = Object.freeze([
    { label: "Recent AI training data", timestamp: "2025-12-01", confidence: 0.95, topicId: "ai_training" },
    { label: "6-month-old AI training data", timestamp: "2024-06-01", confidence: 0.90, topicId: "ai_training" },
    { label: "2-year-old AI training data", timestamp: "2023-01-01", confidence: 0.85, topicId: "ai_training" },
    { label: "Recent news", timestamp: "2025-12-01", confidence: 0.90, topicId: "news" },
    { label: "1-year-old news", timestamp: "2024-01-01", confidence: 0.90, topicId: "news" },
    { label: "Historical fact", timestamp: "2020-01-01", confidence: 0.95, topicId: "history" },
]);

export function registerDemoCommand(program: Command, context: CliContext): void {
    program
        .command("demo")
        .description("Run a quick demonstration on sample data points")
        .option("--now <date>", "Reference instant (default: current time)")
        .action((opts: { now?: string }) => {
            try {
                const entries: DemoEntry[] = DEMO_SAMPLES.map((sample) => ({
                    label    : sample.label,
                    timestamp: sample.timestamp,
                    result   : calculate(sample.confidence, sample.timestamp, sample.topicId, {
                        referenceInstant: opts.now,
                    }),
                }));

                context.out(formatDemo(entries, context.chalk));
                process.exitCode = EXIT_OK;
            }
            catch (error) {
                failCommand(context, error);
            }
        });
}
