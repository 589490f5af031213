/**
 * @fileoverview Terminal formatting
 *
 * Renders calculation results, stale-entry alerts, the policy catalog
 * and the demo as plain lines. Colour comes from the chalk instance
 * passed in, so callers (and tests) decide whether it is applied.
 *
 * @module format/report
 */

import type { ChalkInstance } from "chalk";
import {
    describeStatus,
    formatPercent,
    halfLifeDays,
    type DatasetReport,
    type DecayPolicy,
    type FreshnessResult,
    type FreshnessStatus,
    type ResolvedDecayParameters,
} from "@freshness/core";

const kRULE = "=".repeat(50);
const kWIDE_RULE = "=".repeat(70);

const kSTATUS_LABELS: Readonly<Record<FreshnessStatus, string>> = {
    fresh: "FRESH",
    ok   : "OK",
    aging: "CAUTION",
    stale: "WARNING",
};

function colorStatus(status: FreshnessStatus, text: string, chalk: ChalkInstance): string {
    switch (status) {
        case "fresh":
        case "ok":
            return chalk.green(text);
        case "aging":
            return chalk.yellow(text);
        case "stale":
            return chalk.red(text);
    }
}

/**
 * Status line, e.g. "WARNING: Data is STALE (< 30% confidence)".
 */
export function formatStatusLine(status: FreshnessStatus, chalk: ChalkInstance): string {
    return colorStatus(status, `${kSTATUS_LABELS[status]}: ${describeStatus(status)}`, chalk);
}

/**
 * Render a single-point calculation.
 *
 * @param result - Calculation result
 * @param parameters - Parameters the result was computed with
 * @param rawTimestamp - Timestamp as the user typed it
 */
export function formatCalculation(
    result: FreshnessResult,
    parameters: ResolvedDecayParameters,
    rawTimestamp: string,
    chalk: ChalkInstance
): string {
    return [
        chalk.bold("Freshness Analysis"),
        kRULE,
        `Initial confidence: ${formatPercent(result.initialConfidence)}`,
        `Capture timestamp:  ${rawTimestamp}`,
        `Age:                ${result.ageDays.toFixed(1)} days`,
        `Topic type:         ${result.topicId}`,
        `Decay policy:       ${parameters.displayName}`,
        `Decay rate (λ):     ${result.lambdaPerDay.toFixed(4)} per day`,
        `Floor:              ${formatPercent(result.floor)}`,
        kRULE,
        `Current confidence: ${chalk.bold(formatPercent(result.currentConfidence))}`,
        formatStatusLine(result.status, chalk),
    ].join("\n");
}

/**
 * Render up to `maxAlerts` stale entries. Empty when there are none.
 */
export function formatAlerts(report: DatasetReport, maxAlerts: number, chalk: ChalkInstance): string {
    if (report.alerts.length === 0) {
        return "";
    }

    const lines = ["", kRULE, chalk.red("STALE ENTRIES:"), kRULE];
    for (const alert of report.alerts.slice(0, maxAlerts)) {
        lines.push(
            "",
            `Entry #${alert.index}:`,
            `  Timestamp:  ${alert.timestamp}`,
            `  Age:        ${alert.ageDays.toFixed(1)} days`,
            `  Confidence: ${formatPercent(alert.confidence)}`,
            `  Reason:     ${alert.reason}`
        );
    }

    const remaining = report.alerts.length - maxAlerts;
    if (remaining > 0) {
        lines.push("", `... and ${remaining} more stale entries`);
    }

    return lines.join("\n");
}

function formatHalfLife(policy: DecayPolicy): string {
    const days = halfLifeDays(policy);
    return Number.isFinite(days) ? `${days.toFixed(1)} days` : "never";
}

/**
 * Render the policy catalog.
 */
export function formatPolicies(policies: readonly DecayPolicy[], chalk: ChalkInstance): string {
    const lines = [chalk.bold("Available Decay Policies"), kWIDE_RULE];

    for (const policy of policies) {
        lines.push(
            "",
            chalk.cyan(policy.topicId.toUpperCase()),
            `  Name:        ${policy.displayName}`,
            `  Decay rate:  ${policy.lambdaPerDay.toFixed(4)} per day`,
            `  Floor:       ${formatPercent(policy.floor)}`,
            `  Half-life:   ${formatHalfLife(policy)}`,
            `  Description: ${policy.description}`
        );
    }

    lines.push("", kWIDE_RULE, "Usage: freshness calculate --topic <policy_name> ...");
    return lines.join("\n");
}

/**
 * One evaluated demo sample.
 */
export interface DemoEntry {
    readonly label: string;
    readonly timestamp: string;
    readonly result: FreshnessResult;
}

/**
 * Render the demo samples.
 */
export function formatDemo(entries: readonly DemoEntry[], chalk: ChalkInstance): string {
    const lines = [chalk.bold("Freshness Demo"), kWIDE_RULE];

    for (const { label, timestamp, result } of entries) {
        lines.push(
            "",
            `${label}:`,
            `  Timestamp:  ${timestamp}`,
            `  Age:        ${result.ageDays.toFixed(0)} days`,
            `  Topic:      ${result.topicId}`,
            `  Initial:    ${formatPercent(result.initialConfidence)}`,
            `  Current:    ${formatPercent(result.currentConfidence)}`,
            `  Status:     ${colorStatus(result.status, result.status.toUpperCase(), chalk)}`
        );
    }

    lines.push("", kWIDE_RULE, "Try: freshness check <your_dataset.json>");
    return lines.join("\n");
}
