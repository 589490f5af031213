/**
 * @fileoverview Dataset Evaluator
 *
 * Evaluates a sequence of generic records and aggregates the results
 * into a DatasetReport.
 *
 * Pipeline, per record in input order:
 * 1. Normalize (timestamp, initial confidence)
 * 2. Calculate current confidence
 * 3. Accumulate mean/min/max, flag stale entries
 *
 * A record that cannot be normalized is skipped and reported in
 * `errors`; the rest of the dataset is still evaluated. An unknown
 * topic aborts the whole batch, since it would affect every record.
 *
 * @module @freshness/core/evaluator/DatasetEvaluator
 */

import type { DecayOverrides, ResolvedDecayParameters, TopicId } from "../contracts/DecayPolicy.js";
import type { DatasetReport, RecordError, StaleAlert } from "../contracts/FreshnessResult.js";
import type { FreshnessRecord } from "../contracts/FreshnessRecord.js";
import type { EventBus } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import { isRecordLevelError } from "../contracts/errors.js";
import { noopLogger, type FreshnessLogger } from "../contracts/Logger.js";
import {
    DEFAULT_THRESHOLD,
    assertThreshold,
    evaluateDecay,
    resolveDecayParameters,
    resolveReferenceInstant,
} from "../calculator/FreshnessCalculator.js";
import { DEFAULT_TOPIC } from "../policies/PolicyCatalog.js";
import {
    assertConfidence,
    isDataRecord,
    normalizeRecord,
    type NormalizeOptions,
} from "../normalizer/RecordNormalizer.js";

/**
 * Options for evaluating a dataset.
 */
export interface DatasetOptions extends NormalizeOptions, DecayOverrides {
    /** Entries below this confidence are stale (default: 0.3) */
    readonly threshold?: number;

    /** The "now" every record is aged against (default: current time) */
    readonly referenceInstant?: Date | string;

    /** Diagnostics sink (default: discard) */
    readonly logger?: FreshnessLogger;

    /** Receives evaluation events */
    readonly eventBus?: EventBus;
}

/**
 * Options for in-memory batch checks.
 */
export interface BatchOptions extends DatasetOptions {
    /** Topic for every record without its own (default: "ai_training") */
    readonly topicType?: TopicId;

    /**
     * Field carrying a per-record topic. When a record has a non-empty
     * string there, it is evaluated under that topic instead.
     */
    readonly topicField?: string;
}

const kSEPARATOR = "=".repeat(50);

/**
 * Generate a run id shared by the events of one evaluation.
 */
function generateRunId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `ev_${timestamp}_${random}`;
}

/**
 * Format a 0..1 ratio as a percentage, e.g. `0.15` as `"15.0%"`.
 */
export function formatPercent(value: number, digits = 1): string {
    return `${(value * 100).toFixed(digits)}%`;
}

function round(value: number, digits: number): number {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
}

function describeRawTimestamp(raw: unknown): string {
    return raw instanceof Date ? raw.toISOString() : String(raw);
}

/**
 * Running totals for one evaluation pass.
 */
interface Accumulator {
    evaluated: number;
    sum: number;
    min: number;
    max: number;
    staleIndices: number[];
    alerts: StaleAlert[];
    errors: RecordError[];
}

/**
 * Build the human-readable digest of a report.
 */
export function buildSummary(
    report: Omit<DatasetReport, "summary">
): string {
    const total = Math.max(1, report.totalEntries);

    return [
        "Dataset Analysis Results",
        kSEPARATOR,
        `Total entries: ${report.totalEntries}`,
        `Fresh entries: ${report.freshEntries} (${formatPercent(report.freshEntries / total)})`,
        `Stale entries: ${report.staleEntries} (${formatPercent(report.staleEntries / total)})`,
        `Skipped entries: ${report.skippedEntries} (${formatPercent(report.skippedEntries / total)})`,
        `Average confidence: ${formatPercent(report.averageConfidence)}`,
        `Confidence range: ${formatPercent(report.minConfidence)} - ${formatPercent(report.maxConfidence)}`,
        `Decay policy: ${report.policy.displayName}`,
        `Threshold: ${formatPercent(report.threshold, 0)}`,
        `Alerts: ${report.alerts.length} entries need review`,
    ].join("\n");
}

/**
 * Core fold shared by checkDataset and batchCheck.
 */
function evaluate(
    records: readonly unknown[],
    topicType: TopicId,
    options: BatchOptions
): DatasetReport {
    const logger = options.logger ?? noopLogger;
    const threshold = assertThreshold(options.threshold ?? DEFAULT_THRESHOLD);
    if (options.defaultConfidence !== undefined) {
        assertConfidence(options.defaultConfidence);
    }
    const overrides: DecayOverrides = {
        customLambda: options.customLambda,
        customFloor : options.customFloor,
    };

    // Fails fast on an unknown topic, before any record is read
    const datasetPolicy = resolveDecayParameters(topicType, overrides);
    const reference = resolveReferenceInstant(options.referenceInstant);
    const runId = generateRunId();

    const policyCache = new Map<TopicId, ResolvedDecayParameters>([[topicType, datasetPolicy]]);
    const policyFor = (record: unknown): ResolvedDecayParameters => {
        const own = options.topicField && isDataRecord(record) ? record[options.topicField] : undefined;
        if (typeof own !== "string" || own.trim() === "") {
            return datasetPolicy;
        }
        let resolved = policyCache.get(own);
        if (!resolved) {
            resolved = resolveDecayParameters(own, overrides);
            policyCache.set(own, resolved);
        }
        return resolved;
    };

    logger.info("Evaluating dataset", {
        runId,
        topicId     : datasetPolicy.topicId,
        totalEntries: records.length,
        threshold,
    });
    options.eventBus?.emit(createEvent("dataset:started", {
        topicId         : datasetPolicy.topicId,
        totalEntries    : records.length,
        threshold,
        referenceInstant: reference.toISOString(),
    }, runId));

    const acc: Accumulator = {
        evaluated   : 0,
        sum         : 0,
        min         : Infinity,
        max         : -Infinity,
        staleIndices: [],
        alerts      : [],
        errors      : [],
    };

    const normalizeOrSkip = (record: unknown, index: number): FreshnessRecord | null => {
        try {
            return normalizeRecord(record, options);
        }
        catch (error) {
            if (!isRecordLevelError(error)) {
                throw error;
            }

            acc.errors.push(Object.freeze({ index, kind: error.kind, message: error.message }));
            logger.debug("Skipping record", { runId, index, kind: error.kind, error: error.message });
            options.eventBus?.emit(createEvent("record:skipped", {
                index,
                kind   : error.kind,
                message: error.message,
            }, runId));
            return null;
        }
    };

    records.forEach((record, index) => {
        const normalized = normalizeOrSkip(record, index);
        if (!normalized) {
            return;
        }

        const parameters = policyFor(record);
        const result = evaluateDecay(
            normalized.initialConfidence,
            normalized.capturedAt,
            reference,
            parameters,
            threshold
        );

        acc.evaluated += 1;
        acc.sum += result.currentConfidence;
        acc.min = Math.min(acc.min, result.currentConfidence);
        acc.max = Math.max(acc.max, result.currentConfidence);

        if (result.isStale) {
            acc.staleIndices.push(index);
            acc.alerts.push(Object.freeze({
                index,
                timestamp : describeRawTimestamp(normalized.rawTimestamp),
                capturedAt: normalized.capturedAt.toISOString(),
                ageDays   : round(result.ageDays, 1),
                confidence: round(result.currentConfidence, 3),
                reason    : `Confidence ${formatPercent(result.currentConfidence)} below threshold ${formatPercent(threshold, 0)}`,
            }));
        }

        options.eventBus?.emit(createEvent("record:evaluated", {
            index,
            topicId          : result.topicId,
            currentConfidence: result.currentConfidence,
            ageDays          : result.ageDays,
            isStale          : result.isStale,
        }, runId));
    });

    const hasResults = acc.evaluated > 0;
    const partial: Omit<DatasetReport, "summary"> = {
        totalEntries     : records.length,
        evaluatedEntries : acc.evaluated,
        freshEntries     : acc.evaluated - acc.staleIndices.length,
        staleEntries     : acc.staleIndices.length,
        skippedEntries   : acc.errors.length,
        staleIndices     : Object.freeze(acc.staleIndices),
        averageConfidence: hasResults ? acc.sum / acc.evaluated : 0,
        minConfidence    : hasResults ? acc.min : 0,
        maxConfidence    : hasResults ? acc.max : 0,
        alerts           : Object.freeze(acc.alerts),
        errors           : Object.freeze(acc.errors),
        policy           : datasetPolicy,
        threshold,
        referenceInstant : reference.toISOString(),
    };
    const report: DatasetReport = Object.freeze({ ...partial, summary: buildSummary(partial) });

    logger.info("Dataset evaluated", {
        runId,
        evaluatedEntries : report.evaluatedEntries,
        staleEntries     : report.staleEntries,
        skippedEntries   : report.skippedEntries,
        averageConfidence: report.averageConfidence,
    });
    options.eventBus?.emit(createEvent("dataset:completed", {
        evaluatedEntries : report.evaluatedEntries,
        staleEntries     : report.staleEntries,
        skippedEntries   : report.skippedEntries,
        averageConfidence: report.averageConfidence,
    }, runId));

    return report;
}

/**
 * Analyze an already-decoded dataset (from a JSON or JSONL file) for
 * stale entries under a single topic.
 *
 * @param records - Decoded records, in file order
 * @param topicType - Decay policy topic (default: "ai_training")
 * @param options - Threshold, reference instant, field names, overrides
 * @throws UnknownPolicyError if the topic is unknown and not fully overridden
 * @throws InvalidThresholdError if the threshold is outside [0, 1]
 *
 * @example
 * ```typescript
 * const report = checkDataset(records, "news", { threshold: 0.4 });
 * console.log(report.summary);
 * ```
 */
export function checkDataset(
    records: readonly unknown[],
    topicType: TopicId = DEFAULT_TOPIC,
    options: DatasetOptions = {}
): DatasetReport {
    return evaluate(records, topicType, options);
}

/**
 * Check an in-memory list of records for staleness. Useful inside
 * data pipelines.
 *
 * @example
 * ```typescript
 * const report = batchCheck([
 *     { text: "Example", timestamp: "2025-01-01", confidence: 0.9 },
 *     { text: "Another", timestamp: "2023-01-01", confidence: 0.8 },
 * ], { threshold: 0.5, referenceInstant: "2025-01-02" });
 *
 * report.staleIndices; // [1]
 * ```
 */
export function batchCheck(
    records: readonly unknown[],
    options: BatchOptions = {}
): DatasetReport {
    return evaluate(records, options.topicType ?? DEFAULT_TOPIC, options);
}
