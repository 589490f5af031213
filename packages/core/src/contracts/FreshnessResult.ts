/**
 * Freshness Result Contract
 *
 * Output of one calculation, and the dataset-level report that
 * aggregates many of them.
 */

import type { DecayOverrides, ResolvedDecayParameters, TopicId } from "./DecayPolicy.js";
import type { FreshnessErrorKind } from "./errors.js";
import type { FreshnessStatus } from "./FreshnessStatus.js";

/**
 * Result of a single freshness calculation.
 */
export interface FreshnessResult {
    readonly initialConfidence: number;

    /** Decayed confidence, never below `floor` */
    readonly currentConfidence: number;

    /** Fractional days between capture and reference, >= 0 */
    readonly ageDays: number;

    readonly topicId: TopicId;
    readonly lambdaPerDay: number;
    readonly floor: number;

    /** Threshold the staleness flag was computed against */
    readonly threshold: number;

    /** currentConfidence < threshold */
    readonly isStale: boolean;

    /** Display band of currentConfidence */
    readonly status: FreshnessStatus;

    readonly capturedAt: Date;
    readonly referenceInstant: Date;
}

/**
 * Options shared by single-record calculations.
 */
export interface CalculationOptions extends DecayOverrides {
    /** The "now" to age against (default: current time) */
    readonly referenceInstant?: Date | string;

    /** Staleness threshold (default: 0.3) */
    readonly threshold?: number;
}

/**
 * Alert raised for each stale dataset entry.
 */
export interface StaleAlert {
    /** 0-based position in the input */
    readonly index: number;

    /** Raw timestamp value as text */
    readonly timestamp: string;

    /** Parsed capture instant (ISO) */
    readonly capturedAt: string;

    /** Age in days, rounded to 0.1 */
    readonly ageDays: number;

    /** Current confidence, rounded to 0.001 */
    readonly confidence: number;

    readonly reason: string;
}

/**
 * A record excluded from aggregation.
 */
export interface RecordError {
    readonly index: number;
    readonly kind: FreshnessErrorKind;
    readonly message: string;
}

/**
 * Dataset-level evaluation report.
 *
 * Invariants:
 * - staleEntries === staleIndices.length === alerts.length
 * - freshEntries + staleEntries === evaluatedEntries
 * - evaluatedEntries + skippedEntries === totalEntries
 * - staleIndices ascending, in input order
 */
export interface DatasetReport {
    readonly totalEntries: number;
    readonly evaluatedEntries: number;
    readonly freshEntries: number;
    readonly staleEntries: number;
    readonly skippedEntries: number;
    readonly staleIndices: readonly number[];

    /** Mean of post-floor confidences, 0 when nothing was evaluated */
    readonly averageConfidence: number;
    readonly minConfidence: number;
    readonly maxConfidence: number;

    readonly alerts: readonly StaleAlert[];
    readonly errors: readonly RecordError[];

    /** Parameters of the dataset's topic */
    readonly policy: ResolvedDecayParameters;
    readonly threshold: number;

    /** ISO timestamp every record was aged against */
    readonly referenceInstant: string;

    /** Human-readable digest */
    readonly summary: string;
}
