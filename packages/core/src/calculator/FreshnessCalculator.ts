/**
 * @fileoverview Freshness Calculator
 *
 * Current confidence of a data point under exponential decay with a
 * floor:
 *
 *     C(t) = max(floor, C0 * e^(-lambda * t))
 *
 * - C0: initial confidence
 * - lambda: decay rate per day
 * - t: age in days (future captures count as age 0)
 * - floor: minimum confidence
 *
 * Pure functions of their inputs and the policy catalog.
 *
 * @module @freshness/core/calculator/FreshnessCalculator
 */

import type {
    DecayOverrides,
    ResolvedDecayParameters,
    TopicId,
} from "../contracts/DecayPolicy.js";
import type { CalculationOptions, FreshnessResult } from "../contracts/FreshnessResult.js";
import { InvalidPolicyError, InvalidThresholdError } from "../contracts/errors.js";
import { classifyFreshness } from "../contracts/FreshnessStatus.js";
import { DEFAULT_TOPIC, getPolicy } from "../policies/PolicyCatalog.js";
import { assertConfidence } from "../normalizer/RecordNormalizer.js";
import { parseTimestamp } from "../normalizer/timestamps.js";

export const MS_PER_DAY = 86_400_000;

/**
 * Default staleness threshold.
 */
export const DEFAULT_THRESHOLD = 0.3;

/**
 * Resolve a reference instant, defaulting to the current time.
 */
export function resolveReferenceInstant(referenceInstant?: Date | string): Date {
    return referenceInstant === undefined ? new Date() : parseTimestamp(referenceInstant, "referenceInstant");
}

/**
 * Validate a staleness threshold.
 *
 * @throws InvalidThresholdError unless it is a finite number in [0, 1]
 */
export function assertThreshold(threshold: number): number {
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
        throw new InvalidThresholdError(threshold);
    }
    return threshold;
}

/**
 * Age in fractional days, clamped at 0.
 *
 * @param capturedAt - Capture instant (Date or parseable string)
 * @param referenceInstant - The "now" to measure against (default: current time)
 *
 * @example
 * ```typescript
 * ageInDays("2025-01-01", "2025-01-31"); // 30
 * ageInDays("2025-02-01", "2025-01-31"); // 0 (future capture)
 * ```
 */
export function ageInDays(capturedAt: Date | string, referenceInstant?: Date | string): number {
    const captured = parseTimestamp(capturedAt, "capturedAt");
    const reference = resolveReferenceInstant(referenceInstant);
    return Math.max(0, (reference.getTime() - captured.getTime()) / MS_PER_DAY);
}

/**
 * Resolve the decay rate and floor for a calculation.
 *
 * Both overrides given: the catalog is bypassed and the topic need not
 * exist. One given: the other comes from the catalog entry.
 *
 * @throws UnknownPolicyError if a catalog lookup is needed and the topic is unknown
 * @throws InvalidPolicyError if an override is out of range
 */
export function resolveDecayParameters(
    topicId: TopicId = DEFAULT_TOPIC,
    overrides: DecayOverrides = {}
): ResolvedDecayParameters {
    const { customLambda, customFloor } = overrides;

    if (customLambda !== undefined && (!Number.isFinite(customLambda) || customLambda < 0)) {
        throw new InvalidPolicyError("lambda", customLambda);
    }
    if (customFloor !== undefined && (!Number.isFinite(customFloor) || customFloor < 0 || customFloor > 1)) {
        throw new InvalidPolicyError("floor", customFloor);
    }

    if (customLambda !== undefined && customFloor !== undefined) {
        return Object.freeze({
            topicId,
            lambdaPerDay: customLambda,
            floor       : customFloor,
            displayName : `Custom decay (${topicId})`,
            source      : "custom",
        });
    }

    const policy = getPolicy(topicId);
    const mixed = customLambda !== undefined || customFloor !== undefined;

    return Object.freeze({
        topicId     : policy.topicId,
        lambdaPerDay: customLambda ?? policy.lambdaPerDay,
        floor       : customFloor ?? policy.floor,
        displayName : mixed ? `${policy.displayName} (custom)` : policy.displayName,
        source      : mixed ? "mixed" : "catalog",
    });
}

/**
 * Apply decay with already-resolved parameters.
 * The result is kept within [floor, 1].
 */
export function applyDecay(
    initialConfidence: number,
    ageDays: number,
    parameters: Pick<ResolvedDecayParameters, "lambdaPerDay" | "floor">
): number {
    const decayed = initialConfidence * Math.exp(-parameters.lambdaPerDay * ageDays);
    return Math.max(parameters.floor, Math.min(1.0, decayed));
}

/**
 * Calculate the freshness of a single data point.
 *
 * @param initialConfidence - Confidence at capture time (0.0 - 1.0)
 * @param capturedAt - Capture instant (Date or parseable string)
 * @param topicId - Decay policy topic (default: "ai_training")
 * @param options - Reference instant, threshold and custom overrides
 * @returns Frozen FreshnessResult
 * @throws InvalidConfidenceError if initialConfidence is outside [0, 1]
 * @throws InvalidTimestampError if capturedAt cannot be parsed
 * @throws UnknownPolicyError if the topic is unknown and not fully overridden
 *
 * @example
 * ```typescript
 * const result = calculate(0.9, "2024-01-01", "ai_training", {
 *     referenceInstant: "2025-01-01",
 * });
 * result.currentConfidence; // 0.15 (decayed to the floor)
 * ```
 */
export function calculate(
    initialConfidence: number,
    capturedAt: Date | string,
    topicId: TopicId = DEFAULT_TOPIC,
    options: CalculationOptions = {}
): FreshnessResult {
    assertConfidence(initialConfidence);
    const threshold = assertThreshold(options.threshold ?? DEFAULT_THRESHOLD);
    const parameters = resolveDecayParameters(topicId, options);

    const captured = parseTimestamp(capturedAt, "capturedAt");
    const reference = resolveReferenceInstant(options.referenceInstant);

    return evaluateDecay(initialConfidence, captured, reference, parameters, threshold);
}

/**
 * Calculate current confidence as a plain number.
 *
 * @see calculate
 */
export function calculateFreshness(
    initialConfidence: number,
    capturedAt: Date | string,
    topicId: TopicId = DEFAULT_TOPIC,
    options: Omit<CalculationOptions, "threshold"> = {}
): number {
    return calculate(initialConfidence, capturedAt, topicId, options).currentConfidence;
}

/**
 * Build a result from validated inputs. Shared with the dataset
 * evaluator, which resolves parameters and the reference once per batch.
 *
 * @internal
 */
export function evaluateDecay(
    initialConfidence: number,
    capturedAt: Date,
    referenceInstant: Date,
    parameters: ResolvedDecayParameters,
    threshold: number
): FreshnessResult {
    const ageDays = Math.max(0, (referenceInstant.getTime() - capturedAt.getTime()) / MS_PER_DAY);
    const currentConfidence = applyDecay(initialConfidence, ageDays, parameters);

    return Object.freeze({
        initialConfidence,
        currentConfidence,
        ageDays,
        topicId     : parameters.topicId,
        lambdaPerDay: parameters.lambdaPerDay,
        floor       : parameters.floor,
        threshold,
        isStale     : currentConfidence < threshold,
        status      : classifyFreshness(currentConfidence),
        capturedAt,
        referenceInstant,
    });
}
