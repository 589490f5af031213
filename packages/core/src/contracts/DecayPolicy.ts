/**
 * Decay Policy Contract
 *
 * A named parameter set governing how confidence in a topic's data
 * decays with age:
 *
 *     C(t) = max(floor, C0 * e^(-lambda * t))
 *
 * where t is the age in days.
 */

/**
 * Topic identifier, e.g. "news", "medical".
 * Catalog lookups are case-insensitive.
 */
export type TopicId = string;

/**
 * Immutable decay policy.
 *
 * @example
 * ```typescript
 * const news: DecayPolicy = {
 *     topicId     : "news",
 *     lambdaPerDay: 0.10,
 *     floor       : 0.05,
 *     displayName : "Fast decay (news)",
 *     description : "News and current events become stale quickly",
 * };
 * ```
 */
export interface DecayPolicy {
    /** Unique key */
    readonly topicId: TopicId;

    /** Exponential decay rate per day (>= 0, 0 = no decay) */
    readonly lambdaPerDay: number;

    /** Minimum confidence the value can decay to (0.0 - 1.0) */
    readonly floor: number;

    /** Human-readable label */
    readonly displayName: string;

    /** Free-text explanation */
    readonly description: string;
}

/**
 * Where the parameters of a calculation came from.
 * - catalog: both looked up
 * - custom: both supplied by the caller, catalog bypassed
 * - mixed: one supplied, the other looked up
 */
export type DecayParameterSource = "catalog" | "custom" | "mixed";

/**
 * The decay parameters a calculation actually used.
 */
export interface ResolvedDecayParameters {
    readonly topicId: TopicId;
    readonly lambdaPerDay: number;
    readonly floor: number;
    readonly displayName: string;
    readonly source: DecayParameterSource;
}

/**
 * Caller-supplied substitutes for a policy's values.
 * Never mutate the catalog.
 */
export interface DecayOverrides {
    readonly customLambda?: number;
    readonly customFloor?: number;
}
