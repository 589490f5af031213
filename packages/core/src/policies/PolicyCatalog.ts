/**
 * @fileoverview Decay Policy Catalog
 *
 * The built-in, process-wide table of decay policies. Built once at
 * module load and frozen; there is no way to register or patch a
 * policy at runtime. Callers who need other parameters pass custom
 * overrides to the calculator instead.
 *
 * @module @freshness/core/policies/PolicyCatalog
 */

import type { DecayPolicy, TopicId } from "../contracts/DecayPolicy.js";
import { UnknownPolicyError } from "../contracts/errors.js";

/**
 * Topic used when a caller does not name one.
 */
export const DEFAULT_TOPIC: TopicId = "ai_training";

function definePolicy(policy: DecayPolicy): DecayPolicy {
    return Object.freeze({ ...policy });
}

/**
 * Built-in policies, fastest decay first.
 */
const kPOLICIES: readonly DecayPolicy[] = Object.freeze([
    definePolicy({
        topicId     : "social_media",
        lambdaPerDay: 0.15,
        floor       : 0.02,
        displayName : "Social media content",
        description : "Social media trends change extremely fast",
    }),
    definePolicy({
        topicId     : "news",
        lambdaPerDay: 0.10,
        floor       : 0.05,
        displayName : "Fast decay (news)",
        description : "News and current events become stale quickly",
    }),
    definePolicy({
        topicId     : "financial",
        lambdaPerDay: 0.08,
        floor       : 0.10,
        displayName : "Financial data",
        description : "Market data and financial info changes quickly",
    }),
    definePolicy({
        topicId     : "ai_training",
        lambdaPerDay: 0.02,
        floor       : 0.15,
        displayName : "AI training data",
        description : "AI/ML best practices evolve rapidly",
    }),
    definePolicy({
        topicId     : "medical",
        lambdaPerDay: 0.015,
        floor       : 0.25,
        displayName : "Medical guidelines",
        description : "Medical knowledge updates regularly",
    }),
    definePolicy({
        topicId     : "code",
        lambdaPerDay: 0.005,
        floor       : 0.20,
        displayName : "Medium decay (code)",
        description : "Code examples and APIs evolve moderately",
    }),
    definePolicy({
        topicId     : "science",
        lambdaPerDay: 0.002,
        floor       : 0.30,
        displayName : "Slow decay (science)",
        description : "Scientific facts change slowly",
    }),
    definePolicy({
        topicId     : "legal",
        lambdaPerDay: 0.001,
        floor       : 0.40,
        displayName : "Very slow decay (legal)",
        description : "Legal precedents are highly stable",
    }),
    // floor 1.0: every history record reads as fully confident
    definePolicy({
        topicId     : "history",
        lambdaPerDay: 0.0,
        floor       : 1.0,
        displayName : "No decay (history)",
        description : "Historical facts don't change",
    }),
]);

const kPOLICIES_BY_ID: ReadonlyMap<TopicId, DecayPolicy> = new Map(
    kPOLICIES.map((policy) => [policy.topicId, policy])
);

const kPOLICY_IDS: readonly TopicId[] = Object.freeze(kPOLICIES.map((policy) => policy.topicId));

function normalizeTopicId(topicId: string): string {
    return topicId.trim().toLowerCase();
}

/**
 * Look up a policy by topic id (case-insensitive, surrounding
 * whitespace ignored).
 *
 * @throws UnknownPolicyError if the topic is not registered
 *
 * @example
 * ```typescript
 * getPolicy("news").lambdaPerDay; // 0.1
 * getPolicy("News ").topicId;     // "news"
 * ```
 */
export function getPolicy(topicId: TopicId): DecayPolicy {
    const policy = kPOLICIES_BY_ID.get(normalizeTopicId(topicId));
    if (!policy) {
        throw new UnknownPolicyError(topicId, kPOLICY_IDS);
    }
    return policy;
}

export function hasPolicy(topicId: TopicId): boolean {
    return kPOLICIES_BY_ID.has(normalizeTopicId(topicId));
}

/**
 * All policies, fastest to slowest decay.
 */
export function listPolicies(): readonly DecayPolicy[] {
    return kPOLICIES;
}

export function listPolicyIds(): readonly TopicId[] {
    return kPOLICY_IDS;
}

/**
 * Days until confidence halves, ignoring the floor.
 * Infinity for non-decaying policies.
 */
export function halfLifeDays(policy: Pick<DecayPolicy, "lambdaPerDay">): number {
    return policy.lambdaPerDay > 0 ? Math.LN2 / policy.lambdaPerDay : Infinity;
}
