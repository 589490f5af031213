/**
 * @fileoverview Calculator barrel exports
 *
 * @module @freshness/core/calculator
 */

export {
    DEFAULT_THRESHOLD,
    MS_PER_DAY,
    ageInDays,
    applyDecay,
    assertThreshold,
    calculate,
    calculateFreshness,
    resolveDecayParameters,
    resolveReferenceInstant,
} from "./FreshnessCalculator.js";
