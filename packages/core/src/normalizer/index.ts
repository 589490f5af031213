/**
 * @fileoverview Normalizer barrel exports
 *
 * @module @freshness/core/normalizer
 */

export {
    DEFAULT_CONFIDENCE_FIELD,
    DEFAULT_INITIAL_CONFIDENCE,
    DEFAULT_TIMESTAMP_FIELDS,
    assertConfidence,
    isDataRecord,
    normalizeRecord,
    type NormalizeOptions,
} from "./RecordNormalizer.js";
export { TIMESTAMP_FORMATS, parseTimestamp } from "./timestamps.js";
