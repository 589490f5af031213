/**
 * @fileoverview Contract barrel exports
 *
 * Types, errors and small pure helpers shared by every component.
 *
 * @module @freshness/core/contracts
 */

// Decay policy
export type {
    DecayPolicy,
    DecayOverrides,
    DecayParameterSource,
    ResolvedDecayParameters,
    TopicId,
} from "./DecayPolicy.js";

// Records and results
export type { DataRecord, FreshnessRecord } from "./FreshnessRecord.js";
export type {
    CalculationOptions,
    DatasetReport,
    FreshnessResult,
    RecordError,
    StaleAlert,
} from "./FreshnessResult.js";

// Status bands
export type { FreshnessStatus } from "./FreshnessStatus.js";
export { classifyFreshness, describeStatus } from "./FreshnessStatus.js";

// Errors
export type { FreshnessErrorKind } from "./errors.js";
export {
    FreshnessError,
    UnknownPolicyError,
    InvalidConfidenceError,
    MissingTimestampError,
    InvalidTimestampError,
    InvalidRecordError,
    InvalidPolicyError,
    InvalidThresholdError,
    isRecordLevelError,
} from "./errors.js";

// Logging
export type { FreshnessLogger } from "./Logger.js";
export { noopLogger } from "./Logger.js";

// EventBus
export type {
    EventBus,
    EvaluationEvent,
    EvaluationEventMap,
    EvaluationEventType,
    EventHandler,
    Subscription,
    WildcardHandler,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
