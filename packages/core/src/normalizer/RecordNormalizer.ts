/**
 * @fileoverview Record Normalizer
 *
 * Turns a generic decoded record into a FreshnessRecord by probing a
 * fixed, ordered list of candidate timestamp fields and an optional
 * confidence field.
 *
 * @module @freshness/core/normalizer/RecordNormalizer
 */

import type { DataRecord, FreshnessRecord } from "../contracts/FreshnessRecord.js";
import {
    InvalidConfidenceError,
    InvalidRecordError,
    InvalidTimestampError,
    MissingTimestampError,
} from "../contracts/errors.js";
import { parseTimestamp } from "./timestamps.js";

/**
 * Candidate timestamp fields, highest priority first.
 */
export const DEFAULT_TIMESTAMP_FIELDS: readonly string[] = Object.freeze([
    "timestamp",
    "created_at",
    "date",
    "captured_at",
    "updated_at",
]);

export const DEFAULT_CONFIDENCE_FIELD = "confidence";

export const DEFAULT_INITIAL_CONFIDENCE = 1.0;

/**
 * Normalizer options.
 */
export interface NormalizeOptions {
    /** Confidence used when the record has none (default: 1.0) */
    readonly defaultConfidence?: number;

    /** Candidate timestamp fields in priority order */
    readonly timestampFields?: readonly string[];

    /** Field holding the initial confidence (default: "confidence") */
    readonly confidenceField?: string;
}

/**
 * Type guard for string-keyed object records.
 */
export function isDataRecord(value: unknown): value is DataRecord {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a confidence value is a finite number in [0, 1].
 *
 * @throws InvalidConfidenceError otherwise
 */
export function assertConfidence(value: unknown, field?: string): number {
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 1) {
        throw new InvalidConfidenceError(value, field);
    }
    return value;
}

/**
 * A field counts as present unless it is undefined, null or blank text.
 */
function isPresent(value: unknown): boolean {
    if (value === undefined || value === null) {
        return false;
    }
    return typeof value !== "string" || value.trim() !== "";
}

/**
 * Normalize a generic record.
 *
 * Timestamp resolution: the first present field that parses wins.
 * A present but unparseable field falls through to the next
 * candidate.
 *
 * @param record - Decoded record (not mutated)
 * @param options - Field names and default confidence
 * @returns Frozen FreshnessRecord
 * @throws InvalidRecordError if the record is not an object
 * @throws MissingTimestampError if no candidate field is present
 * @throws InvalidTimestampError if candidates are present but none parses
 * @throws InvalidConfidenceError if the confidence field is out of range or not a number
 *
 * @example
 * ```typescript
 * const normalized = normalizeRecord({ text: "...", created_at: "2024-06-01", confidence: 0.8 });
 * normalized.timestampField;    // "created_at"
 * normalized.initialConfidence; // 0.8
 * ```
 */
export function normalizeRecord(record: unknown, options: NormalizeOptions = {}): FreshnessRecord {
    if (!isDataRecord(record)) {
        throw new InvalidRecordError(record);
    }

    const timestampFields = options.timestampFields ?? DEFAULT_TIMESTAMP_FIELDS;
    const confidenceField = options.confidenceField ?? DEFAULT_CONFIDENCE_FIELD;
    const defaultConfidence = assertConfidence(options.defaultConfidence ?? DEFAULT_INITIAL_CONFIDENCE);

    let firstInvalid: InvalidTimestampError | null = null;
    let resolved: { field: string; raw: unknown; capturedAt: Date } | null = null;

    for (const field of timestampFields) {
        const raw = record[field];
        if (!isPresent(raw)) {
            continue;
        }

        try {
            resolved = { field, raw, capturedAt: parseTimestamp(raw, field) };
            break;
        }
        catch (error) {
            if (!(error instanceof InvalidTimestampError)) {
                throw error;
            }
            if (!firstInvalid) {
                firstInvalid = error;
            }
        }
    }

    if (!resolved) {
        throw firstInvalid ?? new MissingTimestampError(timestampFields);
    }

    const rawConfidence = record[confidenceField];
    const initialConfidence = rawConfidence === undefined || rawConfidence === null
        ? defaultConfidence
        : assertConfidence(rawConfidence, confidenceField);

    return Object.freeze({
        initialConfidence,
        capturedAt    : resolved.capturedAt,
        timestampField: resolved.field,
        rawTimestamp  : resolved.raw,
        payload       : record,
    });
}
