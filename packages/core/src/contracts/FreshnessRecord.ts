/**
 * Freshness Record Contract
 *
 * Generic input records and the normalized shape the calculator
 * consumes. Records are immutable within the pipeline: the normalizer
 * reads them but never mutates them.
 */

/**
 * A generic decoded record (one JSON object or JSONL line).
 * Any fields; optionally a timestamp field and a confidence field.
 */
export type DataRecord = Readonly<Record<string, unknown>>;

/**
 * Normalized input to a single freshness calculation.
 */
export interface FreshnessRecord {
    /** Initial confidence (0.0 - 1.0), 1.0 when the record has none */
    readonly initialConfidence: number;

    /** When the data was captured */
    readonly capturedAt: Date;

    /** Name of the field the capture instant was read from */
    readonly timestampField: string;

    /** That field's original value */
    readonly rawTimestamp: unknown;

    /** The untouched source record */
    readonly payload: DataRecord;
}
