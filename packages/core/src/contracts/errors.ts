/**
 * @fileoverview Freshness error taxonomy
 *
 * Every failure raised by the core is a FreshnessError carrying a
 * machine-readable `kind`. Library consumers can switch on the kind;
 * CLI consumers render it next to the message.
 *
 * @module @freshness/core/contracts/errors
 */

/**
 * Discriminator for the error classes below.
 */
export type FreshnessErrorKind =
    | "unknown_policy"
    | "invalid_confidence"
    | "missing_timestamp"
    | "invalid_timestamp"
    | "invalid_record"
    | "invalid_policy"
    | "invalid_threshold";

/**
 * Base class for all core errors.
 */
export abstract class FreshnessError extends Error {
    abstract readonly kind: FreshnessErrorKind;

    protected constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Raised when a topic id is not in the catalog and no full custom
 * override was supplied.
 */
export class UnknownPolicyError extends FreshnessError {
    readonly kind = "unknown_policy";

    constructor(
        public readonly topicId: string,
        public readonly known: readonly string[]
    ) {
        super(`Unknown decay policy: "${topicId}" (known: ${known.join(", ")})`);
    }
}

export class InvalidConfidenceError extends FreshnessError {
    readonly kind = "invalid_confidence";

    constructor(public readonly value: unknown, field?: string) {
        super(
            field
                ? `Field "${field}" must be a number between 0 and 1, got ${describeValue(value)}`
                : `Initial confidence must be a number between 0 and 1, got ${describeValue(value)}`
        );
    }
}

export class MissingTimestampError extends FreshnessError {
    readonly kind = "missing_timestamp";

    constructor(public readonly fields: readonly string[]) {
        super(`No timestamp field found (looked for: ${fields.join(", ")})`);
    }
}

export class InvalidTimestampError extends FreshnessError {
    readonly kind = "invalid_timestamp";

    constructor(public readonly value: unknown, public readonly field?: string) {
        super(
            field
                ? `Field "${field}" is not a recognized date or date-time: ${describeValue(value)}`
                : `Not a recognized date or date-time: ${describeValue(value)}`
        );
    }
}

/**
 * Raised when an input entry is not a string-keyed object.
 */
export class InvalidRecordError extends FreshnessError {
    readonly kind = "invalid_record";

    constructor(value: unknown) {
        super(`Record must be an object, got ${Array.isArray(value) ? "array" : value === null ? "null" : typeof value}`);
    }
}

export class InvalidPolicyError extends FreshnessError {
    readonly kind = "invalid_policy";

    constructor(
        public readonly parameter: "lambda" | "floor",
        public readonly value: number
    ) {
        super(
            parameter === "lambda"
                ? `Custom decay rate must be a finite number >= 0, got ${value}`
                : `Custom floor must be a number between 0 and 1, got ${value}`
        );
    }
}

export class InvalidThresholdError extends FreshnessError {
    readonly kind = "invalid_threshold";

    constructor(public readonly value: number) {
        super(`Threshold must be a number between 0 and 1, got ${value}`);
    }
}

/**
 * Kinds that only invalidate a single record. The dataset evaluator
 * skips the record and keeps going; every other error aborts the batch.
 */
const kRECORD_LEVEL_KINDS: ReadonlySet<FreshnessErrorKind> = new Set<FreshnessErrorKind>([
    "invalid_confidence",
    "missing_timestamp",
    "invalid_timestamp",
    "invalid_record",
]);

/**
 * Type guard for errors the dataset evaluator tolerates per record.
 */
export function isRecordLevelError(error: unknown): error is FreshnessError {
    return error instanceof FreshnessError && kRECORD_LEVEL_KINDS.has(error.kind);
}

function describeValue(value: unknown): string {
    return typeof value === "string" ? JSON.stringify(value) : String(value);
}
