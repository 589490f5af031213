/**
 * @fileoverview Timestamp parsing
 *
 * Parses the date and date-time representations found in datasets
 * into a Date. Formats are tried in order; a format that does not
 * match falls through to the next one. Strings without a zone are
 * read as UTC. No locale-dependent parsing is involved.
 *
 * @module @freshness/core/normalizer/timestamps
 */

import { InvalidTimestampError } from "../contracts/errors.js";

/**
 * One accepted representation. Returns the parsed instant, or null
 * when the text is not in this format.
 */
interface TimestampFormat {
    readonly name: string;
    parse(text: string): Date | null;
}

const kMS_PER_MINUTE = 60_000;

/**
 * Build a UTC date from calendar components, rejecting components out
 * of range (month 13, February 30, hour 24, ...).
 */
function utcDate(
    year: number,
    month: number,
    day: number,
    hours = 0,
    minutes = 0,
    seconds = 0,
    millis = 0
): Date | null {
    if (month < 1 || month > 12 || day < 1 || hours > 23 || minutes > 59 || seconds > 59) {
        return null;
    }

    const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds, millis));
    // Date.UTC maps years 0-99 to 1900-1999
    date.setUTCFullYear(year);

    if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }
    return date;
}

/**
 * Offset in minutes east of UTC for "Z", "+05:30", "-0800" or "+02".
 */
function parseZoneOffset(zone: string | undefined): number | null {
    if (zone === undefined || zone === "" || zone === "Z" || zone === "z") {
        return 0;
    }

    const match = /^([+-])(\d{2})(?::?(\d{2}))?$/.exec(zone);
    if (!match) {
        return null;
    }

    const hours = Number(match[2]);
    const minutes = match[3] === undefined ? 0 : Number(match[3]);
    if (hours > 23 || minutes > 59) {
        return null;
    }

    const sign = match[1] === "-" ? -1 : 1;
    return sign * (hours * 60 + minutes);
}

const kISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const kISO_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?\s*([Zz]|[+-]\d{2}(?::?\d{2})?)?$/;
const kSLASH_DATE = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/;
const kCOMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;

/**
 * Accepted formats, in the order they are tried.
 */
const kFORMATS: readonly TimestampFormat[] = [
    {
        name: "iso-date",
        parse(text) {
            const match = kISO_DATE.exec(text);
            return match ? utcDate(Number(match[1]), Number(match[2]), Number(match[3])) : null;
        },
    },
    {
        name: "iso-date-time",
        parse(text) {
            const match = kISO_DATE_TIME.exec(text);
            if (!match) {
                return null;
            }

            const [, year, month, day, hours, minutes, seconds, fraction, zone] = match;
            const offset = parseZoneOffset(zone);
            if (offset === null) {
                return null;
            }

            // Keep millisecond precision; finer digits are dropped
            const millis = fraction === undefined ? 0 : Number(fraction.padEnd(3, "0").slice(0, 3));
            const local = utcDate(
                Number(year),
                Number(month),
                Number(day),
                Number(hours),
                Number(minutes),
                seconds === undefined ? 0 : Number(seconds),
                millis
            );

            return local ? new Date(local.getTime() - offset * kMS_PER_MINUTE) : null;
        },
    },
    {
        name: "slash-date",
        parse(text) {
            const match = kSLASH_DATE.exec(text);
            return match ? utcDate(Number(match[1]), Number(match[2]), Number(match[3])) : null;
        },
    },
    {
        name: "compact-date",
        parse(text) {
            const match = kCOMPACT_DATE.exec(text);
            return match ? utcDate(Number(match[1]), Number(match[2]), Number(match[3])) : null;
        },
    },
];

/**
 * Names of the accepted string formats, in the order they are tried.
 */
export const TIMESTAMP_FORMATS: readonly string[] = kFORMATS.map((format) => format.name);

/**
 * Parse a timestamp value into a Date.
 *
 * Accepts valid Date instances and strings in any of the
 * {@link TIMESTAMP_FORMATS}.
 *
 * @param value - Raw timestamp value
 * @param field - Source field name, for the error message
 * @throws InvalidTimestampError if the value cannot be parsed
 *
 * @example
 * ```typescript
 * parseTimestamp("2025-01-01").toISOString();            // "2025-01-01T00:00:00.000Z"
 * parseTimestamp("2025-01-01T12:00:00+02:00").toISOString(); // "2025-01-01T10:00:00.000Z"
 * ```
 */
export function parseTimestamp(value: unknown, field?: string): Date {
    if (value instanceof Date) {
        if (Number.isNaN(value.getTime())) {
            throw new InvalidTimestampError(value, field);
        }
        return new Date(value.getTime());
    }

    if (typeof value !== "string") {
        throw new InvalidTimestampError(value, field);
    }

    const text = value.trim();
    for (const format of kFORMATS) {
        const parsed = format.parse(text);
        if (parsed) {
            return parsed;
        }
    }

    throw new InvalidTimestampError(value, field);
}
