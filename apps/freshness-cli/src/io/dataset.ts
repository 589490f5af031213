/**
 * @fileoverview Dataset file I/O
 *
 * Reads datasets as JSON (an array of records, or a single record) or
 * as JSON Lines, and writes reports back out as JSON.
 *
 * @module io/dataset
 */

import { readFileSync, writeFileSync, existsSync } from "fs";
import type { DatasetReport } from "@freshness/core";
import { DatasetLoadError } from "../errors.js";

function parseJsonLines(content: string, filePath: string): unknown[] {
    const records: unknown[] = [];

    content.split(/\r?\n/).forEach((line, index) => {
        if (line.trim() === "") {
            return;
        }
        try {
            records.push(JSON.parse(line));
        }
        catch (error) {
            throw new DatasetLoadError(
                `Invalid JSON on line ${index + 1} of ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
                filePath,
                { cause: error }
            );
        }
    });

    return records;
}

/**
 * Decode dataset text. A JSON array is returned as is, any other JSON
 * value becomes a one-entry dataset. Text that is not a single JSON
 * document is read as JSON Lines, skipping blank lines.
 *
 * @param content - File contents
 * @param filePath - Used in error messages
 * @throws DatasetLoadError on the first line that is not valid JSON
 */
export function parseDataset(content: string, filePath: string): unknown[] {
    const text = content.replace(/^\uFEFF/, "");

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    }
    catch {
        return parseJsonLines(text, filePath);
    }

    return Array.isArray(parsed) ? parsed : [parsed];
}

/**
 * Load a dataset file.
 *
 * @throws DatasetLoadError if the file does not exist or cannot be decoded
 *
 * @example
 * ```typescript
 * const records = loadDataset("./data/training.jsonl");
 * const report = checkDataset(records, "ai_training");
 * ```
 */
export function loadDataset(filePath: string): unknown[] {
    if (!existsSync(filePath)) {
        throw new DatasetLoadError(`Dataset file not found: ${filePath}`, filePath);
    }
    return parseDataset(readFileSync(filePath, "utf-8"), filePath);
}

/**
 * Write a report as indented JSON.
 */
export function exportReport(filePath: string, report: DatasetReport): void {
    writeFileSync(filePath, JSON.stringify(report, null, 2), "utf-8");
}
