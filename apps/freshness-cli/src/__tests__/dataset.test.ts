/**
 * @fileoverview Unit tests for dataset file I/O
 *
 * @module io/__tests__/dataset
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { checkDataset } from "@freshness/core";
import { exportReport, loadDataset, parseDataset } from "../io/dataset.js";
import { DatasetLoadError } from "../errors.js";

vi.mock("fs", () => ({
    readFileSync : vi.fn(),
    writeFileSync: vi.fn(),
    existsSync   : vi.fn(),
}));

import { readFileSync, writeFileSync, existsSync } from "fs";

const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);
const mockWriteFileSync = vi.mocked(writeFileSync);

describe("dataset I/O", () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    describe("parseDataset", () => {
        it("should keep a JSON array as is", () => {
            const records = parseDataset('[{"timestamp":"2025-01-01"},{"date":"2024-06-01"}]', "data.json");

            expect(records).toEqual([{ timestamp: "2025-01-01" }, { date: "2024-06-01" }]);
        });

        // Scenario: A single JSON object is a one-record dataset
        it("should wrap a single JSON object", () => {
            expect(parseDataset('{"timestamp":"2025-01-01","confidence":0.7}', "data.json")).toEqual([
                { timestamp: "2025-01-01", confidence: 0.7 },
            ]);
        });

        // Scenario: JSON Lines with blank lines and CRLF endings
        it("should read JSON Lines, skipping blank lines", () => {
            const content = '{"timestamp":"2025-01-01"}\r\n\r\n{"timestamp":"2024-01-01"}\n';

            expect(parseDataset(content, "data.jsonl")).toEqual([
                { timestamp: "2025-01-01" },
                { timestamp: "2024-01-01" },
            ]);
        });

        it("should name the line that is not valid JSON", () => {
            const content = '{"a":1}\n{"a":2}\nnot json\n';

            expect(() => parseDataset(content, "data.jsonl")).toThrow(DatasetLoadError);
            expect(() => parseDataset(content, "data.jsonl")).toThrow(/^Invalid JSON on line 3 of data\.jsonl: /);
        });

        it("should ignore a byte order mark", () => {
            expect(parseDataset('\uFEFF[{"date":"2024-01-01"}]', "data.json")).toEqual([{ date: "2024-01-01" }]);
        });

        it("should return no records for an empty file", () => {
            expect(parseDataset("", "empty.jsonl")).toEqual([]);
        });
    });

    describe("loadDataset", () => {
        it("should read the file as UTF-8", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue('[{"date":"2024-01-01"}]');

            expect(loadDataset("/data/set.json")).toEqual([{ date: "2024-01-01" }]);
            expect(mockReadFileSync).toHaveBeenCalledWith("/data/set.json", "utf-8");
        });

        it("should throw DatasetLoadError for a missing file", () => {
            mockExistsSync.mockReturnValue(false);

            try {
                loadDataset("/data/missing.json");
                expect.unreachable();
            }
            catch (error) {
                expect(error).toBeInstanceOf(DatasetLoadError);
                expect(error).toMatchObject({
                    kind    : "dataset_load",
                    filePath: "/data/missing.json",
                    message : "Dataset file not found: /data/missing.json",
                });
            }
        });
    });

    describe("exportReport", () => {
        it("should write the report as indented JSON", () => {
            const report = checkDataset([{ date: "2024-01-01" }], "news", { referenceInstant: "2025-01-01" });

            exportReport("/out/report.json", report);

            expect(mockWriteFileSync).toHaveBeenCalledWith(
                "/out/report.json",
                JSON.stringify(report, null, 2),
                "utf-8"
            );
        });
    });
});
