/**
 * @fileoverview Unit tests for the console logger
 *
 * @module logging/__tests__/consoleLogger
 */

import { describe, it, expect } from "vitest";
import { createConsoleLogger, isLogLevel } from "../logging/consoleLogger.js";

describe("createConsoleLogger", () => {
    // Scenario: Messages below the level are dropped
    it("should filter by level and format lines", () => {
        const lines: string[] = [];
        const logger = createConsoleLogger("info", (line) => lines.push(line));

        logger.debug("hidden");
        logger.info("Dataset evaluated", { staleEntries: 3 });
        logger.warn("careful");
        logger.error("failed", { filePath: "/data/set.json" });

        expect(lines).toEqual([
            "[INFO] Dataset evaluated {\"staleEntries\":3}",
            "[WARN] careful",
            "[ERROR] failed {\"filePath\":\"/data/set.json\"}",
        ]);
    });

    it("should write nothing when silent", () => {
        const lines: string[] = [];
        const logger = createConsoleLogger("silent", (line) => lines.push(line));

        logger.error("failed");

        expect(lines).toEqual([]);
    });

    it("should write everything at debug level", () => {
        const lines: string[] = [];
        const logger = createConsoleLogger("debug", (line) => lines.push(line));

        logger.debug("Skipping record", { index: 2 });

        expect(lines).toEqual(["[DEBUG] Skipping record {\"index\":2}"]);
    });
});

describe("isLogLevel", () => {
    it("should accept known levels only", () => {
        expect(isLogLevel("warn")).toBe(true);
        expect(isLogLevel("silent")).toBe(true);
        expect(isLogLevel("WARN")).toBe(false);
        expect(isLogLevel(3)).toBe(false);
    });
});
