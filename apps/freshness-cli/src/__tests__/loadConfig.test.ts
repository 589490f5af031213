/**
 * @fileoverview Unit tests for the CLI configuration loader
 *
 * Tests cover:
 * - loadCliConfig parsing and validation
 * - loadCliConfigWithFallback
 * - Environment overrides in resolveCliConfig
 *
 * @module config/__tests__/loadConfig
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { FreshnessLogger } from "@freshness/core";
import {
    getDefaultConfig,
    loadCliConfig,
    loadCliConfigWithFallback,
    resolveCliConfig,
} from "../config/loadConfig.js";
import { ConfigLoadError } from "../errors.js";

// Mock the fs module
vi.mock("fs", () => ({
    readFileSync: vi.fn(),
    existsSync  : vi.fn(),
}));

import { readFileSync, existsSync } from "fs";

const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);

function createMockLogger(): FreshnessLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

describe("loadConfig", () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    describe("loadCliConfig", () => {
        // Scenario: Every key set
        it("should load a complete configuration file", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue(`
defaults:
  topic: news
  threshold: 0.45
  maxAlerts: 3
fields:
  timestamp: [seen_at, created_at]
  confidence: score
logLevel: debug
`);

            expect(loadCliConfig("/cfg/freshness.yml")).toEqual({
                topic          : "news",
                threshold      : 0.45,
                maxAlerts      : 3,
                timestampFields: ["seen_at", "created_at"],
                confidenceField: "score",
                logLevel       : "debug",
            });
        });

        // Scenario: Missing keys take the built-in defaults
        it("should fill in defaults for missing keys", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("defaults:\n  topic: legal\n");

            expect(loadCliConfig("/cfg/freshness.yml")).toEqual({
                ...getDefaultConfig(),
                topic: "legal",
            });
        });

        it("should accept a single timestamp field name", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("fields:\n  timestamp: seen_at\n");

            expect(loadCliConfig("/cfg/freshness.yml").timestampFields).toEqual(["seen_at"]);
        });

        it("should return defaults for an empty file", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("");

            expect(loadCliConfig("/cfg/freshness.yml")).toEqual(getDefaultConfig());
        });

        it("should throw when the file does not exist", () => {
            mockExistsSync.mockReturnValue(false);

            expect(() => loadCliConfig("/cfg/missing.yml")).toThrow(ConfigLoadError);
            expect(() => loadCliConfig("/cfg/missing.yml")).toThrow("Config file not found: /cfg/missing.yml");
        });

        it("should throw on invalid YAML", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("defaults: [unclosed\n");

            expect(() => loadCliConfig("/cfg/freshness.yml")).toThrow(/^Invalid YAML in \/cfg\/freshness\.yml: /);
        });

        it("should throw when the document is not a mapping", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("- news\n- legal\n");

            expect(() => loadCliConfig("/cfg/freshness.yml")).toThrow(
                "Invalid config format in /cfg/freshness.yml: expected a mapping"
            );
        });

        it.each([
            ["defaults:\n  threshold: 1.5\n", "'defaults.threshold' must be between 0 and 1"],
            ["defaults:\n  threshold: high\n", "'defaults.threshold' must be between 0 and 1"],
            ["defaults:\n  maxAlerts: -2\n", "'defaults.maxAlerts' must be a non-negative integer"],
            ["defaults:\n  topic: 42\n", "'defaults.topic' must be a string"],
            ["defaults: news\n", "'defaults' must be a mapping"],
            ["fields:\n  timestamp: []\n", "'fields.timestamp' must be a field name or a non-empty list of names"],
            ["fields:\n  confidence: [a, b]\n", "'fields.confidence' must be a string"],
            ["logLevel: loud\n", "'logLevel' must be one of debug, info, warn, error, silent"],
        ])("should reject %j", (content, problem) => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue(content);

            expect(() => loadCliConfig("/cfg/freshness.yml")).toThrow(
                `Invalid config in /cfg/freshness.yml: ${problem}`
            );
        });
    });

    describe("loadCliConfigWithFallback", () => {
        // Scenario: Missing file falls back with a warning
        it("should return defaults and warn when loading fails", () => {
            const logger = createMockLogger();
            mockExistsSync.mockReturnValue(false);

            const config = loadCliConfigWithFallback("/cfg/missing.yml", logger);

            expect(config).toEqual(getDefaultConfig());
            expect(logger.warn).toHaveBeenCalledWith("Failed to load config, using defaults", {
                filePath: "/cfg/missing.yml",
                error   : "Config file not found: /cfg/missing.yml",
            });
        });

        it("should not warn when the file loads", () => {
            const logger = createMockLogger();
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("logLevel: info\n");

            expect(loadCliConfigWithFallback("/cfg/freshness.yml", logger).logLevel).toBe("info");
            expect(logger.warn).not.toHaveBeenCalled();
        });
    });

    describe("resolveCliConfig", () => {
        it("should read the file named by FRESHNESS_CONFIG", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("defaults:\n  topic: science\n");

            const config = resolveCliConfig({ FRESHNESS_CONFIG: "/cfg/custom.yml" }, createMockLogger());

            expect(mockExistsSync).toHaveBeenCalledWith("/cfg/custom.yml");
            expect(config.topic).toBe("science");
        });

        // Scenario: Environment log level wins over the file
        it("should apply FRESHNESS_LOG_LEVEL", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("logLevel: error\n");

            const config = resolveCliConfig(
                { FRESHNESS_CONFIG: "/cfg/custom.yml", FRESHNESS_LOG_LEVEL: "debug" },
                createMockLogger()
            );

            expect(config.logLevel).toBe("debug");
        });

        it("should ignore an unknown FRESHNESS_LOG_LEVEL", () => {
            const logger = createMockLogger();
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("logLevel: error\n");

            const config = resolveCliConfig(
                { FRESHNESS_CONFIG: "/cfg/custom.yml", FRESHNESS_LOG_LEVEL: "loud" },
                logger
            );

            expect(config.logLevel).toBe("error");
            expect(logger.warn).toHaveBeenCalledWith("Ignoring FRESHNESS_LOG_LEVEL", { value: "loud" });
        });
    });
});
