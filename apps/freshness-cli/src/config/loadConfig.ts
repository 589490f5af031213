/**
 * @fileoverview CLI configuration loader
 *
 * Loads command defaults from a YAML file. Every key is optional;
 * missing keys take the built-in defaults.
 *
 * ```yaml
 * defaults:
 *   topic: ai_training
 *   threshold: 0.3
 *   maxAlerts: 10
 * fields:
 *   timestamp: [timestamp, created_at, date, captured_at, updated_at]
 *   confidence: confidence
 * logLevel: warn
 * ```
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { fileURLToPath } from "url";
import { parse as parseYaml } from "yaml";
import {
    DEFAULT_CONFIDENCE_FIELD,
    DEFAULT_THRESHOLD,
    DEFAULT_TIMESTAMP_FIELDS,
    DEFAULT_TOPIC,
    isDataRecord,
    type DataRecord,
    type FreshnessLogger,
} from "@freshness/core";
import { ConfigLoadError } from "../errors.js";
import { createConsoleLogger, isLogLevel, type LogLevel } from "../logging/consoleLogger.js";

/**
 * Resolved CLI configuration.
 */
export interface CliConfig {
    /** Topic used when --topic is omitted */
    readonly topic: string;

    /** Threshold used when --threshold is omitted */
    readonly threshold: number;

    /** Alerts listed in verbose mode when --max-alerts is omitted */
    readonly maxAlerts: number;

    /** Candidate timestamp fields, highest priority first */
    readonly timestampFields: readonly string[];

    readonly confidenceField: string;

    readonly logLevel: LogLevel;
}

export const CONFIG_PATH_ENV = "FRESHNESS_CONFIG";
export const LOG_LEVEL_ENV = "FRESHNESS_LOG_LEVEL";

/**
 * Bundled configuration file, beside the package sources.
 */
export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL("../../config/freshness.yml", import.meta.url));

/**
 * Built-in defaults.
 */
export function getDefaultConfig(): CliConfig {
    return {
        topic          : DEFAULT_TOPIC,
        threshold      : DEFAULT_THRESHOLD,
        maxAlerts      : 10,
        timestampFields: DEFAULT_TIMESTAMP_FIELDS,
        confidenceField: DEFAULT_CONFIDENCE_FIELD,
        logLevel       : "warn",
    };
}

function readSection(parsed: DataRecord, key: string, filePath: string): DataRecord {
    const section = parsed[key];
    if (section === undefined || section === null) {
        return {};
    }
    if (!isDataRecord(section)) {
        throw new ConfigLoadError(`Invalid config in ${filePath}: '${key}' must be a mapping`, filePath);
    }
    return section;
}

function isNonEmptyString(value: unknown): value is string {
    return typeof value === "string" && value.trim() !== "";
}

function readTimestampFields(value: unknown, filePath: string): readonly string[] | undefined {
    if (value === undefined) {
        return undefined;
    }
    if (isNonEmptyString(value)) {
        return [value];
    }
    if (Array.isArray(value) && value.length > 0 && value.every(isNonEmptyString)) {
        return value;
    }
    throw new ConfigLoadError(
        `Invalid config in ${filePath}: 'fields.timestamp' must be a field name or a non-empty list of names`,
        filePath
    );
}

/**
 * Load configuration from a YAML file.
 *
 * @param filePath - Path to the YAML file
 * @throws ConfigLoadError if the file is missing, is not valid YAML, or holds a bad value
 */
export function loadCliConfig(filePath: string): CliConfig {
    if (!existsSync(filePath)) {
        throw new ConfigLoadError(`Config file not found: ${filePath}`, filePath);
    }

    let parsed: unknown;
    try {
        parsed = parseYaml(readFileSync(filePath, "utf-8"));
    }
    catch (error) {
        throw new ConfigLoadError(
            `Invalid YAML in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
            filePath,
            { cause: error }
        );
    }

    // An empty file parses to null
    if (parsed === null || parsed === undefined) {
        return getDefaultConfig();
    }
    if (!isDataRecord(parsed)) {
        throw new ConfigLoadError(`Invalid config format in ${filePath}: expected a mapping`, filePath);
    }

    const defaults = readSection(parsed, "defaults", filePath);
    const fields = readSection(parsed, "fields", filePath);
    const fallback = getDefaultConfig();

    const { topic, threshold, maxAlerts } = defaults;
    if (topic !== undefined && !isNonEmptyString(topic)) {
        throw new ConfigLoadError(`Invalid config in ${filePath}: 'defaults.topic' must be a string`, filePath);
    }
    if (threshold !== undefined && (typeof threshold !== "number" || !(threshold >= 0 && threshold <= 1))) {
        throw new ConfigLoadError(`Invalid config in ${filePath}: 'defaults.threshold' must be between 0 and 1`, filePath);
    }
    if (maxAlerts !== undefined && (typeof maxAlerts !== "number" || !Number.isInteger(maxAlerts) || maxAlerts < 0)) {
        throw new ConfigLoadError(`Invalid config in ${filePath}: 'defaults.maxAlerts' must be a non-negative integer`, filePath);
    }

    const confidenceField = fields.confidence;
    if (confidenceField !== undefined && !isNonEmptyString(confidenceField)) {
        throw new ConfigLoadError(`Invalid config in ${filePath}: 'fields.confidence' must be a string`, filePath);
    }

    const logLevel = parsed.logLevel;
    if (logLevel !== undefined && !isLogLevel(logLevel)) {
        throw new ConfigLoadError(
            `Invalid config in ${filePath}: 'logLevel' must be one of debug, info, warn, error, silent`,
            filePath
        );
    }

    return {
        topic          : topic ?? fallback.topic,
        threshold      : threshold ?? fallback.threshold,
        maxAlerts      : maxAlerts ?? fallback.maxAlerts,
        timestampFields: readTimestampFields(fields.timestamp, filePath) ?? fallback.timestampFields,
        confidenceField: confidenceField ?? fallback.confidenceField,
        logLevel       : logLevel ?? fallback.logLevel,
    };
}

/**
 * Load configuration, falling back to the built-in defaults with a
 * warning when the file is missing or invalid.
 */
export function loadCliConfigWithFallback(
    filePath: string,
    logger: FreshnessLogger = createConsoleLogger("warn")
): CliConfig {
    try {
        return loadCliConfig(filePath);
    }
    catch (error) {
        logger.warn("Failed to load config, using defaults", {
            filePath,
            error: error instanceof Error ? error.message : String(error),
        });
        return getDefaultConfig();
    }
}

/**
 * Resolve the configuration for a CLI run from the environment:
 * the file named by FRESHNESS_CONFIG (or the bundled one), then the
 * FRESHNESS_LOG_LEVEL override.
 */
export function resolveCliConfig(
    env: NodeJS.ProcessEnv = process.env,
    logger: FreshnessLogger = createConsoleLogger("warn")
): CliConfig {
    const filePath = env[CONFIG_PATH_ENV] ?? DEFAULT_CONFIG_PATH;
    const config = loadCliConfigWithFallback(filePath, logger);

    const level = env[LOG_LEVEL_ENV];
    if (level === undefined || level === "") {
        return config;
    }
    if (!isLogLevel(level)) {
        logger.warn(`Ignoring ${LOG_LEVEL_ENV}`, { value: level });
        return config;
    }
    return { ...config, logLevel: level };
}
