/**
 * @fileoverview CLI error types
 *
 * Failures that belong to the command line surface rather than the core:
 * reading datasets, reading configuration and parsing option values.
 *
 * @module freshness-cli/errors
 */

export type CliErrorKind = "dataset_load" | "config_load" | "invalid_option";

/**
 * Base class for CLI errors. Carries a `kind` like core errors do.
 */
export abstract class CliError extends Error {
    abstract readonly kind: CliErrorKind;

    protected constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Raised when a dataset file is missing or cannot be decoded.
 */
export class DatasetLoadError extends CliError {
    readonly kind = "dataset_load";

    constructor(message: string, public readonly filePath: string, options?: ErrorOptions) {
        super(message, options);
    }
}

/**
 * Raised when the YAML configuration is missing or holds a bad value.
 */
export class ConfigLoadError extends CliError {
    readonly kind = "config_load";

    constructor(message: string, public readonly filePath: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class InvalidOptionError extends CliError {
    readonly kind = "invalid_option";

    constructor(public readonly option: string, public readonly value: string, expected: string) {
        super(`Option ${option} expects ${expected}, got "${value}"`);
    }
}
