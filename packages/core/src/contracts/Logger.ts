/**
 * Logger Contract
 *
 * The core never writes to a terminal. Callers that want diagnostics
 * pass a logger; the default discards everything.
 */

/**
 * Logger interface for core components.
 */
export interface FreshnessLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Logger that drops every message.
 */
export const noopLogger: FreshnessLogger = Object.freeze({
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
});
