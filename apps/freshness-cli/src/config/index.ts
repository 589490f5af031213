/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    CONFIG_PATH_ENV,
    DEFAULT_CONFIG_PATH,
    LOG_LEVEL_ENV,
    getDefaultConfig,
    loadCliConfig,
    loadCliConfigWithFallback,
    resolveCliConfig,
    type CliConfig,
} from "./loadConfig.js";
