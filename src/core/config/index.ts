/**
 * Config module - configuration management.
 *
 * Handles config loading, validation, and merging from multiple sources.
 */

// Types
export * from './types.js';

// Schema & Validation
export {
    VersionerConfigSchema,
    ConfigInputSchema,
    ConnectionSchema,
    DialectSchema,
    LogLevelSchema,
    LoggingSchema,
    BootstrapSchema,
    ConfigValidationError,
    validateConfigInput,
    parseConfig,
} from './schema.js';

// Loader
export {
    loadConfig,
    readConfigFile,
    DEFAULT_CONFIG_FILE,
    type LoadConfigOptions,
} from './loader.js';

// Environment variables
export { getEnvConfig, getEnvConfigPath } from './env.js';
