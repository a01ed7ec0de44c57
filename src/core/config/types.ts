/**
 * Configuration types.
 *
 * Inferred from the zod schemas so the validated shape and the static
 * type never drift.
 */
import type {
    ConfigInputSchemaType,
    ConnectionSchemaType,
    VersionerConfigSchemaType,
} from './schema.js';

/**
 * Validated configuration with defaults applied.
 */
export type VersionerConfig = VersionerConfigSchemaType;

/**
 * Partial configuration from a single source (file, env, overrides).
 */
export type VersionerConfigInput = ConfigInputSchemaType;

/**
 * Validated connection section.
 */
export type ConnectionSettings = ConnectionSchemaType;
