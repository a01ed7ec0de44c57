/**
 * Configuration Zod schemas and validation.
 *
 * Uses Zod for declarative validation with better error messages
 * and type inference.
 */
import { z } from 'zod';

/**
 * Valid database dialects.
 */
export const DialectSchema = z.enum(['postgres', 'sqlite']);

/**
 * Valid log levels.
 */
export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'verbose']);

/**
 * Port number validation.
 */
const PortSchema = z
    .number()
    .int()
    .min(1, 'Port must be at least 1')
    .max(65535, 'Port must be at most 65535');

/**
 * Connection pool configuration.
 */
const PoolSchema = z.object({
    min: z.number().int().min(0).optional(),
    max: z.number().int().min(1).optional(),
});

/**
 * SSL configuration - can be boolean or detailed config.
 */
const SSLSchema = z.union([
    z.boolean(),
    z.object({
        rejectUnauthorized: z.boolean().optional(),
        ca: z.string().optional(),
        cert: z.string().optional(),
        key: z.string().optional(),
    }),
]);

/**
 * Connection configuration schema.
 *
 * SQLite only requires dialect + database (or filename).
 * Postgres requires host.
 */
export const ConnectionSchema = z
    .object({
        dialect: DialectSchema,
        host: z.string().optional(),
        port: PortSchema.optional(),
        database: z.string().min(1, 'Database name is required'),
        filename: z.string().optional(),
        user: z.string().optional(),
        password: z.string().optional(),
        ssl: SSLSchema.optional(),
        pool: PoolSchema.optional(),
    })
    .refine((conn) => conn.dialect === 'sqlite' || conn.host, {
        message: 'Host is required for non-SQLite databases',
        path: ['host'],
    });

/**
 * Logging configuration schema.
 */
export const LoggingSchema = z.object({
    enabled: z.boolean().default(true),
    level: LogLevelSchema.default('info'),
    color: z.boolean().default(false),
    file: z.string().min(1, 'Log file path cannot be empty').optional(),
});

/**
 * Bootstrap configuration schema.
 *
 * When enabled, the tracking table is installed as the version numbered
 * `version` (0 by default).
 */
export const BootstrapSchema = z.object({
    enabled: z.boolean().default(true),
    version: z.number().int().default(0),
});

/**
 * Full config schema.
 */
export const VersionerConfigSchema = z.object({
    connection: ConnectionSchema.optional(),
    logging: LoggingSchema.default({}),
    transactional: z.boolean().default(true),
    bootstrap: BootstrapSchema.default({}),
});

/**
 * Partial connection schema (all fields optional).
 */
const PartialConnectionSchema = z.object({
    dialect: DialectSchema.optional(),
    host: z.string().optional(),
    port: PortSchema.optional(),
    database: z.string().optional(),
    filename: z.string().optional(),
    user: z.string().optional(),
    password: z.string().optional(),
    ssl: SSLSchema.optional(),
    pool: PoolSchema.optional(),
});

/**
 * Partial config schema.
 *
 * Shape of each source (file, env, overrides) before merging.
 */
export const ConfigInputSchema = z.object({
    connection: PartialConnectionSchema.optional(),
    logging: z.object({
        enabled: z.boolean().optional(),
        level: LogLevelSchema.optional(),
        color: z.boolean().optional(),
        file: z.string().optional(),
    }).optional(),
    transactional: z.boolean().optional(),
    bootstrap: z.object({
        enabled: z.boolean().optional(),
        version: z.number().int().optional(),
    }).optional(),
});

export type VersionerConfigSchemaType = z.infer<typeof VersionerConfigSchema>;
export type ConfigInputSchemaType = z.infer<typeof ConfigInputSchema>;
export type ConnectionSchemaType = z.infer<typeof ConnectionSchema>;

/**
 * Error thrown when config validation fails.
 *
 * Includes the specific field that failed and all validation issues.
 */
export class ConfigValidationError extends Error {

    override readonly name = 'ConfigValidationError' as const;

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(`Config validation failed at '${field}': ${message}`);

    }

}

function toValidationError(error: z.ZodError): ConfigValidationError {

    const firstIssue = error.issues[0];

    return new ConfigValidationError(
        firstIssue?.message ?? 'Validation failed',
        firstIssue?.path.join('.') || 'unknown',
        error.issues,
    );

}

/**
 * Validate one config source before merging.
 *
 * @throws ConfigValidationError if validation fails
 *
 * @example
 * ```typescript
 * validateConfigInput({ logging: { level: 'verbose' } })
 * ```
 */
export function validateConfigInput(input: unknown): asserts input is ConfigInputSchemaType {

    const result = ConfigInputSchema.safeParse(input);

    if (!result.success) {

        throw toValidationError(result.error);

    }

}

/**
 * Parse a merged config, applying defaults.
 *
 * @throws ConfigValidationError if validation fails
 *
 * @example
 * ```typescript
 * const config = parseConfig({ logging: { level: 'warn' } })
 * // config.transactional === true
 * // config.bootstrap === { enabled: true, version: 0 }
 * ```
 */
export function parseConfig(config: unknown): VersionerConfigSchemaType {

    const result = VersionerConfigSchema.safeParse(config);

    if (!result.success) {

        throw toValidationError(result.error);

    }

    return result.data;

}
