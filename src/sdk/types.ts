/**
 * SDK Types.
 */
import type { Kysely } from 'kysely';

import type { VersionerConfigInput } from '../core/config/types.js';
import type { SchemaVersionDefinition } from '../core/db/version.js';
import type { Logger } from '../core/logger/logger.js';

// ─────────────────────────────────────────────────────────────
// Factory Options
// ─────────────────────────────────────────────────────────────

/**
 * Options for creating a versioner context.
 *
 * @example
 * ```typescript
 * // Connection from the config
 * const ctx = await createVersioner({
 *     versions: [v1, v2],
 *     config: await loadConfig(),
 * })
 *
 * // Connection owned by the caller
 * const ctx = await createVersioner({
 *     versions: [v1, v2],
 *     db,
 *     config: { transactional: false },
 * })
 * ```
 */
export interface CreateVersionerOptions {

    /** Application versions, in any order */
    versions: SchemaVersionDefinition[];

    /** Config values; defaults apply to everything left out */
    config?: VersionerConfigInput;

    /**
     * Connection to run against. Takes precedence over `config.connection`
     * and is never destroyed by the context.
     */
    db?: Kysely<unknown>;

    /**
     * Logger to write sync progress to. Built from `config.logging` when
     * omitted.
     */
    logger?: Logger;
}
