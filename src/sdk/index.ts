/**
 * schema-versioner SDK
 *
 * Wires a `Versioner` from a config: connection, tracking table, logging,
 * transactions and observer events.
 *
 * @example
 * ```typescript
 * import { createVersioner, defineVersion, loadConfig } from 'schema-versioner'
 *
 * const ctx = await createVersioner({
 *     versions: [createUsers, addEmailIndex],
 *     config: await loadConfig(),
 * })
 *
 * try {
 *     await ctx.upgradeToLast()
 * }
 * finally {
 *     await ctx.close()
 * }
 * ```
 */
import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Writable } from 'node:stream';
import type { Kysely } from 'kysely';

import { parseConfig } from '../core/config/schema.js';
import type { VersionerConfig } from '../core/config/types.js';
import { createConnection } from '../core/connection/factory.js';
import { KyselyVersionApplier } from '../core/db/applier.js';
import type { KyselySource, VersionerDatabase } from '../core/db/types.js';
import { KyselyVersion } from '../core/db/version.js';
import { VersioningTableVersion } from '../core/db/versioning.js';
import { BroadcastListener } from '../core/listeners/broadcast.js';
import { LoggingListener } from '../core/listeners/logging.js';
import { ObserverListener } from '../core/listeners/observer.js';
import { TransactionalChangesListener } from '../core/listeners/transactional.js';
import { Logger } from '../core/logger/logger.js';
import { observer } from '../core/observer.js';
import { attempt } from '../core/shared/attempt.js';
import type { Version } from '../core/versioner/types.js';
import { Versioner } from '../core/versioner/versioner.js';

import { VersionerContext } from './context.js';
import type { CreateVersionerOptions } from './types.js';

// ─────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────

interface ResolvedConnection {
    db: Kysely<unknown>;
    destroy: (() => Promise<void>) | null;
}

/**
 * Use the caller's connection, or open one from the config.
 */
async function resolveConnection(
    options: CreateVersionerOptions,
    config: VersionerConfig,
): Promise<ResolvedConnection> {

    if (options.db) {

        return { db: options.db, destroy: null };

    }

    if (!config.connection) {

        throw new Error('No database connection: pass `db` or set `connection` in the config');

    }

    const conn = await createConnection(config.connection);

    return { db: conn.db, destroy: conn.destroy };

}

/**
 * Open the log file for appending, creating its directory first.
 *
 * Failures are reported on the observer's `error` event and leave the
 * logger writing to the console only.
 */
async function openLogFile(path: string): Promise<Writable | undefined> {

    const [, mkdirErr] = await attempt(() => mkdir(dirname(path), { recursive: true }));

    if (mkdirErr) {

        observer.emit('error', { source: 'logger', error: mkdirErr, context: { path } });

        return undefined;

    }

    const stream = createWriteStream(path, { flags: 'a' });

    stream.on('error', (error) => {

        observer.emit('error', { source: 'logger', error, context: { path } });

    });

    return stream;

}

/**
 * Build a logger from the logging section of the config.
 */
async function buildLogger(config: VersionerConfig): Promise<Logger> {

    const { file, ...loggerConfig } = config.logging;

    return new Logger({
        config: loggerConfig,
        console: process.stdout,
        file: file && loggerConfig.enabled ? await openLogFile(file) : undefined,
    });

}

// ─────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────

/**
 * Create a versioner context.
 *
 * Config values are validated and completed with defaults. The applier and
 * every version run through the transactional listener's connection when
 * `transactional` is on, so each change commits together with its marker.
 *
 * @throws ConfigValidationError if the config is invalid
 * @throws Error if no connection is given or configured
 */
export async function createVersioner(options: CreateVersionerOptions): Promise<VersionerContext> {

    const config = parseConfig(options.config ?? {});
    const { db, destroy } = await resolveConnection(options, config);

    const transactional = config.transactional
        ? new TransactionalChangesListener(db)
        : null;

    const source: KyselySource<unknown> = transactional
        ? () => transactional.db
        : db;

    const trackingSource: KyselySource<VersionerDatabase> = transactional
        ? () => transactional.db.withTables<VersionerDatabase>()
        : db.withTables<VersionerDatabase>();

    const versions: Version[] = options.versions.map(
        (definition) => new KyselyVersion(definition, source),
    );

    if (config.bootstrap.enabled) {

        versions.unshift(new VersioningTableVersion(source, config.bootstrap.version));

    }

    const logger = options.logger ?? await buildLogger(config);

    const listener = new BroadcastListener();

    if (transactional) listener.add(transactional);

    listener
        .add(new LoggingListener(logger, 'info'))
        .add(new ObserverListener());

    const versioner = new Versioner(new KyselyVersionApplier(trackingSource), versions, listener);

    return new VersionerContext({
        versioner,
        logger,
        transactional,
        stopLogger: options.logger ? null : () => logger.stop(),
        destroy,
    });

}

export { VersionerContext } from './context.js';
export type { ContextResources } from './context.js';
export type { CreateVersionerOptions } from './types.js';
