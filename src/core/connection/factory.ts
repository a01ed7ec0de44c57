/**
 * Opening database connections.
 *
 * Every connection is checked with `select 1` before it is handed out.
 * Refused, timed out and reset connections are retried with backoff. A
 * missing driver, bad credentials or an unusable file fail at once.
 *
 * @example
 * ```typescript
 * const conn = await createConnection({
 *     dialect: 'postgres',
 *     host: 'localhost',
 *     database: 'inventory',
 *     user: 'versioner',
 *     password: 'test-password',
 * })
 *
 * const versioner = await createVersioner({ versions, db: conn.db })
 * ...
 * await conn.destroy()
 * ```
 */
import { sql, type Kysely } from 'kysely';

import { observer } from '../observer.js';
import { attempt } from '../shared/attempt.js';
import { retry } from '../shared/retry.js';
import { DRIVERS } from './drivers.js';
import type { ConnectionConfig, ConnectionResult, Dialect } from './types.js';

/**
 * Lowercased fragments of driver errors that are worth another attempt.
 */
const TRANSIENT_ERRORS = [
    'econnrefused',
    'econnreset',
    'etimedout',
    'connection reset',
    'too many connections',
    'the database system is starting up',
];

/**
 * The driver package of a dialect is not installed.
 */
export class MissingDriverError extends Error {

    override readonly name = 'MissingDriverError' as const;

    constructor(
        public readonly dialect: Dialect,
        public readonly pkg: string,
    ) {

        super(`Missing driver for ${dialect}: install ${pkg}`);

    }

}

/**
 * Whether a connection failure may succeed on retry.
 */
export function isTransientConnectionError(err: Error): boolean {

    const message = err.message.toLowerCase();

    return TRANSIENT_ERRORS.some((fragment) => message.includes(fragment));

}

function isModuleNotFound(err: Error): boolean {

    return 'code' in err && err.code === 'ERR_MODULE_NOT_FOUND';

}

/**
 * Build the dialect's Kysely instance and check it with `select 1`. A failed check closes
 * the instance so a retry starts from a fresh pool.
 */
async function openAndCheck(config: ConnectionConfig): Promise<Kysely<unknown>> {

    const driver = DRIVERS[config.dialect];
    const [db, openErr] = await attempt(() => driver.open(config));

    if (openErr) {

        throw isModuleNotFound(openErr)
            ? new MissingDriverError(config.dialect, driver.pkg)
            : openErr;

    }

    const [, checkErr] = await attempt(() => sql`select 1`.execute(db));

    if (checkErr) {

        await db.destroy();
        throw checkErr;

    }

    return db;

}

/**
 * Open a connection for the config's dialect.
 *
 * Emits `connection:open` or `connection:error`.
 *
 * @throws MissingDriverError if the dialect's driver is not installed
 */
export async function createConnection(config: ConnectionConfig): Promise<ConnectionResult> {

    const { dialect } = config;

    const [db, err] = await attempt(() =>
        retry(() => openAndCheck(config), {
            retries: 3,
            delay: 1000,
            backoff: 2,
            jitterFactor: 0.1,
            shouldRetry: isTransientConnectionError,
        }),
    );

    if (err) {

        observer.emit('connection:error', { dialect, error: err.message });
        throw err;

    }

    observer.emit('connection:open', { dialect });

    return {
        db,
        dialect,
        destroy: async () => {

            await db.destroy();
            observer.emit('connection:close', { dialect });

        },
    };

}
