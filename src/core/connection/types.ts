/**
 * Connection types.
 *
 * The connection section of the config is the connection config: whatever
 * the schema accepts, `createConnection` can open.
 */
import type { Kysely } from 'kysely';

import type { ConnectionSettings } from '../config/types.js';

export type ConnectionConfig = ConnectionSettings;

/**
 * Databases a versioner can track.
 */
export type Dialect = ConnectionConfig['dialect'];

/**
 * Builds a Kysely instance for one dialect. Nothing is queried yet.
 */
export type DriverOpener = (config: ConnectionConfig) => Promise<Kysely<unknown>>;

/**
 * An open, checked connection.
 */
export interface ConnectionResult {
    db: Kysely<unknown>;
    dialect: Dialect;

    /** Close the connection (or pool) and emit `connection:close` */
    destroy: () => Promise<void>;
}
