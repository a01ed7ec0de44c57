/**
 * Kysely drivers by dialect.
 *
 * Each driver package is imported the first time its dialect is opened, so
 * a project only needs the package of the database it versions.
 */
import { Kysely, PostgresDialect, SqliteDialect } from 'kysely';

import type { Dialect, DriverOpener } from './types.js';

interface Driver {

    /** npm package providing the driver */
    pkg: string;
    open: DriverOpener;
}

export const DRIVERS: Record<Dialect, Driver> = {

    sqlite: {
        pkg: 'better-sqlite3',
        async open(config) {

            const { default: Database } = await import('better-sqlite3');

            return new Kysely<unknown>({
                dialect: new SqliteDialect({
                    database: new Database(config.filename ?? config.database),
                }),
            });

        },
    },

    // Versions run one at a time; two pooled clients are plenty.
    postgres: {
        pkg: 'pg',
        async open(config) {

            const { default: pg } = await import('pg');

            return new Kysely<unknown>({
                dialect: new PostgresDialect({
                    pool: new pg.Pool({
                        host: config.host ?? 'localhost',
                        port: config.port ?? 5432,
                        user: config.user,
                        password: config.password,
                        database: config.database,
                        min: config.pool?.min ?? 0,
                        max: config.pool?.max ?? 2,
                        ssl: config.ssl,
                    }),
                }),
            });

        },
    },
};
