/**
 * Kysely version applier.
 *
 * Stores the version marker as rows of the `__version__` table. The table
 * is created by `VersioningTableVersion`; until it exists the structure is
 * pristine and the current version is -1.
 */
import { randomUUID } from 'node:crypto';
import type { Kysely } from 'kysely';
import { attempt } from '../shared/attempt.js';

import { PRISTINE_VERSION, type VersionApplier } from '../versioner/types.js';
import {
    VERSIONER_TABLES,
    resolveKysely,
    type KyselySource,
    type VersionerDatabase,
} from './types.js';

/**
 * Check if the tracking table exists.
 *
 * Uses dialect introspection rather than probing the table, so it never
 * fails a surrounding postgres transaction.
 *
 * @example
 * ```typescript
 * if (!(await trackingTableExists(db))) {
 *     await new VersioningTableVersion(db).upgrade()
 * }
 * ```
 */
export async function trackingTableExists<DB>(db: Kysely<DB>): Promise<boolean> {

    const tables = await db.introspection.getTables();

    return tables.some((table) => table.name === VERSIONER_TABLES.version);

}

export class KyselyVersionApplier implements VersionApplier {

    readonly #source: KyselySource<VersionerDatabase>;

    constructor(source: KyselySource<VersionerDatabase>) {

        this.#source = source;

    }

    /**
     * Connection the next query runs on.
     */
    get db(): Kysely<VersionerDatabase> {

        return resolveKysely(this.#source);

    }

    /**
     * Newest recorded version, or -1 when the table is missing or empty.
     */
    async currentVersion(): Promise<number> {

        const db = this.db;

        const [row, err] = await attempt(async () => {

            if (!(await trackingTableExists(db))) return undefined;

            return db
                .selectFrom(VERSIONER_TABLES.version)
                .select('version')
                .orderBy('modified_at', 'desc')
                .orderBy('sequence', 'desc')
                .limit(1)
                .executeTakeFirst();

        });

        if (err) {

            throw new Error(`could not get current version: ${err.message}`, { cause: err });

        }

        return row?.version ?? PRISTINE_VERSION;

    }

    /**
     * Append a row recording `versionNb`.
     */
    async syncVersion(versionNb: number): Promise<void> {

        const db = this.db;

        const [, err] = await attempt(async () => {

            const last = await db
                .selectFrom(VERSIONER_TABLES.version)
                .select((eb) => eb.fn.max('sequence').as('sequence'))
                .executeTakeFirst();

            await db
                .insertInto(VERSIONER_TABLES.version)
                .values({
                    id: randomUUID(),
                    version: versionNb,
                    sequence: Number(last?.sequence ?? 0) + 1,
                    modified_at: new Date().toISOString(),
                })
                .execute();

        });

        if (err) {

            throw new Error(`could not insert version ${versionNb}: ${err.message}`, { cause: err });

        }

    }

}
