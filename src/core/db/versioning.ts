/**
 * Version that installs the tracking table.
 *
 * Meant to be the first version of every set, numbered 0 by default, so a
 * pristine structure (-1) starts by creating the table the applier writes to.
 * Dropping the table would lose the history it holds, so it cannot be
 * rolled back.
 */
import { RollbackUnsupportedError } from '../versioner/errors.js';
import type { Version } from '../versioner/types.js';
import { VERSIONER_TABLES, resolveKysely, type KyselySource } from './types.js';

export class VersioningTableVersion<DB = unknown> implements Version {

    readonly description = 'Create version tracking table';

    readonly #source: KyselySource<DB>;

    constructor(
        source: KyselySource<DB>,
        readonly number: number = 0,
    ) {

        this.#source = source;

    }

    async upgrade(): Promise<void> {

        await resolveKysely(this.#source)
            .schema
            .createTable(VERSIONER_TABLES.version)
            .ifNotExists()
            .addColumn('id', 'varchar(36)', (col) => col.primaryKey())
            .addColumn('version', 'integer', (col) => col.notNull())
            .addColumn('sequence', 'integer', (col) => col.notNull())
            .addColumn('modified_at', 'timestamp', (col) => col.notNull())
            .execute();

    }

    async rollback(): Promise<void> {

        throw new RollbackUnsupportedError(this.number);

    }

}
