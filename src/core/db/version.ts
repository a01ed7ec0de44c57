/**
 * Kysely-backed versions.
 *
 * Application changes are written as plain definitions (number, description,
 * `up`, `down`) and adapted into `Version`s that run against whatever
 * connection the source resolves to when the action starts.
 */
import type { Kysely } from 'kysely';

import { RollbackUnsupportedError } from '../versioner/errors.js';
import type { Version } from '../versioner/types.js';
import { resolveKysely, type KyselySource } from './types.js';

/**
 * Schema change definition.
 *
 * Use Kysely's schema builder for dialect-agnostic DDL. Omit `down` for a
 * change that cannot be undone; rolling it back then fails.
 *
 * @example
 * ```typescript
 * export const v1 = defineVersion({
 *     version: 1,
 *     description: 'Create users table',
 *     async up(db) {
 *         await db.schema
 *             .createTable('users')
 *             .addColumn('id', 'integer', col => col.primaryKey())
 *             .addColumn('email', 'varchar(255)', col => col.notNull().unique())
 *             .execute()
 *     },
 *     async down(db) {
 *         await db.schema.dropTable('users').execute()
 *     },
 * })
 * ```
 */
export interface SchemaVersionDefinition<DB = unknown> {

    /** Version number */
    version: number;

    /** Human-readable description */
    description: string;

    /** Apply the change */
    up(db: Kysely<DB>): Promise<void>;

    /** Undo the change */
    down?(db: Kysely<DB>): Promise<void>;
}

/**
 * Typed identity helper for version definitions.
 */
export function defineVersion<DB = unknown>(
    definition: SchemaVersionDefinition<DB>,
): SchemaVersionDefinition<DB> {

    return definition;

}

export class KyselyVersion<DB = unknown> implements Version {

    readonly #definition: SchemaVersionDefinition<DB>;
    readonly #source: KyselySource<DB>;

    constructor(definition: SchemaVersionDefinition<DB>, source: KyselySource<DB>) {

        this.#definition = definition;
        this.#source = source;

    }

    get number(): number {

        return this.#definition.version;

    }

    get description(): string {

        return this.#definition.description;

    }

    async upgrade(): Promise<void> {

        await this.#definition.up(resolveKysely(this.#source));

    }

    async rollback(): Promise<void> {

        if (!this.#definition.down) {

            throw new RollbackUnsupportedError(this.number);

        }

        await this.#definition.down(resolveKysely(this.#source));

    }

}
