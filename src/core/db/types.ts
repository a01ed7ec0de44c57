/**
 * Kysely table types for the version tracking table.
 *
 * The reference backend keeps one row per applied change. The current
 * version is the newest row: latest `modified_at`, then highest `sequence`
 * for rows written within the same clock tick.
 */
import type { ColumnType, Kysely, Selectable } from 'kysely';

/**
 * Tracking table names.
 *
 * @example
 * ```typescript
 * await db.selectFrom(VERSIONER_TABLES.version).selectAll().execute()
 * ```
 */
export const VERSIONER_TABLES = Object.freeze({
    /** Version tracking table */
    version: '__version__' as const,
});

/**
 * Version tracking table.
 */
export interface VersionTable {
    /** Random UUID */
    id: string;

    /** Version number recorded by this change */
    version: number;

    /** Write order, previous maximum plus one */
    sequence: number;

    /** Written as ISO 8601; drivers read it back as a string or a Date */
    modified_at: ColumnType<Date | string, string, never>;
}

export type VersionRow = Selectable<VersionTable>;

/**
 * Database shape the tracking queries run against.
 *
 * Combine with an application schema through `db.withTables<VersionerDatabase>()`.
 */
export type VersionerDatabase = {
    __version__: VersionTable;
};

/**
 * A connection, or a function returning the connection to use right now.
 *
 * The function form lets a collaborator follow whatever transaction a
 * `TransactionalChangesListener` currently holds.
 */
export type KyselySource<DB> = Kysely<DB> | (() => Kysely<DB>);

/**
 * Resolve a source to the connection to use for the next query.
 */
export function resolveKysely<DB>(source: KyselySource<DB>): Kysely<DB> {

    return typeof source === 'function' ? source() : source;

}
