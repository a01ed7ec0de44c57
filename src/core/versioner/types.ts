/**
 * Versioner types.
 *
 * Contracts between the sync engine and its collaborators:
 * - `Version` - a numbered change with forward and inverse actions
 * - `VersionApplier` - the structure being versioned (reads and records the marker)
 * - `Listener` - observer of the sync lifecycle, able to veto by throwing
 *
 * Version numbers are ordering keys only. They do not need to be contiguous,
 * 0 is the empty baseline and -1 means nothing was ever recorded.
 */


// ─────────────────────────────────────────────────────────────
// Versions
// ─────────────────────────────────────────────────────────────

/**
 * A single versioned change unit.
 *
 * @example
 * ```typescript
 * const addUsers: Version = {
 *     number: 1,
 *     description: 'Create users table',
 *     async upgrade() {
 *         await db.schema.createTable('users').addColumn('id', 'integer').execute()
 *     },
 *     async rollback() {
 *         await db.schema.dropTable('users').execute()
 *     },
 * }
 * ```
 */
export interface Version {

    /** Ordering key. Higher is more recent. */
    readonly number: number

    /** Human-readable description, used in logs */
    readonly description?: string

    /** Apply the forward change */
    upgrade(): Promise<void>

    /** Apply the inverse change */
    rollback(): Promise<void>
}


/**
 * The structure being versioned.
 *
 * Owns the persisted "current version" marker. Implementations may store it
 * however they like (append-only table, single row, key-value entry).
 */
export interface VersionApplier {

    /**
     * Currently recorded version.
     *
     * Resolves -1 when no version was ever recorded, which is distinct
     * from 0 (an explicitly applied baseline).
     */
    currentVersion(): Promise<number>

    /** Durably record `versionNb` as the current version. */
    syncVersion(versionNb: number): Promise<void>
}


/**
 * Marker value returned by an applier when nothing was ever recorded.
 */
export const PRISTINE_VERSION = -1


// ─────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────

/**
 * Every event type the versioner emits, in protocol order.
 */
export const EVENT_TYPES = Object.freeze([
    'start',
    'end',
    'before-sync',
    'after-sync',
    'before-change',
    'after-change',
    'error-during-change',
    'error',
] as const)

export type VersionerEventType = (typeof EVENT_TYPES)[number]


/**
 * Direction of a sync. Rollback only when the target is below the current version.
 */
export type SyncDirection = 'upgrade' | 'rollback'


/**
 * Lifecycle event passed to listeners.
 *
 * `version` is only present on per-change events and `error` only on
 * error events.
 */
export type VersionerEvent =
    | { type: 'start' }
    | { type: 'end' }
    | { type: 'before-sync' | 'after-sync'; current: number; target: number; direction: SyncDirection }
    | { type: 'before-change' | 'after-change'; version: Version; direction: SyncDirection }
    | { type: 'error-during-change'; version: Version; direction: SyncDirection; error: Error }
    | { type: 'error'; error: Error }


/**
 * Narrow an event union member by its type.
 */
export type EventOf<T extends VersionerEventType> = Extract<VersionerEvent, { type: T }>


// ─────────────────────────────────────────────────────────────
// Listeners
// ─────────────────────────────────────────────────────────────

/**
 * Observer of the sync lifecycle.
 *
 * Throwing (or rejecting) from `on` aborts the whole sync. There is no
 * other cancellation mechanism.
 */
export interface Listener {

    on(event: VersionerEvent): void | Promise<void>
}


// ─────────────────────────────────────────────────────────────
// Status
// ─────────────────────────────────────────────────────────────

/**
 * Versions that a sync would apply, in application order.
 */
export interface SyncPlan {

    current: number

    target: number

    direction: SyncDirection

    versions: Version[]
}


/**
 * Where the structure stands relative to the highest known version.
 */
export interface VersionStatus {

    /** Recorded version (-1 when pristine) */
    current: number

    /** Highest version number held by the versioner */
    last: number

    /** Whether `upgradeToLast()` would apply anything */
    needsMigration: boolean

    /** Whether the structure is ahead of every known version */
    isNewer: boolean
}
