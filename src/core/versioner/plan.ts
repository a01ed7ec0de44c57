/**
 * Version selection.
 *
 * Pure helpers that decide which versions a sync moves through and in
 * which order. Bounds are strict on both ends: the version numbered like the
 * current version is treated as already applied, and the one numbered like
 * the target as not wanted, so neither runs.
 */
import type { SyncDirection, Version } from './types.js'


/**
 * Sort versions ascending by number, in place.
 *
 * `Array.prototype.sort` is stable, so duplicate numbers keep their
 * insertion order. Duplicates are still a caller error.
 */
export function sortVersions<V extends Version>(versions: V[]): V[] {

    return versions.sort((a, b) => a.number - b.number)
}


/**
 * Rollback iff the target is below the current version.
 */
export function syncDirection(current: number, target: number): SyncDirection {

    return target < current ? 'rollback' : 'upgrade'
}


/**
 * Versions strictly between `current` and `target`, in application order.
 *
 * Expects `versions` sorted ascending. Upgrades come out ascending,
 * rollbacks descending (most recent change undone first).
 *
 * @example
 * ```typescript
 * selectVersions(sorted, -1, 2).map(v => v.number)  // [0, 1]
 * selectVersions(sorted, 3, 0).map(v => v.number)   // [2, 1]
 * ```
 */
export function selectVersions<V extends Version>(
    versions: readonly V[],
    current: number,
    target: number,
): V[] {

    if (syncDirection(current, target) === 'upgrade') {

        return versions.filter((v) => v.number > current && v.number < target)
    }

    return versions
        .filter((v) => v.number < current && v.number > target)
        .reverse()
}


/**
 * Highest version number, or 0 when there are none.
 */
export function lastVersionOf(versions: readonly Version[]): number {

    let last = 0

    for (const version of versions) {

        if (version.number > last) {

            last = version.number
        }
    }

    return last
}
