/**
 * Versioner.
 *
 * Moves a structure from its recorded version to a target version by running
 * the upgrade (or rollback) of every version strictly in between, recording
 * each one through the applier as soon as its action succeeds.
 *
 * Event protocol of a sync that has work to do:
 *
 *     start → before-sync → (before-change → after-change)* → after-sync → end
 *
 * A sync with nothing to do emits only `start` and `end`. Any failure is
 * terminal: versions applied before it stay applied, nothing is retried.
 *
 * @example
 * ```typescript
 * const versioner = new Versioner(applier, [v0, v1, v2, v3])
 * versioner.listener = new BroadcastListener([
 *     new TransactionalChangesListener(db),
 *     new LoggingListener(logger),
 * ])
 *
 * await versioner.upgradeToLast()
 * ```
 */
import { attempt } from '../shared/attempt.js'

import { NoOpListener } from '../listeners/noop.js'
import {
    ListenerVetoError,
    VersionChangeError,
    VersionPersistError,
    VersionReadError,
    toError,
} from './errors.js'
import { lastVersionOf, selectVersions, sortVersions, syncDirection } from './plan.js'
import type {
    Listener,
    SyncPlan,
    Version,
    VersionApplier,
    VersionerEvent,
    VersionStatus,
} from './types.js'


export class Versioner {

    /** Listener notified of every lifecycle event. Replaceable between syncs. */
    listener: Listener

    constructor(
        public readonly applier: VersionApplier,
        public readonly versions: Version[] = [],
        listener: Listener = new NoOpListener(),
    ) {

        this.listener = listener
    }

    /**
     * Recorded version of the structure, without changing anything.
     */
    async currentVersion(): Promise<number> {

        return this.applier.currentVersion()
    }

    /**
     * Highest version number held, 0 when there are none.
     */
    lastVersion(): number {

        return lastVersionOf(this.versions)
    }

    /**
     * Sync to the highest version held.
     */
    async upgradeToLast(): Promise<void> {

        await this.sync(this.lastVersion())
    }

    /**
     * Compare the recorded version with the highest version held.
     *
     * `needsMigration` is set only when `upgradeToLast()` would apply
     * something, so it settles once the window below the last version is empty.
     *
     * @example
     * ```typescript
     * const status = await versioner.status()
     * if (status.needsMigration) {
     *     await versioner.upgradeToLast()
     * }
     * ```
     */
    async status(): Promise<VersionStatus> {

        const current = await this.currentVersion()
        const last = this.lastVersion()
        const { versions } = this.#plan(current, last)

        return {
            current,
            last,
            needsMigration: versions.length > 0,
            isNewer: current > last,
        }
    }

    /**
     * Versions a sync to `target` would apply, without running them.
     */
    async plan(target: number): Promise<SyncPlan> {

        const current = await this.currentVersion()

        return this.#plan(current, target)
    }

    /**
     * Bring the structure to `target`.
     *
     * @throws ListenerVetoError if a listener fails on any event
     * @throws VersionReadError if the current version cannot be read
     * @throws VersionChangeError if a version's action fails
     * @throws VersionPersistError if a version cannot be recorded
     */
    async sync(target: number): Promise<void> {

        await this.#emit({ type: 'start' })

        const [current, readErr] = await attempt(() => this.applier.currentVersion())

        if (readErr) {

            const cause = toError(readErr)
            const listenerError = await this.#report({ type: 'error', error: cause })

            throw new VersionReadError(cause, listenerError)
        }

        if (current === target) {

            await this.#emit({ type: 'end' })

            return
        }

        const { direction, versions } = this.#plan(current, target)

        await this.#emit({ type: 'before-sync', current, target, direction })

        for (const version of versions) {

            await this.#emit({ type: 'before-change', version, direction })

            const [, actionErr] = await attempt(() =>
                direction === 'upgrade' ? version.upgrade() : version.rollback()
            )

            if (actionErr) {

                const cause = toError(actionErr)
                const listenerError = await this.#report({
                    type: 'error-during-change',
                    version,
                    direction,
                    error: cause,
                })

                throw new VersionChangeError(direction, version.number, cause, listenerError)
            }

            const [, persistErr] = await attempt(() => this.applier.syncVersion(version.number))

            if (persistErr) {

                const cause = toError(persistErr)
                const listenerError = await this.#report({
                    type: 'error-during-change',
                    version,
                    direction,
                    error: cause,
                })

                throw new VersionPersistError(version.number, cause, listenerError)
            }

            await this.#emit({ type: 'after-change', version, direction })
        }

        await this.#emit({ type: 'after-sync', current, target, direction })
        await this.#emit({ type: 'end' })
    }

    #plan(current: number, target: number): SyncPlan {

        const direction = syncDirection(current, target)

        if (current === target) {

            return { current, target, direction, versions: [] }
        }

        sortVersions(this.versions)

        return {
            current,
            target,
            direction,
            versions: selectVersions(this.versions, current, target),
        }
    }

    /**
     * Notify the listener. A failure vetoes the sync.
     */
    async #emit(event: VersionerEvent): Promise<void> {

        const [, err] = await attempt(async () => {

            await this.listener.on(event)
        })

        if (err) {

            const version = 'version' in event ? event.version.number : undefined

            throw new ListenerVetoError(event.type, toError(err), version)
        }
    }

    /**
     * Notify the listener of an error the sync is already failing with.
     * Returns the listener's own failure so both can be reported.
     */
    async #report(event: VersionerEvent): Promise<Error | undefined> {

        const [, err] = await attempt(async () => {

            await this.listener.on(event)
        })

        return err ? toError(err) : undefined
    }
}
