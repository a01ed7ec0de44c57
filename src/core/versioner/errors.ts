/**
 * Sync errors.
 *
 * Every failure of a sync is wrapped in a `SyncError` carrying the phase that
 * raised it. When a listener fails while the engine is reporting another
 * error, both are kept: the first failure as `cause`, the listener's as
 * `listenerError`, and both messages appear in `message`.
 */
import type { SyncDirection, VersionerEventType } from './types.js'

export { toError } from '../shared/attempt.js'


/**
 * Step of the sync protocol that failed.
 */
export type SyncPhase = 'event' | 'read' | 'change' | 'persist'


function eventErrorSuffix(listenerError?: Error): string {

    return listenerError ? ` (event error: ${listenerError.message})` : ''
}


/**
 * Base class of every error returned by `Versioner.sync`.
 *
 * @example
 * ```typescript
 * const [, err] = await attempt(() => versioner.sync(4))
 * if (err instanceof SyncError) {
 *     console.log(err.phase, err.cause.message)
 * }
 * ```
 */
export abstract class SyncError extends Error {

    abstract readonly phase: SyncPhase

    /**
     * Failure to roll back the transaction this sync left open, when the
     * caller releases it after the sync failed.
     */
    releaseError?: Error

    constructor(
        message: string,
        public override readonly cause: Error,
        public readonly listenerError?: Error,
    ) {

        super(message)
    }
}


/**
 * A listener vetoed the sync by failing on an event.
 */
export class ListenerVetoError extends SyncError {

    override readonly name = 'ListenerVetoError' as const
    readonly phase = 'event' as const

    constructor(
        public readonly eventType: VersionerEventType,
        cause: Error,
        public readonly version?: number,
    ) {

        super(`event ${eventType}: ${cause.message}`, cause)
    }
}


/**
 * The applier could not report the current version. Nothing was changed.
 */
export class VersionReadError extends SyncError {

    override readonly name = 'VersionReadError' as const
    readonly phase = 'read' as const

    constructor(cause: Error, listenerError?: Error) {

        super(`could not sync${eventErrorSuffix(listenerError)}: ${cause.message}`, cause, listenerError)
    }
}


/**
 * A version's upgrade or rollback action failed.
 *
 * Versions applied before it stay applied and recorded.
 */
export class VersionChangeError extends SyncError {

    override readonly name = 'VersionChangeError' as const
    readonly phase = 'change' as const

    constructor(
        public readonly direction: SyncDirection,
        public readonly version: number,
        cause: Error,
        listenerError?: Error,
    ) {

        super(
            `${direction} to version ${version}${eventErrorSuffix(listenerError)}: ${cause.message}`,
            cause,
            listenerError,
        )
    }
}


/**
 * A version's action succeeded but its marker could not be recorded.
 *
 * The structure is now ahead of (or behind) what the applier reports.
 * Retrying `syncVersion` alone reconciles them.
 */
export class VersionPersistError extends SyncError {

    override readonly name = 'VersionPersistError' as const
    readonly phase = 'persist' as const

    constructor(
        public readonly version: number,
        cause: Error,
        listenerError?: Error,
    ) {

        super(
            `sync version to ${version}${eventErrorSuffix(listenerError)}: ${cause.message}`,
            cause,
            listenerError,
        )
    }
}


/**
 * Thrown by a version whose change has no meaningful inverse.
 *
 * The engine does not treat it specially: it surfaces as the cause of a
 * `VersionChangeError`.
 */
export class RollbackUnsupportedError extends Error {

    override readonly name = 'RollbackUnsupportedError' as const

    constructor(public readonly version: number) {

        super(`cannot rollback version ${version}`)
    }
}
