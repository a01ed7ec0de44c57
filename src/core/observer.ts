/**
 * Central event system.
 *
 * Core modules emit events, applications subscribe. The sync engine itself
 * talks to listeners; `ObserverListener` bridges those onto this bus so
 * anything in the process can follow a sync without being wired into it.
 *
 * @example
 * ```typescript
 * const onApplied = ({ version }: { version: number }) => {
 *     console.log(`version ${version} applied`)
 * }
 *
 * observer.on('versioner:after-change', onApplied)
 * ...
 * observer.off('versioner:after-change', onApplied)
 * ```
 */
import { EventEmitter } from 'eventemitter3'

import { isDebug } from './environment.js'
import type { SyncDirection } from './versioner/types.js'


/**
 * Payload of a per-change event.
 */
interface ChangePayload {
    version: number
    description?: string
    direction: SyncDirection
}


/**
 * Payload of a sync boundary event.
 */
interface SyncPayload {
    current: number
    target: number
    direction: SyncDirection
}


/**
 * All events emitted on the observer.
 *
 * Events are namespaced by module:
 * - `versioner:*` - Sync lifecycle, one per listener event type
 * - `connection:*` - Database connections
 * - `config:*` - Configuration loading
 * - `error` - Failures outside a sync, such as an unwritable log file
 */
export interface VersionerEvents {

    // Sync lifecycle
    'versioner:start': Record<string, never>
    'versioner:end': Record<string, never>
    'versioner:before-sync': SyncPayload
    'versioner:after-sync': SyncPayload
    'versioner:before-change': ChangePayload
    'versioner:after-change': ChangePayload
    'versioner:error-during-change': ChangePayload & { error: Error }
    'versioner:error': { error: Error }

    // Connection
    'connection:open': { dialect: string }
    'connection:close': { dialect: string }
    'connection:error': { dialect: string; error: string }

    // Config
    'config:loaded': { path: string | null; fromFile: boolean }

    // Failures with nobody to throw to
    'error': { source: string; error: Error; context?: Record<string, unknown> }
}

export type VersionerEventNames = keyof VersionerEvents

export type VersionerEventCallback<E extends VersionerEventNames> = (payload: VersionerEvents[E]) => void

/**
 * Handler signature of every event, as the emitter types them.
 */
type ObserverHandlers = { [E in VersionerEventNames]: VersionerEventCallback<E> }

const EVENT_NAMES = [
    'versioner:start',
    'versioner:end',
    'versioner:before-sync',
    'versioner:after-sync',
    'versioner:before-change',
    'versioner:after-change',
    'versioner:error-during-change',
    'versioner:error',
    'connection:open',
    'connection:close',
    'connection:error',
    'config:loaded',
    'error',
] as const satisfies readonly VersionerEventNames[]


export class VersionerObserver extends EventEmitter<ObserverHandlers> {}


/**
 * Global observer instance.
 *
 * Enable debug mode with `VERSIONER_DEBUG=1` to see all events as they occur.
 */
export const observer = new VersionerObserver()

if (isDebug()) {

    for (const name of EVENT_NAMES) {

        observer.on(name, () => console.error(`[versioner:emit] ${name}`))
    }
}
