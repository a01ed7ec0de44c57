/**
 * Observer listener.
 *
 * Re-emits every sync event on the process observer as `versioner:<type>`,
 * with versions reduced to their number and description. Never fails.
 *
 * @example
 * ```typescript
 * observer.on('versioner:after-change', ({ version }) => progress.tick(version))
 *
 * versioner.listener = new ObserverListener()
 * ```
 */
import {
    observer as globalObserver,
    type VersionerEvents,
    type VersionerObserver,
} from '../observer.js';
import type { EventOf, Listener, VersionerEvent } from '../versioner/types.js';

type ChangeEvent = EventOf<'before-change' | 'after-change' | 'error-during-change'>;
type SyncEvent = EventOf<'before-sync' | 'after-sync'>;

function changePayload(event: ChangeEvent): VersionerEvents['versioner:after-change'] {

    const { version, direction } = event;

    return version.description === undefined
        ? { version: version.number, direction }
        : { version: version.number, description: version.description, direction };

}

function syncPayload(event: SyncEvent): VersionerEvents['versioner:after-sync'] {

    return { current: event.current, target: event.target, direction: event.direction };

}

export class ObserverListener implements Listener {

    constructor(readonly observer: VersionerObserver = globalObserver) {}

    on(event: VersionerEvent): void {

        switch (event.type) {

            case 'start':
                this.observer.emit('versioner:start', {});
                break;

            case 'end':
                this.observer.emit('versioner:end', {});
                break;

            case 'before-sync':
                this.observer.emit('versioner:before-sync', syncPayload(event));
                break;

            case 'after-sync':
                this.observer.emit('versioner:after-sync', syncPayload(event));
                break;

            case 'before-change':
                this.observer.emit('versioner:before-change', changePayload(event));
                break;

            case 'after-change':
                this.observer.emit('versioner:after-change', changePayload(event));
                break;

            case 'error-during-change':
                this.observer.emit('versioner:error-during-change', {
                    ...changePayload(event),
                    error: event.error,
                });
                break;

            case 'error':
                this.observer.emit('versioner:error', { error: event.error });
                break;

        }

    }

}
