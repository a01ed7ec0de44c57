/**
 * Broadcast listener.
 *
 * Forwards each event to its listeners in order. The first failure stops
 * the broadcast and is rethrown as is, so listeners after it never see
 * that event.
 *
 * @example
 * ```typescript
 * versioner.listener = new BroadcastListener([
 *     transactional,
 *     new LoggingListener(logger),
 *     new ObserverListener(),
 * ])
 * ```
 */
import type { Listener, VersionerEvent } from '../versioner/types.js'


export class BroadcastListener implements Listener {

    readonly #listeners: Listener[]

    constructor(listeners: Listener[] = []) {

        this.#listeners = [...listeners]
    }

    /**
     * Listeners in notification order.
     */
    get listeners(): readonly Listener[] {

        return this.#listeners
    }

    /**
     * Append a listener. It is notified after every listener already held.
     */
    add(listener: Listener): this {

        this.#listeners.push(listener)

        return this
    }

    async on(event: VersionerEvent): Promise<void> {

        for (const listener of this.#listeners) {

            await listener.on(event)
        }
    }
}
