/**
 * Listener that ignores every event. Default listener of a `Versioner`.
 */
import type { Listener, VersionerEvent } from '../versioner/types.js'


export class NoOpListener implements Listener {

    on(_event: VersionerEvent): void {

        // nothing to do
    }
}
