/**
 * Logging listener.
 *
 * Writes the sync boundaries and each applied version to a `Logger`.
 * Every other event is ignored. Never fails.
 *
 * @example
 * ```typescript
 * const listener = new LoggingListener(logger, 'info')
 * // [2024-01-15T10:30:00.000Z] [INFO ] starting syncing process
 * // [2024-01-15T10:30:00.004Z] [INFO ] applying version 1
 * // [2024-01-15T10:30:00.019Z] [INFO ] version 1 applied
 * // [2024-01-15T10:30:00.020Z] [INFO ] end of syncing process
 * ```
 */
import type { Logger } from '../logger/logger.js';
import type { EntryLevel } from '../logger/types.js';
import type { Listener, VersionerEvent } from '../versioner/types.js';

export class LoggingListener implements Listener {

    constructor(
        readonly logger: Logger,
        readonly level: EntryLevel = 'debug',
    ) {}

    on(event: VersionerEvent): void {

        switch (event.type) {

            case 'before-sync':
                this.logger.log(this.level, 'starting syncing process', {
                    current: event.current,
                    target: event.target,
                    direction: event.direction,
                });
                break;

            case 'before-change':
                this.logger.log(this.level, `applying version ${event.version.number}`, {
                    version: event.version.number,
                    direction: event.direction,
                });
                break;

            case 'after-change':
                this.logger.log(this.level, `version ${event.version.number} applied`, {
                    version: event.version.number,
                    direction: event.direction,
                });
                break;

            case 'after-sync':
                this.logger.log(this.level, 'end of syncing process');
                break;

        }

    }

}
