/**
 * Logging listener tests.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Writable } from 'node:stream';

import { LoggingListener } from '../../../src/core/listeners/index.js';
import { Logger } from '../../../src/core/logger/index.js';
import type { LogLevel } from '../../../src/core/logger/index.js';
import type { VersionerEvent } from '../../../src/core/versioner/index.js';
import { fakeVersion } from '../../support/versions.js';

function createMockStream(): { stream: Writable; output: string[] } {

    const output: string[] = [];
    const stream = new Writable({
        write(chunk, _encoding, callback) {

            output.push(chunk.toString());
            callback();

        },
    });

    return { stream, output };

}

const version = fakeVersion(1, []);

const syncEvents: VersionerEvent[] = [
    { type: 'start' },
    { type: 'before-sync', current: 0, target: 2, direction: 'upgrade' },
    { type: 'before-change', version, direction: 'upgrade' },
    { type: 'after-change', version, direction: 'upgrade' },
    { type: 'after-sync', current: 0, target: 2, direction: 'upgrade' },
    { type: 'end' },
];

describe('listeners: logging', () => {

    beforeEach(() => {

        vi.useFakeTimers();
        vi.setSystemTime(new Date('2024-01-15T15:30:00.123Z'));

    });

    afterEach(() => {

        vi.useRealTimers();

    });

    function loggerAt(level: LogLevel): { logger: Logger; output: string[] } {

        const { stream, output } = createMockStream();
        const logger = new Logger({ config: { level }, console: stream });

        return { logger, output };

    }

    it('should log the sync boundaries and each applied version', () => {

        const { logger, output } = loggerAt('info');
        const listener = new LoggingListener(logger, 'info');

        for (const event of syncEvents) listener.on(event);

        expect(output).toEqual([
            '[2024-01-15T15:30:00.123Z] [INFO ] starting syncing process\n',
            '[2024-01-15T15:30:00.123Z] [INFO ] applying version 1\n',
            '[2024-01-15T15:30:00.123Z] [INFO ] version 1 applied\n',
            '[2024-01-15T15:30:00.123Z] [INFO ] end of syncing process\n',
        ]);

    });

    it('should log at debug by default, shown only at verbose', () => {

        const quiet = loggerAt('info');
        new LoggingListener(quiet.logger).on({ type: 'before-change', version, direction: 'upgrade' });

        expect(quiet.output).toEqual([]);

        const verbose = loggerAt('verbose');
        new LoggingListener(verbose.logger).on({ type: 'before-change', version, direction: 'rollback' });

        expect(verbose.output).toEqual([
            '[2024-01-15T15:30:00.123Z] [DEBUG] applying version 1 {"version":1,"direction":"rollback"}\n',
        ]);

    });

    it('should ignore error events', () => {

        const { logger, output } = loggerAt('verbose');
        const listener = new LoggingListener(logger);

        listener.on({ type: 'error', error: new Error('no connection') });
        listener.on({ type: 'error-during-change', version, direction: 'upgrade', error: new Error('boom') });

        expect(output).toEqual([]);

    });

});
