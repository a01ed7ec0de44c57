/**
 * Log formatter tests.
 */
import { describe, it, expect } from 'vitest';

import { formatEntry, formatLine, sanitizeData, serializeEntry } from '../../../src/core/logger/index.js';
import type { LogEntry } from '../../../src/core/logger/index.js';

describe('logger: formatter', () => {

    describe('formatEntry', () => {

        it('should omit empty data and context', () => {

            const entry = formatEntry('warn', 'careful', {}, {});

            expect(Object.keys(entry).sort()).toEqual(['level', 'message', 'timestamp']);

        });

    });

    describe('sanitizeData', () => {

        it('should flatten errors and dates', () => {

            const when = new Date('2024-01-15T15:30:00.000Z');
            const err = new Error('boom');

            const data = sanitizeData({ when, err, version: 2 });

            expect(data['when']).toBe('2024-01-15T15:30:00.000Z');
            expect(data['err']).toMatchObject({ name: 'Error', message: 'boom' });
            expect(data['version']).toBe(2);

        });

        it('should stringify values that cannot be serialized', () => {

            const data = sanitizeData({ big: 10n });

            expect(data['big']).toBe('10');

        });

    });

    describe('formatLine', () => {

        const entry: LogEntry = {
            timestamp: '2024-01-15T15:30:00.000Z',
            level: 'info',
            message: 'version 3 applied',
            data: { version: 3 },
        };

        it('should pad the level label', () => {

            expect(formatLine(entry)).toBe('[2024-01-15T15:30:00.000Z] [INFO ] version 3 applied\n');

        });

        it('should append data when asked', () => {

            expect(formatLine(entry, true))
                .toBe('[2024-01-15T15:30:00.000Z] [INFO ] version 3 applied {"version":3}\n');

        });

    });

    describe('serializeEntry', () => {

        it('should write one JSON line', () => {

            const entry: LogEntry = { timestamp: 't', level: 'error', message: 'failed' };

            expect(serializeEntry(entry)).toBe('{"timestamp":"t","level":"error","message":"failed"}\n');

        });

    });

});
