/**
 * Observer listener tests.
 */
import { describe, it, expect, afterEach } from 'vitest';

import { ObserverListener } from '../../../src/core/listeners/index.js';
import { observer } from '../../../src/core/observer.js';
import type { Version } from '../../../src/core/versioner/index.js';
import { fakeVersion } from '../../support/versions.js';

describe('listeners: observer', () => {

    afterEach(() => {

        observer.removeAllListeners();

    });

    it('should forward sync boundaries', () => {

        const received: unknown[] = [];

        observer.on('versioner:start', (data) => received.push(['start', data]));
        observer.on('versioner:before-sync', (data) => received.push(['before-sync', data]));
        observer.on('versioner:after-sync', (data) => received.push(['after-sync', data]));
        observer.on('versioner:end', (data) => received.push(['end', data]));

        const listener = new ObserverListener();

        listener.on({ type: 'start' });
        listener.on({ type: 'before-sync', current: 3, target: 0, direction: 'rollback' });
        listener.on({ type: 'after-sync', current: 3, target: 0, direction: 'rollback' });
        listener.on({ type: 'end' });

        expect(received).toEqual([
            ['start', {}],
            ['before-sync', { current: 3, target: 0, direction: 'rollback' }],
            ['after-sync', { current: 3, target: 0, direction: 'rollback' }],
            ['end', {}],
        ]);

    });

    it('should reduce versions to their number and description', () => {

        const received: unknown[] = [];

        observer.on('versioner:before-change', (data) => received.push(data));
        observer.on('versioner:after-change', (data) => received.push(data));

        const listener = new ObserverListener();
        const version = fakeVersion(4, []);

        listener.on({ type: 'before-change', version, direction: 'upgrade' });
        listener.on({ type: 'after-change', version, direction: 'upgrade' });

        expect(received).toEqual([
            { version: 4, description: 'version 4', direction: 'upgrade' },
            { version: 4, description: 'version 4', direction: 'upgrade' },
        ]);

    });

    it('should leave out a missing description', () => {

        const received: unknown[] = [];

        observer.on('versioner:after-change', (data) => received.push(data));

        const bare: Version = {
            number: 9,
            upgrade: async () => undefined,
            rollback: async () => undefined,
        };

        new ObserverListener().on({ type: 'after-change', version: bare, direction: 'upgrade' });

        expect(received).toEqual([{ version: 9, direction: 'upgrade' }]);

    });

    it('should forward errors with the failing version', () => {

        const received: unknown[] = [];
        const boom = new Error('boom');
        const lost = new Error('lost connection');

        observer.on('versioner:error-during-change', (data) => received.push(data));
        observer.on('versioner:error', (data) => received.push(data));

        const listener = new ObserverListener();

        listener.on({ type: 'error-during-change', version: fakeVersion(2, []), direction: 'rollback', error: boom });
        listener.on({ type: 'error', error: lost });

        expect(received).toEqual([
            { version: 2, description: 'version 2', direction: 'rollback', error: boom },
            { error: lost },
        ]);

    });

});
