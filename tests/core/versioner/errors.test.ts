/**
 * Sync error tests.
 */
import { describe, it, expect } from 'vitest';

import {
    ListenerVetoError,
    RollbackUnsupportedError,
    SyncError,
    VersionChangeError,
    VersionPersistError,
    VersionReadError,
    toError,
} from '../../../src/core/versioner/index.js';

describe('versioner: errors', () => {

    describe('toError', () => {

        it('should return errors unchanged', () => {

            const err = new Error('boom');

            expect(toError(err)).toBe(err);

        });

        it('should wrap strings and other values', () => {

            expect(toError('boom').message).toBe('boom');
            expect(toError(42).message).toBe('42');

        });

    });

    describe('messages', () => {

        const cause = new Error('timeout');
        const listenerError = new Error('log sink closed');

        it('should format a read error', () => {

            expect(new VersionReadError(cause).message).toBe('could not sync: timeout');
            expect(new VersionReadError(cause, listenerError).message)
                .toBe('could not sync (event error: log sink closed): timeout');

        });

        it('should format a change error per direction', () => {

            expect(new VersionChangeError('upgrade', 3, cause).message)
                .toBe('upgrade to version 3: timeout');
            expect(new VersionChangeError('rollback', 3, cause, listenerError).message)
                .toBe('rollback to version 3 (event error: log sink closed): timeout');

        });

        it('should format a persist error', () => {

            expect(new VersionPersistError(5, cause).message).toBe('sync version to 5: timeout');
            expect(new VersionPersistError(5, cause, listenerError).message)
                .toBe('sync version to 5 (event error: log sink closed): timeout');

        });

        it('should format a listener veto', () => {

            expect(new ListenerVetoError('before-change', cause, 2).message)
                .toBe('event before-change: timeout');

        });

        it('should format an unsupported rollback', () => {

            expect(new RollbackUnsupportedError(0).message).toBe('cannot rollback version 0');

        });

    });

    describe('classification', () => {

        it('should tag each sync error with its phase', () => {

            const cause = new Error('x');

            const errors: SyncError[] = [
                new ListenerVetoError('start', cause),
                new VersionReadError(cause),
                new VersionChangeError('upgrade', 1, cause),
                new VersionPersistError(1, cause),
            ];

            expect(errors.map((e) => e.phase)).toEqual(['event', 'read', 'change', 'persist']);
            expect(errors.map((e) => e.name)).toEqual([
                'ListenerVetoError',
                'VersionReadError',
                'VersionChangeError',
                'VersionPersistError',
            ]);
            expect(errors.every((e) => e.cause === cause)).toBe(true);

        });

        it('should not treat an unsupported rollback as a sync error', () => {

            expect(new RollbackUnsupportedError(1)).not.toBeInstanceOf(SyncError);

        });

    });

});
