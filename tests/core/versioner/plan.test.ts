/**
 * Version selection tests.
 */
import { describe, it, expect } from 'vitest';

import {
    lastVersionOf,
    selectVersions,
    sortVersions,
    syncDirection,
} from '../../../src/core/versioner/index.js';
import { fakeVersion, fakeVersions } from '../../support/versions.js';

const numbers = (versions: { number: number }[]): number[] => versions.map((v) => v.number);

describe('versioner: plan', () => {

    describe('syncDirection', () => {

        it('should roll back only when the target is below the current version', () => {

            expect(syncDirection(3, 1)).toBe('rollback');
            expect(syncDirection(1, 3)).toBe('upgrade');
            expect(syncDirection(2, 2)).toBe('upgrade');
            expect(syncDirection(-1, 0)).toBe('upgrade');

        });

    });

    describe('sortVersions', () => {

        it('should sort ascending in place', () => {

            const versions = fakeVersions([4, 0, 2, 1], []);

            const sorted = sortVersions(versions);

            expect(sorted).toBe(versions);
            expect(numbers(versions)).toEqual([0, 1, 2, 4]);

        });

        it('should keep the insertion order of duplicates', () => {

            const first = fakeVersion(1, []);
            const second = fakeVersion(1, []);
            const versions = [fakeVersion(2, []), first, second];

            sortVersions(versions);

            expect(versions[0]).toBe(first);
            expect(versions[1]).toBe(second);

        });

    });

    describe('selectVersions', () => {

        const sorted = fakeVersions([0, 1, 2, 3, 4], []);

        it('should select the open upgrade window ascending', () => {

            expect(numbers(selectVersions(sorted, 0, 4))).toEqual([1, 2, 3]);
            expect(numbers(selectVersions(sorted, -1, 2))).toEqual([0, 1]);

        });

        it('should select the open rollback window descending', () => {

            expect(numbers(selectVersions(sorted, 4, 0))).toEqual([3, 2, 1]);
            expect(numbers(selectVersions(sorted, 3, 0))).toEqual([2, 1]);

        });

        it('should select nothing between adjacent versions', () => {

            expect(selectVersions(sorted, 2, 3)).toEqual([]);
            expect(selectVersions(sorted, 3, 2)).toEqual([]);

        });

        it('should not reorder the input', () => {

            selectVersions(sorted, 4, 0);

            expect(numbers(sorted)).toEqual([0, 1, 2, 3, 4]);

        });

    });

    describe('lastVersionOf', () => {

        it('should return 0 for no versions', () => {

            expect(lastVersionOf([])).toBe(0);

        });

        it('should return the highest number', () => {

            expect(lastVersionOf(fakeVersions([3, 9, 1], []))).toBe(9);

        });

    });

});
