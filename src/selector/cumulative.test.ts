import { describe, it, expect } from 'vitest';
import {
    buildCumulativeWeights,
    findCumulativeIndex,
    removeCumulativeAt,
    scaleFactor,
    scaleWeight,
    totalScaledWeight,
} from './cumulative.js';
import { createItem } from './item.js';

const SAMPLE = [
    createItem('A', 0.8),
    createItem('B', 15.0),
    createItem('C', 62.21),
    createItem('D', 32.5),
    createItem('E', 70.0),
];

describe('cumulative weights', () => {
    describe('scaling', () => {
        it('uses a power of ten per decimal place', () => {
            expect(scaleFactor(0)).toBe(1);
            expect(scaleFactor(2)).toBe(100);
            expect(scaleFactor(4)).toBe(10000);
        });

        it('truncates digits beyond the factor', () => {
            expect(scaleWeight(1.239, 100)).toBe(123);
            expect(scaleWeight(0.005, 100)).toBe(0);
            expect(scaleWeight(62.21, 100)).toBe(6221);
        });
    });

    describe('buildCumulativeWeights()', () => {
        it('folds scaled weights into a running sum', () => {
            const { cumulative, total } = buildCumulativeWeights(SAMPLE, 100);

            expect(cumulative).toEqual([80, 1580, 7801, 11051, 18051]);
            expect(total).toBe(18051);
        });

        it('returns an empty index for no items', () => {
            expect(buildCumulativeWeights([], 100)).toEqual({ cumulative: [], total: 0 });
        });

        it('yields all zeros when every weight scales to zero', () => {
            const items = [createItem('x', 0.001), createItem('y', 0.004)];

            expect(buildCumulativeWeights(items, 100)).toEqual({ cumulative: [0, 0], total: 0 });
        });

        it('is deterministic for the same input', () => {
            expect(buildCumulativeWeights(SAMPLE, 100)).toEqual(buildCumulativeWeights(SAMPLE, 100));
        });
    });

    describe('totalScaledWeight()', () => {
        it('matches the last cumulative entry', () => {
            expect(totalScaledWeight(SAMPLE, 100)).toBe(18051);
            expect(totalScaledWeight(SAMPLE.slice(1, 3), 100)).toBe(7721);
        });
    });

    describe('findCumulativeIndex()', () => {
        const cumulative = [80, 1580, 7801, 11051, 18051];

        it('resolves boundary rolls to the owning item', () => {
            expect(findCumulativeIndex(cumulative, 1)).toBe(0);
            expect(findCumulativeIndex(cumulative, 80)).toBe(0);
            expect(findCumulativeIndex(cumulative, 81)).toBe(1);
            expect(findCumulativeIndex(cumulative, 1580)).toBe(1);
            expect(findCumulativeIndex(cumulative, 1581)).toBe(2);
            expect(findCumulativeIndex(cumulative, 18051)).toBe(4);
        });

        it('returns the insertion point past the end for oversized rolls', () => {
            expect(findCumulativeIndex(cumulative, 18052)).toBe(5);
        });

        it('skips zero-width entries', () => {
            expect(findCumulativeIndex([0, 5, 5, 9], 1)).toBe(1);
            expect(findCumulativeIndex([0, 5, 5, 9], 5)).toBe(1);
            expect(findCumulativeIndex([0, 5, 5, 9], 6)).toBe(3);
        });
    });

    describe('removeCumulativeAt()', () => {
        it('shifts later entries down by the removed weight', () => {
            const weights = [80, 1580, 7801, 11051, 18051];
            removeCumulativeAt(weights, 1);

            expect(weights).toEqual([80, 6301, 9551, 16551]);
            expect(weights).toEqual(
                buildCumulativeWeights([SAMPLE[0], SAMPLE[2], SAMPLE[3], SAMPLE[4]], 100).cumulative
            );
        });

        it('handles the first and last entries', () => {
            const weights = [80, 1580, 7801, 11051, 18051];
            removeCumulativeAt(weights, 0);
            expect(weights).toEqual([1500, 7721, 10971, 17971]);

            removeCumulativeAt(weights, 3);
            expect(weights).toEqual([1500, 7721, 10971]);
        });

        it('ignores out-of-range indices', () => {
            const weights = [1, 2, 3];
            removeCumulativeAt(weights, 3);
            removeCumulativeAt(weights, -1);

            expect(weights).toEqual([1, 2, 3]);
        });
    });
});
