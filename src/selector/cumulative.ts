import type { WeightedItem } from './item.js';

export interface CumulativeWeights {
    cumulative: number[];
    total: number;
}

/** Integer factor that weights are multiplied by before truncation. */
export function scaleFactor(decimalPlaces: number): number {
    return 10 ** decimalPlaces;
}

/**
 * Converts a weight to an integer at the given factor. Digits past the factor's precision are dropped.
 */
export function scaleWeight(weight: number, factor: number): number {
    return Math.trunc(weight * factor);
}

/**
 * Builds the running sum of scaled weights, one entry per item, in item order.
 */
export function buildCumulativeWeights<T>(items: readonly WeightedItem<T>[], factor: number): CumulativeWeights {
    const cumulative = new Array<number>(items.length);
    let running = 0;
    for (let i = 0; i < items.length; i++) {
        running += scaleWeight(items[i].weight, factor);
        cumulative[i] = running;
    }
    return { cumulative, total: running };
}

export function totalScaledWeight<T>(items: readonly WeightedItem<T>[], factor: number): number {
    let total = 0;
    for (const item of items) {
        total += scaleWeight(item.weight, factor);
    }
    return total;
}

/**
 * Returns the smallest index whose cumulative value is >= `roll`, i.e. the leftmost insertion point.
 * Returns `cumulative.length` when `roll` exceeds every entry.
 */
export function findCumulativeIndex(cumulative: readonly number[], roll: number): number {
    let lo = 0;
    let hi = cumulative.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        if (cumulative[mid] < roll) {
            lo = mid + 1;
        } else {
            hi = mid;
        }
    }
    return lo;
}

/**
 * Removes entry `index` from a working cumulative list and shifts every later entry down by the
 * removed item's scaled weight, so the list still describes the remaining items.
 */
export function removeCumulativeAt(cumulative: number[], index: number): void {
    if (index < 0 || index >= cumulative.length) {
        return;
    }
    const removed = cumulative[index] - (index > 0 ? cumulative[index - 1] : 0);
    cumulative.splice(index, 1);
    if (removed === 0) {
        return;
    }
    for (let i = index; i < cumulative.length; i++) {
        cumulative[i] -= removed;
    }
}
