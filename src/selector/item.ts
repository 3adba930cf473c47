/**
 * A value paired with its relative selection weight.
 */
export interface WeightedItem<T> {
    readonly value: T;
    readonly weight: number;
}

export type WeightedTuple<T> = readonly [value: T, weight: number];

export function createItem<T>(value: T, weight: number): WeightedItem<T> {
    return Object.freeze({ value, weight });
}

/** Splits an item into a `[value, weight]` tuple. */
export function toTuple<T>(item: WeightedItem<T>): WeightedTuple<T> {
    return [item.value, item.weight];
}

export function fromTuple<T>([value, weight]: WeightedTuple<T>): WeightedItem<T> {
    return createItem(value, weight);
}

/**
 * Structural equality: same value (Object.is) and same weight.
 */
export function itemsEqual<T>(a: WeightedItem<T>, b: WeightedItem<T>): boolean {
    return Object.is(a.value, b.value) && a.weight === b.weight;
}
