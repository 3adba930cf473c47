import { SelectorSettingsSchema, type SelectorLogger, type SelectorSettingsInput } from '../config.js';
import { SeededRng, type RandomSource } from '../util/rng.js';
import {
    buildCumulativeWeights,
    findCumulativeIndex,
    removeCumulativeAt,
    scaleFactor,
    totalScaledWeight,
} from './cumulative.js';
import { SelectorError } from './errors.js';
import { createItem, itemsEqual, type WeightedItem } from './item.js';
import { hasOption, SelectorOptions } from './options.js';

export interface WeightedBuilder<T> {
    add(item: WeightedItem<T>): void;
    add(value: T, weight: number): void;
    addMany(items: Iterable<WeightedItem<T>>): void;
    remove(item: WeightedItem<T>): boolean;
    clear(): void;
    build(): void;
}

export interface WeightedEngine<T> {
    select(): T;
    selectMany(count: number): T[];
}

type CacheState = 'clean' | 'dirty';

/**
 * Picks values with probability proportional to their weight.
 *
 * Weights are scaled to integers (`10 ** decimalPlaces`) and folded into a cumulative array that
 * is searched with a binary search. The array is rebuilt lazily, only when a selection runs after
 * the item list changed.
 */
export class WeightedRandomSelector<T> implements WeightedBuilder<T>, WeightedEngine<T> {
    readonly options: number;
    readonly decimalPlaces: number;
    readonly integerFactor: number;

    private readonly entries: WeightedItem<T>[] = [];
    private readonly rng: RandomSource;
    private readonly logger?: SelectorLogger;

    private state: CacheState = 'dirty';
    private cumulative: number[] = [];
    private total = 0;
    /** Resizable copy of `cumulative`, kept only when duplicates are disallowed. */
    private cumulativeList: number[] | null = null;

    constructor(settings: SelectorSettingsInput = {}, items?: Iterable<WeightedItem<T>>) {
        const parsed = SelectorSettingsSchema.parse(settings);
        this.options = parsed.options;
        this.decimalPlaces = parsed.decimalPlaces;
        this.integerFactor = scaleFactor(parsed.decimalPlaces);
        this.rng = parsed.rng ?? new SeededRng(parsed.seed);
        this.logger = parsed.logger;

        if (items) {
            this.addMany(items);
        }
    }

    get size(): number {
        return this.entries.length;
    }

    get items(): readonly WeightedItem<T>[] {
        return Object.freeze([...this.entries]);
    }

    get totalWeight(): number {
        this.build();
        return this.total;
    }

    get cumulativeWeights(): readonly number[] {
        this.build();
        return [...this.cumulative];
    }

    get isDirty(): boolean {
        return this.state === 'dirty';
    }

    private get allowsDuplicates(): boolean {
        return hasOption(this.options, SelectorOptions.AllowDuplicates);
    }

    add(item: WeightedItem<T>): void;
    add(value: T, weight: number): void;
    add(...args: [item: WeightedItem<T>] | [value: T, weight: number]): void {
        const item = args.length === 2 ? createItem(args[0], args[1]) : args[0];

        if (!Number.isFinite(item.weight) || item.weight <= 0) {
            const problem = Number.isFinite(item.weight) ? 'non-positive' : 'non-finite';
            if (hasOption(this.options, SelectorOptions.IgnoreZeroWeight)) {
                this.logger?.debug(`Ignoring item with ${problem} weight ${item.weight}`);
                return;
            }
            throw new SelectorError('InvalidWeight', `Weight must be finite and > 0, got ${item.weight}`);
        }

        this.entries.push(item);
        this.state = 'dirty';
    }

    /**
     * Adds each item in order. Items added before a failing one stay added.
     */
    addMany(items: Iterable<WeightedItem<T>>): void {
        for (const item of items) {
            this.add(item);
        }
    }

    /**
     * Removes the first item equal in both value and weight. Marks the index stale either way.
     */
    remove(item: WeightedItem<T>): boolean {
        this.state = 'dirty';
        const index = this.entries.findIndex((entry) => itemsEqual(entry, item));
        if (index === -1) {
            return false;
        }
        this.entries.splice(index, 1);
        return true;
    }

    clear(): void {
        this.state = 'dirty';
        this.entries.length = 0;
    }

    /**
     * Recomputes the cumulative weights if the items changed since the last build.
     */
    build(): void {
        if (this.state === 'clean') {
            return;
        }

        const { cumulative, total } = buildCumulativeWeights(this.entries, this.integerFactor);
        if (!Number.isSafeInteger(total)) {
            throw new SelectorError(
                'InvalidWeight',
                `Scaled total weight ${total} exceeds Number.MAX_SAFE_INTEGER; lower decimalPlaces (${this.decimalPlaces})`
            );
        }
        this.cumulative = cumulative;
        this.total = total;
        this.cumulativeList = this.allowsDuplicates ? null : [...cumulative];
        this.state = 'clean';

        this.logger?.debug(`Rebuilt cumulative weights: ${this.entries.length} items, total ${total}`);
    }

    select(): T {
        if (this.entries.length === 0) {
            throw new SelectorError('EmptyCollection', 'There are no items to select from');
        }
        this.build();
        this.warnIfZeroTotal(this.entries.length, this.total);
        return this.entries[this.drawIndex(this.entries, this.cumulative, this.total)].value;
    }

    selectMany(count: number): T[] {
        if (!Number.isInteger(count) || count <= 0) {
            throw new SelectorError('InvalidCount', `Count must be a positive integer, got ${count}`);
        }
        if (this.entries.length === 0) {
            throw new SelectorError('EmptyCollection', 'There are no items to select from');
        }
        if (!this.allowsDuplicates && count > this.entries.length) {
            throw new SelectorError(
                'InsufficientItems',
                `Cannot select ${count} distinct items from a collection of ${this.entries.length}`
            );
        }

        this.build();

        const result: T[] = [];
        if (this.allowsDuplicates) {
            this.warnIfZeroTotal(this.entries.length, this.total);
            for (let i = 0; i < count; i++) {
                result.push(this.entries[this.drawIndex(this.entries, this.cumulative, this.total)].value);
            }
            return result;
        }

        const items = [...this.entries];
        const weights = [...(this.cumulativeList ?? this.cumulative)];
        let warned = false;
        for (let i = 0; i < count && items.length > 0; i++) {
            const total = totalScaledWeight(items, this.integerFactor);
            if (!warned) {
                warned = this.warnIfZeroTotal(items.length, total);
            }
            const index = this.drawIndex(items, weights, total);
            result.push(items[index].value);
            items.splice(index, 1);
            removeCumulativeAt(weights, index);
        }
        return result;
    }

    private drawIndex(items: readonly WeightedItem<T>[], cumulative: readonly number[], total: number): number {
        if (items.length === 1) {
            return 0;
        }
        if (total === 0) {
            return this.rng.int(0, items.length - 1);
        }
        const roll = this.rng.int(1, total);
        return Math.min(findCumulativeIndex(cumulative, roll), items.length - 1);
    }

    private warnIfZeroTotal(count: number, total: number): boolean {
        if (total !== 0 || count < 2) {
            return false;
        }
        this.logger?.warn(`All ${count} weights scale to zero; picking uniformly`);
        return true;
    }
}
