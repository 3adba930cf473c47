/**
 * Bit flags controlling selector behaviour. Combine with `|`.
 */
export enum SelectorOptions {
    None = 0,
    /** A value may be returned more than once by `selectMany`. */
    AllowDuplicates = 1 << 0,
    /** Items with weight <= 0 are dropped on add instead of rejected. */
    IgnoreZeroWeight = 1 << 1,
}

export const DEFAULT_OPTIONS = SelectorOptions.AllowDuplicates | SelectorOptions.IgnoreZeroWeight;

export const ALL_OPTIONS = SelectorOptions.AllowDuplicates | SelectorOptions.IgnoreZeroWeight;

export function hasOption(options: number, flag: SelectorOptions): boolean {
    return (options & flag) === flag;
}
