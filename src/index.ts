export { WeightedRandomSelector } from './selector/selector.js';
export type { WeightedBuilder, WeightedEngine } from './selector/selector.js';
export { SelectorOptions, DEFAULT_OPTIONS, hasOption } from './selector/options.js';
export { createItem, toTuple, fromTuple, itemsEqual } from './selector/item.js';
export type { WeightedItem, WeightedTuple } from './selector/item.js';
export { SelectorError, isSelectorError } from './selector/errors.js';
export type { SelectorErrorCode } from './selector/errors.js';
export { buildCumulativeWeights, findCumulativeIndex, scaleFactor, scaleWeight } from './selector/cumulative.js';
export type { CumulativeWeights } from './selector/cumulative.js';
export { SeededRng } from './util/rng.js';
export type { RandomSource } from './util/rng.js';
export { loadSelectorSettings, SelectorSettingsSchema } from './config.js';
export type { SelectorSettings, SelectorSettingsInput, SelectorLogger } from './config.js';
