import seedrandom from 'seedrandom';

/**
 * Minimal random source a selector draws from. Tests can script it.
 */
export interface RandomSource {
    /** Returns a random float in [0, 1). */
    random(): number;
    /** Returns a random integer in [min, max] (inclusive). */
    int(min: number, max: number): number;
}

/**
 * Seeded random number generator. Omitting the seed auto-seeds from entropy.
 */
export class SeededRng implements RandomSource {
    private rng: seedrandom.PRNG;

    constructor(seed?: number | string) {
        this.rng = seed === undefined ? seedrandom() : seedrandom(String(seed));
    }

    random(): number {
        return this.rng();
    }

    int(min: number, max: number): number {
        return Math.floor(this.random() * (max - min + 1)) + min;
    }
}
