/**
 * Random sources for exploration.
 *
 * Agents take a RandomSource instead of calling Math.random directly so
 * tests can force the explore or exploit branch.
 */

export interface RandomSource {
    /** Uniform number in [0, 1). */
    next(): number;
}

/** Mulberry32 PRNG. Same seed, same sequence. */
export class SeededRng implements RandomSource {
    private state: number;

    constructor(seed: number) {
        this.state = seed >>> 0;
    }

    next(): number {
        let t = (this.state = (this.state + 0x6d2b79f5) >>> 0);
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }
}

export const mathRandom: RandomSource = { next: () => Math.random() };

/** Integer in [0, n) drawn from any RandomSource. */
export function randomInt(rng: RandomSource, n: number): number {
    // Guard against sources that return exactly 1.
    return Math.min(n - 1, Math.floor(rng.next() * n));
}
