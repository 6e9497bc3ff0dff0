/**
 * Per-state visit counts, used for the novelty bonus and for reporting.
 */
import type { StateKey } from "./discretize.js";

export class VisitCounter {
    private counts = new Map<StateKey, number>();

    /** Number of distinct states ever visited. */
    get size(): number {
        return this.counts.size;
    }

    /** Record a visit and return the new count. */
    visit(key: StateKey): number {
        const n = (this.counts.get(key) ?? 0) + 1;
        this.counts.set(key, n);
        return n;
    }

    count(key: StateKey): number {
        return this.counts.get(key) ?? 0;
    }
}

/** weight / visits, with visits floored at 1. */
export function noveltyBonus(visits: number, weight: number): number {
    return weight / Math.max(1, visits);
}
