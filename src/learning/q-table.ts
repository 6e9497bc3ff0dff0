/**
 * Tabular action-value function over a fixed action set.
 *
 * Rows are created on first sight and never removed; missing entries read as 0.
 */
import type { StateKey } from "./discretize.js";

export type ActionId = number;

export class QTable {
    public readonly actions: readonly ActionId[];
    private rows = new Map<StateKey, Map<ActionId, number>>();

    constructor(actions: readonly ActionId[]) {
        this.actions = actions;
    }

    /** Number of distinct states with a row. */
    get size(): number {
        return this.rows.size;
    }

    /** Number of stored (state, action) values across all rows. */
    get entryCount(): number {
        let n = 0;
        for (const row of this.rows.values()) n += row.size;
        return n;
    }

    has(key: StateKey): boolean {
        return this.rows.has(key);
    }

    /** Make sure a row exists for the key (a visited state with no values yet). */
    touch(key: StateKey): void {
        if (!this.rows.has(key)) this.rows.set(key, new Map());
    }

    get(key: StateKey, action: ActionId): number {
        return this.rows.get(key)?.get(action) ?? 0;
    }

    /** max over the action set of Q[key][a]. */
    maxValue(key: StateKey): number {
        return this.get(key, this.bestAction(key));
    }

    /** Greedy action; ties go to the earliest action in the set. */
    bestAction(key: StateKey): ActionId {
        let best = this.actions[0] ?? 0;
        let bestValue = this.get(key, best);
        for (const action of this.actions) {
            const value = this.get(key, action);
            if (value > bestValue) {
                best = action;
                bestValue = value;
            }
        }
        return best;
    }

    /**
     * One-step Q-learning update:
     *   Q[s][a] += alpha * (reward + gamma * max Q[next] - Q[s][a])
     * A non-finite result leaves the entry untouched. Returns the stored value.
     */
    update(
        key: StateKey,
        action: ActionId,
        reward: number,
        nextKey: StateKey,
        alpha: number,
        gamma: number,
    ): number {
        const current = this.get(key, action);
        const target = reward + gamma * this.maxValue(nextKey);
        const updated = current + alpha * (target - current);
        this.touch(key);
        if (!Number.isFinite(updated)) return current;
        this.rows.get(key)?.set(action, updated);
        return updated;
    }
}
