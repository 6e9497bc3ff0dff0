/**
 * Learned one-step forward model: (state, action) -> expected next state.
 */
import type { Vec3 } from "../schemas/observations.js";
import type { StateKey } from "./discretize.js";
import type { ActionId } from "./q-table.js";

export class WorldModel {
    private predictions = new Map<string, Vec3>();

    get size(): number {
        return this.predictions.size;
    }

    predict(key: StateKey, action: ActionId): Vec3 | undefined {
        const p = this.predictions.get(transitionKey(key, action));
        return p ? [...p] : undefined;
    }

    /**
     * Move the prediction toward the observed next state by `weight`
     * (exponential moving average). The first observation is stored as is.
     */
    observe(key: StateKey, action: ActionId, actual: Vec3, weight: number): Vec3 {
        const id = transitionKey(key, action);
        const prev = this.predictions.get(id);
        const next: Vec3 = prev
            ? [
                prev[0] + weight * (actual[0] - prev[0]),
                prev[1] + weight * (actual[1] - prev[1]),
                prev[2] + weight * (actual[2] - prev[2]),
            ]
            : [...actual];
        this.predictions.set(id, next);
        return [...next];
    }
}

function transitionKey(key: StateKey, action: ActionId): string {
    return `${key}|${action}`;
}
