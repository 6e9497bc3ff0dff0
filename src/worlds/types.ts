/**
 * World boundary — the dynamical systems a Session drives.
 *
 * A world is a black box: the core only steps it, reads a render snapshot and,
 * when the world opts in, experiments on it through the Experimentable handle.
 */
import type { WorldObservation } from "../schemas/observations.js";
import type { WorldAction } from "../schemas/actions.js";
import type { StateSnapshot, ParamValue } from "../schemas/world.js";

/** Optional capability: a world that accepts an agent's actions. */
export interface Experimentable {
    observe(): WorldObservation;
    applyAction(action: WorldAction): void;
    /** World-defined scalar, e.g. a stability or survival measure. */
    reward(): number;
}

export interface World {
    /** Advance the world by one step. */
    step(): void;
    /** Render-only view of the current state. Must not mutate the world. */
    getState(): StateSnapshot;
    /** Best-effort parameter change; unknown keys and mistyped values are ignored. */
    setParam(key: string, value: ParamValue): void;
    /** The experimentable handle, or null for worlds that only evolve on their own. */
    asExperimentable(): Experimentable | null;
}
