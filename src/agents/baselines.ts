/**
 * Baseline experimenters — controls for tests and for worlds where learning
 * is undesired.
 */
import type { AgentObservation } from "../schemas/observations.js";
import type { AgentAction } from "../schemas/actions.js";
import { NOOP } from "../schemas/actions.js";
import type { Experimenter, ExperimenterResult } from "./experimenter.js";

/** Always does nothing and never reports. */
export class NoopExperimenter implements Experimenter {
    public readonly kind = "noop";

    act(): ExperimenterResult {
        return { action: NOOP, discovery: null };
    }
}

/**
 * Does nothing, but remembers what the loop fed it.
 * Useful to check which observation, reward and step a Session passes along.
 */
export class ObserverExperimenter implements Experimenter {
    public readonly kind = "observer";
    public observations = 0;
    public lastObservation: AgentObservation | null = null;
    public lastReward: number | null = null;
    public lastStep: number | null = null;

    act(observation: AgentObservation, reward: number, step: number): ExperimenterResult {
        this.observations++;
        this.lastObservation = observation;
        this.lastReward = reward;
        this.lastStep = step;
        return { action: NOOP, discovery: null };
    }
}

/** Fixed-schedule intervention periods for ScheduledExperimenter. */
export const GRID_POKE_INTERVAL = 60;
export const VECTOR_KICK_INTERVAL = 30;
export const STATUS_INTERVAL = 120;

/**
 * Scripted scientist: pokes the world on a fixed schedule instead of learning.
 *   - grid worlds: birth the centre cell every 60 steps
 *   - vector worlds: kick axis 0 by +2 every 30 steps
 *   - every 120 steps (after the first) a status line
 */
export class ScheduledExperimenter implements Experimenter {
    public readonly kind = "scheduled";

    act(observation: AgentObservation, _reward: number, step: number): ExperimenterResult {
        let action: AgentAction = NOOP;
        if (observation.kind === "grid_summary" && step % GRID_POKE_INTERVAL === 0) {
            action = {
                kind: "flip_cell",
                row: Math.floor(observation.height / 2),
                col: Math.floor(observation.width / 2),
            };
        } else if (observation.kind === "state_vec" && step % VECTOR_KICK_INTERVAL === 0) {
            action = { kind: "perturb", axis: 0, delta: 2 };
        }

        const discovery =
            step > 0 && step % STATUS_INTERVAL === 0
                ? { kind: "text" as const, text: `Scientist: tick ${step} shows interesting stability.` }
                : null;

        return { action, discovery };
    }
}
