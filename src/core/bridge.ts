/**
 * Observation/Action Bridge — pure translation between a world's vocabulary
 * and the agent's.
 *
 * Both functions are total: anything that does not validate against the
 * schemas maps to the agent's `none` or the world's `noop`, so an agent can be
 * attached to any world that speaks the shared vocabulary.
 */
import { WorldObservation } from "../schemas/observations.js";
import type { AgentObservation } from "../schemas/observations.js";
import { AgentAction } from "../schemas/actions.js";
import type { WorldAction } from "../schemas/actions.js";

export function toAgentObservation(obs: unknown): AgentObservation {
    const parsed = WorldObservation.safeParse(obs);
    if (!parsed.success) return { kind: "none" };

    const o = parsed.data;
    switch (o.kind) {
        case "grid_summary":
            return { kind: "grid_summary", width: o.width, height: o.height };
        case "state_vec":
            return { kind: "state_vec", values: [...o.values] };
        default:
            return { kind: "none" };
    }
}

export function toWorldAction(action: unknown): WorldAction {
    const parsed = AgentAction.safeParse(action);
    if (!parsed.success) return { kind: "noop" };

    const a = parsed.data;
    switch (a.kind) {
        case "flip_cell":
            return { kind: "flip_cell", row: a.row, col: a.col };
        case "perturb":
            return { kind: "perturb", axis: a.axis, delta: a.delta };
        case "set_param":
            return { kind: "set_param", name: a.name, value: a.value };
        default:
            return { kind: "noop" };
    }
}
