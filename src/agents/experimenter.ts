/**
 * Experimenter — the capability every agent driven by a Session implements.
 *
 * Implementations are stateful across calls and owned by exactly one Session.
 */
import type { AgentObservation } from "../schemas/observations.js";
import type { AgentAction } from "../schemas/actions.js";
import type { DiscoveryEvent } from "../schemas/discovery.js";

export interface ExperimenterResult {
    action: AgentAction;
    /** At most one discovery per tick. */
    discovery: DiscoveryEvent | null;
}

export interface Experimenter {
    /** Factory tag this experimenter was built from. */
    readonly kind: string;
    /**
     * Observe, learn and decide.
     * @param reward World-defined reward for the current state.
     * @param step Number of ticks the session completed before this one.
     */
    act(observation: AgentObservation, reward: number, step: number): ExperimenterResult;
}
