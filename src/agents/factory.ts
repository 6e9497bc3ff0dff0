/**
 * Experimenter factory — selects an implementation by tag at construction time.
 */
import { NoopExperimenter, ObserverExperimenter, ScheduledExperimenter } from "./baselines.js";
import { CuriosityExperimenter } from "./curiosity.js";
import type { CuriosityExperimenterOptions } from "./curiosity.js";
import type { Experimenter } from "./experimenter.js";
import { UnknownExperimenterError } from "../errors/index.js";

export const EXPERIMENTER_KINDS = ["noop", "observer", "scheduled", "curiosity"] as const;
export type ExperimenterKind = (typeof EXPERIMENTER_KINDS)[number];

/** Options are only read by the learning experimenters. */
export type ExperimenterOptions = CuriosityExperimenterOptions;

export function createExperimenter(kind: string, options: ExperimenterOptions = {}): Experimenter {
    switch (kind) {
        case "noop":
            return new NoopExperimenter();
        case "observer":
            return new ObserverExperimenter();
        case "scheduled":
            return new ScheduledExperimenter();
        case "curiosity":
            return new CuriosityExperimenter(options);
        default:
            throw new UnknownExperimenterError(kind, EXPERIMENTER_KINDS);
    }
}
