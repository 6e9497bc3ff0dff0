/**
 * Agents barrel export.
 */
export type { Experimenter, ExperimenterResult } from "./experimenter.js";

export { NoopExperimenter, ObserverExperimenter, ScheduledExperimenter } from "./baselines.js";

export { CuriosityExperimenter, ACTION_IDS, START_KEY, START_ACTION, actionFor } from "./curiosity.js";
export type { CuriosityExperimenterOptions, CuriosityStats } from "./curiosity.js";

export { createExperimenter, EXPERIMENTER_KINDS } from "./factory.js";
export type { ExperimenterKind, ExperimenterOptions } from "./factory.js";
