/**
 * worldlab — Public API
 *
 * An experimentation loop that pairs an evolving world with an autonomous,
 * curiosity-driven scientist agent.
 */

// Core
export { Session, AutoPlayer, toAgentObservation, toWorldAction } from "./core/index.js";
export type { SessionEvents, SessionOptions } from "./core/index.js";

// Agents
export {
    NoopExperimenter,
    ObserverExperimenter,
    ScheduledExperimenter,
    CuriosityExperimenter,
    createExperimenter,
    EXPERIMENTER_KINDS,
    ACTION_IDS,
    actionFor,
} from "./agents/index.js";
export type {
    Experimenter,
    ExperimenterResult,
    ExperimenterKind,
    ExperimenterOptions,
    CuriosityExperimenterOptions,
    CuriosityStats,
} from "./agents/index.js";

// Learning
export { discretize, foveate, QTable, WorldModel, VisitCounter, SeededRng } from "./learning/index.js";
export type { StateKey, ActionId, RandomSource } from "./learning/index.js";

// Worlds
export { AttractorWorld, createWorld, WORLD_KINDS } from "./worlds/index.js";
export type { World, Experimentable } from "./worlds/index.js";

// Schemas
export {
    Vec3,
    WorldObservation,
    AgentObservation,
    WorldAction,
    AgentAction,
    DiscoveryEvent,
    DiscoveryWire,
    toDiscoveryWire,
    fromDiscoveryWire,
    StateSnapshot,
    ParamValue,
    CuriosityConfig,
    PlaybackConfig,
    LabConfig,
} from "./schemas/index.js";

// Errors
export {
    UnknownExperimenterError,
    UnknownWorldError,
    OverlappingTickError,
    ConfigFileError,
} from "./errors/index.js";
