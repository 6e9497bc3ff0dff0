/**
 * Schema barrel export — all Zod schemas and inferred types.
 */

// Observations
export { Vec3, WorldObservation, AgentObservation } from "./observations.js";

// Actions
export { WorldAction, AgentAction, NOOP } from "./actions.js";

// Discoveries
export { DiscoveryEvent, DiscoveryWire, toDiscoveryWire, fromDiscoveryWire } from "./discovery.js";

// World
export { StateSnapshot, ParamValue } from "./world.js";

// Configuration
export { CuriosityConfig, PlaybackConfig, LabConfig } from "./config.js";
export type { CuriosityConfigInput, PlaybackConfigInput } from "./config.js";
