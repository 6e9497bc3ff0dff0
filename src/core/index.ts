export { Session } from "./session.js";
export type { SessionEvents, SessionOptions } from "./session.js";
export { AutoPlayer } from "./autoplay.js";
export { toAgentObservation, toWorldAction } from "./bridge.js";
