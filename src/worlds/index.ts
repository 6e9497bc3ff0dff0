/**
 * World registry — construct a reference world by tag.
 */
import { AttractorWorld } from "./attractor.js";
import type { World } from "./types.js";
import { UnknownWorldError } from "../errors/index.js";

export const WORLD_KINDS = ["lorenz", "rossler"] as const;
export type WorldKind = (typeof WORLD_KINDS)[number];

export function createWorld(kind: string): World {
    switch (kind) {
        case "lorenz":
            return new AttractorWorld("lorenz");
        case "rossler":
            return new AttractorWorld("rossler");
        default:
            throw new UnknownWorldError(kind, WORLD_KINDS);
    }
}

export { AttractorWorld, MAX_TAIL } from "./attractor.js";
export type { AttractorSystem, AttractorParams } from "./attractor.js";
export type { World, Experimentable } from "./types.js";
