/**
 * Observation Schemas — What a world reports each tick, and the smaller
 * vocabulary the agent actually reasons over.
 */
import { z } from "zod/v4";

/** A point in a continuous 3-dimensional state space. */
export const Vec3 = z.tuple([z.number(), z.number(), z.number()]);
export type Vec3 = z.infer<typeof Vec3>;

/**
 * Observation produced by an experimentable world.
 * Immutable snapshot; worlds build a fresh one per call to observe().
 */
export const WorldObservation = z.discriminatedUnion("kind", [
    z.object({
        kind: z.literal("grid_summary"),
        width: z.number().int().nonnegative(),
        height: z.number().int().nonnegative(),
        /** Live cell estimate. Not forwarded to the agent. */
        alive: z.number().int().nonnegative().optional(),
    }),
    z.object({ kind: z.literal("state_vec"), values: Vec3 }),
    z.object({ kind: z.literal("text"), text: z.string() }),
    z.object({ kind: z.literal("none") }),
]);
export type WorldObservation = z.infer<typeof WorldObservation>;

/** The agent-facing observation vocabulary. */
export const AgentObservation = z.discriminatedUnion("kind", [
    z.object({
        kind: z.literal("grid_summary"),
        width: z.number().int().nonnegative(),
        height: z.number().int().nonnegative(),
    }),
    z.object({ kind: z.literal("state_vec"), values: Vec3 }),
    z.object({ kind: z.literal("none") }),
]);
export type AgentObservation = z.infer<typeof AgentObservation>;
