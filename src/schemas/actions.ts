/**
 * Action Schemas — Mutations an agent may ask a world to perform.
 *
 * The world-side and agent-side vocabularies share a shape today but are kept
 * as separate schemas so either side can grow without touching the other.
 */
import { z } from "zod/v4";

const FlipCell = z.object({
    kind: z.literal("flip_cell"),
    row: z.number().int().nonnegative(),
    col: z.number().int().nonnegative(),
});

const Perturb = z.object({
    kind: z.literal("perturb"),
    /** State axis index (0 = x, 1 = y, 2 = z). */
    axis: z.number().int().nonnegative(),
    delta: z.number(),
});

const SetParam = z.object({
    kind: z.literal("set_param"),
    name: z.string(),
    value: z.number(),
});

const Noop = z.object({ kind: z.literal("noop") });

/** Action consumed by a world's applyAction(). */
export const WorldAction = z.discriminatedUnion("kind", [FlipCell, Perturb, SetParam, Noop]);
export type WorldAction = z.infer<typeof WorldAction>;

/** Action chosen by an Experimenter. */
export const AgentAction = z.discriminatedUnion("kind", [FlipCell, Perturb, SetParam, Noop]);
export type AgentAction = z.infer<typeof AgentAction>;

export const NOOP = { kind: "noop" } as const satisfies AgentAction;
