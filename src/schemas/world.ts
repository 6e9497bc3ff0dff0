/**
 * World Schemas — Render-only snapshots and runtime parameter values.
 */
import { z } from "zod/v4";
import { Vec3 } from "./observations.js";

export const StateSnapshot = z.discriminatedUnion("kind", [
    z.object({
        kind: z.literal("grid"),
        offset_x: z.number().int(),
        offset_y: z.number().int(),
        width: z.number().int().nonnegative(),
        height: z.number().int().nonnegative(),
        cells: z.array(z.boolean()),
    }),
    z.object({ kind: z.literal("points"), points: z.array(Vec3) }),
    z.object({
        kind: z.literal("float_grid"),
        width: z.number().int().nonnegative(),
        height: z.number().int().nonnegative(),
        /** Intensities in [0, 1]. */
        values: z.array(z.number()),
    }),
]);
export type StateSnapshot = z.infer<typeof StateSnapshot>;

/** Value accepted by World.setParam(). */
export const ParamValue = z.union([z.boolean(), z.number(), z.string()]);
export type ParamValue = z.infer<typeof ParamValue>;
