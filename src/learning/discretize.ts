/**
 * Foveated state abstraction.
 *
 * Continuous states are bucketed on a logarithmic scale per axis: fine buckets
 * near the origin, coarse ones far away. The resulting StateKey is the hashing
 * key for every learned table.
 */
import type { Vec3 } from "../schemas/observations.js";

/** Canonical discretized state, e.g. "3,-1,0". */
export type StateKey = string;

/** sign(v) * round(ln(1 + |v|) * scale). Symmetric around zero. */
export function foveate(value: number, scale: number): number {
    const bucket = Math.round(Math.log1p(Math.abs(value)) * scale);
    // Never -0, so "0" keys stay canonical.
    return value < 0 && bucket !== 0 ? -bucket : bucket;
}

export function discretize(state: Vec3, scale: number): StateKey {
    return state.map((v) => foveate(v, scale)).join(",");
}

/**
 * Replace non-finite components and clamp to ±limit so nothing degenerate
 * reaches a table. NaN becomes 0, ±Infinity becomes ±limit.
 */
export function sanitize(state: readonly number[], limit: number): Vec3 {
    const clean = (v: number | undefined): number => {
        if (v === undefined || Number.isNaN(v)) return 0;
        return Math.max(-limit, Math.min(limit, v));
    };
    return [clean(state[0]), clean(state[1]), clean(state[2])];
}

export function distance(a: Vec3, b: Vec3): number {
    return Math.hypot(a[0] - b[0], a[1] - b[1], a[2] - b[2]);
}
