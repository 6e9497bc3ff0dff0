/**
 * Configuration — All tunable parameters of the agent, the playback driver
 * and the CLI lab file.
 */
import { z } from "zod/v4";

/**
 * Hyperparameters of the curiosity-driven agent.
 * Everything except the exploration rate is fixed for the agent's lifetime.
 */
export const CuriosityConfig = z.object({
    // --- Exploration ---
    /** Initial probability of taking a uniformly random action. */
    exploration_rate: z.number().min(0).max(1).default(0.3),
    /** The exploration rate never decays below this. */
    exploration_floor: z.number().min(0).max(1).default(0.05),
    /** Multiplicative decay applied to the exploration rate each tick. */
    exploration_decay: z.number().gt(0).max(1).default(0.999),

    // --- Learning ---
    learning_rate: z.number().gt(0).max(1).default(0.1),
    discount_factor: z.number().min(0).lt(1).default(0.9),

    // --- State abstraction ---
    /** Buckets per unit of ln(1 + |v|); larger means finer keys. */
    foveal_scale: z.number().positive().default(2),
    /** Components are clamped to ±value_clamp before discretization. */
    value_clamp: z.number().positive().default(1e6),

    // --- Actions ---
    /** Size of the perturbation applied by every non-noop action. */
    perturb_magnitude: z.number().positive().default(1),

    // --- Surprise and novelty ---
    surprise_gain: z.number().nonnegative().default(1),
    surprise_cap: z.number().nonnegative().default(10),
    /** Bonus for a (state, action) pair the world model has never seen. */
    first_visit_surprise: z.number().nonnegative().default(1),
    /** Weight of a new observation in the world model's moving average. */
    model_smoothing: z.number().gt(0).max(1).default(0.2),
    /**
     * "surprise": effective = base + surprise.
     * "novelty":  effective = base * (1 + novelty_weight / visits).
     */
    reward_shaping: z.enum(["surprise", "novelty"]).default("surprise"),
    novelty_weight: z.number().nonnegative().default(1),

    // --- Reporting ---
    /** Surprise above this is reported as an anomaly. */
    insight_threshold: z.number().nonnegative().default(3),
    /** Novelty bonus above this is reported as a novel state; keep it below novelty_weight. */
    novelty_insight_threshold: z.number().nonnegative().default(0.5),
    report_interval: z.number().int().positive().default(10),
    summary_interval: z.number().int().positive().default(500),

    /** Seed for the exploration RNG. Unseeded agents use Math.random. */
    seed: z.number().int().optional(),
});
export type CuriosityConfig = z.infer<typeof CuriosityConfig>;
export type CuriosityConfigInput = z.input<typeof CuriosityConfig>;

/** Real-time playback: how many ticks per second and how far to catch up. */
export const PlaybackConfig = z.object({
    ticks_per_second: z.number().min(1).max(60).default(30),
    /** Maximum ticks run for a single elapsed-time callback. */
    max_catch_up: z.number().int().positive().default(5),
});
export type PlaybackConfig = z.infer<typeof PlaybackConfig>;
export type PlaybackConfigInput = z.input<typeof PlaybackConfig>;

/** The lab file read by `worldlab run` (worldlab.config.json). */
export const LabConfig = z.object({
    world: z.string().default("lorenz"),
    agent: z.string().default("curiosity"),
    ticks: z.number().int().positive().default(1000),
    seed: z.number().int().optional(),
    /** Number of discoveries kept in the feed. */
    feed_capacity: z.number().int().positive().default(50),
    curiosity: CuriosityConfig.partial().default({}),
    playback: PlaybackConfig.partial().default({}),
});
export type LabConfig = z.infer<typeof LabConfig>;
