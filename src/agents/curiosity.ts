/**
 * CuriosityExperimenter — a tabular Q-learner rewarded for being surprised.
 *
 * Each tick runs a full Observe → Learn → Decide → Report cycle:
 *   1. discretize the observed 3-vector into a foveated StateKey
 *   2. compare it with what the world model predicted for the last transition
 *   3. move the world model toward what actually happened
 *   4. shape the world's reward with the surprise (or novelty) signal
 *   5. Q-learning update for the previous (state, action)
 *   6. epsilon-greedy choice over the fixed action set, then decay epsilon
 *   7. map the choice to a per-axis perturbation
 *   8. remember this state and action for the next tick
 *   9. maybe publish an insight or a periodic status summary
 *
 * Only `state_vec` observations are understood; anything else yields a no-op,
 * leaves every table untouched and forgets the pending transition, since the
 * next state it sees is no longer one step away from the remembered one.
 */
import type { AgentObservation, Vec3 } from "../schemas/observations.js";
import type { AgentAction } from "../schemas/actions.js";
import { NOOP } from "../schemas/actions.js";
import type { DiscoveryEvent } from "../schemas/discovery.js";
import { CuriosityConfig } from "../schemas/config.js";
import type { CuriosityConfigInput } from "../schemas/config.js";
import { discretize, sanitize, distance } from "../learning/discretize.js";
import type { StateKey } from "../learning/discretize.js";
import { QTable } from "../learning/q-table.js";
import type { ActionId } from "../learning/q-table.js";
import { WorldModel } from "../learning/world-model.js";
import { VisitCounter, noveltyBonus } from "../learning/visits.js";
import { SeededRng, mathRandom, randomInt } from "../learning/rng.js";
import type { RandomSource } from "../learning/rng.js";
import type { Experimenter, ExperimenterResult } from "./experimenter.js";

/** Previous-state sentinel for the first tick: never present in any table. */
export const START_KEY: StateKey = "<start>";
export const START_ACTION: ActionId = -1;

/**
 * Discrete action ids. 0 is a no-op; 1..6 perturb one axis:
 * 1 = +x, 2 = -x, 3 = +y, 4 = -y, 5 = +z, 6 = -z.
 */
export const ACTION_IDS: readonly ActionId[] = [0, 1, 2, 3, 4, 5, 6];

export function actionFor(id: ActionId, magnitude: number): AgentAction {
    if (id < 1 || id > 6) return NOOP;
    const axis = Math.floor((id - 1) / 2);
    const sign = id % 2 === 1 ? 1 : -1;
    return { kind: "perturb", axis, delta: sign * magnitude };
}

export interface CuriosityExperimenterOptions {
    config?: CuriosityConfigInput;
    /** Overrides `config.seed`. */
    rng?: RandomSource;
}

/** Read-only view of the agent's learning progress. */
export interface CuriosityStats {
    explorationRate: number;
    /** Distinct StateKeys in the Q-table. */
    states: number;
    /** Stored (state, action) values in the Q-table. */
    qEntries: number;
    /** (state, action) transitions the world model has a prediction for. */
    transitions: number;
    /** Distinct states ever visited. */
    visitedStates: number;
    /** Surprise (or novelty) signal from the last handled tick. */
    lastSignal: number;
}

export class CuriosityExperimenter implements Experimenter {
    public readonly kind = "curiosity";
    public readonly config: CuriosityConfig;

    private explorationRate: number;
    private readonly rng: RandomSource;
    private readonly qTable = new QTable(ACTION_IDS);
    private readonly model = new WorldModel();
    private readonly visits = new VisitCounter();

    // Memory: written once per handled tick, read by the next one.
    private prevKey: StateKey = START_KEY;
    private prevAction: ActionId = START_ACTION;
    private prevState: Vec3 | null = null;
    private lastSignal = 0;

    constructor(opts: CuriosityExperimenterOptions = {}) {
        this.config = CuriosityConfig.parse(opts.config ?? {});
        this.explorationRate = Math.max(this.config.exploration_floor, this.config.exploration_rate);
        this.rng =
            opts.rng ?? (this.config.seed !== undefined ? new SeededRng(this.config.seed) : mathRandom);
    }

    act(observation: AgentObservation, reward: number, step: number): ExperimenterResult {
        if (observation.kind !== "state_vec") {
            this.forget();
            return { action: NOOP, discovery: null };
        }
        const cfg = this.config;

        // 1. Discretize
        const state = sanitize(observation.values, cfg.value_clamp);
        const key = discretize(state, cfg.foveal_scale);
        const visits = this.visits.visit(key);
        this.qTable.touch(key);

        // 2. Surprise against the learned prediction
        const predicted = this.model.predict(this.prevKey, this.prevAction);
        const surprise = predicted
            ? Math.min(cfg.surprise_cap, cfg.surprise_gain * distance(predicted, state))
            : cfg.first_visit_surprise;

        const hasTransition = this.prevState !== null;

        // 3. World model update
        if (hasTransition) {
            this.model.observe(this.prevKey, this.prevAction, state, cfg.model_smoothing);
        }

        // 4. Reward shaping
        const base = Number.isFinite(reward) ? reward : 0;
        const signal =
            cfg.reward_shaping === "novelty" ? noveltyBonus(visits, cfg.novelty_weight) : surprise;
        const effective = cfg.reward_shaping === "novelty" ? base * (1 + signal) : base + signal;
        this.lastSignal = signal;

        // 5. Learn
        if (hasTransition) {
            this.qTable.update(
                this.prevKey,
                this.prevAction,
                effective,
                key,
                cfg.learning_rate,
                cfg.discount_factor,
            );
        }

        // 6. Decide, then anneal
        const explore = this.rng.next() < this.explorationRate;
        const choice = explore
            ? ACTION_IDS[randomInt(this.rng, ACTION_IDS.length)] ?? 0
            : this.qTable.bestAction(key);
        this.explorationRate = Math.max(cfg.exploration_floor, this.explorationRate * cfg.exploration_decay);

        // 7 + 8. Map and remember
        const action = actionFor(choice, cfg.perturb_magnitude);
        const transition =
            this.prevKey === START_KEY ? `first observation of ${key}` : `transition ${this.prevKey} -> ${key}`;
        this.prevKey = key;
        this.prevAction = choice;
        this.prevState = state;

        // 9. Report
        return { action, discovery: this.report(signal, step, transition) };
    }

    stats(): CuriosityStats {
        return {
            explorationRate: this.explorationRate,
            states: this.qTable.size,
            qEntries: this.qTable.entryCount,
            transitions: this.model.size,
            visitedStates: this.visits.size,
            lastSignal: this.lastSignal,
        };
    }

    private forget(): void {
        this.prevKey = START_KEY;
        this.prevAction = START_ACTION;
        this.prevState = null;
    }

    private report(signal: number, step: number, transition: string): DiscoveryEvent | null {
        const cfg = this.config;
        const novelty = cfg.reward_shaping === "novelty";
        const threshold = novelty ? cfg.novelty_insight_threshold : cfg.insight_threshold;
        if (signal > threshold && step % cfg.report_interval === 0) {
            return novelty
                ? {
                    kind: "insight",
                    topic: "Novel state",
                    content: `Novelty ${signal.toFixed(2)} on ${transition}`,
                }
                : {
                    kind: "insight",
                    topic: "Anomaly",
                    content: `Prediction error ${signal.toFixed(2)} on ${transition}`,
                };
        }
        if (step > 0 && step % cfg.summary_interval === 0) {
            return {
                kind: "text",
                text:
                    `Tick ${step}: explored ${this.visits.size} distinct states, ` +
                    `modelled ${this.model.size} transitions, exploration rate ${this.explorationRate.toFixed(3)}.`,
            };
        }
        return null;
    }
}
