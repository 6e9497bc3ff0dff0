/**
 * Session — drives one world and one experimenter, one tick at a time.
 *
 * Each tick: Observe → Reward → Act → Apply → Step. The agent is only
 * consulted when the world exposes its Experimentable handle; otherwise the
 * world just steps on its own.
 */
import { EventEmitter } from "events";
import { v4 as uuidv4 } from "uuid";
import type { World } from "../worlds/types.js";
import type { Experimenter } from "../agents/experimenter.js";
import type { DiscoveryEvent } from "../schemas/discovery.js";
import type { StateSnapshot } from "../schemas/world.js";
import { toAgentObservation, toWorldAction } from "./bridge.js";
import { OverlappingTickError } from "../errors/index.js";

/** Supported events emitted by a Session. */
export interface SessionEvents {
    "tick:complete": [{ sessionId: string; step: number; experimented: boolean; discovery: DiscoveryEvent | null }];
    discovery: [{ sessionId: string; step: number; event: DiscoveryEvent }];
}

export interface SessionOptions {
    /** Defaults to a random UUID. */
    id?: string;
}

export class Session extends EventEmitter<SessionEvents> {
    public readonly id: string;
    private readonly world: World;
    private readonly agent: Experimenter;
    private steps = 0;
    private ticking = false;

    constructor(world: World, agent: Experimenter, options: SessionOptions = {}) {
        super();
        this.world = world;
        this.agent = agent;
        this.id = options.id ?? uuidv4();
    }

    /** Ticks completed so far. */
    get stepCount(): number {
        return this.steps;
    }

    /** Tag of the experimenter driving this session. */
    get agentKind(): string {
        return this.agent.kind;
    }

    /**
     * Run one full tick and return the agent's discovery, if it had one.
     */
    tick(): DiscoveryEvent | null {
        if (this.ticking) throw new OverlappingTickError(this.id, this.steps);
        this.ticking = true;

        let discovery: DiscoveryEvent | null = null;
        let experimented = false;
        try {
            // 1-3. Observe, act, apply (experimentable worlds only)
            const lab = this.world.asExperimentable();
            if (lab) {
                const observation = toAgentObservation(lab.observe());
                const reward = lab.reward();
                const result = this.agent.act(observation, reward, this.steps);
                discovery = result.discovery;
                lab.applyAction(toWorldAction(result.action));
                experimented = true;
            }

            // 4. Advance the world
            this.world.step();
            this.steps++;
        } finally {
            this.ticking = false;
        }

        // Listeners run after the tick is complete.
        const step = this.steps - 1;
        this.emit("tick:complete", { sessionId: this.id, step, experimented, discovery });
        if (discovery) this.emit("discovery", { sessionId: this.id, step, event: discovery });
        return discovery;
    }

    /** Run `n` ticks and collect every discovery, in order. */
    run(n: number): DiscoveryEvent[] {
        const found: DiscoveryEvent[] = [];
        for (let i = 0; i < n; i++) {
            const d = this.tick();
            if (d) found.push(d);
        }
        return found;
    }

    /** Always the world's latest state; nothing is cached. */
    getState(): StateSnapshot {
        return this.world.getState();
    }
}
