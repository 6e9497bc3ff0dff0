/**
 * AutoPlayer — turns elapsed wall time into a bounded number of ticks.
 *
 * The player never schedules anything itself: a host (render loop, timer)
 * calls advance() with the time since its last call. Work per call is capped
 * at `max_catch_up` ticks and any backlog beyond that is dropped, so a slow
 * host never builds up unbounded work.
 */
import type { Session } from "./session.js";
import type { DiscoveryEvent } from "../schemas/discovery.js";
import { PlaybackConfig } from "../schemas/config.js";
import type { PlaybackConfigInput } from "../schemas/config.js";

export class AutoPlayer {
    public readonly config: PlaybackConfig;
    private readonly session: Session;
    private accumulatorMs = 0;
    private playing = false;

    constructor(session: Session, config: PlaybackConfigInput = {}) {
        this.session = session;
        this.config = PlaybackConfig.parse(config);
    }

    get isPlaying(): boolean {
        return this.playing;
    }

    /** Milliseconds per tick at the configured speed. */
    get intervalMs(): number {
        return 1000 / this.config.ticks_per_second;
    }

    play(): void {
        this.playing = true;
    }

    pause(): void {
        this.playing = false;
        this.accumulatorMs = 0;
    }

    /** Single manual step; ignored while playing. */
    stepOnce(): DiscoveryEvent | null {
        if (this.playing) return null;
        return this.session.tick();
    }

    /**
     * Account for `elapsedMs` of wall time and run the ticks that are due,
     * never more than `limit` of them. Returns the discoveries produced, in order.
     */
    advance(elapsedMs: number, limit: number = Infinity): DiscoveryEvent[] {
        if (!this.playing || !Number.isFinite(elapsedMs) || elapsedMs <= 0) return [];

        this.accumulatorMs += elapsedMs;
        const due = Math.floor(this.accumulatorMs / this.intervalMs);
        const ticks = Math.min(due, this.config.max_catch_up);
        if (due > ticks) {
            this.accumulatorMs = 0;
        } else {
            this.accumulatorMs -= ticks * this.intervalMs;
        }
        return this.session.run(Math.max(0, Math.min(ticks, Math.floor(limit))));
    }
}
