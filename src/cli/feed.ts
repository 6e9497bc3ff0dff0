/**
 * DiscoveryFeed — bounded, append-only history of discoveries for display.
 *
 * The core only produces discoveries; keeping (and forgetting) them is the
 * presentation layer's job.
 */
import chalk from "chalk";
import type { DiscoveryEvent } from "../schemas/discovery.js";

export interface FeedEntry {
    step: number;
    event: DiscoveryEvent;
}

export const DEFAULT_FEED_CAPACITY = 50;

export class DiscoveryFeed {
    public readonly capacity: number;
    private items: FeedEntry[] = [];

    constructor(capacity: number = DEFAULT_FEED_CAPACITY) {
        this.capacity = Math.max(1, Math.floor(capacity));
    }

    /** Oldest first. */
    get entries(): readonly FeedEntry[] {
        return this.items;
    }

    push(step: number, event: DiscoveryEvent): void {
        this.items.push({ step, event });
        if (this.items.length > this.capacity) {
            this.items.splice(0, this.items.length - this.capacity);
        }
    }

    /** The most recent `n` entries, oldest first. */
    latest(n: number): FeedEntry[] {
        return n > 0 ? this.items.slice(-n) : [];
    }
}

/** Plain one-line rendering, e.g. `[42] Anomaly: Prediction error 4.10 ...`. */
export function formatEntry({ step, event }: FeedEntry): string {
    if (event.kind === "insight") return `[${step}] ${event.topic}: ${event.content}`;
    return `[${step}] ${event.text}`;
}

/** Terminal rendering with colour. */
export function renderEntry({ step, event }: FeedEntry): string {
    const tick = chalk.dim(`[${step}]`);
    if (event.kind === "insight") {
        return `${tick} ${chalk.magenta.bold(event.topic)}: ${event.content}`;
    }
    return `${tick} ${chalk.cyan(event.text)}`;
}
