/**
 * Batch and paced drivers for `worldlab run`. Both stop after exactly
 * `ticks` ticks and hand every discovery to `onDiscovery` as it arrives.
 */
import chalk from "chalk";
import ora from "ora";
import type { Session } from "../core/session.js";
import { AutoPlayer } from "../core/autoplay.js";
import type { PlaybackConfigInput } from "../schemas/config.js";
import type { FeedEntry } from "./feed.js";

export type DiscoveryListener = (entry: FeedEntry) => void;

/** Ticks back to back under a spinner. */
export function runBatch(session: Session, ticks: number, onDiscovery: DiscoveryListener): void {
    const spinner = ora(`Running ${ticks} ticks...`).start();
    const every = Math.max(1, Math.floor(ticks / 20));
    session.on("tick:complete", ({ step }) => {
        if (step % every === 0) spinner.text = `Tick ${step + 1}/${ticks}`;
    });
    session.on("discovery", ({ step, event }) => {
        spinner.clear();
        onDiscovery({ step, event });
        spinner.render();
    });

    try {
        session.run(ticks);
    } catch (err) {
        spinner.fail(chalk.red(`Stopped after ${session.stepCount} ticks.`));
        throw err;
    }
    spinner.succeed(chalk.green(`Completed ${session.stepCount} ticks.`));
}

/**
 * Real-time playback through an AutoPlayer on a timer. Resolves once the
 * session reaches `ticks`; rejects with the first error a tick throws.
 */
export function runPaced(
    session: Session,
    ticks: number,
    playback: PlaybackConfigInput,
    onDiscovery: DiscoveryListener,
    now: () => number = () => performance.now(),
): Promise<void> {
    const player = new AutoPlayer(session, playback);
    session.on("discovery", ({ step, event }) => onDiscovery({ step, event }));
    player.play();

    return new Promise<void>((resolve, reject) => {
        let last = now();
        const timer = setInterval(() => {
            try {
                const current = now();
                player.advance(current - last, ticks - session.stepCount);
                last = current;
                if (session.stepCount >= ticks) {
                    clearInterval(timer);
                    player.pause();
                    resolve();
                }
            } catch (err) {
                clearInterval(timer);
                player.pause();
                reject(err);
            }
        }, player.intervalMs);
    });
}
