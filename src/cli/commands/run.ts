import * as p from "@clack/prompts";
import chalk from "chalk";
import { Session } from "../../core/session.js";
import { createWorld } from "../../worlds/index.js";
import { createExperimenter } from "../../agents/factory.js";
import { CuriosityExperimenter } from "../../agents/curiosity.js";
import type { Experimenter } from "../../agents/experimenter.js";
import { DiscoveryFeed, renderEntry } from "../feed.js";
import type { FeedEntry } from "../feed.js";
import { runBatch, runPaced } from "../playback.js";
import { loadLabConfig, resolveRunSettings } from "../config.js";
import type { RunOptions, RunSettings } from "../config.js";

/** Entries echoed in the closing summary. */
const SUMMARY_ENTRIES = 5;

function buildSession({ lab }: RunSettings): { session: Session; agent: Experimenter } {
    const world = createWorld(lab.world);
    const agent = createExperimenter(lab.agent, {
        config: { ...lab.curiosity, seed: lab.seed ?? lab.curiosity.seed },
    });
    return { session: new Session(world, agent), agent };
}

export async function runCommand(options: RunOptions) {
    p.intro(chalk.bgMagenta.black(" worldlab - Run "));

    try {
        const lab = await loadLabConfig(options.config ?? process.env.WORLDLAB_CONFIG);
        const settings = resolveRunSettings(lab, options);
        const { session, agent } = buildSession(settings);
        const feed = new DiscoveryFeed(settings.lab.feed_capacity);

        p.log.info(
            `World ${chalk.bold(settings.lab.world)} · agent ${chalk.bold(settings.lab.agent)} · ` +
            `seed ${chalk.bold(String(settings.lab.seed ?? "random"))}`,
        );

        session.on("discovery", ({ step, event }) => feed.push(step, event));

        const print = (entry: FeedEntry) => p.log.message(renderEntry(entry));
        if (settings.tps !== undefined) {
            const playback = { ...settings.lab.playback, ticks_per_second: settings.tps };
            p.log.step(`Playing at ${settings.tps} ticks/s (Ctrl+C to stop)`);
            await runPaced(session, settings.lab.ticks, playback, print);
        } else {
            runBatch(session, settings.lab.ticks, print);
        }

        const recent = feed.latest(SUMMARY_ENTRIES);
        p.note(
            recent.length > 0 ? recent.map(renderEntry).join("\n") : chalk.dim("No discoveries."),
            `Discoveries (${feed.entries.length} kept)`,
        );

        if (agent instanceof CuriosityExperimenter) {
            const s = agent.stats();
            p.log.info(
                `States ${s.states} · transitions ${s.transitions} · ` +
                `exploration rate ${s.explorationRate.toFixed(3)}`,
            );
        }

        p.outro(`Session ${chalk.dim(session.id)} finished after ${session.stepCount} ticks.`);
    } catch (err) {
        p.log.error(chalk.red(err instanceof Error ? err.message : String(err)));
        process.exit(1);
    }
}
