/**
 * Lab config loading and CLI override resolution.
 */
import fs from "fs/promises";
import path from "path";
import { z } from "zod/v4";
import { LabConfig } from "../schemas/config.js";
import { ConfigFileError } from "../errors/index.js";

export const DEFAULT_CONFIG_FILE = "worldlab.config.json";

export interface RunOptions {
    config?: string;
    world?: string;
    agent?: string;
    ticks?: string;
    seed?: string;
    tps?: string;
}

/** Everything `worldlab run` needs, after file, environment and flags are merged. */
export interface RunSettings {
    lab: LabConfig;
    /** Ticks per second for paced playback; undefined runs ticks back to back. */
    tps?: number;
}

/**
 * Read and validate a lab file. A missing file is only an error when the
 * path was given explicitly; otherwise the defaults apply.
 */
export async function loadLabConfig(filePath: string | undefined, cwd: string = process.cwd()): Promise<LabConfig> {
    const explicit = filePath !== undefined;
    const resolved = path.resolve(cwd, filePath ?? DEFAULT_CONFIG_FILE);

    let content: string;
    try {
        content = await fs.readFile(resolved, "utf-8");
    } catch (err: unknown) {
        if (!explicit) return LabConfig.parse({});
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigFileError(resolved, reason);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigFileError(resolved, `not valid JSON (${reason})`);
    }

    const parsed = LabConfig.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigFileError(resolved, z.prettifyError(parsed.error));
    }
    return parsed.data;
}

function parseIntOption(name: string, value: string | undefined): number | undefined {
    if (value === undefined || value === "") return undefined;
    const n = Number(value);
    if (!Number.isInteger(n)) {
        throw new Error(`Invalid ${name} value: ${value}`);
    }
    return n;
}

/**
 * Merge precedence: command-line flags, then environment, then the file.
 */
export function resolveRunSettings(
    lab: LabConfig,
    options: RunOptions,
    env: NodeJS.ProcessEnv = process.env,
): RunSettings {
    const ticks = parseIntOption("--ticks", options.ticks);
    const seed = parseIntOption("--seed", options.seed) ?? parseIntOption("WORLDLAB_SEED", env.WORLDLAB_SEED);
    const tps = parseIntOption("--tps", options.tps);

    const merged = LabConfig.parse({
        ...lab,
        world: options.world ?? lab.world,
        agent: options.agent ?? lab.agent,
        ticks: ticks ?? lab.ticks,
        seed: seed ?? lab.seed,
    });
    return { lab: merged, tps };
}
