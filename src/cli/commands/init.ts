import * as p from "@clack/prompts";
import chalk from "chalk";
import fs from "fs/promises";
import path from "path";
import { templateConfig } from "../templates/config.js";
import { DEFAULT_CONFIG_FILE } from "../config.js";

/** Write the file unless it already exists. Returns whether it was written. */
export async function safeWrite(filePath: string, content: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        p.log.warn(`Skipped ${chalk.cyan(path.basename(filePath))} (already exists)`);
        return false;
    } catch {
        await fs.writeFile(filePath, content);
        return true;
    }
}

export async function initCommand(options?: { yes?: boolean }) {
    p.intro(chalk.bgCyan.black(" worldlab - Initialize Lab "));

    const cwd = process.cwd();
    const isReady = options?.yes
        ? true
        : await p.confirm({
            message: `Write ${DEFAULT_CONFIG_FILE} in ${cwd}?`,
            initialValue: true,
        });

    if (p.isCancel(isReady) || !isReady) {
        p.cancel("Operation cancelled.");
        process.exit(0);
    }

    try {
        const written = await safeWrite(path.join(cwd, DEFAULT_CONFIG_FILE), templateConfig);
        if (written) p.log.success(`Created ${chalk.cyan(DEFAULT_CONFIG_FILE)}`);

        p.note(
            `1. Tune the agent under ${chalk.cyan("curiosity")} in ${chalk.cyan(DEFAULT_CONFIG_FILE)}\n` +
            `2. Run the lab: ${chalk.magenta("worldlab run")}\n` +
            `3. Watch it live: ${chalk.magenta("worldlab run --tps 30")}`,
            "Next Steps",
        );

        p.outro(chalk.green("Lab ready."));
    } catch (error: unknown) {
        p.log.error(chalk.red(error instanceof Error ? error.message : String(error)));
        process.exit(1);
    }
}
