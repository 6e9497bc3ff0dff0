#!/usr/bin/env node

import dotenv from "dotenv";

// Silence dotenv 17+ console output
process.env.DOTENV_CONFIG_SILENT = "true";
dotenv.config();

import { Command } from "commander";
import { initCommand, runCommand } from "./commands/index.js";
import { WORLD_KINDS } from "../worlds/index.js";
import { EXPERIMENTER_KINDS } from "../agents/factory.js";

const program = new Command();

program
    .name("worldlab")
    .description("Pair an evolving world with a curious scientist agent")
    .version("0.1.0");

program
    .command("init")
    .description("Write a default worldlab.config.json in the current directory")
    .option("-y, --yes", "Skip confirmation prompts")
    .action(initCommand);

program
    .command("run")
    .description("Run a session and report the agent's discoveries")
    .option("-c, --config <path>", "Path to a lab config JSON file")
    .option("-w, --world <kind>", `World to observe (${WORLD_KINDS.join("|")})`)
    .option("-a, --agent <kind>", `Experimenter (${EXPERIMENTER_KINDS.join("|")})`)
    .option("-t, --ticks <number>", "Number of ticks to run")
    .option("-s, --seed <number>", "Seed for the agent's exploration")
    .option("--tps <number>", "Play in real time at this many ticks per second")
    .action(runCommand);

program.parse(process.argv);
