export { initCommand } from "./init.js";
export { runCommand } from "./run.js";
