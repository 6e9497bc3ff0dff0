export { discretize, foveate, sanitize, distance } from "./discretize.js";
export type { StateKey } from "./discretize.js";
export { QTable } from "./q-table.js";
export type { ActionId } from "./q-table.js";
export { WorldModel } from "./world-model.js";
export { VisitCounter, noveltyBonus } from "./visits.js";
export { SeededRng, mathRandom, randomInt } from "./rng.js";
export type { RandomSource } from "./rng.js";
