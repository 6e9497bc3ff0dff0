/**
 * AttractorWorld Tests — integration, parameters, perturbations and the registry.
 */
import { describe, it, expect } from "vitest";
import { AttractorWorld, MAX_TAIL, createWorld, WORLD_KINDS } from "../../worlds/index.js";
import { UnknownWorldError } from "../../errors/index.js";

describe("createWorld()", () => {
    it("builds every registered world", () => {
        for (const kind of WORLD_KINDS) {
            const world = createWorld(kind);
            expect(world).toBeInstanceOf(AttractorWorld);
            if (world instanceof AttractorWorld) expect(world.system).toBe(kind);
        }
    });

    it("rejects unknown worlds", () => {
        expect(() => createWorld("mandelbrot")).toThrow(UnknownWorldError);
        expect(() => createWorld("mandelbrot")).toThrow('Unknown world "mandelbrot". Expected one of: lorenz, rossler.');
    });
});

describe("AttractorWorld", () => {
    it("starts at (1, 1, 1) with an empty tail", () => {
        const world = new AttractorWorld();
        expect(world.position).toEqual([1, 1, 1]);
        expect(world.getState()).toEqual({ kind: "points", points: [] });
        expect(world.observe()).toEqual({ kind: "state_vec", values: [1, 1, 1] });
    });

    it("is experimentable", () => {
        const world = new AttractorWorld();
        expect(world.asExperimentable()).toBe(world);
    });

    it("records each step in its tail", () => {
        const world = new AttractorWorld();
        world.step();
        world.step();
        const state = world.getState();
        expect(state.kind).toBe("points");
        if (state.kind === "points") {
            expect(state.points).toHaveLength(2);
            expect(state.points[1]).toEqual(world.position);
        }
    });

    it("keeps at most MAX_TAIL points", () => {
        const world = new AttractorWorld();
        for (let i = 0; i < MAX_TAIL + 100; i++) world.step();
        const state = world.getState();
        if (state.kind !== "points") throw new Error("expected points");
        expect(state.points).toHaveLength(MAX_TAIL);
        expect(state.points[MAX_TAIL - 1]).toEqual(world.position);
    });

    it("does not change when read", () => {
        const world = new AttractorWorld();
        world.step();
        const before = world.getState();
        world.observe();
        world.reward();
        expect(world.getState()).toEqual(before);
    });

    it("follows the Lorenz equations for one Euler-sized step in x", () => {
        const world = new AttractorWorld("lorenz", 1e-6);
        world.step();
        // dx/dt = sigma * (y - x) = 0 at (1, 1, 1); dy/dt = 1 * (28 - 1) - 1 = 26
        const [x, y] = world.position;
        expect(x).toBeCloseTo(1, 9);
        expect(y).toBeCloseTo(1 + 26e-6, 9);
    });

    it("stays on a bounded orbit", () => {
        for (const system of WORLD_KINDS) {
            const world = new AttractorWorld(system);
            for (let i = 0; i < 5000; i++) world.step();
            for (const v of world.position) {
                expect(Number.isFinite(v)).toBe(true);
                expect(Math.abs(v)).toBeLessThan(100);
            }
        }
    });

    it("rewards proximity to the origin", () => {
        const world = new AttractorWorld();
        expect(world.reward()).toBeCloseTo(10 / (1 + Math.sqrt(3) / 10), 12);
        world.applyAction({ kind: "perturb", axis: 0, delta: 50 });
        expect(world.reward()).toBeLessThan(10 / (1 + Math.sqrt(3) / 10));
    });

    it("applies perturbations to a single axis", () => {
        const world = new AttractorWorld();
        world.applyAction({ kind: "perturb", axis: 0, delta: 2 });
        world.applyAction({ kind: "perturb", axis: 2, delta: -0.5 });
        expect(world.position).toEqual([3, 1, 0.5]);
    });

    it("ignores perturbations of unknown axes and unsupported actions", () => {
        const world = new AttractorWorld();
        world.applyAction({ kind: "perturb", axis: 3, delta: 2 });
        world.applyAction({ kind: "flip_cell", row: 0, col: 0 });
        world.applyAction({ kind: "noop" });
        expect(world.position).toEqual([1, 1, 1]);
    });

    it("leaves its trajectory untouched under no-ops", () => {
        const a = new AttractorWorld();
        const b = new AttractorWorld();
        for (let i = 0; i < 50; i++) {
            a.applyAction({ kind: "noop" });
            a.step();
            b.step();
        }
        expect(a.getState()).toEqual(b.getState());
    });
});

describe("AttractorWorld.setParam()", () => {
    it("updates numeric parameters", () => {
        const world = new AttractorWorld();
        world.setParam("rho", 14);
        world.applyAction({ kind: "set_param", name: "sigma", value: 12 });
        expect(world.params.rho).toBe(14);
        expect(world.params.sigma).toBe(12);
    });

    it("ignores mistyped values and unknown keys", () => {
        const world = new AttractorWorld();
        world.setParam("rho", "fast");
        world.setParam("rho", Number.NaN);
        world.setParam("gravity", 9.8);
        world.setParam("toString", 1);
        expect(world.params).toEqual({ sigma: 10, rho: 28, beta: 8 / 3, a: 0.2, b: 0.2, c: 5.7 });
    });

    it("switches system and restarts", () => {
        const world = new AttractorWorld();
        for (let i = 0; i < 10; i++) world.step();
        world.setParam("system", "rossler");
        expect(world.system).toBe("rossler");
        expect(world.position).toEqual([1, 1, 1]);
        expect(world.getState()).toEqual({ kind: "points", points: [] });

        world.setParam("system", "duffing");
        expect(world.system).toBe("rossler");
    });

    it("resets on request", () => {
        const world = new AttractorWorld();
        world.step();
        world.setParam("reset", false);
        expect(world.position).not.toEqual([1, 1, 1]);
        world.setParam("reset", true);
        expect(world.position).toEqual([1, 1, 1]);
    });
});
