/**
 * Learned Table Tests — Q-table, world model and visit counts.
 */
import { describe, it, expect } from "vitest";
import { QTable } from "../../learning/q-table.js";
import { WorldModel } from "../../learning/world-model.js";
import { VisitCounter, noveltyBonus } from "../../learning/visits.js";

describe("QTable", () => {
    it("reads missing entries as 0 and starts empty", () => {
        const q = new QTable([0, 1, 2]);
        expect(q.get("s", 1)).toBe(0);
        expect(q.maxValue("s")).toBe(0);
        expect(q.size).toBe(0);
    });

    it("breaks ties toward the earliest action", () => {
        const q = new QTable([0, 1, 2]);
        expect(q.bestAction("s")).toBe(0);
    });

    it("applies the one-step update", () => {
        const q = new QTable([0, 1]);
        // target = 2 + 0.9 * 0; 0 + 0.5 * (2 - 0)
        expect(q.update("s", 1, 2, "t", 0.5, 0.9)).toBe(1);
        expect(q.get("s", 1)).toBe(1);
        expect(q.bestAction("s")).toBe(1);
        expect(q.maxValue("s")).toBe(1);
    });

    it("bootstraps from the best value of the next state", () => {
        const q = new QTable([0, 1]);
        q.update("t", 0, 4, "u", 1, 0.5); // Q[t][0] = 4
        // target = 0 + 0.5 * 4 = 2; 0 + 0.5 * 2
        expect(q.update("s", 1, 0, "t", 0.5, 0.5)).toBe(1);
    });

    it("ignores updates that would store a non-finite value", () => {
        const q = new QTable([0]);
        expect(q.update("s", 0, NaN, "t", 0.5, 0.9)).toBe(0);
        expect(q.get("s", 0)).toBe(0);
        expect(q.entryCount).toBe(0);
        expect(q.has("s")).toBe(true);
    });

    it("converges to r / (1 - gamma) on a self-looping pair", () => {
        const q = new QTable([0, 1, 2]);
        for (let i = 0; i < 2000; i++) q.update("s", 0, 1, "s", 0.1, 0.9);
        expect(q.get("s", 0)).toBeCloseTo(10, 5);
    });

    it("never shrinks", () => {
        const q = new QTable([0]);
        q.touch("a");
        q.update("b", 0, 1, "a", 0.1, 0.9);
        q.touch("a");
        expect(q.size).toBe(2);
        expect(q.entryCount).toBe(1);
    });
});

describe("WorldModel", () => {
    it("has no prediction for an unseen transition", () => {
        expect(new WorldModel().predict("s", 0)).toBeUndefined();
    });

    it("stores the first observation as is, then smooths", () => {
        const m = new WorldModel();
        expect(m.observe("s", 0, [0, 0, 0], 0.5)).toEqual([0, 0, 0]);
        expect(m.observe("s", 0, [2, 4, -2], 0.5)).toEqual([1, 2, -1]);
        expect(m.predict("s", 0)).toEqual([1, 2, -1]);
    });

    it("keys predictions by state and action", () => {
        const m = new WorldModel();
        m.observe("s", 0, [1, 1, 1], 0.2);
        m.observe("s", 1, [2, 2, 2], 0.2);
        expect(m.size).toBe(2);
        expect(m.predict("s", 1)).toEqual([2, 2, 2]);
    });

    it("hands out copies", () => {
        const m = new WorldModel();
        m.observe("s", 0, [1, 1, 1], 0.2);
        const p = m.predict("s", 0);
        if (p) p[0] = 99;
        expect(m.predict("s", 0)).toEqual([1, 1, 1]);
    });
});

describe("VisitCounter", () => {
    it("counts visits per state", () => {
        const v = new VisitCounter();
        expect(v.visit("a")).toBe(1);
        expect(v.visit("a")).toBe(2);
        v.visit("b");
        expect(v.count("a")).toBe(2);
        expect(v.count("c")).toBe(0);
        expect(v.size).toBe(2);
    });

    it("floors the novelty divisor at 1", () => {
        expect(noveltyBonus(0, 2)).toBe(2);
        expect(noveltyBonus(4, 2)).toBe(0.5);
    });
});
