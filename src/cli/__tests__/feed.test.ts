/**
 * DiscoveryFeed Tests — bounded history and line formatting.
 */
import { describe, it, expect } from "vitest";
import { DiscoveryFeed, DEFAULT_FEED_CAPACITY, formatEntry } from "../../cli/feed.js";

describe("DiscoveryFeed", () => {
    it("defaults to 50 entries", () => {
        expect(new DiscoveryFeed().capacity).toBe(DEFAULT_FEED_CAPACITY);
        expect(DEFAULT_FEED_CAPACITY).toBe(50);
    });

    it("drops the oldest entries past capacity", () => {
        const feed = new DiscoveryFeed(3);
        for (let step = 0; step < 5; step++) {
            feed.push(step, { kind: "text", text: `t${step}` });
        }
        expect(feed.entries.map((e) => e.step)).toEqual([2, 3, 4]);
    });

    it("returns the latest entries oldest first", () => {
        const feed = new DiscoveryFeed();
        feed.push(1, { kind: "text", text: "a" });
        feed.push(2, { kind: "text", text: "b" });
        feed.push(3, { kind: "text", text: "c" });
        expect(feed.latest(2).map((e) => e.step)).toEqual([2, 3]);
        expect(feed.latest(10)).toHaveLength(3);
        expect(feed.latest(0)).toEqual([]);
    });

    it("keeps at least one entry", () => {
        const feed = new DiscoveryFeed(0);
        expect(feed.capacity).toBe(1);
        feed.push(1, { kind: "text", text: "a" });
        feed.push(2, { kind: "text", text: "b" });
        expect(feed.entries).toEqual([{ step: 2, event: { kind: "text", text: "b" } }]);
    });
});

describe("formatEntry()", () => {
    it("formats text discoveries", () => {
        expect(formatEntry({ step: 120, event: { kind: "text", text: "all quiet" } })).toBe("[120] all quiet");
    });

    it("formats insights with their topic", () => {
        expect(
            formatEntry({ step: 40, event: { kind: "insight", topic: "Anomaly", content: "Prediction error 4.10" } }),
        ).toBe("[40] Anomaly: Prediction error 4.10");
    });
});
