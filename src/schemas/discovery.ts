/**
 * Discovery Schemas — Qualitative reports the agent publishes for display.
 */
import { z } from "zod/v4";

export const DiscoveryEvent = z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("text"), text: z.string() }),
    z.object({ kind: z.literal("insight"), topic: z.string(), content: z.string() }),
]);
export type DiscoveryEvent = z.infer<typeof DiscoveryEvent>;

/**
 * Externally tagged form used when a discovery is serialized for display
 * clients or transmitted: `{ "Text": "..." }` or `{ "Insight": { topic, content } }`.
 */
export const DiscoveryWire = z.union([
    z.object({ Text: z.string() }).strict(),
    z.object({ Insight: z.object({ topic: z.string(), content: z.string() }) }).strict(),
]);
export type DiscoveryWire = z.infer<typeof DiscoveryWire>;

export function toDiscoveryWire(event: DiscoveryEvent): DiscoveryWire {
    if (event.kind === "text") return { Text: event.text };
    return { Insight: { topic: event.topic, content: event.content } };
}

/** Parse the wire form back into a DiscoveryEvent. Throws a ZodError on malformed input. */
export function fromDiscoveryWire(raw: unknown): DiscoveryEvent {
    const wire = DiscoveryWire.parse(raw);
    if ("Text" in wire) return { kind: "text", text: wire.Text };
    return { kind: "insight", topic: wire.Insight.topic, content: wire.Insight.content };
}
