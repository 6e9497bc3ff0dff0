/**
 * Custom Error Classes — Raised only for programmer or configuration mistakes.
 * Degraded runtime conditions (unknown observations, unknown parameters,
 * non-finite numbers) never throw; they fall back to a no-op.
 */

/**
 * Thrown by the experimenter factory when asked for a tag it does not know.
 */
export class UnknownExperimenterError extends Error {
    public readonly kind: string;

    constructor(kind: string, known: readonly string[]) {
        super(`Unknown experimenter "${kind}". Expected one of: ${known.join(", ")}.`);
        this.name = "UnknownExperimenterError";
        this.kind = kind;
    }
}

/**
 * Thrown by the world registry when asked for a world it does not know.
 */
export class UnknownWorldError extends Error {
    public readonly kind: string;

    constructor(kind: string, known: readonly string[]) {
        super(`Unknown world "${kind}". Expected one of: ${known.join(", ")}.`);
        this.name = "UnknownWorldError";
        this.kind = kind;
    }
}

/**
 * Thrown when Session.tick() is entered while another tick of the same
 * session is still running (e.g. a listener or a world calling back into it).
 */
export class OverlappingTickError extends Error {
    public readonly sessionId: string;
    public readonly step: number;

    constructor(sessionId: string, step: number) {
        super(`Session "${sessionId}" is already ticking (step ${step}); ticks must not overlap.`);
        this.name = "OverlappingTickError";
        this.sessionId = sessionId;
        this.step = step;
    }
}

/**
 * Thrown by the CLI when a lab config file cannot be read or does not validate.
 */
export class ConfigFileError extends Error {
    public readonly path: string;

    constructor(path: string, reason: string) {
        super(`Invalid config file "${path}": ${reason}`);
        this.name = "ConfigFileError";
        this.path = path;
    }
}
