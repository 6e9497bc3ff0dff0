/**
 * AttractorWorld — Lorenz and Rössler chaotic attractors integrated with RK4.
 *
 * Reference world for the CLI. Exposes its 3-vector state to the agent and
 * accepts per-axis perturbations.
 */
import type { Vec3 } from "../schemas/observations.js";
import type { WorldObservation } from "../schemas/observations.js";
import type { WorldAction } from "../schemas/actions.js";
import type { StateSnapshot, ParamValue } from "../schemas/world.js";
import type { World, Experimentable } from "./types.js";

export type AttractorSystem = "lorenz" | "rossler";

/** Number of trailing points kept for rendering. */
export const MAX_TAIL = 800;

const INITIAL_STATE: Vec3 = [1, 1, 1];

export interface AttractorParams {
    // Lorenz
    sigma: number;
    rho: number;
    beta: number;
    // Rössler
    a: number;
    b: number;
    c: number;
}

const DEFAULT_PARAMS: AttractorParams = {
    sigma: 10,
    rho: 28,
    beta: 8 / 3,
    a: 0.2,
    b: 0.2,
    c: 5.7,
};

function isParamKey(key: string): key is keyof AttractorParams {
    return Object.hasOwn(DEFAULT_PARAMS, key);
}

export class AttractorWorld implements World, Experimentable {
    public system: AttractorSystem;
    public readonly params: AttractorParams = { ...DEFAULT_PARAMS };
    public readonly dt: number;
    private state: Vec3 = [...INITIAL_STATE];
    private tail: Vec3[] = [];

    constructor(system: AttractorSystem = "lorenz", dt: number = 0.01) {
        this.system = system;
        this.dt = dt;
    }

    step(): void {
        this.state = this.rk4(this.state);
        this.tail.push([...this.state]);
        if (this.tail.length > MAX_TAIL) {
            this.tail.splice(0, this.tail.length - MAX_TAIL);
        }
    }

    getState(): StateSnapshot {
        return { kind: "points", points: this.tail.map((p) => [...p]) };
    }

    setParam(key: string, value: ParamValue): void {
        if (isParamKey(key)) {
            if (typeof value === "number" && Number.isFinite(value)) this.params[key] = value;
            return;
        }
        if (key === "system") {
            if (value === "lorenz" || value === "rossler") {
                this.system = value;
                this.reset();
            }
            return;
        }
        if (key === "reset" && value === true) {
            this.reset();
        }
    }

    asExperimentable(): Experimentable {
        return this;
    }

    observe(): WorldObservation {
        return { kind: "state_vec", values: [...this.state] };
    }

    applyAction(action: WorldAction): void {
        switch (action.kind) {
            case "perturb":
                if (action.axis >= 0 && action.axis <= 2 && Number.isFinite(action.delta)) {
                    this.state[action.axis] += action.delta;
                }
                return;
            case "set_param":
                this.setParam(action.name, action.value);
                return;
            default:
                return;
        }
    }

    /** Highest near the origin, decaying as the trajectory wanders out. */
    reward(): number {
        const [x, y, z] = this.state;
        return 10 / (1 + Math.hypot(x, y, z) / 10);
    }

    /** Current state vector (copy). */
    get position(): Vec3 {
        return [...this.state];
    }

    private reset(): void {
        this.state = [...INITIAL_STATE];
        this.tail = [];
    }

    private deriv([x, y, z]: Vec3): Vec3 {
        const p = this.params;
        if (this.system === "rossler") {
            return [-y - z, x + p.a * y, p.b + z * (x - p.c)];
        }
        return [p.sigma * (y - x), x * (p.rho - z) - y, x * y - p.beta * z];
    }

    private rk4(s: Vec3): Vec3 {
        const h = this.dt;
        const k1 = this.deriv(s);
        const k2 = this.deriv(axpy(s, k1, h / 2));
        const k3 = this.deriv(axpy(s, k2, h / 2));
        const k4 = this.deriv(axpy(s, k3, h));
        return [
            s[0] + (h / 6) * (k1[0] + 2 * k2[0] + 2 * k3[0] + k4[0]),
            s[1] + (h / 6) * (k1[1] + 2 * k2[1] + 2 * k3[1] + k4[1]),
            s[2] + (h / 6) * (k1[2] + 2 * k2[2] + 2 * k3[2] + k4[2]),
        ];
    }
}

function axpy(s: Vec3, k: Vec3, h: number): Vec3 {
    return [s[0] + k[0] * h, s[1] + k[1] * h, s[2] + k[2] * h];
}
