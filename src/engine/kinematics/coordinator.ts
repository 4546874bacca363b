import {
    AXES,
    ROLES,
    Axis,
    AxisState,
    AxisAttribution,
    PolarAttribution,
    LaunchVector,
    FinalVelocityMagnitude
} from '../../schema/kinematics.js';
import { AxisSolver } from './axis-solver.js';
import { KinematicRule } from './rules.js';
import { VARIABLE_COUNT, deriveValue, forgetDerived, knownCount } from './axis-state.js';

const DEG_TO_RAD = Math.PI / 180;
const RAD_TO_DEG = 180 / Math.PI;

export interface KinematicsState {
    x: AxisState;
    y: AxisState;
    launch: LaunchVector;
    final: FinalVelocityMagnitude;
}

export interface CoordinatorReport {
    rounds: number;
    lastRule: Record<Axis, KinematicRule | null>;
    attribution: Record<Axis, AxisAttribution> & { polar: PolarAttribution };
}

export interface CoordinatorOptions {
    solver?: AxisSolver;
    maxRounds?: number;
}

function otherAxis(axis: Axis): Axis {
    return axis === 'x' ? 'y' : 'x';
}

/**
 * Drives both axis solvers to a joint fixed point.
 *
 * The axes only talk through the shared elapsed time `t` and, before
 * solving, through the polar launch/final speed inputs.
 */
export class CrossAxisCoordinator {
    private readonly solver: AxisSolver;
    private readonly maxRounds: number;

    constructor(options: CoordinatorOptions = {}) {
        this.solver = options.solver ?? new AxisSolver();
        this.maxRounds = options.maxRounds ?? 2 * VARIABLE_COUNT;
    }

    resolveAll(state: KinematicsState): CoordinatorReport {
        const report: CoordinatorReport = {
            rounds: 0,
            lastRule: { x: null, y: null },
            attribution: { x: {}, y: {}, polar: {} }
        };

        this.forgetDerivedKnowledge(state);
        this.seedLaunchVector(state, report);
        this.decomposeFinalSpeed(state, report);
        this.seedSharedTime(state, report);

        while (report.rounds < this.maxRounds) {
            report.rounds++;
            const before = knownCount(state.x) + knownCount(state.y);

            for (const axis of AXES) {
                const resolution = this.solver.resolve(state[axis]);
                if (resolution.lastRule) report.lastRule[axis] = resolution.lastRule;

                for (const role of ROLES) {
                    const rule = resolution.derivations[role];
                    if (rule) {
                        report.attribution[axis][role] = { kind: 'rule', rule: rule.id, equation: rule.equation };
                    }
                }

                this.shareTime(state, axis, report);
            }

            if (knownCount(state.x) + knownCount(state.y) === before) break;
        }

        this.backDerivePolar(state, report);
        return report;
    }

    private forgetDerivedKnowledge(state: KinematicsState): void {
        for (const axis of AXES) {
            for (const role of ROLES) forgetDerived(state[axis][role]);
        }
        forgetDerived(state.launch.speed);
        forgetDerived(state.launch.angle);
        forgetDerived(state.final.speed);
    }

    private seedLaunchVector(state: KinematicsState, report: CoordinatorReport): void {
        const { speed, angle } = state.launch;
        if (!speed.userSet || !angle.userSet) return;

        const radians = angle.value * DEG_TO_RAD;
        if (deriveValue(state.x.v0, speed.value * Math.cos(radians))) {
            report.attribution.x.v0 = { kind: 'launch-vector' };
        }
        if (deriveValue(state.y.v0, speed.value * Math.sin(radians))) {
            report.attribution.y.v0 = { kind: 'launch-vector' };
        }
    }

    // Sign convention: a projectile landing on level ground moves forward and down.
    private decomposeFinalSpeed(state: KinematicsState, report: CoordinatorReport): void {
        const finalSpeed = state.final.speed;
        if (!finalSpeed.userSet) return;

        const { x, y } = state;
        if (x.vf.known && !y.vf.userSet) {
            const square = finalSpeed.value ** 2 - x.vf.value ** 2;
            if (square >= 0 && deriveValue(y.vf, -Math.sqrt(square))) {
                report.attribution.y.vf = { kind: 'final-speed' };
            }
        } else if (y.vf.known && !x.vf.userSet) {
            const square = finalSpeed.value ** 2 - y.vf.value ** 2;
            if (square >= 0 && deriveValue(x.vf, Math.sqrt(square))) {
                report.attribution.x.vf = { kind: 'final-speed' };
            }
        }
    }

    private seedSharedTime(state: KinematicsState, report: CoordinatorReport): void {
        if (state.x.t.userSet && !state.y.t.userSet) {
            this.copyTime(state, 'x', report);
        } else if (state.y.t.userSet && !state.x.t.userSet) {
            this.copyTime(state, 'y', report);
        }
    }

    private shareTime(state: KinematicsState, from: Axis, report: CoordinatorReport): void {
        if (state[from].t.known && !state[otherAxis(from)].t.known) {
            this.copyTime(state, from, report);
        }
    }

    private copyTime(state: KinematicsState, from: Axis, report: CoordinatorReport): void {
        const to = otherAxis(from);
        if (deriveValue(state[to].t, state[from].t.value)) {
            report.attribution[to].t = { kind: 'shared-time', from };
        }
    }

    private backDerivePolar(state: KinematicsState, report: CoordinatorReport): void {
        const { x, y, launch, final } = state;

        if (x.v0.known && y.v0.known) {
            if (!launch.speed.known && deriveValue(launch.speed, Math.hypot(x.v0.value, y.v0.value))) {
                report.attribution.polar.launchSpeed = { kind: 'components' };
            }
            if (!launch.angle.known && deriveValue(launch.angle, Math.atan2(y.v0.value, x.v0.value) * RAD_TO_DEG)) {
                report.attribution.polar.launchAngle = { kind: 'components' };
            }
        }

        if (x.vf.known && y.vf.known && !final.speed.known) {
            if (deriveValue(final.speed, Math.hypot(x.vf.value, y.vf.value))) {
                report.attribution.polar.finalSpeed = { kind: 'components' };
            }
        }
    }
}
