import {
    Axis,
    Role,
    PolarQuantity,
    Variable,
    KinematicsSnapshot,
    TrajectoryPoint,
    TrajectoryBounds
} from '../../schema/kinematics.js';
import {
    STANDARD_GRAVITY,
    cloneAxisState,
    clearVariable,
    createDefaultAxes,
    createFinalVelocityMagnitude,
    createLaunchVector,
    setUserValue
} from './axis-state.js';
import { CrossAxisCoordinator, CoordinatorReport, KinematicsState } from './coordinator.js';
import {
    DEFAULT_TRAJECTORY_SAMPLES,
    computeDerivedQuantities,
    sampleTrajectory,
    trajectoryBounds
} from './derived.js';

export interface KinematicsSessionOptions {
    /** Magnitude of the default vertical acceleration (a_y = -gravity) */
    gravity?: number;
    coordinator?: CrossAxisCoordinator;
}

export interface Trajectory {
    points: TrajectoryPoint[];
    bounds: TrajectoryBounds | null;
}

function createDefaultState(gravity: number): KinematicsState {
    return {
        ...createDefaultAxes(gravity),
        launch: createLaunchVector(),
        final: createFinalVelocityMagnitude()
    };
}

/**
 * One user's projectile problem. Every edit re-runs the coordinator, so the
 * state is always at its joint fixed point when control returns.
 */
export class KinematicsSession {
    readonly gravity: number;
    private readonly coordinator: CrossAxisCoordinator;
    private state: KinematicsState;
    private report: CoordinatorReport;

    constructor(options: KinematicsSessionOptions = {}) {
        this.gravity = options.gravity ?? STANDARD_GRAVITY;
        this.coordinator = options.coordinator ?? new CrossAxisCoordinator();
        this.state = createDefaultState(this.gravity);
        this.report = this.coordinator.resolveAll(this.state);
    }

    setValue(axis: Axis, role: Role, value: number): KinematicsSnapshot {
        setUserValue(this.state[axis][role], value);
        return this.resolveAll();
    }

    clearValue(axis: Axis, role: Role): KinematicsSnapshot {
        clearVariable(this.state[axis][role]);
        return this.resolveAll();
    }

    setPolar(quantity: PolarQuantity, value: number): KinematicsSnapshot {
        setUserValue(this.polarVariable(quantity), value);
        return this.resolveAll();
    }

    clearPolar(quantity: PolarQuantity): KinematicsSnapshot {
        clearVariable(this.polarVariable(quantity));
        return this.resolveAll();
    }

    setLaunchSpeed(value: number): KinematicsSnapshot {
        return this.setPolar('launchSpeed', value);
    }

    setLaunchAngle(degrees: number): KinematicsSnapshot {
        return this.setPolar('launchAngle', degrees);
    }

    setFinalSpeed(value: number): KinematicsSnapshot {
        return this.setPolar('finalSpeed', value);
    }

    reset(): KinematicsSnapshot {
        this.state = createDefaultState(this.gravity);
        return this.resolveAll();
    }

    resolveAll(): KinematicsSnapshot {
        this.report = this.coordinator.resolveAll(this.state);
        return this.snapshot();
    }

    /** Coupling rounds used by the most recent resolve */
    get rounds(): number {
        return this.report.rounds;
    }

    snapshot(): KinematicsSnapshot {
        const { x, y, launch, final } = this.state;
        const { attribution } = this.report;
        return {
            x: cloneAxisState(x),
            y: cloneAxisState(y),
            launch: { speed: { ...launch.speed }, angle: { ...launch.angle } },
            final: { speed: { ...final.speed } },
            attribution: {
                x: { ...attribution.x },
                y: { ...attribution.y },
                polar: { ...attribution.polar }
            },
            derived: computeDerivedQuantities(x, y)
        };
    }

    trajectory(samples: number = DEFAULT_TRAJECTORY_SAMPLES): Trajectory {
        const points = sampleTrajectory(this.state.x, this.state.y, samples) ?? [];
        return { points, bounds: trajectoryBounds(points) };
    }

    private polarVariable(quantity: PolarQuantity): Variable {
        switch (quantity) {
            case 'launchSpeed':
                return this.state.launch.speed;
            case 'launchAngle':
                return this.state.launch.angle;
            case 'finalSpeed':
                return this.state.final.speed;
        }
    }
}
