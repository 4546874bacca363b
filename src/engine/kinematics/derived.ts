import {
    AxisState,
    DerivedQuantities,
    TrajectoryPoint,
    TrajectoryBounds
} from '../../schema/kinematics.js';

export const DEFAULT_TRAJECTORY_SAMPLES = 50;
export const PLOT_MARGIN = 0.1;

// Unknown initial position or acceleration count as zero
function knownOrZero(variable: { value: number; known: boolean }): number {
    return variable.known ? variable.value : 0;
}

/**
 * Highest vertical position reached. Needs the vertical launch velocity and
 * acceleration; without an ascent the launch height is the maximum.
 */
export function maxHeight(y: AxisState): number | null {
    if (!y.v0.known || !y.a.known) return null;

    const y0 = knownOrZero(y.p0);
    const v0 = y.v0.value;
    const a = y.a.value;

    if (a < 0 && v0 > 0) {
        const apexTime = -v0 / a;
        return y0 + v0 * apexTime + 0.5 * a * apexTime * apexTime;
    }
    return y0;
}

// Both axes share elapsed time; the horizontal axis is the one reported
export function timeOfFlight(x: AxisState): number | null {
    return x.t.known ? x.t.value : null;
}

export function range(x: AxisState): number | null {
    return x.d.known ? x.d.value : null;
}

export function computeDerivedQuantities(x: AxisState, y: AxisState): DerivedQuantities {
    return {
        maxHeight: maxHeight(y),
        timeOfFlight: timeOfFlight(x),
        range: range(x)
    };
}

export function positionAt(axis: AxisState, t: number): number {
    return knownOrZero(axis.p0) + axis.v0.value * t + 0.5 * knownOrZero(axis.a) * t * t;
}

/**
 * Sample both position functions over [0, time of flight].
 * Returns null until both launch velocities and a positive flight time are known.
 */
export function sampleTrajectory(
    x: AxisState,
    y: AxisState,
    samples: number = DEFAULT_TRAJECTORY_SAMPLES
): TrajectoryPoint[] | null {
    if (!x.v0.known || !y.v0.known || !x.t.known || x.t.value <= 0) return null;

    const steps = Math.max(1, Math.floor(samples));
    const totalTime = x.t.value;
    const points: TrajectoryPoint[] = [];

    for (let i = 0; i <= steps; i++) {
        const t = (i / steps) * totalTime;
        points.push({ t, x: positionAt(x, t), y: positionAt(y, t) });
    }
    return points;
}

/**
 * Plot window around the sampled path: each extent is at least 1 unit wide,
 * then padded by PLOT_MARGIN on both sides.
 */
export function trajectoryBounds(points: TrajectoryPoint[]): TrajectoryBounds | null {
    if (points.length === 0) return null;

    let minX = points[0].x;
    let maxX = points[0].x;
    let minY = points[0].y;
    let maxY = points[0].y;

    for (const p of points) {
        minX = Math.min(minX, p.x);
        maxX = Math.max(maxX, p.x);
        minY = Math.min(minY, p.y);
        maxY = Math.max(maxY, p.y);
    }

    const spanX = Math.max(maxX - minX, 1);
    const spanY = Math.max(maxY - minY, 1);

    return {
        minX: minX - spanX * PLOT_MARGIN,
        maxX: maxX + spanX * PLOT_MARGIN,
        minY: minY - spanY * PLOT_MARGIN,
        maxY: maxY + spanY * PLOT_MARGIN
    };
}
