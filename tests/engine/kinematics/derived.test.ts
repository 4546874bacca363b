import {
    maxHeight,
    timeOfFlight,
    range,
    positionAt,
    sampleTrajectory,
    trajectoryBounds
} from '../../../src/engine/kinematics/derived.js';
import { createAxisState } from '../../../src/engine/kinematics/axis-state.js';

describe('derived quantities', () => {
    describe('maxHeight', () => {
        it('should need the vertical launch velocity and acceleration', () => {
            expect(maxHeight(createAxisState({ a: -10 }))).toBeNull();
            expect(maxHeight(createAxisState({ v0: 10 }))).toBeNull();
        });

        it('should be the apex of an upward launch', () => {
            expect(maxHeight(createAxisState({ p0: 2, v0: 10, a: -10 }))).toBe(7);
        });

        it('should be the launch height without an ascent', () => {
            expect(maxHeight(createAxisState({ p0: 2, v0: -5, a: -10 }))).toBe(2);
            expect(maxHeight(createAxisState({ p0: 2, v0: 5, a: 0 }))).toBe(2);
        });

        it('should treat an unknown launch height as zero', () => {
            expect(maxHeight(createAxisState({ v0: 10, a: -10 }))).toBe(5);
        });
    });

    it('should read time of flight and range from the horizontal axis', () => {
        const x = createAxisState({ t: 3, d: 12 });
        expect(timeOfFlight(x)).toBe(3);
        expect(range(x)).toBe(12);

        const unknown = createAxisState();
        expect(timeOfFlight(unknown)).toBeNull();
        expect(range(unknown)).toBeNull();
    });

    it('should evaluate the position function', () => {
        expect(positionAt(createAxisState({ p0: 1, v0: 2, a: 4 }), 3)).toBe(25);
        expect(positionAt(createAxisState({ v0: 2 }), 3)).toBe(6);
    });

    describe('sampleTrajectory', () => {
        it('should sample evenly over the flight time', () => {
            const x = createAxisState({ p0: 0, v0: 3, a: 0, t: 2 });
            const y = createAxisState({ p0: 0, v0: 4, a: -2 });

            expect(sampleTrajectory(x, y, 4)).toEqual([
                { t: 0, x: 0, y: 0 },
                { t: 0.5, x: 1.5, y: 1.75 },
                { t: 1, x: 3, y: 3 },
                { t: 1.5, x: 4.5, y: 3.75 },
                { t: 2, x: 6, y: 4 }
            ]);
        });

        it('should need both launch velocities and a positive time', () => {
            const y = createAxisState({ v0: 4, a: -2 });

            expect(sampleTrajectory(createAxisState({ v0: 3 }), y)).toBeNull();
            expect(sampleTrajectory(createAxisState({ v0: 3, t: 0 }), y)).toBeNull();
            expect(sampleTrajectory(createAxisState({ v0: 3, t: 2 }), createAxisState({ a: -2 }))).toBeNull();
        });
    });

    describe('trajectoryBounds', () => {
        it('should pad the extents by ten percent', () => {
            const bounds = trajectoryBounds([
                { t: 0, x: 0, y: 0 },
                { t: 1, x: 6, y: 4 }
            ]);

            expect(bounds?.minX).toBeCloseTo(-0.6, 10);
            expect(bounds?.maxX).toBeCloseTo(6.6, 10);
            expect(bounds?.minY).toBeCloseTo(-0.4, 10);
            expect(bounds?.maxY).toBeCloseTo(4.4, 10);
        });

        it('should keep at least a unit span', () => {
            expect(trajectoryBounds([{ t: 0, x: 1, y: 1 }])).toEqual({
                minX: 0.9,
                maxX: 1.1,
                minY: 0.9,
                maxY: 1.1
            });
        });

        it('should have no bounds without points', () => {
            expect(trajectoryBounds([])).toBeNull();
        });
    });
});
