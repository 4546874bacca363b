import { ROLES } from '../../../src/schema/kinematics.js';
import { KINEMATIC_RULES, ROOT_EPSILON, expressionFor, findRule, pickTimeRoot } from '../../../src/engine/kinematics/rules.js';
import { RoleValues } from '../../../src/engine/kinematics/axis-state.js';

function values(partial: Partial<RoleValues>): RoleValues {
    return { p0: 0, pf: 0, v0: 0, vf: 0, a: 0, d: 0, t: 0, ...partial };
}

function ruleById(id: number) {
    const rule = findRule(id);
    if (!rule) throw new Error(`No rule ${id}`);
    return rule;
}

function solve(id: number, partial: Partial<RoleValues>): number | null {
    return ruleById(id).solve(values(partial));
}

function branch(id: number, partial: Partial<RoleValues>): string {
    return expressionFor(ruleById(id), values(partial));
}

describe('kinematic rules', () => {
    it('should be numbered 1 to 25 in evaluation order', () => {
        expect(KINEMATIC_RULES.map(rule => rule.id)).toEqual(
            Array.from({ length: 25 }, (_, i) => i + 1)
        );
    });

    it('should never list their own output as an input', () => {
        for (const rule of KINEMATIC_RULES) {
            expect(rule.inputs).not.toContain(rule.output);
            expect(ROLES).toContain(rule.output);
        }
    });

    it('should relate positions and displacement', () => {
        expect(solve(1, { pf: 8, p0: 3 })).toBe(5);
        expect(solve(2, { p0: 3, d: 5 })).toBe(8);
        expect(solve(3, { pf: 8, d: 5 })).toBe(3);
    });

    it('should reject a negative elapsed time', () => {
        expect(solve(4, { vf: 10, v0: 0, a: -10 })).toBeNull();
        expect(solve(4, { vf: 0, v0: 10, a: -10 })).toBe(1);
    });

    it('should guard zero-acceleration rules on a = 0', () => {
        expect(solve(5, { v0: 4, a: 0 })).toBe(4);
        expect(solve(5, { v0: 4, a: -9.81 })).toBeNull();
        expect(solve(6, { vf: 4, a: 0 })).toBe(4);
        expect(solve(6, { vf: 4, a: 2 })).toBeNull();
    });

    it('should guard rules that divide by acceleration, time or displacement', () => {
        expect(solve(4, { vf: 1, v0: 0, a: 0 })).toBeNull();
        expect(solve(9, { vf: 1, v0: 0, t: 0 })).toBeNull();
        expect(solve(14, { d: 1, v0: 2, vf: -2 })).toBeNull();
        expect(solve(24, { vf: 1, v0: 0, d: 0 })).toBeNull();
        expect(solve(25, { vf: 1, v0: 0, a: 0 })).toBeNull();
    });

    it('should evaluate the constant-acceleration relations', () => {
        expect(solve(7, { v0: 2, a: 3, t: 4 })).toBe(14);
        expect(solve(8, { vf: 14, a: 3, t: 4 })).toBe(2);
        expect(solve(10, { v0: 2, a: 4, t: 3 })).toBe(24);
        expect(solve(11, { d: 24, a: 4, t: 3 })).toBe(2);
        expect(solve(13, { v0: 2, vf: 6, t: 3 })).toBe(12);
        expect(solve(16, { d: 12, t: 3, v0: 2 })).toBe(6);
        expect(solve(17, { vf: 14, a: 4, t: 3 })).toBe(24);
        expect(solve(25, { vf: 5, v0: 3, a: 2 })).toBe(4);
    });

    it('should pick the non-trivial root of the launch quadratic', () => {
        const t = solve(21, { d: 0, v0: 5, a: -9.81 });
        expect(t).toBeCloseTo(10 / 9.81, 10);
    });

    it('should fall back to d / v when the quadratic degenerates', () => {
        expect(solve(21, { d: 10, v0: 5, a: 0 })).toBe(2);
        expect(solve(20, { d: 10, vf: 5, a: 0 })).toBe(2);
        expect(solve(21, { d: 10, v0: 0, a: 0 })).toBeNull();
    });

    it('should return null for a negative discriminant', () => {
        expect(solve(21, { d: 10, v0: 1, a: -9.81 })).toBeNull();
        expect(solve(22, { v0: 1, a: -9.81, d: 10 })).toBeNull();
    });

    it('should sign the final velocity after the initial one', () => {
        expect(solve(22, { v0: 3, a: 0, d: 5 })).toBe(3);
        expect(solve(22, { v0: -3, a: 0, d: 5 })).toBe(-3);
        expect(solve(23, { vf: -4, a: 0, d: 2 })).toBe(-4);
    });
});

describe('pickTimeRoot', () => {
    it('should prefer the larger root when it is clearly positive', () => {
        expect(pickTimeRoot(-1, 2)).toBe(2);
        expect(pickTimeRoot(3, 1)).toBe(3);
    });

    it('should accept a root at zero when nothing larger exists', () => {
        expect(pickTimeRoot(ROOT_EPSILON / 2, 0)).toBe(0);
    });

    it('should reject two negative roots', () => {
        expect(pickTimeRoot(-1, -2)).toBeNull();
        expect(pickTimeRoot(ROOT_EPSILON / 2, -1)).toBeNull();
    });
});

describe('expressionFor', () => {
    it('should name the time root the quadratic rules took', () => {
        // Launched upward and back at the start height: the `+` root is the trivial t = 0
        expect(solve(21, { d: 0, v0: 5, a: -10 })).toBe(1);
        expect(branch(21, { d: 0, v0: 5, a: -10 })).toBe('(-v0 - sqrt(v0^2 + 2*a*d))/a');

        // a > 0 flips which root is larger
        expect(solve(20, { d: 16, vf: 10, a: 2 })).toBe(8);
        expect(branch(20, { d: 16, vf: 10, a: 2 })).toBe('(vf + sqrt(vf^2 - 2*a*d))/a');
        expect(branch(20, { d: 5, vf: 0, a: -10 })).toBe('(vf - sqrt(vf^2 - 2*a*d))/a');
    });

    it('should name the linear form when a = 0', () => {
        expect(branch(20, { d: 6, vf: 3, a: 0 })).toBe('d/vf');
        expect(branch(21, { d: 6, v0: 3, a: 0 })).toBe('d/v0');
    });

    it('should carry the sign the velocity rules took', () => {
        expect(solve(22, { v0: -3, a: 0, d: 4 })).toBe(-3);
        expect(branch(22, { v0: -3, a: 0, d: 4 })).toBe('-sqrt(v0^2 + 2*a*d)');
        expect(branch(22, { v0: 0, a: -10, d: -5 })).toBe('sqrt(v0^2 + 2*a*d)');
        expect(branch(22, { v0: 0, a: 10, d: -5 })).toBe('-sqrt(v0^2 + 2*a*d)');

        expect(solve(23, { vf: -4, a: 0, d: 1 })).toBe(-4);
        expect(branch(23, { vf: -4, a: 0, d: 1 })).toBe('-sqrt(vf^2 - 2*a*d)');
        expect(branch(23, { vf: 0, a: -10, d: -5 })).toBe('-sqrt(vf^2 - 2*a*d)');
    });

    it('should fall back to the single form of every other rule', () => {
        expect(branch(10, { v0: 3, a: 0, t: 2 })).toBe(ruleById(10).expression);
    });
});
