import { Role } from '../../schema/kinematics.js';
import { RoleValues } from './axis-state.js';

/**
 * A single derivation of the constant-acceleration (SUVAT) relations.
 *
 * `solve` returns null when the rule's guard rejects the current inputs
 * (zero denominator, negative discriminant, negative time); the solver
 * treats that as "not derivable yet", never as a failure.
 */
export interface KinematicRule {
    id: number;
    output: Role;
    inputs: readonly Role[];
    /** Human-readable form, e.g. `vf = v0 + a*t` */
    equation: string;
    /** Right-hand side in nerdamer syntax, for TeX rendering */
    expression: string;
    solve(values: RoleValues): number | null;
    /** Right-hand side of the root or sign `solve` takes for these inputs, where it can take more than one */
    branch?(values: RoleValues): string;
}

// Larger quadratic roots at or below this are treated as the trivial t = 0 solution
export const ROOT_EPSILON = 0.001;

function nonNegativeTime(t: number): number | null {
    return t >= 0 ? t : null;
}

/**
 * Root selection for a time-quadratic: prefer the larger root when it is
 * clearly positive, otherwise accept the smaller one if it is not negative.
 */
export function pickTimeRoot(r1: number, r2: number): number | null {
    const tMax = Math.max(r1, r2);
    const tMin = Math.min(r1, r2);
    if (tMax > ROOT_EPSILON) return tMax;
    if (tMin >= 0) return tMin;
    return null;
}

// Magnitude from v^2 with a sign hint; a zero hint resolves to the positive root
function signedRoot(square: number, signHint: number): number | null {
    if (square < 0) return null;
    const magnitude = Math.sqrt(square);
    return signHint >= 0 ? magnitude : -magnitude;
}

// With v0 = 0 the displacement says which way the object ends up moving
function finalVelocitySign({ v0, a, d }: RoleValues): number {
    return v0 !== 0 ? v0 : a * d;
}

function initialVelocitySign({ vf, a, d }: RoleValues): number {
    return vf !== 0 ? vf : -(a * d);
}

/** (b ± sqrt(disc))/a: true when pickTimeRoot takes the `+` root */
function takesPlusRoot(b: number, disc: number, a: number): boolean {
    const root = Math.sqrt(Math.max(disc, 0));
    return pickTimeRoot((b + root) / a, (b - root) / a) === (b + root) / a;
}

export const KINEMATIC_RULES: readonly KinematicRule[] = [
    {
        id: 1, output: 'd', inputs: ['pf', 'p0'],
        equation: 'd = pf - p0', expression: 'pf - p0',
        solve: ({ pf, p0 }) => pf - p0
    },
    {
        id: 2, output: 'pf', inputs: ['p0', 'd'],
        equation: 'pf = p0 + d', expression: 'p0 + d',
        solve: ({ p0, d }) => p0 + d
    },
    {
        id: 3, output: 'p0', inputs: ['pf', 'd'],
        equation: 'p0 = pf - d', expression: 'pf - d',
        solve: ({ pf, d }) => pf - d
    },
    {
        id: 4, output: 't', inputs: ['vf', 'v0', 'a'],
        equation: 't = (vf - v0)/a', expression: '(vf - v0)/a',
        solve: ({ vf, v0, a }) => (a !== 0 ? nonNegativeTime((vf - v0) / a) : null)
    },
    {
        id: 5, output: 'vf', inputs: ['v0', 'a'],
        equation: 'vf = v0 (a = 0)', expression: 'v0',
        solve: ({ v0, a }) => (a === 0 ? v0 : null)
    },
    {
        id: 6, output: 'v0', inputs: ['vf', 'a'],
        equation: 'v0 = vf (a = 0)', expression: 'vf',
        solve: ({ vf, a }) => (a === 0 ? vf : null)
    },
    {
        id: 7, output: 'vf', inputs: ['v0', 'a', 't'],
        equation: 'vf = v0 + a*t', expression: 'v0 + a*t',
        solve: ({ v0, a, t }) => v0 + a * t
    },
    {
        id: 8, output: 'v0', inputs: ['vf', 'a', 't'],
        equation: 'v0 = vf - a*t', expression: 'vf - a*t',
        solve: ({ vf, a, t }) => vf - a * t
    },
    {
        id: 9, output: 'a', inputs: ['vf', 'v0', 't'],
        equation: 'a = (vf - v0)/t', expression: '(vf - v0)/t',
        solve: ({ vf, v0, t }) => (t !== 0 ? (vf - v0) / t : null)
    },
    {
        id: 10, output: 'd', inputs: ['v0', 'a', 't'],
        equation: 'd = v0*t + a*t^2/2', expression: 'v0*t + (1/2)*a*t^2',
        solve: ({ v0, a, t }) => v0 * t + 0.5 * a * t * t
    },
    {
        id: 11, output: 'v0', inputs: ['d', 'a', 't'],
        equation: 'v0 = (d - a*t^2/2)/t', expression: '(d - (1/2)*a*t^2)/t',
        solve: ({ d, a, t }) => (t !== 0 ? (d - 0.5 * a * t * t) / t : null)
    },
    {
        id: 12, output: 'a', inputs: ['d', 'v0', 't'],
        equation: 'a = 2*(d - v0*t)/t^2', expression: '2*(d - v0*t)/t^2',
        solve: ({ d, v0, t }) => (t !== 0 ? (2 * (d - v0 * t)) / (t * t) : null)
    },
    {
        id: 13, output: 'd', inputs: ['v0', 'vf', 't'],
        equation: 'd = (v0 + vf)*t/2', expression: '(v0 + vf)*t/2',
        solve: ({ v0, vf, t }) => ((v0 + vf) * t) / 2
    },
    {
        id: 14, output: 't', inputs: ['d', 'v0', 'vf'],
        equation: 't = 2*d/(v0 + vf)', expression: '2*d/(v0 + vf)',
        solve: ({ d, v0, vf }) => (v0 + vf !== 0 ? nonNegativeTime((2 * d) / (v0 + vf)) : null)
    },
    {
        id: 15, output: 'v0', inputs: ['d', 't', 'vf'],
        equation: 'v0 = 2*d/t - vf', expression: '2*d/t - vf',
        solve: ({ d, t, vf }) => (t !== 0 ? (2 * d) / t - vf : null)
    },
    {
        id: 16, output: 'vf', inputs: ['d', 't', 'v0'],
        equation: 'vf = 2*d/t - v0', expression: '2*d/t - v0',
        solve: ({ d, t, v0 }) => (t !== 0 ? (2 * d) / t - v0 : null)
    },
    {
        id: 17, output: 'd', inputs: ['vf', 'a', 't'],
        equation: 'd = vf*t - a*t^2/2', expression: 'vf*t - (1/2)*a*t^2',
        solve: ({ vf, a, t }) => vf * t - 0.5 * a * t * t
    },
    {
        id: 18, output: 'vf', inputs: ['d', 'a', 't'],
        equation: 'vf = (d + a*t^2/2)/t', expression: '(d + (1/2)*a*t^2)/t',
        solve: ({ d, a, t }) => (t !== 0 ? (d + 0.5 * a * t * t) / t : null)
    },
    {
        id: 19, output: 'a', inputs: ['vf', 'd', 't'],
        equation: 'a = 2*(vf*t - d)/t^2', expression: '2*(vf*t - d)/t^2',
        solve: ({ vf, d, t }) => (t !== 0 ? (2 * (vf * t - d)) / (t * t) : null)
    },
    {
        // (a/2)t^2 - vf*t + d = 0
        id: 20, output: 't', inputs: ['d', 'vf', 'a'],
        equation: 't: d = vf*t - a*t^2/2 (quadratic)', expression: '(vf - sqrt(vf^2 - 2*a*d))/a',
        solve: ({ d, vf, a }) => {
            if (a === 0) {
                return vf !== 0 ? nonNegativeTime(d / vf) : null;
            }
            const disc = vf * vf - 2 * a * d;
            if (disc < 0) return null;
            const root = Math.sqrt(disc);
            return pickTimeRoot((vf + root) / a, (vf - root) / a);
        },
        branch: ({ d, vf, a }) => {
            if (a === 0) return 'd/vf';
            return takesPlusRoot(vf, vf * vf - 2 * a * d, a)
                ? '(vf + sqrt(vf^2 - 2*a*d))/a'
                : '(vf - sqrt(vf^2 - 2*a*d))/a';
        }
    },
    {
        // (a/2)t^2 + v0*t - d = 0
        id: 21, output: 't', inputs: ['d', 'v0', 'a'],
        equation: 't: d = v0*t + a*t^2/2 (quadratic)', expression: '(-v0 + sqrt(v0^2 + 2*a*d))/a',
        solve: ({ d, v0, a }) => {
            if (a === 0) {
                return v0 !== 0 ? nonNegativeTime(d / v0) : null;
            }
            const disc = v0 * v0 + 2 * a * d;
            if (disc < 0) return null;
            const root = Math.sqrt(disc);
            return pickTimeRoot((-v0 + root) / a, (-v0 - root) / a);
        },
        branch: ({ d, v0, a }) => {
            if (a === 0) return 'd/v0';
            return takesPlusRoot(-v0, v0 * v0 + 2 * a * d, a)
                ? '(-v0 + sqrt(v0^2 + 2*a*d))/a'
                : '(-v0 - sqrt(v0^2 + 2*a*d))/a';
        }
    },
    {
        id: 22, output: 'vf', inputs: ['v0', 'a', 'd'],
        equation: 'vf^2 = v0^2 + 2*a*d', expression: 'sqrt(v0^2 + 2*a*d)',
        solve: (values) => signedRoot(values.v0 * values.v0 + 2 * values.a * values.d, finalVelocitySign(values)),
        branch: (values) => (finalVelocitySign(values) >= 0 ? 'sqrt(v0^2 + 2*a*d)' : '-sqrt(v0^2 + 2*a*d)')
    },
    {
        id: 23, output: 'v0', inputs: ['vf', 'a', 'd'],
        equation: 'v0^2 = vf^2 - 2*a*d', expression: 'sqrt(vf^2 - 2*a*d)',
        solve: (values) => signedRoot(values.vf * values.vf - 2 * values.a * values.d, initialVelocitySign(values)),
        branch: (values) => (initialVelocitySign(values) >= 0 ? 'sqrt(vf^2 - 2*a*d)' : '-sqrt(vf^2 - 2*a*d)')
    },
    {
        id: 24, output: 'a', inputs: ['vf', 'v0', 'd'],
        equation: 'a = (vf^2 - v0^2)/(2*d)', expression: '(vf^2 - v0^2)/(2*d)',
        solve: ({ vf, v0, d }) => (d !== 0 ? (vf * vf - v0 * v0) / (2 * d) : null)
    },
    {
        id: 25, output: 'd', inputs: ['vf', 'v0', 'a'],
        equation: 'd = (vf^2 - v0^2)/(2*a)', expression: '(vf^2 - v0^2)/(2*a)',
        solve: ({ vf, v0, a }) => (a !== 0 ? (vf * vf - v0 * v0) / (2 * a) : null)
    }
];

export function findRule(id: number): KinematicRule | undefined {
    return KINEMATIC_RULES.find(rule => rule.id === id);
}

/** The right-hand side that produced the rule's result for these inputs. */
export function expressionFor(rule: KinematicRule, values: RoleValues): string {
    return rule.branch ? rule.branch(values) : rule.expression;
}
