import { ROLES, AxisState } from '../../schema/kinematics.js';
import { KINEMATIC_RULES, KinematicRule } from './rules.js';
import { VARIABLE_COUNT, readKnown, readValues, RoleFlags } from './axis-state.js';

export type RuleAttribution = Partial<Record<KinematicRule['output'], KinematicRule>>;

export interface AxisResolution {
    state: AxisState;
    /** Rule that fired last, or null when nothing new was derivable */
    lastRule: KinematicRule | null;
    /** Rule that produced each variable derived during this call */
    derivations: RuleAttribution;
    passes: number;
    /** Non-user-set known count before the first pass and after each pass */
    knownCountByPass: number[];
}

export interface AxisSolverOptions {
    rules?: readonly KinematicRule[];
    maxPasses?: number;
}

function countDerived(known: RoleFlags, state: AxisState): number {
    return ROLES.filter(role => known[role] && !state[role].userSet).length;
}

/**
 * Fixed-point rule engine for one axis.
 *
 * Each pass walks the rule list in order; a value derived early in a pass is
 * visible to the rules after it. The known set only grows, so the loop ends
 * after the first pass that fires nothing.
 */
export class AxisSolver {
    private readonly rules: readonly KinematicRule[];
    private readonly maxPasses: number;

    constructor(options: AxisSolverOptions = {}) {
        this.rules = options.rules ?? KINEMATIC_RULES;
        this.maxPasses = options.maxPasses ?? 2 * VARIABLE_COUNT;
    }

    resolve(state: AxisState): AxisResolution {
        const values = readValues(state);
        const known = readKnown(state);
        const derivations: RuleAttribution = {};
        const knownCountByPass = [countDerived(known, state)];
        let lastRule: KinematicRule | null = null;
        let passes = 0;

        while (passes < this.maxPasses) {
            passes++;
            let fired = false;

            for (const rule of this.rules) {
                if (known[rule.output]) continue;
                if (!rule.inputs.every(input => known[input])) continue;

                const result = rule.solve(values);
                if (result === null || !Number.isFinite(result)) continue;

                values[rule.output] = result;
                known[rule.output] = true;
                derivations[rule.output] = rule;
                lastRule = rule;
                fired = true;
            }

            knownCountByPass.push(countDerived(known, state));
            if (!fired) break;
        }

        for (const role of ROLES) {
            const variable = state[role];
            if (variable.userSet || !known[role]) continue;
            variable.value = values[role];
            variable.known = true;
        }

        return { state, lastRule, derivations, passes, knownCountByPass };
    }
}
