import {
    ROLES,
    Role,
    Variable,
    AxisState,
    LaunchVector,
    FinalVelocityMagnitude
} from '../../schema/kinematics.js';

export const VARIABLE_COUNT = ROLES.length;

export const STANDARD_GRAVITY = 9.81;

export type RoleValues = Record<Role, number>;
export type RoleFlags = Record<Role, boolean>;

export function createVariable(value?: number): Variable {
    if (value === undefined) {
        return { value: 0, known: false, userSet: false };
    }
    return { value, known: true, userSet: true };
}

/**
 * Build an axis with the given roles entered by the user; every other role unknown.
 */
export function createAxisState(userValues: Partial<RoleValues> = {}): AxisState {
    return {
        p0: createVariable(userValues.p0),
        pf: createVariable(userValues.pf),
        v0: createVariable(userValues.v0),
        vf: createVariable(userValues.vf),
        a: createVariable(userValues.a),
        d: createVariable(userValues.d),
        t: createVariable(userValues.t)
    };
}

export function setUserValue(variable: Variable, value: number): void {
    variable.value = value;
    variable.known = true;
    variable.userSet = true;
}

export function clearVariable(variable: Variable): void {
    variable.value = 0;
    variable.known = false;
    variable.userSet = false;
}

// Marks a value as derived. Never touches a user-set variable.
export function deriveValue(variable: Variable, value: number): boolean {
    if (variable.userSet) return false;
    variable.value = value;
    variable.known = true;
    return true;
}

export function forgetDerived(variable: Variable): void {
    if (!variable.userSet) variable.known = false;
}

export function cloneAxisState(state: AxisState): AxisState {
    return {
        p0: { ...state.p0 },
        pf: { ...state.pf },
        v0: { ...state.v0 },
        vf: { ...state.vf },
        a: { ...state.a },
        d: { ...state.d },
        t: { ...state.t }
    };
}

export function readValues(state: AxisState): RoleValues {
    return {
        p0: state.p0.value,
        pf: state.pf.value,
        v0: state.v0.value,
        vf: state.vf.value,
        a: state.a.value,
        d: state.d.value,
        t: state.t.value
    };
}

export function readKnown(state: AxisState): RoleFlags {
    return {
        p0: state.p0.known,
        pf: state.pf.known,
        v0: state.v0.known,
        vf: state.vf.known,
        a: state.a.known,
        d: state.d.known,
        t: state.t.known
    };
}

export function knownCount(state: AxisState): number {
    return ROLES.filter(role => state[role].known).length;
}

/** Known variables that were not entered by the user. */
export function derivedKnownCount(state: AxisState): number {
    return ROLES.filter(role => state[role].known && !state[role].userSet).length;
}

// Defaults: launch from the origin, no horizontal acceleration, gravity pulling -y
export function createDefaultAxes(gravity: number = STANDARD_GRAVITY): { x: AxisState; y: AxisState } {
    return {
        x: createAxisState({ p0: 0, a: 0 }),
        y: createAxisState({ p0: 0, a: -gravity })
    };
}

export function createLaunchVector(): LaunchVector {
    return { speed: createVariable(), angle: createVariable() };
}

export function createFinalVelocityMagnitude(): FinalVelocityMagnitude {
    return { speed: createVariable() };
}
