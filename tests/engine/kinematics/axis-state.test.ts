import {
    VARIABLE_COUNT,
    createVariable,
    createAxisState,
    createDefaultAxes,
    setUserValue,
    clearVariable,
    deriveValue,
    forgetDerived,
    cloneAxisState,
    knownCount,
    derivedKnownCount
} from '../../../src/engine/kinematics/axis-state.js';

describe('axis state', () => {
    it('should have seven roles per axis', () => {
        expect(VARIABLE_COUNT).toBe(7);
    });

    it('should create unknown variables without a value and user-set ones with a value', () => {
        expect(createVariable()).toEqual({ value: 0, known: false, userSet: false });
        expect(createVariable(4)).toEqual({ value: 4, known: true, userSet: true });
    });

    it('should build the default axes with gravity pulling down', () => {
        const { x, y } = createDefaultAxes(9.81);

        expect(x.p0).toEqual({ value: 0, known: true, userSet: true });
        expect(x.a).toEqual({ value: 0, known: true, userSet: true });
        expect(y.p0).toEqual({ value: 0, known: true, userSet: true });
        expect(y.a).toEqual({ value: -9.81, known: true, userSet: true });
        expect(knownCount(x)).toBe(2);
        expect(knownCount(y)).toBe(2);
    });

    it('should honour a custom gravity', () => {
        expect(createDefaultAxes(1.62).y.a.value).toBe(-1.62);
    });

    it('should never let a derivation overwrite a user-set value', () => {
        const variable = createVariable(3);

        expect(deriveValue(variable, 10)).toBe(false);
        expect(variable).toEqual({ value: 3, known: true, userSet: true });
    });

    it('should mark derived values known but not user-set', () => {
        const variable = createVariable();

        expect(deriveValue(variable, 10)).toBe(true);
        expect(variable).toEqual({ value: 10, known: true, userSet: false });
    });

    it('should forget derived knowledge but keep user input', () => {
        const derived = createVariable();
        deriveValue(derived, 2);
        const entered = createVariable(5);

        forgetDerived(derived);
        forgetDerived(entered);

        expect(derived.known).toBe(false);
        expect(entered.known).toBe(true);
    });

    it('should set and clear user values', () => {
        const variable = createVariable();

        setUserValue(variable, 7);
        expect(variable).toEqual({ value: 7, known: true, userSet: true });

        clearVariable(variable);
        expect(variable).toEqual({ value: 0, known: false, userSet: false });
    });

    it('should count derived knowledge separately from user input', () => {
        const state = createAxisState({ d: 100, t: 4 });
        deriveValue(state.v0, 25);

        expect(knownCount(state)).toBe(3);
        expect(derivedKnownCount(state)).toBe(1);
    });

    it('should clone deeply', () => {
        const state = createAxisState({ t: 1 });
        const copy = cloneAxisState(state);

        copy.t.value = 99;
        expect(state.t.value).toBe(1);
    });
});
