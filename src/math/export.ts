import nerdamer from 'nerdamer';
import { z } from 'zod';
import {
    AXES,
    ROLES,
    Axis,
    Derivation,
    KinematicsSnapshot,
    PolarQuantity,
    Variable
} from '../schema/kinematics.js';
import { expressionFor, findRule } from '../engine/kinematics/rules.js';
import { RoleValues, readValues } from '../engine/kinematics/axis-state.js';

export const ExportFormatSchema = z.enum(['plaintext', 'steps', 'latex', 'json']);

export type ExportFormat = z.infer<typeof ExportFormatSchema>;

const POLAR_LABELS: Record<PolarQuantity, { label: string; unit: string }> = {
    launchSpeed: { label: 'Launch speed', unit: 'm/s' },
    launchAngle: { label: 'Launch angle', unit: 'deg' },
    finalSpeed: { label: 'Final speed', unit: 'm/s' }
};

interface DerivedEntry {
    name: string;
    variable: Variable;
    derivation: Derivation;
    // Axis values the rule read; polar entries have none
    inputs: RoleValues | null;
}

// 8 significant digits, no trailing zeros, and never "-0"
export function formatNumber(value: number): string {
    const rounded = Number(value.toPrecision(8));
    return Object.is(rounded, -0) ? '0' : String(rounded);
}

function polarEntries(snapshot: KinematicsSnapshot): [PolarQuantity, Variable][] {
    return [
        ['launchSpeed', snapshot.launch.speed],
        ['launchAngle', snapshot.launch.angle],
        ['finalSpeed', snapshot.final.speed]
    ];
}

function formatCell(variable: Variable): string {
    if (!variable.known) return '?';
    return formatNumber(variable.value) + (variable.userSet ? '*' : '');
}

function describeDerivation(derivation: Derivation): string {
    switch (derivation.kind) {
        case 'rule':
            return `rule ${derivation.rule}: ${derivation.equation}`;
        case 'launch-vector':
            return 'launch speed and angle';
        case 'final-speed':
            return 'final speed decomposition';
        case 'shared-time':
            return `shared time from ${derivation.from}`;
        case 'components':
            return 'velocity components';
    }
}

export class ExportEngine {

    export(snapshot: KinematicsSnapshot, format: ExportFormat, input?: string): string {
        switch (format) {
            case 'plaintext':
                return this.toPlaintext(snapshot);
            case 'steps':
                return this.toSteps(snapshot, input);
            case 'latex':
                return this.toLatex(snapshot);
            case 'json':
                return JSON.stringify(snapshot, null, 2);
            default:
                throw new Error(`Unsupported export format: ${format}`);
        }
    }

    private toPlaintext(snapshot: KinematicsSnapshot): string {
        const lines = [`${''.padEnd(4)} ${'x'.padEnd(14)} y`];
        for (const role of ROLES) {
            lines.push(`${role.padEnd(4)} ${formatCell(snapshot.x[role]).padEnd(14)} ${formatCell(snapshot.y[role])}`);
        }

        lines.push('');
        for (const [quantity, variable] of polarEntries(snapshot)) {
            const { label, unit } = POLAR_LABELS[quantity];
            lines.push(`${label}: ${formatCell(variable)} ${unit}`);
        }

        const { maxHeight, timeOfFlight, range } = snapshot.derived;
        if (maxHeight !== null) lines.push(`Max height: ${formatNumber(maxHeight)} m`);
        if (timeOfFlight !== null) lines.push(`Time of flight: ${formatNumber(timeOfFlight)} s`);
        if (range !== null) lines.push(`Range: ${formatNumber(range)} m`);

        return lines.join('\n');
    }

    private toSteps(snapshot: KinematicsSnapshot, input?: string): string {
        const header = input ? `Input: ${input}\n\n` : '';
        const entries = this.derivedEntries(snapshot);
        if (entries.length === 0) {
            return `${header}Steps:\n(nothing derived)`;
        }
        const steps = entries.map((entry, i) =>
            `${i + 1}. ${entry.name} = ${formatNumber(entry.variable.value)} (${describeDerivation(entry.derivation)})`
        );
        return `${header}Steps:\n${steps.join('\n')}`;
    }

    private toLatex(snapshot: KinematicsSnapshot): string {
        return this.derivedEntries(snapshot)
            .map(entry => {
                const value = formatNumber(entry.variable.value);
                const rhs = this.ruleToTeX(entry.derivation, entry.inputs);
                return rhs ? `${entry.name} = ${rhs} = ${value}` : `${entry.name} = ${value}`;
            })
            .join('\n');
    }

    // Renders the root or sign the rule took for these inputs, not its generic form
    private ruleToTeX(derivation: Derivation, inputs: RoleValues | null): string | null {
        if (derivation.kind !== 'rule') return null;
        const rule = findRule(derivation.rule);
        if (!rule) return derivation.equation;
        const expression = inputs ? expressionFor(rule, inputs) : rule.expression;
        try {
            return nerdamer(expression).toTeX();
        } catch {
            return expression;
        }
    }

    // Derived (non-user-set) known quantities in display order, x before y, then polar
    private derivedEntries(snapshot: KinematicsSnapshot): DerivedEntry[] {
        const entries: DerivedEntry[] = [];
        for (const axis of AXES) {
            // Inputs of a derived value never change after it fires, so the snapshot holds them
            const inputs = readValues(snapshot[axis]);
            for (const role of ROLES) {
                const variable = snapshot[axis][role];
                const derivation = snapshot.attribution[axis][role];
                if (variable.known && !variable.userSet && derivation) {
                    entries.push({ name: axisName(axis, role), variable, derivation, inputs });
                }
            }
        }

        for (const [quantity, variable] of polarEntries(snapshot)) {
            const derivation = snapshot.attribution.polar[quantity];
            if (variable.known && !variable.userSet && derivation) {
                entries.push({ name: quantity, variable, derivation, inputs: null });
            }
        }
        return entries;
    }
}

function axisName(axis: Axis, role: string): string {
    return `${axis}.${role}`;
}
