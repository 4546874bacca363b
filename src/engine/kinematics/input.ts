import { NumericInput } from '../../schema/kinematics.js';

// Longest leading decimal number: sign, digits, optional fraction and exponent
const NUMERIC_PREFIX = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;

/**
 * Lenient numeric coercion for typed-in values.
 *
 * Never throws: "12.5m" reads as 12.5, "1e3" as 1000, while text without a
 * numeric prefix ("abc", "-", "") yields null, meaning "no value".
 */
export function parseNumericInput(raw: NumericInput): number | null {
    if (typeof raw === 'number') {
        return Number.isFinite(raw) ? raw : null;
    }

    const match = raw.trim().match(NUMERIC_PREFIX);
    if (!match) return null;

    const value = Number(match[0]);
    return Number.isFinite(value) ? value : null;
}
