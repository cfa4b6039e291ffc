/**
 * Helpers.ts
 * Utility functions for OID strings and numeric input.
 */
import { OidSegment } from '../types';

const DECIMAL_INTEGER = /^[+-]?\d+$/;
const ARC = /^\d+$/;

/**
 * Checks if a string is a plain decimal integer (optional sign, no exponent, no fraction).
 */
export function isDecimalInteger(str: string): boolean {
    return DECIMAL_INTEGER.test(str);
}

/**
 * Two-branch segment parse: digits become a number, anything else stays a name.
 */
export function parseSegment(segment: string): OidSegment {
    if (ARC.test(segment)) {
        const arc = Number(segment);
        if (Number.isSafeInteger(arc)) return arc;
    }
    return segment;
}

/**
 * Renders OID arcs in dotted form, without a leading dot.
 */
export function oidToString(arcs: readonly number[]): string {
    return arcs.join('.');
}

/**
 * Parses a purely numeric dotted OID ("1.3.6.1" or ".1.3.6.1").
 * @returns The arcs, or null when any segment is not a non-negative integer.
 */
export function parseNumericOid(str: string): number[] | null {
    const body = str.trim().replace(/^\./, '');
    if (body === '') return null;

    const arcs: number[] = [];
    for (const segment of body.split('.')) {
        const arc = parseSegment(segment);
        if (typeof arc !== 'number') return null;
        arcs.push(arc);
    }
    return arcs;
}

/**
 * True when `prefix` is a (non-strict) prefix of `arcs`.
 */
export function startsWith(arcs: readonly number[], prefix: readonly number[]): boolean {
    if (prefix.length > arcs.length) return false;
    return prefix.every((arc, i) => arcs[i] === arc);
}
