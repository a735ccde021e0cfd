import type { Multiplicity } from '../types/index.js';
import { createInvalidMultiplicityError } from '../types/index.js';

/** UML default when neither bound is given */
export const DEFAULT_MULTIPLICITY: Multiplicity = { lower: 1, upper: 1 };

export const UNCONSTRAINED: Multiplicity = { lower: 0, upper: '*' };

function parseBound(raw: string, which: 'lower' | 'upper'): number | '*' | null {
    const s = raw.trim();
    if (s === '*' || s === '-1' || s.toLowerCase() === 'n') {
        return which === 'upper' ? '*' : null;
    }
    if (!/^\d+$/.test(s)) return null;
    const n = Number(s);
    // Bounds become xsd:nonNegativeInteger literals and must print as plain digits
    return Number.isSafeInteger(n) ? n : null;
}

function isValid(m: Multiplicity): boolean {
    if (m.lower < 0) return false;
    if (m.upper === '*') return true;
    return m.upper >= m.lower && m.upper > 0;
}

/**
 * Build a multiplicity from separate bound strings (XMI lowerValue/upperValue).
 * A missing bound takes the UML default of 1, except that a missing upper never
 * drops below an explicit lower.
 */
export function multiplicityFromBounds(lower: string | undefined, upper: string | undefined): Multiplicity {
    if (lower === undefined && upper === undefined) return { ...DEFAULT_MULTIPLICITY };

    const lo = lower === undefined ? 1 : parseBound(lower, 'lower');
    const rawUp = upper === undefined ? null : parseBound(upper, 'upper');
    const text = `${lower ?? ''}..${upper ?? ''}`;

    if (lo === null || lo === '*') throw createInvalidMultiplicityError(text);
    if (upper !== undefined && rawUp === null) throw createInvalidMultiplicityError(text);

    const up = rawUp ?? Math.max(lo, 1);
    const m: Multiplicity = { lower: lo, upper: up };
    if (!isValid(m)) throw createInvalidMultiplicityError(text);
    return m;
}

/**
 * Parse textual multiplicity: "1", "0..1", "*", "1..*", "2..5".
 */
export function parseMultiplicity(text: string): Multiplicity {
    const s = text.trim();
    if (!s) throw createInvalidMultiplicityError(text);

    const range = s.split('..');
    if (range.length > 2) throw createInvalidMultiplicityError(text);

    if (range.length === 1) {
        if (s === '*') return { ...UNCONSTRAINED };
        const n = parseBound(s, 'lower');
        if (n === null || n === '*' || n === 0) throw createInvalidMultiplicityError(text);
        return { lower: n, upper: n };
    }

    const lower = parseBound(range[0], 'lower');
    const upper = parseBound(range[1], 'upper');
    if (lower === null || lower === '*' || upper === null) throw createInvalidMultiplicityError(text);

    const m: Multiplicity = { lower, upper };
    if (!isValid(m)) throw createInvalidMultiplicityError(text);
    return m;
}

export function formatMultiplicity(m: Multiplicity): string {
    if (m.upper === '*') return m.lower === 0 ? '*' : `${m.lower}..*`;
    if (m.lower === m.upper) return String(m.lower);
    return `${m.lower}..${m.upper}`;
}

export function isSingleValued(m: Multiplicity): boolean {
    return m.upper === 1;
}
