import type { CardinalityKind, ClassExpression, IRI, Multiplicity } from '../types/index.js';

export interface CardinalityTarget {
    kind: 'data' | 'object';
    property: IRI;
    range?: IRI;
    /** The property is declared functional, so an upper bound of 1 is already implied */
    functional: boolean;
    qualified: boolean;
}

function restriction(kind: CardinalityKind, n: number, t: CardinalityTarget): ClassExpression {
    if (t.kind === 'object') {
        return {
            type: 'ObjectCardinality',
            kind,
            cardinality: n,
            property: t.property,
            ...(t.qualified && t.range && { onClass: t.range }),
        };
    }
    return {
        type: 'DataCardinality',
        kind,
        cardinality: n,
        property: t.property,
        ...(t.qualified && t.range && { onDataRange: t.range }),
    };
}

/**
 * Cardinality restrictions the owning class is a subclass of.
 *
 * - n..n (n > 0)      -> exactly n
 * - lower > 0         -> min lower
 * - bounded upper     -> max upper, unless functional already says "at most 1"
 * - 0..*              -> nothing
 */
export function cardinalityRestrictions(m: Multiplicity, t: CardinalityTarget): ClassExpression[] {
    if (m.upper !== '*' && m.lower === m.upper && m.lower > 0) {
        return [restriction('exact', m.lower, t)];
    }

    const out: ClassExpression[] = [];
    if (m.lower > 0) {
        out.push(restriction('min', m.lower, t));
    }
    if (m.upper !== '*' && !(m.upper === 1 && t.functional)) {
        out.push(restriction('max', m.upper, t));
    }
    return out;
}
