import type { Axiom, ClassExpression, MappingReport, SkippedElement } from '../types/index.js';

function expressionKey(e: ClassExpression): string {
    switch (e.type) {
        case 'Class':
            return e.iri;
        case 'ObjectUnionOf':
            return `or(${e.operands.map(expressionKey).sort().join(',')})`;
        case 'ObjectOneOf':
            return `one(${[...e.individuals].sort().join(',')})`;
        case 'ObjectCardinality':
        case 'DataCardinality':
            return `${e.type}:${e.kind}:${e.cardinality}:${e.property}:${e.type === 'ObjectCardinality' ? e.onClass ?? '' : e.onDataRange ?? ''}`;
    }
}

/**
 * Structural identity of an axiom; n-ary axioms compare as sets.
 */
export function axiomKey(a: Axiom): string {
    switch (a.type) {
        case 'SubClassOf':
            return `SubClassOf|${expressionKey(a.sub)}|${expressionKey(a.sup)}`;
        case 'EquivalentClasses':
            return `EquivalentClasses|${a.classes.map(expressionKey).sort().join('|')}`;
        case 'DisjointClasses':
            return `DisjointClasses|${[...a.classes].sort().join('|')}`;
        case 'DifferentIndividuals':
            return `DifferentIndividuals|${[...a.individuals].sort().join('|')}`;
        case 'ObjectPropertyDomain':
        case 'DataPropertyDomain':
            return `${a.type}|${a.property}|${expressionKey(a.domain)}`;
        case 'InverseObjectProperties':
            return `Inverse|${[a.first, a.second].sort().join('|')}`;
        default:
            return JSON.stringify(a);
    }
}

/**
 * Accumulates axioms without duplicates and records which UML element produced each one.
 */
export class AxiomBuilder {
    readonly axioms: Axiom[] = [];
    readonly warnings: string[] = [];
    readonly skipped: SkippedElement[] = [];
    private readonly trace: Record<string, number[]> = {};
    private readonly keys = new Map<string, number>();

    add(axiom: Axiom, sourceId?: string): number {
        const key = axiomKey(axiom);
        let index = this.keys.get(key);
        if (index === undefined) {
            index = this.axioms.length;
            this.axioms.push(axiom);
            this.keys.set(key, index);
        }
        if (sourceId !== undefined) {
            const list = this.trace[sourceId] ?? (this.trace[sourceId] = []);
            if (!list.includes(index)) list.push(index);
        }
        return index;
    }

    warn(message: string): void {
        this.warnings.push(message);
    }

    skip(element: SkippedElement): void {
        this.skipped.push(element);
    }

    report(loaderWarnings: string[] = []): MappingReport {
        const stats: MappingReport['stats'] = {};
        for (const a of this.axioms) {
            stats[a.type] = (stats[a.type] ?? 0) + 1;
        }
        return {
            warnings: [...loaderWarnings, ...this.warnings],
            skipped: [...this.skipped],
            trace: { ...this.trace },
            stats,
        };
    }
}
