/**
 * OWL 2 functional-style syntax writer.
 */

import type { Axiom, ClassExpression, IRI, Ontology } from '../types/index.js';
import { NS } from '../types/index.js';

const CARDINALITY_NAMES = { min: 'MinCardinality', max: 'MaxCardinality', exact: 'ExactCardinality' } as const;

const LOCAL_NAME = /^[A-Za-z_][A-Za-z0-9_-]*$/;

function escapeLiteral(value: string): string {
    return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

class FunctionalWriter {
    private readonly prefixes: Array<[string, IRI]>;

    constructor(prefixes: Record<string, IRI>) {
        // longest namespace first so nested namespaces abbreviate correctly
        this.prefixes = Object.entries(prefixes).sort((a, b) => b[1].length - a[1].length);
    }

    iri(value: IRI): string {
        for (const [prefix, ns] of this.prefixes) {
            if (value.startsWith(ns)) {
                const local = value.slice(ns.length);
                if (LOCAL_NAME.test(local)) return `${prefix}:${local}`;
            }
        }
        return `<${value}>`;
    }

    expression(e: ClassExpression): string {
        switch (e.type) {
            case 'Class':
                return this.iri(e.iri);
            case 'ObjectUnionOf':
                return `ObjectUnionOf(${e.operands.map((o) => this.expression(o)).join(' ')})`;
            case 'ObjectOneOf':
                return `ObjectOneOf(${e.individuals.map((i) => this.iri(i)).join(' ')})`;
            case 'ObjectCardinality':
            case 'DataCardinality': {
                const prefix = e.type === 'ObjectCardinality' ? 'Object' : 'Data';
                const filler = e.type === 'ObjectCardinality' ? e.onClass : e.onDataRange;
                const args = [String(e.cardinality), this.iri(e.property)];
                if (filler !== undefined) args.push(this.iri(filler));
                return `${prefix}${CARDINALITY_NAMES[e.kind]}(${args.join(' ')})`;
            }
        }
    }

    axiom(a: Axiom): string {
        switch (a.type) {
            case 'Declaration':
                return `Declaration(${a.entity}(${this.iri(a.iri)}))`;
            case 'SubClassOf':
                return `SubClassOf(${this.expression(a.sub)} ${this.expression(a.sup)})`;
            case 'EquivalentClasses':
                return `EquivalentClasses(${a.classes.map((c) => this.expression(c)).join(' ')})`;
            case 'DisjointClasses':
                return `DisjointClasses(${a.classes.map((c) => this.iri(c)).join(' ')})`;
            case 'DataPropertyDomain':
            case 'ObjectPropertyDomain':
                return `${a.type}(${this.iri(a.property)} ${this.expression(a.domain)})`;
            case 'DataPropertyRange':
            case 'ObjectPropertyRange':
                return `${a.type}(${this.iri(a.property)} ${this.iri(a.range)})`;
            case 'FunctionalDataProperty':
            case 'FunctionalObjectProperty':
                return `${a.type}(${this.iri(a.property)})`;
            case 'InverseObjectProperties':
                return `InverseObjectProperties(${this.iri(a.first)} ${this.iri(a.second)})`;
            case 'ClassAssertion':
                return `ClassAssertion(${this.iri(a.cls)} ${this.iri(a.individual)})`;
            case 'DifferentIndividuals':
                return `DifferentIndividuals(${a.individuals.map((i) => this.iri(i)).join(' ')})`;
            case 'AnnotationAssertion':
                return `AnnotationAssertion(${this.iri(NS.rdfs + a.property)} ${this.iri(a.subject)} ${escapeLiteral(a.value)})`;
        }
    }
}

/**
 * Render an ontology as functional-style syntax, one axiom per line.
 */
export function toFunctionalSyntax(ontology: Ontology): string {
    const writer = new FunctionalWriter(ontology.prefixes);
    const lines: string[] = [];
    for (const [prefix, ns] of Object.entries(ontology.prefixes)) {
        lines.push(`Prefix(${prefix}:=<${ns}>)`);
    }
    lines.push('');
    lines.push(`Ontology(<${ontology.iri}>`);
    for (const axiom of ontology.axioms) {
        lines.push(writer.axiom(axiom));
    }
    lines.push(')');
    return lines.join('\n') + '\n';
}
