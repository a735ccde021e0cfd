/**
 * OWL 2 structural axioms -> RDF quads, following the OWL 2 to RDF graph
 * mapping for the constructs the mapping engine produces.
 */

import { DataFactory } from 'n3';
import type { BlankNode, NamedNode, Quad, Quad_Object, Quad_Subject } from 'n3';
import type { Axiom, ClassExpression, EntityKind, IRI, Ontology } from '../types/index.js';
import { NS, createSerializationError } from '../types/index.js';

const { namedNode, blankNode, literal, quad } = DataFactory;

const rdf = (local: string) => namedNode(NS.rdf + local);
const rdfs = (local: string) => namedNode(NS.rdfs + local);
const owl = (local: string) => namedNode(NS.owl + local);
const xsd = (local: string) => namedNode(NS.xsd + local);

const TYPE = rdf('type');

const ENTITY_TYPES: Record<EntityKind, NamedNode> = {
    Class: owl('Class'),
    DataProperty: owl('DatatypeProperty'),
    ObjectProperty: owl('ObjectProperty'),
    NamedIndividual: owl('NamedIndividual'),
};

const CARDINALITY = {
    min: ['minCardinality', 'minQualifiedCardinality'],
    max: ['maxCardinality', 'maxQualifiedCardinality'],
    exact: ['cardinality', 'qualifiedCardinality'],
} as const;

/**
 * Collects triples for one ontology. Blank nodes are labelled b1, b2, ...
 * in emission order so output is stable across runs.
 */
class QuadSink {
    readonly quads: Quad[] = [];
    private blankCounter = 0;

    add(s: Quad_Subject, p: NamedNode, o: Quad_Object): void {
        this.quads.push(quad(s, p, o));
    }

    blank(): BlankNode {
        this.blankCounter++;
        return blankNode(`b${this.blankCounter}`);
    }

    list(items: Quad_Object[]): Quad_Object {
        if (items.length === 0) return rdf('nil');
        const head = this.blank();
        let node = head;
        items.forEach((item, i) => {
            this.add(node, rdf('first'), item);
            if (i === items.length - 1) {
                this.add(node, rdf('rest'), rdf('nil'));
            } else {
                const next = this.blank();
                this.add(node, rdf('rest'), next);
                node = next;
            }
        });
        return head;
    }

    expression(e: ClassExpression): NamedNode | BlankNode {
        switch (e.type) {
            case 'Class':
                return namedNode(e.iri);
            case 'ObjectUnionOf': {
                const node = this.blank();
                this.add(node, TYPE, owl('Class'));
                this.add(node, owl('unionOf'), this.list(e.operands.map((o) => this.expression(o))));
                return node;
            }
            case 'ObjectOneOf': {
                const node = this.blank();
                this.add(node, TYPE, owl('Class'));
                this.add(node, owl('oneOf'), this.list(e.individuals.map((i) => namedNode(i))));
                return node;
            }
            case 'ObjectCardinality':
            case 'DataCardinality': {
                const node = this.blank();
                const filler = e.type === 'ObjectCardinality' ? e.onClass : e.onDataRange;
                const [plain, qualified] = CARDINALITY[e.kind];
                this.add(node, TYPE, owl('Restriction'));
                this.add(node, owl('onProperty'), namedNode(e.property));
                this.add(
                    node,
                    owl(filler === undefined ? plain : qualified),
                    literal(String(e.cardinality), xsd('nonNegativeInteger'))
                );
                if (filler !== undefined) {
                    this.add(node, owl(e.type === 'ObjectCardinality' ? 'onClass' : 'onDataRange'), namedNode(filler));
                }
                return node;
            }
        }
    }

    /** Two members as a pairwise predicate, more as an owl:All* node with owl:members */
    nary(iris: IRI[], pairwise: NamedNode, allType: NamedNode): void {
        if (iris.length < 2) {
            throw createSerializationError(`${allType.value} needs at least two members`, { members: iris });
        }
        if (iris.length === 2) {
            this.add(namedNode(iris[0]), pairwise, namedNode(iris[1]));
            return;
        }
        const node = this.blank();
        this.add(node, TYPE, allType);
        this.add(node, owl('members'), this.list(iris.map((i) => namedNode(i))));
    }

    axiom(a: Axiom): void {
        switch (a.type) {
            case 'Declaration':
                this.add(namedNode(a.iri), TYPE, ENTITY_TYPES[a.entity]);
                return;
            case 'SubClassOf':
                this.add(this.expression(a.sub), rdfs('subClassOf'), this.expression(a.sup));
                return;
            case 'EquivalentClasses': {
                const [first, ...rest] = a.classes;
                if (first === undefined || rest.length === 0) {
                    throw createSerializationError('EquivalentClasses needs at least two class expressions');
                }
                const head = this.expression(first);
                for (const other of rest) {
                    this.add(head, owl('equivalentClass'), this.expression(other));
                }
                return;
            }
            case 'DisjointClasses':
                this.nary(a.classes, owl('disjointWith'), owl('AllDisjointClasses'));
                return;
            case 'DataPropertyDomain':
            case 'ObjectPropertyDomain':
                this.add(namedNode(a.property), rdfs('domain'), this.expression(a.domain));
                return;
            case 'DataPropertyRange':
            case 'ObjectPropertyRange':
                this.add(namedNode(a.property), rdfs('range'), namedNode(a.range));
                return;
            case 'FunctionalDataProperty':
            case 'FunctionalObjectProperty':
                this.add(namedNode(a.property), TYPE, owl('FunctionalProperty'));
                return;
            case 'InverseObjectProperties':
                this.add(namedNode(a.first), owl('inverseOf'), namedNode(a.second));
                return;
            case 'ClassAssertion':
                this.add(namedNode(a.individual), TYPE, namedNode(a.cls));
                return;
            case 'DifferentIndividuals':
                this.nary(a.individuals, owl('differentFrom'), owl('AllDifferent'));
                return;
            case 'AnnotationAssertion':
                this.add(namedNode(a.subject), rdfs(a.property), literal(a.value));
                return;
        }
    }
}

/**
 * RDF quads for an ontology: the owl:Ontology header followed by the
 * triples of each axiom in order.
 */
export function toQuads(ontology: Ontology): Quad[] {
    const sink = new QuadSink();
    sink.add(namedNode(ontology.iri), TYPE, owl('Ontology'));
    for (const axiom of ontology.axioms) {
        sink.axiom(axiom);
    }
    return sink.quads;
}
