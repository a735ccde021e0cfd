/**
 * OWL 2 structural model emitted by the mapping engine.
 *
 * Entities are referenced by full IRI. Only the constructs the UML rule
 * table can produce are modelled.
 */

export type IRI = string;

export type EntityKind = 'Class' | 'DataProperty' | 'ObjectProperty' | 'NamedIndividual';

export type CardinalityKind = 'min' | 'max' | 'exact';

export type ClassExpression =
    | { type: 'Class'; iri: IRI }
    | { type: 'ObjectUnionOf'; operands: ClassExpression[] }
    | { type: 'ObjectOneOf'; individuals: IRI[] }
    | {
        type: 'ObjectCardinality';
        kind: CardinalityKind;
        cardinality: number;
        property: IRI;
        onClass?: IRI;
    }
    | {
        type: 'DataCardinality';
        kind: CardinalityKind;
        cardinality: number;
        property: IRI;
        onDataRange?: IRI;
    };

export type AnnotationProperty = 'label' | 'comment';

export type Axiom =
    | { type: 'Declaration'; entity: EntityKind; iri: IRI }
    | { type: 'SubClassOf'; sub: ClassExpression; sup: ClassExpression }
    | { type: 'EquivalentClasses'; classes: ClassExpression[] }
    | { type: 'DisjointClasses'; classes: IRI[] }
    | { type: 'DataPropertyDomain'; property: IRI; domain: ClassExpression }
    | { type: 'DataPropertyRange'; property: IRI; range: IRI }
    | { type: 'ObjectPropertyDomain'; property: IRI; domain: ClassExpression }
    | { type: 'ObjectPropertyRange'; property: IRI; range: IRI }
    | { type: 'FunctionalDataProperty'; property: IRI }
    | { type: 'FunctionalObjectProperty'; property: IRI }
    | { type: 'InverseObjectProperties'; first: IRI; second: IRI }
    | { type: 'ClassAssertion'; cls: IRI; individual: IRI }
    | { type: 'DifferentIndividuals'; individuals: IRI[] }
    | { type: 'AnnotationAssertion'; property: AnnotationProperty; subject: IRI; value: string };

export type AxiomType = Axiom['type'];

export interface Ontology {
    iri: IRI;
    prefixes: Record<string, IRI>;
    axioms: Axiom[];
}

export const NS = {
    rdf: 'http://www.w3.org/1999/02/22-rdf-syntax-ns#',
    rdfs: 'http://www.w3.org/2000/01/rdf-schema#',
    owl: 'http://www.w3.org/2002/07/owl#',
    xsd: 'http://www.w3.org/2001/XMLSchema#',
} as const;
