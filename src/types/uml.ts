/**
 * In-memory UML class model produced by the XMI loader.
 */

export type Unbounded = '*';

export interface Multiplicity {
    lower: number;
    upper: number | Unbounded;
}

export type TypeRef =
    | { kind: 'primitive'; name: string }
    | { kind: 'element'; id: string }
    | { kind: 'unresolved'; ref: string };

export type AggregationKind = 'none' | 'shared' | 'composite';

export type ClassifierKind = 'class' | 'interface' | 'datatype' | 'associationClass';

export interface UmlAttribute {
    id: string;
    name: string;
    typeRef?: TypeRef;
    multiplicity: Multiplicity;
    isStatic: boolean;
    isDerived: boolean;
    isReadOnly: boolean;
    defaultValue?: string;
    /** Set when the attribute is the classifier-owned end of an association */
    association?: string;
    aggregation: AggregationKind;
}

export interface UmlClass {
    id: string;
    name: string;
    kind: ClassifierKind;
    isAbstract: boolean;
    attributes: UmlAttribute[];
    operations: string[];
    comments: string[];
    packagePath: string[];
}

export interface UmlEnumerationLiteral {
    id: string;
    name: string;
}

export interface UmlEnumeration {
    id: string;
    name: string;
    literals: UmlEnumerationLiteral[];
    comments: string[];
    packagePath: string[];
}

export interface UmlAssociationEnd {
    id: string;
    name?: string;
    typeId: string;
    multiplicity: Multiplicity;
    aggregation: AggregationKind;
    navigable: boolean;
    ownedBy: 'association' | 'classifier';
}

export interface UmlAssociation {
    id: string;
    name?: string;
    ends: UmlAssociationEnd[];
    /** Id of the class when this is an AssociationClass */
    classId?: string;
}

export interface UmlGeneralization {
    id: string;
    childId: string;
    parentId: string;
    generalizationSetIds: string[];
}

export interface UmlGeneralizationSet {
    id: string;
    name?: string;
    isDisjoint: boolean;
    isCovering: boolean;
}

export interface UmlRealization {
    id: string;
    clientId: string;
    supplierId: string;
}

export interface UmlModel {
    name: string;
    classes: UmlClass[];
    enumerations: UmlEnumeration[];
    associations: UmlAssociation[];
    generalizations: UmlGeneralization[];
    generalizationSets: UmlGeneralizationSet[];
    realizations: UmlRealization[];
    packages: string[];
    warnings: string[];
}

export interface LoadOptions {
    /** Throw on dangling references, duplicate ids and bad multiplicities instead of warning */
    strict?: boolean;
}
