/**
 * Shared test fixtures: XMI documents on disk and hand-built UML models.
 */
import { readFileSync } from 'fs';
import { join } from 'path';
import type {
    LLMMessage,
    LLMProvider,
    LLMResponse,
    Multiplicity,
    UmlAssociationEnd,
    UmlAttribute,
    UmlClass,
    UmlModel,
} from '../src/types/index.js';

export const SHOP_NS = 'http://example.org/online-shop#';
export const LIBRARY_NS = 'http://example.org/ea-model#';

export function readFixture(name: string): string {
    return readFileSync(join(__dirname, 'fixtures', name), 'utf-8');
}

export const ONE: Multiplicity = { lower: 1, upper: 1 };
export const MANY: Multiplicity = { lower: 0, upper: '*' };

export function umlClass(id: string, name: string, extra: Partial<UmlClass> = {}): UmlClass {
    return {
        id,
        name,
        kind: 'class',
        isAbstract: false,
        attributes: [],
        operations: [],
        comments: [],
        packagePath: [],
        ...extra,
    };
}

export function attribute(id: string, name: string, extra: Partial<UmlAttribute> = {}): UmlAttribute {
    return {
        id,
        name,
        multiplicity: ONE,
        isStatic: false,
        isDerived: false,
        isReadOnly: false,
        aggregation: 'none',
        ...extra,
    };
}

export function end(id: string, typeId: string, extra: Partial<UmlAssociationEnd> = {}): UmlAssociationEnd {
    return {
        id,
        typeId,
        multiplicity: ONE,
        aggregation: 'none',
        navigable: true,
        ownedBy: 'association',
        ...extra,
    };
}

export function model(extra: Partial<UmlModel> = {}): UmlModel {
    return {
        name: 'Test',
        classes: [],
        enumerations: [],
        associations: [],
        generalizations: [],
        generalizationSets: [],
        realizations: [],
        packages: [],
        warnings: [],
        ...extra,
    };
}

/**
 * Provider that answers from a queue and records the messages it was sent.
 */
export class FakeLLMProvider implements LLMProvider {
    readonly model: string;
    readonly calls: LLMMessage[][] = [];
    private readonly answers: Array<LLMResponse | Error>;

    constructor(answers: Array<LLMResponse | Error>, model: string = 'fake-model') {
        this.answers = answers;
        this.model = model;
    }

    async complete(messages: LLMMessage[]): Promise<LLMResponse> {
        this.calls.push(messages);
        const next = this.answers.shift();
        if (next === undefined) throw new Error('no answer queued');
        if (next instanceof Error) throw next;
        return next;
    }
}

export const SMALL_TURTLE = `@prefix : <http://example.org/t#> .
@prefix owl: <http://www.w3.org/2002/07/owl#> .
@prefix rdfs: <http://www.w3.org/2000/01/rdf-schema#> .

:Person a owl:Class .
:Student a owl:Class ; rdfs:subClassOf :Person .
:name a owl:DatatypeProperty .
`;
