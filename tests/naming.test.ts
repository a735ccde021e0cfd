import { IriMinter, normalizeNamespace, slugify, toCamelCase, toPascalCase } from '../src/mapping/naming.js';
import { datatypeRows, xsdFor } from '../src/mapping/datatypes.js';
import { cardinalityRestrictions } from '../src/mapping/cardinality.js';
import { AxiomBuilder, axiomKey } from '../src/mapping/builder.js';
import { NS } from '../src/types/index.js';

describe('case conversion', () => {
    test.each([
        ['order line', 'OrderLine'],
        ['order_line', 'OrderLine'],
        ['OrderLine', 'OrderLine'],
        ['DVD', 'DVD'],
        ['2nd item', '_2ndItem'],
        ['', 'unnamed'],
    ])('toPascalCase(%p) = %p', (input, expected) => {
        expect(toPascalCase(input)).toBe(expected);
    });

    test.each([
        ['Order Line', 'orderLine'],
        ['HTTPServer', 'httpServer'],
        ['birthDate', 'birthDate'],
        ['has-part', 'hasPart'],
        ['', 'unnamed'],
    ])('toCamelCase(%p) = %p', (input, expected) => {
        expect(toCamelCase(input)).toBe(expected);
    });

    test('slugify', () => {
        expect(slugify('Online Shop')).toBe('online-shop');
        expect(slugify('EA_Model')).toBe('ea-model');
        expect(slugify(' -- ')).toBe('');
    });

    test('normalizeNamespace appends # only when needed', () => {
        expect(normalizeNamespace('http://x.org/a')).toBe('http://x.org/a#');
        expect(normalizeNamespace('http://x.org/a/')).toBe('http://x.org/a/');
        expect(normalizeNamespace('http://x.org/a#')).toBe('http://x.org/a#');
    });
});

describe('IriMinter', () => {
    test('suffixes names taken by another owner', () => {
        const minter = new IriMinter('http://x.org/#');
        expect(minter.mint('Person', 'class:1')).toEqual({ iri: 'http://x.org/#Person', renamed: false });
        expect(minter.mint('Person', 'class:2')).toEqual({ iri: 'http://x.org/#Person_2', renamed: true });
        expect(minter.mint('Person', 'class:1')).toEqual({ iri: 'http://x.org/#Person', renamed: false });
        expect(minter.mint('Person', 'class:3')).toEqual({ iri: 'http://x.org/#Person_3', renamed: true });
        expect(minter.base).toBe('http://x.org/#');
    });
});

describe('datatypes', () => {
    test('xsdFor maps canonical primitives', () => {
        expect(xsdFor('String')).toBe(NS.xsd + 'string');
        expect(xsdFor('Real')).toBe(NS.xsd + 'double');
        expect(xsdFor('UnlimitedNatural')).toBe(NS.xsd + 'nonNegativeInteger');
        expect(xsdFor('Matrix')).toBeUndefined();
    });

    test('datatypeRows lists aliases per primitive', () => {
        const uri = datatypeRows().find((r) => r.uml === 'URI');
        expect(uri).toEqual({ uml: 'URI', xsd: 'xsd:anyURI', aliases: ['uri', 'url', 'anyuri'] });
    });
});

describe('cardinalityRestrictions', () => {
    const target = { kind: 'object' as const, property: 'p', range: 'C', functional: false, qualified: false };

    test('n..n is an exact cardinality', () => {
        expect(cardinalityRestrictions({ lower: 1, upper: 1 }, { ...target, functional: true })).toEqual([
            { type: 'ObjectCardinality', kind: 'exact', cardinality: 1, property: 'p' },
        ]);
    });

    test('functional properties need no max 1', () => {
        expect(cardinalityRestrictions({ lower: 0, upper: 1 }, { ...target, functional: true })).toEqual([]);
        expect(cardinalityRestrictions({ lower: 0, upper: 1 }, target)).toEqual([
            { type: 'ObjectCardinality', kind: 'max', cardinality: 1, property: 'p' },
        ]);
    });

    test('bounded ranges give min and max', () => {
        expect(cardinalityRestrictions({ lower: 2, upper: 5 }, target)).toEqual([
            { type: 'ObjectCardinality', kind: 'min', cardinality: 2, property: 'p' },
            { type: 'ObjectCardinality', kind: 'max', cardinality: 5, property: 'p' },
        ]);
        expect(cardinalityRestrictions({ lower: 1, upper: '*' }, target)).toEqual([
            { type: 'ObjectCardinality', kind: 'min', cardinality: 1, property: 'p' },
        ]);
        expect(cardinalityRestrictions({ lower: 0, upper: '*' }, target)).toEqual([]);
    });

    test('qualified restrictions carry the filler', () => {
        expect(cardinalityRestrictions({ lower: 1, upper: '*' }, { ...target, qualified: true })).toEqual([
            { type: 'ObjectCardinality', kind: 'min', cardinality: 1, property: 'p', onClass: 'C' },
        ]);
        expect(
            cardinalityRestrictions({ lower: 1, upper: '*' }, { kind: 'data', property: 'd', range: 'xsd', functional: false, qualified: true })
        ).toEqual([{ type: 'DataCardinality', kind: 'min', cardinality: 1, property: 'd', onDataRange: 'xsd' }]);
    });
});

describe('AxiomBuilder', () => {
    test('n-ary axioms compare as sets', () => {
        expect(axiomKey({ type: 'DisjointClasses', classes: ['A', 'B'] }))
            .toBe(axiomKey({ type: 'DisjointClasses', classes: ['B', 'A'] }));
        expect(axiomKey({ type: 'InverseObjectProperties', first: 'p', second: 'q' }))
            .toBe(axiomKey({ type: 'InverseObjectProperties', first: 'q', second: 'p' }));
    });

    test('duplicates are stored once and traced to every source', () => {
        const b = new AxiomBuilder();
        expect(b.add({ type: 'Declaration', entity: 'Class', iri: 'A' }, 'x')).toBe(0);
        expect(b.add({ type: 'DisjointClasses', classes: ['A', 'B'] }, 'x')).toBe(1);
        expect(b.add({ type: 'DisjointClasses', classes: ['B', 'A'] }, 'y')).toBe(1);
        b.warn('careful');

        const report = b.report(['from loader']);
        expect(b.axioms).toHaveLength(2);
        expect(report.trace).toEqual({ x: [0, 1], y: [1] });
        expect(report.stats).toEqual({ Declaration: 1, DisjointClasses: 1 });
        expect(report.warnings).toEqual(['from loader', 'careful']);
    });
});
