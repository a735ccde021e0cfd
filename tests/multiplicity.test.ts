import {
    formatMultiplicity,
    isSingleValued,
    multiplicityFromBounds,
    parseMultiplicity,
} from '../src/xmi/multiplicity.js';
import { canonicalPrimitive, hrefFragment, parseIdRefList, primitiveFromHref } from '../src/xmi/primitives.js';
import { PipelineException } from '../src/types/index.js';

describe('multiplicityFromBounds', () => {
    test('defaults to exactly one', () => {
        expect(multiplicityFromBounds(undefined, undefined)).toEqual({ lower: 1, upper: 1 });
    });

    test('missing upper never drops below the lower bound', () => {
        expect(multiplicityFromBounds('0', undefined)).toEqual({ lower: 0, upper: 1 });
        expect(multiplicityFromBounds('2', undefined)).toEqual({ lower: 2, upper: 2 });
    });

    test('missing lower is one', () => {
        expect(multiplicityFromBounds(undefined, '5')).toEqual({ lower: 1, upper: 5 });
    });

    test('star and -1 are unbounded', () => {
        expect(multiplicityFromBounds('1', '*')).toEqual({ lower: 1, upper: '*' });
        expect(multiplicityFromBounds('0', '-1')).toEqual({ lower: 0, upper: '*' });
    });

    test('rejects inverted and empty ranges', () => {
        expect(() => multiplicityFromBounds('3', '1')).toThrow(PipelineException);
        expect(() => multiplicityFromBounds('0', '0')).toThrow("Invalid multiplicity '0..0'");
        expect(() => multiplicityFromBounds('x', '1')).toThrow(PipelineException);
    });

    test('rejects bounds beyond the safe integer range', () => {
        expect(multiplicityFromBounds('0', '9007199254740991')).toEqual({ lower: 0, upper: 9007199254740991 });
        expect(() => multiplicityFromBounds('0', '9999999999999999999999')).toThrow(
            "Invalid multiplicity '0..9999999999999999999999'"
        );
        expect(() => parseMultiplicity('1..9007199254740992')).toThrow(PipelineException);
    });
});

describe('parseMultiplicity', () => {
    test.each([
        ['1', { lower: 1, upper: 1 }],
        ['*', { lower: 0, upper: '*' }],
        ['0..1', { lower: 0, upper: 1 }],
        ['1..*', { lower: 1, upper: '*' }],
        ['2..5', { lower: 2, upper: 5 }],
        [' 0..n ', { lower: 0, upper: '*' }],
    ])('parses %s', (text, expected) => {
        expect(parseMultiplicity(text)).toEqual(expected);
    });

    test.each(['', '0', '1..2..3', '5..2', '-1', 'a..b'])('rejects %p', (text) => {
        expect(() => parseMultiplicity(text)).toThrow(PipelineException);
    });

    test('errors carry the INVALID_MULTIPLICITY code', () => {
        try {
            parseMultiplicity('5..2');
            throw new Error('expected a throw');
        } catch (e) {
            expect(e).toBeInstanceOf(PipelineException);
            if (e instanceof PipelineException) expect(e.code).toBe('INVALID_MULTIPLICITY');
        }
    });
});

describe('formatMultiplicity', () => {
    test('uses UML shorthand', () => {
        expect(formatMultiplicity({ lower: 0, upper: '*' })).toBe('*');
        expect(formatMultiplicity({ lower: 1, upper: '*' })).toBe('1..*');
        expect(formatMultiplicity({ lower: 1, upper: 1 })).toBe('1');
        expect(formatMultiplicity({ lower: 0, upper: 1 })).toBe('0..1');
    });

    test('isSingleValued looks at the upper bound only', () => {
        expect(isSingleValued({ lower: 0, upper: 1 })).toBe(true);
        expect(isSingleValued({ lower: 1, upper: '*' })).toBe(false);
    });
});

describe('primitive recognition', () => {
    test('canonical names ignore case and vendor prefixes', () => {
        expect(canonicalPrimitive('string')).toBe('String');
        expect(canonicalPrimitive('EAJava_int')).toBe('Integer');
        expect(canonicalPrimitive('EAnone_Boolean')).toBe('Boolean');
        expect(canonicalPrimitive('Timestamp')).toBe('DateTime');
        expect(canonicalPrimitive('java.lang.Matrix')).toBeUndefined();
        expect(canonicalPrimitive('  ')).toBeUndefined();
    });

    test('library hrefs name primitives', () => {
        expect(primitiveFromHref('pathmap://UML_LIBRARIES/UMLPrimitiveTypes.library.uml#Boolean')).toBe('Boolean');
        expect(primitiveFromHref('http://www.w3.org/2001/XMLSchema#dateTime')).toBe('DateTime');
        expect(primitiveFromHref('pathmap://UML_LIBRARIES/JavaPrimitiveTypes.library.uml#char[]')).toBe('char[]');
        expect(primitiveFromHref('model.uml#_abc')).toBeUndefined();
    });

    test('hrefFragment and id lists', () => {
        expect(hrefFragment('other.xmi#_abc')).toBe('_abc');
        expect(hrefFragment('no-fragment')).toBeUndefined();
        expect(parseIdRefList('  _a   _b\n_c ')).toEqual(['_a', '_b', '_c']);
        expect(parseIdRefList(null)).toEqual([]);
    });
});
