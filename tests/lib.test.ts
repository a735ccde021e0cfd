/**
 * Tests for the library entry point
 */

import * as lib from '../src/lib.js';
import { readFixture } from './fixtures.js';

describe('library exports', () => {
    test('exposes each pipeline stage', () => {
        expect(typeof lib.convertUml).toBe('function');
        expect(typeof lib.loadXmi).toBe('function');
        expect(typeof lib.mapModel).toBe('function');
        expect(typeof lib.serialize).toBe('function');
        expect(typeof lib.parseTurtle).toBe('function');
        expect(typeof lib.OntologyGenerator).toBe('function');
        expect(typeof lib.JsonBenchmarkStore).toBe('function');
    });

    test('stages compose the same way convertUml does', async () => {
        const xmi = readFixture('library-ea.xmi');
        const { ontology } = lib.mapModel(lib.loadXmi(xmi), { disjointSiblings: 'none' });
        const manual = await lib.serialize(ontology, 'functional');
        const { output } = await lib.convertUml(xmi, { disjointSiblings: 'none', format: 'functional' });
        expect(output).toBe(manual);
    });

    test('defaults are exported', () => {
        expect(lib.DEFAULTS.format).toBe('turtle');
        expect(lib.OUTPUT_FORMATS).toEqual(['turtle', 'ntriples', 'functional']);
    });
});
