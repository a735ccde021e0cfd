/**
 * Tests for CLI argument parsing and the generation spinner
 */

import { parseCliArgs, toConvertOptions } from '../src/cliArgs.js';
import { generateWithSpinner } from '../src/cliGenerate.js';
import { OntologyGenerator } from '../src/llm/generator.js';
import { PipelineException } from '../src/types/index.js';
import { FakeLLMProvider, SMALL_TURTLE } from './fixtures.js';

describe('parseCliArgs', () => {
    test('command and file are the first positionals', () => {
        expect(parseCliArgs(['convert', 'shop.xmi'])).toEqual({
            command: 'convert',
            file: 'shop.xmi',
            help: false,
            version: false,
            strict: false,
            qualified: false,
            noLabels: false,
            summary: false,
        });
    });

    test('value options take = or the next argument', () => {
        const args = parseCliArgs(['convert', '--format=functional', 'shop.xmi', '--base', 'http://x.org/shop#', '--out=shop.ofn']);
        expect(args.format).toBe('functional');
        expect(args.base).toBe('http://x.org/shop#');
        expect(args.out).toBe('shop.ofn');
        expect(args.file).toBe('shop.xmi');
    });

    test('flags and short forms', () => {
        const args = parseCliArgs(['-h', '-v', '--strict', '--qualified', '--no-labels', '--summary']);
        expect(args).toMatchObject({ help: true, version: true, strict: true, qualified: true, noLabels: true, summary: true });
        expect(args.command).toBeUndefined();
    });

    test('generate options', () => {
        const args = parseCliArgs(['generate', 'm.xmi', '--model', 'qwen2.5:14b', '--benchmark=runs.json']);
        expect(args.model).toBe('qwen2.5:14b');
        expect(args.benchmark).toBe('runs.json');
    });

    test('enumerated values are checked', () => {
        expect(() => parseCliArgs(['--format=rdfxml'])).toThrow(
            "Invalid --format 'rdfxml'. Valid options are: turtle, ntriples, functional"
        );
        expect(() => parseCliArgs(['--disjoint', 'some'])).toThrow(
            "Invalid --disjoint 'some'. Valid options are: abstract, all, none"
        );
        expect(() => parseCliArgs(['--naming=long'])).toThrow(PipelineException);
    });

    test('--base must be an absolute IRI', () => {
        expect(() => parseCliArgs(['convert', 'a.xmi', '--base=shop'])).toThrow(
            "Invalid --base 'shop'. Expected an absolute IRI such as http://example.org/shop#"
        );
        expect(() => parseCliArgs(['--base', ''])).toThrow(PipelineException);
    });

    test('unknown options and missing values', () => {
        expect(() => parseCliArgs(['--verbose'])).toThrow('Unknown option --verbose');
        expect(() => parseCliArgs(['convert', '--out'])).toThrow('Option --out needs a value');
    });
});

describe('toConvertOptions', () => {
    test('only set options are passed on', () => {
        expect(toConvertOptions(parseCliArgs(['convert', 'a.xmi']))).toEqual({});
    });

    test('maps flags to mapping options', () => {
        const args = parseCliArgs([
            'convert', 'a.xmi', '--format=ntriples', '--disjoint=all', '--naming=qualified', '--qualified', '--no-labels', '--strict',
        ]);
        expect(toConvertOptions(args)).toEqual({
            format: 'ntriples',
            disjointSiblings: 'all',
            propertyNaming: 'qualified',
            qualifiedCardinality: true,
            emitLabels: false,
            strict: true,
        });
    });

    test('--base wins over the configured namespace', () => {
        expect(toConvertOptions(parseCliArgs([]), 'http://env.test/#')).toEqual({ baseIri: 'http://env.test/#' });
        expect(toConvertOptions(parseCliArgs(['--base=http://arg.test/#']), 'http://env.test/#')).toEqual({
            baseIri: 'http://arg.test/#',
        });
    });
});

describe('generateWithSpinner', () => {
    const XMI = '<xmi:XMI xmlns:xmi="http://www.omg.org/spec/XMI/20131001"/>';
    let errorSpy: jest.SpyInstance;

    const spinner = () => ({ start: jest.fn(), succeed: jest.fn(), fail: jest.fn() });

    beforeEach(() => {
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        errorSpy.mockRestore();
    });

    test('succeeds on a successful run', async () => {
        const s = spinner();
        const generator = new OntologyGenerator(new FakeLLMProvider([{ content: SMALL_TURTLE }]));
        const result = await generateWithSpinner(s, generator, XMI);

        expect(result.metrics?.success).toBe(true);
        expect(s.start).toHaveBeenCalledTimes(1);
        expect(s.succeed).toHaveBeenCalledWith('Generation finished');
        expect(s.fail).not.toHaveBeenCalled();
    });

    test('fails on a recorded provider failure', async () => {
        const s = spinner();
        const generator = new OntologyGenerator(new FakeLLMProvider([new Error('model not found')]));
        const result = await generateWithSpinner(s, generator, XMI);

        expect(result.metrics?.success).toBe(false);
        expect(s.fail).toHaveBeenCalledWith('Generation failed');
        expect(s.succeed).not.toHaveBeenCalled();
    });

    test('stops the spinner when generation throws', async () => {
        const s = spinner();
        const generator = new OntologyGenerator(new FakeLLMProvider([]));

        await expect(generateWithSpinner(s, generator, '   ')).rejects.toThrow('UML XMI cannot be empty');
        expect(s.start).toHaveBeenCalledTimes(1);
        expect(s.fail).toHaveBeenCalledWith('Generation failed');
    });
});
