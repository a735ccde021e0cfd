/**
 * Tests for MCP tool dispatch and the tool handlers
 */

import { handleToolCall, ToolCallResult } from '../src/server.js';
import { createContainer, ServerContainer } from '../src/container.js';
import type { AppConfig } from '../src/config.js';
import type { BenchmarkSummary, IBenchmarkStore } from '../src/benchmark/index.js';
import { summarizeRuns } from '../src/benchmark/index.js';
import { TOOLS } from '../src/tools/definitions.js';
import type { BenchmarkMetrics, LLMResponse } from '../src/types/index.js';
import { FakeLLMProvider, SMALL_TURTLE, readFixture } from './fixtures.js';

const TOOL_NAMES = ['convert-uml', 'inspect-uml', 'map-uml', 'validate-ontology', 'generate-ontology', 'list-benchmarks'];

class MemoryBenchmarkStore implements IBenchmarkStore {
    readonly runs: BenchmarkMetrics[] = [];
    failWith?: Error;

    async append(metrics: BenchmarkMetrics): Promise<void> {
        if (this.failWith) throw this.failWith;
        this.runs.push(metrics);
    }

    async list(model?: string): Promise<BenchmarkMetrics[]> {
        return model === undefined ? this.runs : this.runs.filter((r) => r.model === model);
    }

    async summarize(): Promise<BenchmarkSummary[]> {
        return summarizeRuns(this.runs);
    }
}

function config(extra: Partial<AppConfig> = {}): AppConfig {
    return {
        llm: { provider: 'standard', backend: 'ollama', url: 'http://localhost:11434/api/chat', model: 'unused' },
        benchmarkFile: 'unused.json',
        ...extra,
    };
}

function payload(result: ToolCallResult): Record<string, unknown> {
    return JSON.parse(result.content[0].text);
}

describe('tool definitions', () => {
    test('every tool has a handler', async () => {
        expect(TOOLS.map((t) => t.name)).toEqual(TOOL_NAMES);
    });
});

describe('handleToolCall', () => {
    const shop = readFixture('shop.uml');
    let store: MemoryBenchmarkStore;
    let container: ServerContainer;

    function withAnswers(answers: Array<LLMResponse | Error>, extra: Partial<AppConfig> = {}): ServerContainer {
        return createContainer(config(extra), { llmProvider: new FakeLLMProvider(answers), benchmarkStore: store });
    }

    beforeEach(() => {
        store = new MemoryBenchmarkStore();
        container = withAnswers([]);
    });

    describe('convert-uml', () => {
        test('minimal verbosity returns only the output', async () => {
            const result = await handleToolCall('convert-uml', { xmi: shop, verbosity: 'minimal' }, container);
            expect(result.isError).toBeUndefined();
            const body = payload(result);
            expect(Object.keys(body)).toEqual(['success', 'format', 'output']);
            expect(body.success).toBe(true);
            expect(body.format).toBe('turtle');
        });

        test('standard verbosity adds counts and warnings', async () => {
            const body = payload(await handleToolCall('convert-uml', { xmi: shop, format: 'functional' }, container));
            expect(body.message).toBe('Mapped 5 classes and 1 enumerations to 79 axioms');
            expect(body.axiomCount).toBe(79);
            expect(body.warnings).toEqual([]);
            expect(body.report).toBeUndefined();
        });

        test('detailed verbosity adds the report and timings', async () => {
            const body = payload(await handleToolCall('convert-uml', { xmi: shop, verbosity: 'detailed' }, container));
            expect(body.report).toMatchObject({
                skipped: [{ id: '_Order', name: 'Order.total()', kind: 'operation', reason: expect.any(String) }],
            });
            expect(Object.keys(body.timings ?? {})).toEqual(['loadMs', 'mapMs', 'serializeMs']);
        });

        test('the configured base IRI applies unless an argument overrides it', async () => {
            const configured = withAnswers([], { baseIri: 'http://acme.test/onto#' });
            const first = (r: ToolCallResult) => String(payload(r).output).split('\n')[0];

            expect(first(await handleToolCall('convert-uml', { xmi: shop, format: 'functional' }, configured))).toBe(
                'Prefix(:=<http://acme.test/onto#>)'
            );
            expect(
                first(await handleToolCall('convert-uml', { xmi: shop, format: 'functional', base_iri: 'http://x.test/shop/' }, configured))
            ).toBe('Prefix(:=<http://x.test/shop/>)');
        });

        test('forwards progress', async () => {
            const messages: string[] = [];
            await handleToolCall('convert-uml', { xmi: shop }, container, (_p, m) => messages.push(m));
            expect(messages).toEqual(['Loading XMI', 'Mapping 5 classes', 'Serializing 79 axioms as turtle', 'Done']);
        });

        test('pipeline errors are structured', async () => {
            const result = await handleToolCall('convert-uml', { xmi: '' }, container);
            expect(result.isError).toBe(true);
            expect(payload(result)).toMatchObject({ code: 'EMPTY_INPUT', message: 'UML input cannot be empty' });
        });

        test('argument errors name the field', async () => {
            const missing = await handleToolCall('convert-uml', {}, container);
            expect(payload(missing)).toMatchObject({
                code: 'INVALID_ARGUMENT',
                message: 'Invalid arguments for convert-uml: xmi: Required',
            });

            const badIri = await handleToolCall('convert-uml', { xmi: shop, base_iri: 'shop' }, container);
            expect(payload(badIri).message).toBe('Invalid arguments for convert-uml: base_iri: Invalid url');
        });
    });

    test('inspect-uml summarizes the model', async () => {
        const body = payload(await handleToolCall('inspect-uml', { xmi: shop }, container));
        expect(body).toMatchObject({
            name: 'Online Shop',
            packages: ['sales'],
            generalizations: 2,
            warnings: [],
            enumerations: [{ id: '_OrderStatus', name: 'OrderStatus', literals: ['open', 'paid', 'shipped'] }],
            associations: [
                { id: '_contains', name: 'contains', ends: ['lines: OrderLine [1..*]', 'order: Order [1]'] },
                { id: '_places', name: 'places', ends: ['(unnamed): Party [1]', 'orders: Order [*]'] },
            ],
        });
        expect(body.classes).toContainEqual({ id: '_Party', name: 'Party', kind: 'class', isAbstract: true, attributes: 1 });
    });

    describe('map-uml', () => {
        test('minimal verbosity returns the IRI and stats', async () => {
            const body = payload(await handleToolCall('map-uml', { xmi: shop, verbosity: 'minimal' }, container));
            expect(Object.keys(body)).toEqual(['success', 'ontologyIri', 'stats']);
            expect(body.ontologyIri).toBe('http://example.org/online-shop');
            expect(body.stats).toMatchObject({ SubClassOf: 10, DisjointClasses: 1 });
        });

        test('detailed verbosity adds axioms and the trace', async () => {
            const body = payload(
                await handleToolCall('map-uml', { xmi: shop, verbosity: 'detailed', disjoint_siblings: 'none' }, container)
            );
            expect(body.stats).not.toHaveProperty('DisjointClasses');
            expect(body.axioms).toHaveLength(78);
            expect(body.trace).toHaveProperty('_Person_gen');
            expect(body.skipped).toHaveLength(1);
        });
    });

    test('validate-ontology', async () => {
        const body = payload(await handleToolCall('validate-ontology', { turtle: SMALL_TURTLE }, container));
        expect(body).toEqual({ valid: true, tripleCount: 4, classes: 2, objectProperties: 0, dataProperties: 1, individuals: 0 });
    });

    describe('generate-ontology', () => {
        test('benchmarks by default without saving', async () => {
            const c = withAnswers([{ content: SMALL_TURTLE, usage: { promptTokens: 1, completionTokens: 8 } }]);
            const body = payload(await handleToolCall('generate-ontology', { xmi: shop }, c));
            expect(body).toMatchObject({ success: true, model: 'fake-model', ontology: SMALL_TURTLE.trim() });
            expect(body.metrics).toMatchObject({ model: 'fake-model', validTurtle: true, tripleCount: 4 });
            expect(body.saved).toBeUndefined();
            expect(store.runs).toEqual([]);
        });

        test('saves the run when asked', async () => {
            const c = withAnswers([{ content: SMALL_TURTLE }]);
            const body = payload(await handleToolCall('generate-ontology', { xmi: shop, save: true }, c));
            expect(body.saved).toBe(true);
            expect(store.runs).toHaveLength(1);
        });

        test('nothing is saved without benchmarking', async () => {
            const c = withAnswers([{ content: SMALL_TURTLE }]);
            const body = payload(await handleToolCall('generate-ontology', { xmi: shop, benchmark: false, save: true }, c));
            expect(body.metrics).toBeUndefined();
            expect(body.saved).toBeUndefined();
            expect(store.runs).toEqual([]);
        });

        test('unparseable answers are not a success', async () => {
            const c = withAnswers([{ content: 'no idea' }]);
            const body = payload(await handleToolCall('generate-ontology', { xmi: shop }, c));
            expect(body.success).toBe(false);
        });

        test('a failed run is recorded when benchmarking', async () => {
            const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
            const c = withAnswers([new Error('connection refused')]);
            const result = await handleToolCall('generate-ontology', { xmi: shop, save: true }, c);
            errorSpy.mockRestore();

            expect(result.isError).toBeUndefined();
            expect(payload(result)).toMatchObject({ success: false, errors: ['LLM provider failed: connection refused'] });
            expect(store.runs.map((r) => r.success)).toEqual([false]);
        });

        test('store failures surface as generic errors', async () => {
            store.failWith = new Error('disk full');
            const c = withAnswers([{ content: SMALL_TURTLE }]);
            const result = await handleToolCall('generate-ontology', { xmi: shop, save: true }, c);
            expect(result.isError).toBe(true);
            expect(payload(result)).toEqual({ error: 'disk full', type: 'Error' });
        });
    });

    describe('list-benchmarks', () => {
        const run = (model: string, success: boolean): BenchmarkMetrics => ({
            model,
            timestamp: '2024-05-01T10:00:00.000Z',
            inputSizeChars: 10,
            inputSizeKb: 0.01,
            generationTimeSeconds: success ? 2 : 0,
            outputSizeChars: 10,
            outputSizeKb: 0.01,
            success,
        });

        beforeEach(() => {
            store.runs.push(run('a', true), run('b', true), run('a', false));
        });

        test('lists runs, optionally for one model', async () => {
            expect(payload(await handleToolCall('list-benchmarks', {}, container)).runs).toHaveLength(3);
            expect(payload(await handleToolCall('list-benchmarks', { model: 'b' }, container))).toEqual({ runs: [run('b', true)] });
        });

        test('summarizes per model', async () => {
            expect(payload(await handleToolCall('list-benchmarks', { summary: true }, container))).toEqual({
                summary: [
                    { model: 'a', runs: 2, successRate: 0.5, avgGenerationSeconds: 2 },
                    { model: 'b', runs: 1, successRate: 1, avgGenerationSeconds: 2 },
                ],
            });
        });
    });

    test('unknown tools list the available ones', async () => {
        const result = await handleToolCall('prove', {}, container);
        expect(result.isError).toBe(true);
        expect(payload(result)).toEqual({
            code: 'INVALID_ARGUMENT',
            message: 'Unknown tool: prove',
            details: { tools: TOOL_NAMES },
        });
    });

    test('missing arguments are treated as empty', async () => {
        expect(payload(await handleToolCall('list-benchmarks', undefined, container))).toEqual({ runs: [] });
    });
});
