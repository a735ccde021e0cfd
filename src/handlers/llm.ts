import type { BenchmarkMetrics, GenerateResult } from '../types/index.js';
import type { OntologyGenerator } from '../llm/generator.js';
import type { BenchmarkSummary, IBenchmarkStore } from '../benchmark/index.js';
import { GenerateArgsSchema, ListBenchmarksArgsSchema, parseArgs } from './schemas.js';

export interface GenerateResponse extends GenerateResult {
    success: boolean;
    model: string;
    saved?: boolean;
}

export async function generateOntologyHandler(
    rawArgs: unknown,
    generator: OntologyGenerator,
    store: IBenchmarkStore
): Promise<GenerateResponse> {
    const args = parseArgs(GenerateArgsSchema, rawArgs, 'generate-ontology');
    const result = await generator.generate(args.xmi, { benchmark: args.benchmark });

    let saved: boolean | undefined;
    if (args.save && result.metrics) {
        await store.append(result.metrics);
        saved = true;
    }

    return {
        ...result,
        success: (result.metrics?.success ?? true) && !result.errors,
        model: generator.model,
        ...(saved && { saved }),
    };
}

export async function listBenchmarksHandler(
    rawArgs: unknown,
    store: IBenchmarkStore
): Promise<{ runs: BenchmarkMetrics[] } | { summary: BenchmarkSummary[] }> {
    const args = parseArgs(ListBenchmarksArgsSchema, rawArgs, 'list-benchmarks');
    if (args.summary) {
        return { summary: await store.summarize() };
    }
    return { runs: await store.list(args.model) };
}
