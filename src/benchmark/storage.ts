import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { BenchmarkMetrics } from '../types/llm.js';
import { createStorageError } from '../types/errors.js';

const MetricsSchema = z.object({
    model: z.string(),
    timestamp: z.string(),
    inputSizeChars: z.number(),
    inputSizeKb: z.number(),
    generationTimeSeconds: z.number(),
    outputSizeChars: z.number(),
    outputSizeKb: z.number(),
    success: z.boolean(),
    error: z.string().optional(),
    tokensGenerated: z.number().optional(),
    tokensPerSecond: z.number().optional(),
    validTurtle: z.boolean().optional(),
    tripleCount: z.number().optional(),
});

export interface BenchmarkSummary {
    model: string;
    runs: number;
    successRate: number;
    avgGenerationSeconds: number;
    avgTokensPerSecond?: number;
}

/**
 * Storage for benchmark runs.
 */
export interface IBenchmarkStore {
    append(metrics: BenchmarkMetrics): Promise<void>;
    list(model?: string): Promise<BenchmarkMetrics[]>;
    summarize(): Promise<BenchmarkSummary[]>;
}

function mean(values: number[]): number {
    return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

export function summarizeRuns(runs: BenchmarkMetrics[]): BenchmarkSummary[] {
    const byModel = new Map<string, BenchmarkMetrics[]>();
    for (const r of runs) {
        const list = byModel.get(r.model) ?? [];
        list.push(r);
        byModel.set(r.model, list);
    }

    return [...byModel.entries()].map(([model, list]) => {
        const ok = list.filter((r) => r.success);
        const tps = ok.flatMap((r) => (r.tokensPerSecond === undefined ? [] : [r.tokensPerSecond]));
        return {
            model,
            runs: list.length,
            successRate: Math.round((ok.length / list.length) * 1000) / 1000,
            avgGenerationSeconds: Math.round(mean(ok.map((r) => r.generationTimeSeconds)) * 1000) / 1000,
            ...(tps.length > 0 && { avgTokensPerSecond: Math.round(mean(tps) * 100) / 100 }),
        };
    });
}

/**
 * Append-only JSON array on disk. Each append re-reads the file so that
 * separate CLI runs accumulate into the same history.
 */
export class JsonBenchmarkStore implements IBenchmarkStore {
    private readonly filePath: string;

    constructor(storagePath: string = 'benchmark_results.json') {
        this.filePath = storagePath;
    }

    get path(): string {
        return this.filePath;
    }

    /**
     * Raw entries of the history file. Anything other than a JSON array is
     * refused, so an append never replaces a file it could not read.
     */
    private readEntries(operation: 'read' | 'save'): unknown[] {
        if (!fs.existsSync(this.filePath)) return [];
        let content: unknown;
        try {
            content = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            throw createStorageError(`${this.filePath} is not valid JSON (${message})`, this.filePath, operation);
        }
        if (!Array.isArray(content)) {
            throw createStorageError(`${this.filePath} does not hold a JSON array`, this.filePath, operation);
        }
        return content;
    }

    private load(): BenchmarkMetrics[] {
        const runs: BenchmarkMetrics[] = [];
        for (const entry of this.readEntries('read')) {
            const parsed = MetricsSchema.safeParse(entry);
            if (parsed.success) runs.push(parsed.data);
            else console.error(`Skipping malformed benchmark entry in ${this.filePath}`);
        }
        return runs;
    }

    /** Entries this store cannot read are written back untouched. */
    async append(metrics: BenchmarkMetrics): Promise<void> {
        const entries = this.readEntries('save');
        entries.push(metrics);
        const tmp = `${this.filePath}.${process.pid}.tmp`;
        try {
            const dir = path.dirname(this.filePath);
            fs.mkdirSync(dir, { recursive: true });
            fs.writeFileSync(tmp, JSON.stringify(entries, null, 2) + '\n');
            fs.renameSync(tmp, this.filePath);
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            throw createStorageError(message, this.filePath);
        }
    }

    async list(model?: string): Promise<BenchmarkMetrics[]> {
        const runs = this.load();
        return model === undefined ? runs : runs.filter((r) => r.model === model);
    }

    async summarize(): Promise<BenchmarkSummary[]> {
        return summarizeRuns(this.load());
    }
}
