import type { BenchmarkMetrics } from '../types/llm.js';
import type { BenchmarkSummary } from './storage.js';

/**
 * Plain-text benchmark report, one "Label: value" line per metric.
 */
export function formatMetrics(metrics: BenchmarkMetrics): string {
    const lines = [
        `Model: ${metrics.model}`,
        `Timestamp: ${metrics.timestamp}`,
        `Input Size: ${metrics.inputSizeChars} chars (${metrics.inputSizeKb.toFixed(2)} KB)`,
        `Generation Time: ${metrics.generationTimeSeconds} seconds`,
        `Output Size: ${metrics.outputSizeChars} chars (${metrics.outputSizeKb.toFixed(2)} KB)`,
    ];
    if (metrics.tokensPerSecond !== undefined) {
        lines.push(`Tokens Generated: ${metrics.tokensGenerated ?? 'N/A'}`);
        lines.push(`Tokens/Second: ${metrics.tokensPerSecond}`);
    }
    if (metrics.validTurtle !== undefined) {
        lines.push(`Valid Turtle: ${metrics.validTurtle}${metrics.tripleCount !== undefined ? ` (${metrics.tripleCount} triples)` : ''}`);
    }
    lines.push(`Success: ${metrics.success}`);
    if (metrics.error) {
        lines.push(`Error: ${metrics.error}`);
    }
    return lines.join('\n');
}

/**
 * Fixed-width table of per-model summaries.
 */
export function formatSummaryTable(rows: BenchmarkSummary[]): string {
    if (rows.length === 0) return 'No benchmark runs recorded.';
    const header = ['Model', 'Runs', 'Success', 'Avg s', 'Avg tok/s'];
    const body = rows.map((r) => [
        r.model,
        String(r.runs),
        `${Math.round(r.successRate * 100)}%`,
        r.avgGenerationSeconds.toFixed(3),
        r.avgTokensPerSecond === undefined ? '-' : r.avgTokensPerSecond.toFixed(2),
    ]);
    const widths = header.map((h, i) => Math.max(h.length, ...body.map((row) => row[i].length)));
    const fmt = (row: string[]) => row.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd();
    return [fmt(header), widths.map((w) => '-'.repeat(w)).join('  '), ...body.map(fmt)].join('\n');
}
