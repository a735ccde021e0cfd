export { JsonBenchmarkStore, summarizeRuns } from './storage.js';
export type { IBenchmarkStore, BenchmarkSummary } from './storage.js';
export { formatMetrics, formatSummaryTable } from './format.js';
