import type { Verbosity } from './responses.js';

export type DisjointPolicy = 'abstract' | 'all' | 'none';

export type PropertyNaming = 'shared' | 'qualified';

export type OutputFormat = 'turtle' | 'ntriples' | 'functional';

export interface MappingOptions {
    /** Namespace for minted class/property IRIs; must end in '#' or '/' */
    baseIri?: string;
    /** Ontology header IRI; defaults to baseIri without its trailing separator */
    ontologyIri?: string;
    propertyNaming?: PropertyNaming;
    disjointSiblings?: DisjointPolicy;
    emitCardinality?: boolean;
    /** Use owl:onClass / owl:onDataRange on cardinality restrictions */
    qualifiedCardinality?: boolean;
    emitLabels?: boolean;
    /** Map interface realizations to rdfs:subClassOf */
    includeInterfaces?: boolean;
    strict?: boolean;
}

export interface ConvertOptions extends MappingOptions {
    format?: OutputFormat;
    verbosity?: Verbosity;
    /**
     * Callback for progress updates.
     * @param progress A number between 0 and 1 (if known) or undefined.
     * @param message A descriptive message about the current step.
     */
    onProgress?: (progress: number | undefined, message: string) => void;
}

export const DEFAULTS = {
    baseIri: 'http://example.org/uml#',
    propertyNaming: 'shared',
    disjointSiblings: 'abstract',
    format: 'turtle',
    emitCardinality: true,
    qualifiedCardinality: false,
    emitLabels: true,
    includeInterfaces: true,
    strict: false,
    llmModel: 'llama3.1:8b',
    benchmarkFile: 'benchmark_results.json',
} as const;
