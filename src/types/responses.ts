/**
 * Response types for uml2owl tools
 */

import type { AxiomType, Axiom } from './owl.js';
import type { OutputFormat } from './options.js';

/**
 * Verbosity level for responses
 */
export type Verbosity = 'minimal' | 'standard' | 'detailed';

export interface SkippedElement {
    id: string;
    name: string;
    kind: string;
    reason: string;
}

export interface MappingReport {
    warnings: string[];
    skipped: SkippedElement[];
    /** UML element id -> indexes into ontology.axioms */
    trace: Record<string, number[]>;
    stats: Partial<Record<AxiomType, number>>;
}

export interface StageTimings {
    loadMs: number;
    mapMs: number;
    serializeMs: number;
}

/**
 * Minimal response - just success and the serialized ontology
 */
export interface MinimalConvertResponse {
    success: boolean;
    format: OutputFormat;
    output: string;
}

/**
 * Standard response - adds counts and warnings
 */
export interface StandardConvertResponse extends MinimalConvertResponse {
    message: string;
    axiomCount: number;
    warnings: string[];
}

/**
 * Detailed response - adds the full report and stage timings
 */
export interface DetailedConvertResponse extends StandardConvertResponse {
    report: MappingReport;
    timings: StageTimings;
}

export type ConvertResponse = MinimalConvertResponse | StandardConvertResponse | DetailedConvertResponse;

export interface MapResponse {
    success: boolean;
    ontologyIri: string;
    axioms?: Axiom[];
    stats: MappingReport['stats'];
    warnings?: string[];
    skipped?: SkippedElement[];
    trace?: MappingReport['trace'];
}

export interface ModelSummary {
    name: string;
    packages: string[];
    classes: Array<{ id: string; name: string; kind: string; isAbstract: boolean; attributes: number }>;
    enumerations: Array<{ id: string; name: string; literals: string[] }>;
    associations: Array<{ id: string; name?: string; ends: string[] }>;
    generalizations: number;
    warnings: string[];
}
