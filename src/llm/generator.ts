/**
 * LLM-based ontology generation, with optional benchmark metrics.
 */

import type {
    BenchmarkMetrics,
    GenerateOptions,
    GenerateResult,
    LLMMessage,
    LLMProvider,
} from '../types/llm.js';
import { PipelineException, createEmptyInputError, createLLMError } from '../types/errors.js';
import { parseTurtle } from '../serializer/validate.js';
import { extractTurtle } from './outputParser.js';

export const GENERATION_PROMPT = `You are an expert in converting UML diagrams into OWL ontologies.
Given the following UML diagram XMI, generate a corresponding OWL ontology in Turtle format.

Requirements:
1. Declare the owl:, rdf:, rdfs: and xsd: prefixes and a namespace for the model.
2. Map every class and interface to owl:Class and every generalization to rdfs:subClassOf.
3. Map attributes of primitive type to owl:DatatypeProperty with rdfs:domain and an xsd: rdfs:range.
4. Map associations and class-typed attributes to owl:ObjectProperty with rdfs:domain and rdfs:range.
5. Express multiplicities as owl:FunctionalProperty (upper bound 1) or cardinality restrictions.
6. Map enumerations to classes defined by owl:oneOf over named individuals.

UML XMI:
{uml}

Respond ONLY with the OWL ontology in Turtle format, without any additional explanations or JSON wrapping.
`;

export function buildGenerationMessages(uml: string): LLMMessage[] {
    return [{ role: 'user', content: GENERATION_PROMPT.replace('{uml}', () => uml) }];
}

function round(value: number, digits: number): number {
    const f = 10 ** digits;
    return Math.round(value * f) / f;
}

function sizeKb(text: string): number {
    return round(Buffer.byteLength(text, 'utf8') / 1024, 3);
}

export class OntologyGenerator {
    private readonly provider: LLMProvider;

    constructor(provider: LLMProvider) {
        this.provider = provider;
    }

    get model(): string {
        return this.provider.model;
    }

    /**
     * Ask the model for a Turtle ontology.
     *
     * With `benchmark`, a provider failure is recorded in the returned metrics
     * (`success: false`) instead of being thrown.
     */
    async generate(uml: string, options: GenerateOptions = {}): Promise<GenerateResult> {
        if (!uml.trim()) {
            throw createEmptyInputError('UML XMI');
        }
        const validate = options.validate ?? true;

        const base = {
            model: this.provider.model,
            timestamp: new Date().toISOString(),
            inputSizeChars: uml.length,
            inputSizeKb: sizeKb(uml),
        };

        const start = performance.now();
        let raw: string;
        let completionTokens: number | undefined;
        try {
            const response = await this.provider.complete(buildGenerationMessages(uml));
            raw = response.content;
            completionTokens = response.usage?.completionTokens;
        } catch (error) {
            const pipelineError =
                error instanceof PipelineException
                    ? error
                    : createLLMError(error instanceof Error ? error.message : String(error), { model: this.provider.model });
            if (!options.benchmark) throw pipelineError;

            console.error(`Error generating ontology with ${this.provider.model}: ${pipelineError.message}`);
            const metrics: BenchmarkMetrics = {
                ...base,
                generationTimeSeconds: 0,
                outputSizeChars: 0,
                outputSizeKb: 0,
                success: false,
                error: pipelineError.message,
            };
            return { ontology: '', raw: '', metrics, errors: [pipelineError.message] };
        }
        const seconds = (performance.now() - start) / 1000;

        const ontology = extractTurtle(raw);
        const errors: string[] = [];
        const check = validate ? parseTurtle(ontology) : undefined;
        if (check && !check.valid) {
            errors.push(`Generated Turtle does not parse: ${check.error ?? 'unknown error'}`);
        }

        const result: GenerateResult = {
            ontology,
            raw,
            ...(errors.length > 0 && { errors }),
        };

        if (options.benchmark) {
            const metrics: BenchmarkMetrics = {
                ...base,
                generationTimeSeconds: round(seconds, 3),
                outputSizeChars: ontology.length,
                outputSizeKb: sizeKb(ontology),
                success: true,
            };
            if (completionTokens !== undefined && completionTokens > 0) {
                metrics.tokensGenerated = completionTokens;
                if (seconds > 0) metrics.tokensPerSecond = round(completionTokens / seconds, 2);
            }
            if (check) {
                metrics.validTurtle = check.valid;
                metrics.tripleCount = check.tripleCount;
            }
            result.metrics = metrics;
        }

        return result;
    }
}
