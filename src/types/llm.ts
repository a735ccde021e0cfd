/**
 * LLM Provider and generation interfaces.
 */

export interface LLMMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface LLMResponse {
    content: string;
    usage?: {
        promptTokens: number;
        completionTokens: number;
    };
}

export interface LLMProvider {
    /** Model identifier, recorded in benchmark metrics */
    readonly model: string;
    complete(messages: LLMMessage[]): Promise<LLMResponse>;
}

export interface BenchmarkMetrics {
    /** Model name, or 'rules' for the deterministic pipeline */
    model: string;
    timestamp: string;
    inputSizeChars: number;
    inputSizeKb: number;
    generationTimeSeconds: number;
    outputSizeChars: number;
    outputSizeKb: number;
    success: boolean;
    error?: string;
    tokensGenerated?: number;
    tokensPerSecond?: number;
    /** Whether the output parsed as Turtle */
    validTurtle?: boolean;
    tripleCount?: number;
}

export interface GenerateOptions {
    benchmark?: boolean;
    /** Validate the answer with an RDF parser (default: true) */
    validate?: boolean;
}

export interface GenerateResult {
    ontology: string;
    raw: string;
    metrics?: BenchmarkMetrics;
    errors?: string[];
}
