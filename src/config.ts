/**
 * Environment configuration.
 *
 * The CLI loads `.env` through dotenv before calling {@link loadConfig};
 * the MCP server reads whatever environment it was started with.
 */

import { z } from 'zod';
import { DEFAULTS, createInvalidArgumentError } from './types/index.js';

const optionalString = z
    .string()
    .trim()
    .transform((s) => (s === '' ? undefined : s))
    .optional();

export const EnvSchema = z.object({
    OPENAI_API_KEY: optionalString,
    OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
    OPENAI_MODEL: optionalString,
    OLLAMA_URL: optionalString.pipe(z.string().url().optional()),
    OLLAMA_MODEL: optionalString,
    LLM_PROVIDER: z.enum(['standard', 'ai-sdk']).default('standard'),
    UML2OWL_BASE_IRI: optionalString.pipe(z.string().url().optional()),
    UML2OWL_BENCHMARK_FILE: optionalString,
});

export type LLMBackend = 'openai' | 'ollama';

export interface LLMConfig {
    provider: 'standard' | 'ai-sdk';
    backend: LLMBackend;
    /** Full endpoint for the standard provider, base URL for the AI SDK */
    url: string;
    model: string;
    apiKey?: string;
}

export interface AppConfig {
    llm: LLMConfig;
    baseIri?: string;
    benchmarkFile: string;
}

const OLLAMA_CHAT_URL = 'http://localhost:11434/api/chat';
const OPENAI_URL = 'https://api.openai.com/v1';

/**
 * Resolve configuration from an environment map.
 *
 * Backend selection: an explicit OPENAI_BASE_URL (llama.cpp, vLLM, LM Studio)
 * or an OPENAI_API_KEY selects the OpenAI chat API; otherwise Ollama.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
        throw createInvalidArgumentError(`Invalid environment: ${issues.join('; ')}`, { issues });
    }
    const e = parsed.data;

    let llm: LLMConfig;
    if (e.OPENAI_BASE_URL || e.OPENAI_API_KEY) {
        llm = {
            provider: e.LLM_PROVIDER,
            backend: 'openai',
            url: (e.OPENAI_BASE_URL ?? OPENAI_URL).replace(/\/$/, ''),
            model: e.OPENAI_MODEL ?? (e.OPENAI_BASE_URL ? 'model' : 'gpt-4o'),
            ...(e.OPENAI_API_KEY && { apiKey: e.OPENAI_API_KEY }),
        };
    } else {
        llm = {
            provider: e.LLM_PROVIDER,
            backend: 'ollama',
            url: e.OLLAMA_URL ?? OLLAMA_CHAT_URL,
            model: e.OLLAMA_MODEL ?? DEFAULTS.llmModel,
        };
    }

    return {
        llm,
        ...(e.UML2OWL_BASE_IRI && { baseIri: e.UML2OWL_BASE_IRI }),
        benchmarkFile: e.UML2OWL_BENCHMARK_FILE ?? DEFAULTS.benchmarkFile,
    };
}

/** Chat endpoint for the standard provider */
export function chatEndpoint(llm: LLMConfig): string {
    if (llm.backend === 'ollama') return llm.url;
    return llm.url.endsWith('/chat/completions') ? llm.url : `${llm.url}/chat/completions`;
}

/** OpenAI-compatible base URL for the AI SDK; Ollama serves one under /v1 */
export function openAiBaseUrl(llm: LLMConfig): string {
    if (llm.backend === 'openai') return llm.url.replace(/\/chat\/completions$/, '');
    return llm.url.replace(/\/api\/chat\/?$/, '').replace(/\/$/, '') + '/v1';
}
