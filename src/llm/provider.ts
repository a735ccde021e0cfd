import { z } from 'zod';
import type { LLMProvider, LLMMessage, LLMResponse } from '../types/llm.js';
import { PipelineException, createLLMError } from '../types/errors.js';
import { LLMConfig, chatEndpoint, loadConfig } from '../config.js';

const OpenAIResponse = z.object({
    choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).min(1),
    usage: z
        .object({
            prompt_tokens: z.number().optional(),
            completion_tokens: z.number().optional(),
        })
        .optional(),
});

const OllamaResponse = z.object({
    message: z.object({ content: z.string() }),
    prompt_eval_count: z.number().optional(),
    eval_count: z.number().optional(),
});

/**
 * Fetch-based provider for the OpenAI chat completions API (and compatible
 * servers) or Ollama's /api/chat, chosen by configuration.
 */
export class StandardLLMProvider implements LLMProvider {
    private readonly apiUrl: string;
    private readonly apiKey?: string;
    private readonly type: 'openai' | 'ollama';
    readonly model: string;

    constructor(config: LLMConfig = loadConfig().llm) {
        this.type = config.backend;
        this.apiUrl = chatEndpoint(config);
        this.apiKey = config.apiKey;
        this.model = config.model;
    }

    async complete(messages: LLMMessage[]): Promise<LLMResponse> {
        const payload = {
            model: this.model,
            messages,
            stream: false,
            // Ollama reads sampling settings from options, OpenAI from the top level
            ...(this.type === 'ollama' ? { options: { temperature: 0 } } : { temperature: 0 }),
        };

        const headers: Record<string, string> = {
            'Content-Type': 'application/json',
        };
        if (this.apiKey) {
            headers['Authorization'] = `Bearer ${this.apiKey}`;
        }

        let body: unknown;
        try {
            const response = await fetch(this.apiUrl, {
                method: 'POST',
                headers,
                body: JSON.stringify(payload),
            });

            if (!response.ok) {
                const text = await response.text();
                throw createLLMError(`API error (${response.status}): ${text}`, { model: this.model, url: this.apiUrl });
            }
            body = await response.json();
        } catch (error) {
            if (error instanceof PipelineException) throw error;
            const errMsg = error instanceof Error ? error.message : String(error);
            console.error(`LLM Provider Error: ${errMsg}`, { model: this.model, url: this.apiUrl });
            throw createLLMError(`request failed: ${errMsg}`, { model: this.model, url: this.apiUrl });
        }

        return this.type === 'ollama' ? this.fromOllama(body) : this.fromOpenAI(body);
    }

    private fromOpenAI(body: unknown): LLMResponse {
        const parsed = OpenAIResponse.safeParse(body);
        if (!parsed.success) {
            throw createLLMError('unexpected response shape from chat completions API', {
                issues: parsed.error.issues.map((i) => i.message),
            });
        }
        const usage = parsed.data.usage;
        return {
            content: parsed.data.choices[0].message.content ?? '',
            usage: {
                promptTokens: usage?.prompt_tokens ?? 0,
                completionTokens: usage?.completion_tokens ?? 0,
            },
        };
    }

    private fromOllama(body: unknown): LLMResponse {
        const parsed = OllamaResponse.safeParse(body);
        if (!parsed.success) {
            throw createLLMError('unexpected response shape from Ollama', {
                issues: parsed.error.issues.map((i) => i.message),
            });
        }
        return {
            content: parsed.data.message.content,
            usage: {
                promptTokens: parsed.data.prompt_eval_count ?? 0,
                completionTokens: parsed.data.eval_count ?? 0,
            },
        };
    }
}
