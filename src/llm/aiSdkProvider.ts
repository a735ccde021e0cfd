import { createOpenAI } from '@ai-sdk/openai';
import { generateText, CoreMessage } from 'ai';
import type { LLMProvider, LLMMessage, LLMResponse } from '../types/llm.js';
import { createLLMError } from '../types/errors.js';
import { LLMConfig, loadConfig, openAiBaseUrl } from '../config.js';

function toCoreMessage(m: LLMMessage): CoreMessage {
    switch (m.role) {
        case 'system':
            return { role: 'system', content: m.content };
        case 'user':
            return { role: 'user', content: m.content };
        case 'assistant':
            return { role: 'assistant', content: m.content };
    }
}

/**
 * Provider backed by the Vercel AI SDK. Talks to any OpenAI-compatible
 * endpoint, including Ollama's /v1 compatibility layer.
 */
export class AiSdkLLMProvider implements LLMProvider {
    readonly model: string;
    private readonly baseURL: string;
    private readonly openai: ReturnType<typeof createOpenAI>;

    constructor(config: LLMConfig = loadConfig().llm) {
        this.model = config.model;
        this.baseURL = openAiBaseUrl(config);
        this.openai = createOpenAI({
            baseURL: this.baseURL,
            // Ollama ignores the key but the SDK requires one
            apiKey: config.apiKey ?? 'ollama',
        });
    }

    async complete(messages: LLMMessage[]): Promise<LLMResponse> {
        try {
            const result = await generateText({
                model: this.openai(this.model),
                messages: messages.map(toCoreMessage),
                temperature: 0,
            });
            return {
                content: result.text,
                usage: {
                    promptTokens: result.usage.promptTokens,
                    completionTokens: result.usage.completionTokens,
                },
            };
        } catch (error) {
            const errMsg = error instanceof Error ? error.message : String(error);
            console.error(`LLM Provider Error: ${errMsg}`, { model: this.model, url: this.baseURL });
            throw createLLMError(`request failed: ${errMsg}`, { model: this.model, url: this.baseURL });
        }
    }
}
