import { AppConfig, loadConfig } from './config.js';
import type { LLMProvider } from './types/index.js';
import { StandardLLMProvider } from './llm/provider.js';
import { AiSdkLLMProvider } from './llm/aiSdkProvider.js';
import { OntologyGenerator } from './llm/generator.js';
import { IBenchmarkStore, JsonBenchmarkStore } from './benchmark/index.js';

export interface ServerContainer {
    config: AppConfig;
    llmProvider: LLMProvider;
    generator: OntologyGenerator;
    benchmarkStore: IBenchmarkStore;
}

export function createLLMProvider(config: AppConfig): LLMProvider {
    return config.llm.provider === 'ai-sdk'
        ? new AiSdkLLMProvider(config.llm)
        : new StandardLLMProvider(config.llm);
}

/**
 * Wire the server's services. Tests pass their own provider and store.
 */
export function createContainer(
    config: AppConfig = loadConfig(),
    overrides: Partial<Pick<ServerContainer, 'llmProvider' | 'benchmarkStore'>> = {}
): ServerContainer {
    const llmProvider = overrides.llmProvider ?? createLLMProvider(config);
    const benchmarkStore = overrides.benchmarkStore ?? new JsonBenchmarkStore(config.benchmarkFile);

    return {
        config,
        llmProvider,
        generator: new OntologyGenerator(llmProvider),
        benchmarkStore,
    };
}
