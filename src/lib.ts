/**
 * uml2owl - Library Entry Point
 *
 * Exports the pipeline for use in other projects.
 * This file should NOT import @modelcontextprotocol/sdk or any other
 * server-specific dependencies.
 */

// Pipeline
export { convertUml } from './pipeline.js';
export type { ConvertResult } from './pipeline.js';

// Loader
export * from './xmi/index.js';

// Mapping
export * from './mapping/index.js';

// Serializer
export * from './serializer/index.js';

// LLM generation and benchmarks
export { OntologyGenerator, GENERATION_PROMPT, buildGenerationMessages } from './llm/generator.js';
export { StandardLLMProvider } from './llm/provider.js';
export { AiSdkLLMProvider } from './llm/aiSdkProvider.js';
export { extractTurtle } from './llm/outputParser.js';
export * from './benchmark/index.js';

// Configuration
export { loadConfig } from './config.js';
export type { AppConfig, LLMConfig } from './config.js';

// Types and Interfaces
export * from './types/index.js';
