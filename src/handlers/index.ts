export { convertHandler, inspectHandler, mapHandler, validateOntologyHandler } from './convert.js';
export { generateOntologyHandler, listBenchmarksHandler } from './llm.js';
export type { GenerateResponse } from './llm.js';
export { parseArgs, toMappingOptions } from './schemas.js';
