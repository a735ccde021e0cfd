export { MappingEngine, createMappingEngine, mapModel, resolveMappingOptions } from './engine.js';
export type { MappingResult, ResolvedMappingOptions } from './engine.js';
export { AxiomBuilder, axiomKey } from './builder.js';
export { cardinalityRestrictions } from './cardinality.js';
export { datatypeRows, xsdFor } from './datatypes.js';
export { IriMinter, normalizeNamespace, slugify, toCamelCase, toPascalCase } from './naming.js';
