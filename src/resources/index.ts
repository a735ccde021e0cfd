/**
 * MCP resources: the mapping reference documents.
 */

export { RESOURCES, listResources, getResourceContent } from './mappings.js';
export type { Resource } from './mappings.js';
