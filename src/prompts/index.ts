/**
 * MCP prompts: guided conversion and review workflows.
 */

export { PROMPTS, listPrompts, getPrompt } from './templates.js';
export type { Prompt, PromptArgument, PromptMessage, GetPromptResult } from './templates.js';
