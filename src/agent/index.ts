export { TravelAgent, type AgentOptions, type AgentRunOptions, type AgentRunResult } from './agent.js';
export { ToolRegistry, type ToolResult, type DispatchOptions } from './tool-registry.js';
export { convertToolsToLlm, parseZodSchema } from './tool-converter.js';
export { getSystemPrompt, SYSTEM_PROMPTS, type SystemPromptKey } from './prompts.js';
