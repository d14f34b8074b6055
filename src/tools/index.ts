/**
 * Travel tools
 */
import type { Env, ToolsConfig } from '../config/app-config.js';
import { createCurrencyTool } from './currency-tool.js';
import { createExpenseTool } from './expense-tool.js';
import { createPlaceSearchTool } from './place-search-tool.js';
import type { TravelTool } from './types.js';
import { createWeatherTool } from './weather-tool.js';
import { createWebSearchTool } from './web-search-tool.js';

export { TOOL_NAMES, isToolName, defineTool, validateArgs } from './types.js';
export type { ToolName, ToolContext, TravelTool, ToolSpec } from './types.js';
export { createHttpClient, type HttpClient, type HttpRequest, type HttpResult } from './http.js';
export { createWeatherTool, summarizeForecast } from './weather-tool.js';
export { createPlaceSearchTool, buildPlaceQuery, PLACE_CATEGORIES } from './place-search-tool.js';
export { createCurrencyTool, formatConversion } from './currency-tool.js';
export { createExpenseTool, summarizeExpenses } from './expense-tool.js';
export { createWebSearchTool } from './web-search-tool.js';

function secret(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Build the full tool set. Missing service keys don't fail startup; the
 * affected tool reports itself as not configured when called.
 */
export function createDefaultTools(config: ToolsConfig, env: Env = process.env): TravelTool[] {
  return [
    createWeatherTool({ apiKey: secret(env, 'OPENWEATHERMAP_API_KEY') }),
    createPlaceSearchTool({ apiKey: secret(env, 'GOOGLE_PLACES_API_KEY'), resultLimit: config.placeResultLimit }),
    createCurrencyTool({ apiKey: secret(env, 'EXCHANGE_RATE_API_KEY') }),
    createExpenseTool(),
    createWebSearchTool({ apiKey: secret(env, 'TAVILY_API_KEY'), maxResults: config.webSearchResults }),
  ];
}
