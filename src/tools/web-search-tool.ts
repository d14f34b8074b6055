/**
 * Web Search Tool
 *
 * Tavily search for travel information the other tools don't cover:
 * visa rules, events, opening hours, local tips.
 */
import { z } from 'zod';
import { createLogger } from '../core/logger.js';
import { defineTool, type TravelTool } from './types.js';

const log = createLogger('tools:search');

const SEARCH_URL = 'https://api.tavily.com/search';

const searchSchema = z.object({
  answer: z.string().nullish(),
  results: z
    .array(
      z.object({
        title: z.string(),
        url: z.string(),
        content: z.string().optional(),
      })
    )
    .default([]),
});

export interface WebSearchToolOptions {
  apiKey?: string;
  maxResults: number;
}

const SNIPPET_LENGTH = 300;

function snippet(content: string): string {
  const compact = content.replace(/\s+/g, ' ').trim();
  return compact.length > SNIPPET_LENGTH ? `${compact.slice(0, SNIPPET_LENGTH)}...` : compact;
}

export function createWebSearchTool(options: WebSearchToolOptions): TravelTool {
  return defineTool({
    name: 'search_web',
    description:
      'Search the web for current travel information such as visa requirements, events, ' +
      'opening hours and local tips. Returns a short answer and source links.',
    schema: {
      query: z.string().min(1).describe('Search query'),
      max_results: z.number().int().min(1).max(10).optional().describe('Number of results to return'),
    },
    handler: async ({ query, max_results }, { http, signal }) => {
      const maxResults = max_results ?? options.maxResults;
      if (!options.apiKey) {
        return 'Web search unavailable: search service is not configured';
      }

      const result = await http({
        url: SEARCH_URL,
        method: 'POST',
        headers: { authorization: `Bearer ${options.apiKey}` },
        body: { query, max_results: maxResults, include_answer: true },
        signal,
      });
      if (!result.ok) {
        log.warn({ query, reason: result.reason }, 'Web search request failed');
        return `Web search unavailable: ${result.reason}`;
      }

      const parsed = searchSchema.safeParse(result.data);
      if (!parsed.success) {
        return 'Web search unavailable: unexpected response from search service';
      }

      const { answer, results } = parsed.data;
      if (!answer && results.length === 0) {
        return `No web results found for "${query}".`;
      }

      const lines: string[] = [];
      if (answer) lines.push(`Answer: ${answer}`);
      if (results.length > 0) {
        lines.push('Sources:');
        for (const item of results.slice(0, maxResults)) {
          lines.push(item.content ? `- ${item.title} (${item.url}): ${snippet(item.content)}` : `- ${item.title} (${item.url})`);
        }
      }
      return lines.join('\n');
    },
  });
}
