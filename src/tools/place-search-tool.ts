/**
 * Place Search Tool
 *
 * Google Places text search for attractions, restaurants, activities,
 * hotels and transport around a destination.
 */
import { z } from 'zod';
import { createLogger } from '../core/logger.js';
import { defineTool, type TravelTool } from './types.js';

const log = createLogger('tools:places');

const TEXT_SEARCH_URL = 'https://maps.googleapis.com/maps/api/place/textsearch/json';

export const PLACE_CATEGORIES = ['attractions', 'restaurants', 'activities', 'hotels', 'transportation'] as const;

type PlaceCategory = (typeof PLACE_CATEGORIES)[number];

const CATEGORY_PREFIX: Record<PlaceCategory, string> = {
  attractions: 'top tourist attractions in',
  restaurants: 'best restaurants in',
  activities: 'things to do in',
  hotels: 'hotels in',
  transportation: 'public transportation in',
};

const textSearchSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z
    .array(
      z.object({
        name: z.string(),
        rating: z.number().optional(),
        formatted_address: z.string().optional(),
      })
    )
    .default([]),
});

export interface PlaceSearchToolOptions {
  apiKey?: string;
  resultLimit: number;
}

export function buildPlaceQuery(query: string, category?: PlaceCategory): string {
  return category ? `${CATEGORY_PREFIX[category]} ${query}` : query;
}

export function createPlaceSearchTool(options: PlaceSearchToolOptions): TravelTool {
  return defineTool({
    name: 'search_places',
    description:
      'Search Google Places for attractions, restaurants, activities, hotels or transportation ' +
      'at a destination. Returns names, ratings and addresses of the top matches.',
    schema: {
      query: z.string().min(1).describe('What to look for, usually a place name (e.g., "Rome")'),
      category: z.enum(PLACE_CATEGORIES).optional().describe('Narrow the search to one kind of place'),
    },
    handler: async ({ query, category }, { http, signal }) => {
      if (!options.apiKey) {
        return 'Place search unavailable: places service is not configured';
      }

      const params = new URLSearchParams({ query: buildPlaceQuery(query, category), key: options.apiKey });
      const result = await http({ url: `${TEXT_SEARCH_URL}?${params}`, signal });
      if (!result.ok) {
        log.warn({ query, reason: result.reason }, 'Place search request failed');
        return `Place search unavailable: ${result.reason}`;
      }

      const parsed = textSearchSchema.safeParse(result.data);
      if (!parsed.success) {
        return 'Place search unavailable: unexpected response from places service';
      }

      const { status, results, error_message } = parsed.data;
      if (status === 'ZERO_RESULTS' || (status === 'OK' && results.length === 0)) {
        return `No places found for "${query}".`;
      }
      if (status !== 'OK') {
        log.warn({ query, status, error_message }, 'Places API returned an error status');
        return `Place search unavailable: ${status}`;
      }

      const lines = results.slice(0, options.resultLimit).map((place, index) => {
        const rating = place.rating !== undefined ? ` (rating ${place.rating})` : '';
        const address = place.formatted_address ? ` - ${place.formatted_address}` : '';
        return `${index + 1}. ${place.name}${rating}${address}`;
      });

      return [`Top places for "${buildPlaceQuery(query, category)}":`, ...lines].join('\n');
    },
  });
}
