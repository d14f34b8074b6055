/**
 * Weather Tool
 *
 * Current conditions and an optional 5-day outlook from OpenWeatherMap.
 * Every failure is reported as text so the agent can plan without weather.
 */
import { z } from 'zod';
import { createLogger } from '../core/logger.js';
import type { HttpResult } from './http.js';
import { defineTool, type TravelTool } from './types.js';

const log = createLogger('tools:weather');

const BASE_URL = 'https://api.openweathermap.org/data/2.5';

const currentSchema = z.object({
  name: z.string(),
  sys: z.object({ country: z.string().optional() }).optional(),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    humidity: z.number(),
  }),
  weather: z.array(z.object({ description: z.string() })),
  wind: z.object({ speed: z.number() }).optional(),
});

const forecastSchema = z.object({
  list: z.array(
    z.object({
      dt_txt: z.string(),
      main: z.object({ temp_min: z.number(), temp_max: z.number() }),
      weather: z.array(z.object({ description: z.string() })),
    })
  ),
});

type ForecastEntry = z.infer<typeof forecastSchema>['list'][number];

export interface WeatherToolOptions {
  apiKey?: string;
}

function celsius(value: number): string {
  return `${Math.round(value)}°C`;
}

function describeFailure(result: Extract<HttpResult, { ok: false }>): string {
  return result.status === 404 ? 'location not found' : result.reason;
}

/**
 * Summarise 3-hourly forecast entries per day: min-max temperature and the
 * midday description (first entry of the day when there is no midday slot).
 */
export function summarizeForecast(entries: ForecastEntry[], maxDays = 5): string[] {
  const days = new Map<string, ForecastEntry[]>();
  for (const entry of entries) {
    const date = entry.dt_txt.slice(0, 10);
    const bucket = days.get(date);
    if (bucket) {
      bucket.push(entry);
    } else {
      days.set(date, [entry]);
    }
  }

  const lines: string[] = [];
  for (const [date, bucket] of days) {
    if (lines.length >= maxDays) break;
    const min = Math.min(...bucket.map((e) => e.main.temp_min));
    const max = Math.max(...bucket.map((e) => e.main.temp_max));
    const representative = bucket.find((e) => e.dt_txt.includes('12:00:00')) ?? bucket[0];
    const description = representative?.weather[0]?.description ?? 'no description';
    lines.push(`- ${date}: ${Math.round(min)}-${celsius(max)}, ${description}`);
  }
  return lines;
}

export function createWeatherTool(options: WeatherToolOptions): TravelTool {
  return defineTool({
    name: 'get_weather',
    description:
      'Get the current weather for a city, optionally with a 5-day forecast. ' +
      'Use it for weather details and clothing recommendations.',
    schema: {
      location: z.string().min(1).describe('City name, optionally with country (e.g., "Rome, IT")'),
      include_forecast: z.boolean().optional().describe('Also return a 5-day forecast'),
    },
    handler: async ({ location, include_forecast }, { http, signal }) => {
      if (!options.apiKey) {
        return `Weather data unavailable for ${location}: weather service is not configured`;
      }

      const query = new URLSearchParams({ q: location, appid: options.apiKey, units: 'metric' });

      const current = await http({ url: `${BASE_URL}/weather?${query}`, signal });
      if (!current.ok) {
        log.warn({ location, reason: current.reason }, 'Current weather request failed');
        return `Weather data unavailable for ${location}: ${describeFailure(current)}`;
      }

      const parsed = currentSchema.safeParse(current.data);
      if (!parsed.success) {
        log.warn({ location, issues: parsed.error.issues }, 'Unexpected weather response');
        return `Weather data unavailable for ${location}: unexpected response from weather service`;
      }

      const data = parsed.data;
      const place = data.sys?.country ? `${data.name}, ${data.sys.country}` : data.name;
      const description = data.weather[0]?.description ?? 'no description';
      const lines = [
        `Current weather in ${place}: ${celsius(data.main.temp)} (feels like ${celsius(data.main.feels_like)}), ${description}.`,
        data.wind
          ? `Humidity ${data.main.humidity}%, wind ${data.wind.speed} m/s.`
          : `Humidity ${data.main.humidity}%.`,
      ];

      if (include_forecast) {
        const forecast = await http({ url: `${BASE_URL}/forecast?${query}`, signal });
        if (!forecast.ok) {
          lines.push(`Forecast unavailable: ${describeFailure(forecast)}`);
        } else {
          const forecastData = forecastSchema.safeParse(forecast.data);
          if (forecastData.success) {
            lines.push('Forecast:', ...summarizeForecast(forecastData.data.list));
          } else {
            lines.push('Forecast unavailable: unexpected response from weather service');
          }
        }
      }

      return lines.join('\n');
    },
  });
}
