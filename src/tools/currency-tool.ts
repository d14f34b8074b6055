/**
 * Currency Tool
 *
 * Converts amounts with latest rates from ExchangeRate-API. With a key the
 * v6 endpoint is used, otherwise the open access endpoint.
 */
import { z } from 'zod';
import { createLogger } from '../core/logger.js';
import { defineTool, type TravelTool } from './types.js';

const log = createLogger('tools:currency');

const KEYED_URL = 'https://v6.exchangerate-api.com/v6';
const OPEN_URL = 'https://open.er-api.com/v6/latest';

const ratesSchema = z
  .object({
    result: z.string().optional(),
    'error-type': z.string().optional(),
    conversion_rates: z.record(z.number()).optional(),
    rates: z.record(z.number()).optional(),
  })
  .transform((value) => ({
    result: value.result,
    errorType: value['error-type'],
    rates: value.conversion_rates ?? value.rates ?? {},
  }));

export interface CurrencyToolOptions {
  apiKey?: string;
}

export function formatRate(rate: number): string {
  return Number(rate.toPrecision(6)).toString();
}

export function formatConversion(amount: number, from: string, to: string, rate: number): string {
  return `${amount} ${from} = ${(amount * rate).toFixed(2)} ${to} (1 ${from} = ${formatRate(rate)} ${to})`;
}

function ratesUrl(from: string, apiKey?: string): string {
  const base = encodeURIComponent(from);
  return apiKey ? `${KEYED_URL}/${encodeURIComponent(apiKey)}/latest/${base}` : `${OPEN_URL}/${base}`;
}

export function createCurrencyTool(options: CurrencyToolOptions): TravelTool {
  return defineTool({
    name: 'convert_currency',
    description:
      'Convert an amount between two currencies using the latest exchange rate. ' +
      'Currencies are ISO 4217 codes such as USD, EUR or JPY.',
    schema: {
      amount: z.number().nonnegative().describe('Amount to convert'),
      from_currency: z.string().length(3).describe('Source currency code (e.g., "USD")'),
      to_currency: z.string().length(3).describe('Target currency code (e.g., "EUR")'),
    },
    handler: async ({ amount, from_currency, to_currency }, { http, signal }) => {
      const from = from_currency.toUpperCase();
      const to = to_currency.toUpperCase();

      if (from === to) {
        return formatConversion(amount, from, to, 1);
      }

      const result = await http({ url: ratesUrl(from, options.apiKey), signal });
      if (!result.ok) {
        log.warn({ from, to, reason: result.reason }, 'Exchange rate request failed');
        return `Currency conversion unavailable: ${result.reason}`;
      }

      const parsed = ratesSchema.safeParse(result.data);
      if (!parsed.success) {
        return 'Currency conversion unavailable: unexpected response from exchange rate service';
      }
      if (parsed.data.result === 'error') {
        return `Currency conversion unavailable: ${parsed.data.errorType ?? 'exchange rate service error'}`;
      }

      const rate = parsed.data.rates[to];
      if (rate === undefined) {
        return `Exchange rate unavailable for ${from} to ${to}.`;
      }

      return formatConversion(amount, from, to, rate);
    },
  });
}
