/**
 * Expense Tool
 *
 * Pure arithmetic over a list of trip costs. No network access.
 */
import { z } from 'zod';
import { defineTool, type TravelTool } from './types.js';

export interface ExpenseItem {
  label: string;
  amount?: unknown;
}

export interface ExpenseOptions {
  days?: number;
  travelers?: number;
  currency?: string;
}

function parseAmount(raw: unknown): number | undefined {
  let value: number;
  if (typeof raw === 'number') {
    value = raw;
  } else if (typeof raw === 'string' && raw.trim() !== '') {
    value = Number(raw.trim());
  } else {
    return undefined;
  }
  return Number.isFinite(value) && value >= 0 ? value : undefined;
}

function describeAmount(raw: unknown): string {
  if (raw === undefined) return 'missing';
  return typeof raw === 'string' ? raw : JSON.stringify(raw);
}

/**
 * Render an expense breakdown. Items with amounts that are not
 * non-negative numbers are listed as invalid and left out of the total.
 */
export function summarizeExpenses(items: ExpenseItem[], options: ExpenseOptions = {}): string {
  const suffix = options.currency ? ` ${options.currency.toUpperCase()}` : '';
  const lines: string[] = ['Expense breakdown:'];
  let total = 0;

  for (const item of items) {
    const amount = parseAmount(item.amount);
    if (amount === undefined) {
      lines.push(`- ${item.label}: invalid amount: ${describeAmount(item.amount)}`);
      continue;
    }
    total += amount;
    lines.push(`- ${item.label}: ${amount.toFixed(2)}${suffix}`);
  }

  lines.push(`Total: ${total.toFixed(2)}${suffix}`);
  if (options.days) {
    lines.push(`Per day (${options.days} days): ${(total / options.days).toFixed(2)}${suffix}`);
  }
  if (options.travelers) {
    lines.push(`Per person (${options.travelers} travelers): ${(total / options.travelers).toFixed(2)}${suffix}`);
  }
  return lines.join('\n');
}

export function createExpenseTool(): TravelTool {
  return defineTool({
    name: 'calculate_expenses',
    description:
      'Add up trip costs and split them per day and per traveler. ' +
      'Use it to produce a total budget from individual cost estimates.',
    schema: {
      items: z
        .array(
          z.object({
            label: z.string().min(1).describe('What the cost is for (e.g., "hotel")'),
            // Unusable amounts are reported per item, so nothing is rejected here
            amount: z.union([z.number(), z.unknown()]).describe('Cost as a number'),
          })
        )
        .min(1)
        .describe('Individual costs'),
      days: z.number().int().positive().optional().describe('Trip length in days'),
      travelers: z.number().int().positive().optional().describe('Number of travelers'),
      currency: z.string().optional().describe('Currency code for display'),
    },
    handler: async ({ items, days, travelers, currency }) => summarizeExpenses(items, { days, travelers, currency }),
  });
}
