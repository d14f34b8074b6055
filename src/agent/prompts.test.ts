import { describe, it, expect } from 'vitest';
import { getSystemPrompt, SYSTEM_PROMPTS } from './prompts.js';

describe('getSystemPrompt', () => {
  it('gives the default prompt for blank input', () => {
    expect(getSystemPrompt()).toBe(SYSTEM_PROMPTS.default);
    expect(getSystemPrompt('   ')).toBe(SYSTEM_PROMPTS.default);
  });

  it('resolves known keys and passes custom text through trimmed', () => {
    expect(getSystemPrompt('brief')).toBe(SYSTEM_PROMPTS.brief);
    expect(getSystemPrompt('  Plan budget trips only.  ')).toBe('Plan budget trips only.');
  });

  it('asks for cost tables in INR by default', () => {
    expect(SYSTEM_PROMPTS.default).toContain(
      '- Tables for cost breakdowns and comparisons, with costs in Indian Rupees (INR) unless the user asks for another currency.'
    );
  });
});
