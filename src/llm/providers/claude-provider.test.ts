import { beforeEach, describe, it, expect, vi } from 'vitest';
import { AgentError } from '../../core/errors.js';
import { toolRoundConversation } from '../../testing/fakes.js';
import { ClaudeProvider } from './claude-provider.js';

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create };
  },
}));

describe('ClaudeProvider', () => {
  beforeEach(() => {
    create.mockReset();
  });

  it('folds consecutive tool results into one user turn after the tool_use turn', async () => {
    create.mockResolvedValue({
      content: [{ type: 'text', text: 'Rome it is.' }],
      stop_reason: 'end_turn',
      usage: { input_tokens: 20, output_tokens: 8 },
    });
    const provider = new ClaudeProvider({ apiKey: 'test-secret' });

    const result = await provider.chat(toolRoundConversation());

    expect(create).toHaveBeenCalledWith(
      {
        model: 'claude-sonnet-4-20250514',
        max_tokens: 4096,
        system: 'You plan trips.',
        messages: [
          { role: 'user', content: 'Weekend in Rome on 100 USD?' },
          {
            role: 'assistant',
            content: [
              { type: 'text', text: 'Checking.' },
              { type: 'tool_use', id: 'call_w', name: 'get_weather', input: { location: 'Rome' } },
              {
                type: 'tool_use',
                id: 'call_c',
                name: 'convert_currency',
                input: { amount: 100, from_currency: 'USD', to_currency: 'EUR' },
              },
            ],
          },
          {
            role: 'user',
            content: [
              { type: 'tool_result', tool_use_id: 'call_w', content: 'Rome: 24°C, clear sky' },
              { type: 'tool_result', tool_use_id: 'call_c', content: '100 USD = 92.00 EUR' },
            ],
          },
        ],
        tools: undefined,
        temperature: undefined,
      },
      { signal: undefined }
    );
    expect(result).toEqual({
      content: 'Rome it is.',
      toolCalls: undefined,
      finishReason: 'stop',
      usage: { promptTokens: 20, completionTokens: 8, totalTokens: 28 },
    });
  });

  it('reads tool_use blocks from the response', async () => {
    create.mockResolvedValue({
      content: [{ type: 'tool_use', id: 'toolu_1', name: 'get_weather', input: { location: 'Oslo' } }],
      stop_reason: 'tool_use',
      usage: { input_tokens: 5, output_tokens: 3 },
    });
    const provider = new ClaudeProvider({ apiKey: 'test-secret', maxTokens: 1024 });

    const result = await provider.chat([{ role: 'user', content: 'Oslo weather?' }]);

    expect(create).toHaveBeenCalledWith(expect.objectContaining({ max_tokens: 1024 }), { signal: undefined });
    expect(result.toolCalls).toEqual([{ id: 'toolu_1', name: 'get_weather', arguments: { location: 'Oslo' } }]);
    expect(result.finishReason).toBe('tool_calls');
  });

  it('rejects tool input that is not an object', async () => {
    create.mockResolvedValue({
      content: [{ type: 'tool_use', id: 'toolu_2', name: 'get_weather', input: 'Oslo' }],
      stop_reason: 'tool_use',
      usage: { input_tokens: 5, output_tokens: 3 },
    });
    const provider = new ClaudeProvider({ apiKey: 'test-secret' });

    await expect(provider.chat([{ role: 'user', content: 'Oslo weather?' }])).rejects.toThrow(
      new AgentError('Model produced non-object arguments for tool "get_weather"')
    );
  });
});
