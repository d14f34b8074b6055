import { beforeEach, describe, it, expect, vi } from 'vitest';
import { toolRoundConversation } from '../../testing/fakes.js';
import type { LlmMessage } from '../types.js';
import { GeminiProvider } from './gemini-provider.js';

const { generateContent, modelParams } = vi.hoisted(() => {
  const modelParams: unknown[] = [];
  return { generateContent: vi.fn(), modelParams };
});

vi.mock('@google/generative-ai', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@google/generative-ai')>();
  return {
    ...actual,
    GoogleGenerativeAI: class {
      getGenerativeModel(params: unknown) {
        modelParams.push(params);
        return { generateContent };
      }
    },
  };
});

const ROME_WEATHER = {
  functionResponse: { name: 'get_weather', response: { result: 'Rome: 24°C, clear sky' } },
};
const ROME_RATE = {
  functionResponse: { name: 'convert_currency', response: { result: '100 USD = 92.00 EUR' } },
};

function contentsSent(): unknown {
  const [request] = generateContent.mock.lastCall ?? [];
  return typeof request === 'object' && request !== null && 'contents' in request ? request.contents : undefined;
}

describe('GeminiProvider', () => {
  beforeEach(() => {
    generateContent.mockReset();
    modelParams.length = 0;
    generateContent.mockResolvedValue({
      response: {
        candidates: [
          {
            content: {
              role: 'model',
              parts: [{ functionCall: { name: 'search_places', args: { query: 'Rome', category: 'attractions' } } }],
            },
            finishReason: 'STOP',
          },
        ],
        usageMetadata: { promptTokenCount: 12, candidatesTokenCount: 3, totalTokenCount: 15 },
      },
    });
  });

  it('answers parallel function calls in a single function turn', async () => {
    const provider = new GeminiProvider({ apiKey: 'test-secret' });

    const result = await provider.chat(toolRoundConversation());

    expect(modelParams).toEqual([
      { model: 'gemini-2.0-flash', systemInstruction: 'You plan trips.', tools: undefined },
    ]);
    expect(contentsSent()).toEqual([
      { role: 'user', parts: [{ text: 'Weekend in Rome on 100 USD?' }] },
      {
        role: 'model',
        parts: [
          { text: 'Checking.' },
          { functionCall: { name: 'get_weather', args: { location: 'Rome' } } },
          {
            functionCall: {
              name: 'convert_currency',
              args: { amount: 100, from_currency: 'USD', to_currency: 'EUR' },
            },
          },
        ],
      },
      { role: 'function', parts: [ROME_WEATHER, ROME_RATE] },
    ]);
    expect(result).toEqual({
      content: '',
      toolCalls: [{ id: 'call_0', name: 'search_places', arguments: { query: 'Rome', category: 'attractions' } }],
      finishReason: 'tool_calls',
      usage: { promptTokens: 12, completionTokens: 3, totalTokens: 15 },
    });
  });

  it('starts a new function turn for each model turn', async () => {
    const provider = new GeminiProvider({ apiKey: 'test-secret' });
    const conversation: LlmMessage[] = [
      ...toolRoundConversation(),
      {
        role: 'assistant',
        content: '',
        toolCalls: [{ id: 'call_p', name: 'search_places', arguments: { query: 'Rome' } }],
      },
      { role: 'tool', toolCallId: 'call_p', name: 'search_places', content: '1. Colosseum (rating 4.7) - Rome' },
    ];

    await provider.chat(conversation);

    expect(contentsSent()).toEqual([
      { role: 'user', parts: [{ text: 'Weekend in Rome on 100 USD?' }] },
      expect.objectContaining({ role: 'model' }),
      { role: 'function', parts: [ROME_WEATHER, ROME_RATE] },
      { role: 'model', parts: [{ functionCall: { name: 'search_places', args: { query: 'Rome' } } }] },
      {
        role: 'function',
        parts: [
          {
            functionResponse: { name: 'search_places', response: { result: '1. Colosseum (rating 4.7) - Rome' } },
          },
        ],
      },
    ]);
  });
});
