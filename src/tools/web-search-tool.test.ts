import { describe, it, expect } from 'vitest';
import { fail, fakeHttp, ok } from '../testing/fakes.js';
import { createWebSearchTool } from './web-search-tool.js';

const visaResults = {
  answer: 'EU citizens need only a valid ID card.',
  results: [
    { title: 'Entry requirements', url: 'https://example.com/entry', content: 'Travellers from the EU\n  can enter with an ID card.' },
    { title: 'Visa FAQ', url: 'https://example.com/faq' },
    { title: 'Old news', url: 'https://example.com/old', content: 'Outdated.' },
  ],
};

describe('search_web', () => {
  it('returns the answer and sources', async () => {
    const http = fakeHttp(() => ok(visaResults));
    const tool = createWebSearchTool({ apiKey: 'test-search-key', maxResults: 2 });

    const text = await tool.invoke({ query: 'Italy visa for EU citizens' }, { http });

    expect(text.split('\n')).toEqual([
      'Answer: EU citizens need only a valid ID card.',
      'Sources:',
      '- Entry requirements (https://example.com/entry): Travellers from the EU can enter with an ID card.',
      '- Visa FAQ (https://example.com/faq)',
    ]);
  });

  it('posts the query with a bearer token', async () => {
    const http = fakeHttp(() => ok(visaResults));
    const tool = createWebSearchTool({ apiKey: 'test-search-key', maxResults: 5 });

    await tool.invoke({ query: 'Rome events in May', max_results: 3 }, { http });

    const request = http.requests[0];
    expect(request?.url).toBe('https://api.tavily.com/search');
    expect(request?.method).toBe('POST');
    expect(request?.headers).toEqual({ authorization: 'Bearer test-search-key' });
    expect(request?.body).toEqual({ query: 'Rome events in May', max_results: 3, include_answer: true });
  });

  it('reports an empty result', async () => {
    const http = fakeHttp(() => ok({ answer: null, results: [] }));
    const tool = createWebSearchTool({ apiKey: 'test-search-key', maxResults: 5 });

    expect(await tool.invoke({ query: 'zzzz' }, { http })).toBe('No web results found for "zzzz".');
  });

  it('reports failures as text', async () => {
    const http = fakeHttp(() => fail('HTTP 401', 401));
    const tool = createWebSearchTool({ apiKey: 'test-search-key', maxResults: 5 });

    expect(await tool.invoke({ query: 'Rome' }, { http })).toBe('Web search unavailable: HTTP 401');
  });

  it('is unavailable without an API key', async () => {
    const http = fakeHttp(() => ok(visaResults));
    const tool = createWebSearchTool({ maxResults: 5 });

    expect(await tool.invoke({ query: 'Rome' }, { http })).toBe(
      'Web search unavailable: search service is not configured'
    );
    expect(http.requests).toHaveLength(0);
  });
});
