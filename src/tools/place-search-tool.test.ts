import { describe, it, expect } from 'vitest';
import { fail, fakeHttp, ok } from '../testing/fakes.js';
import { buildPlaceQuery, createPlaceSearchTool } from './place-search-tool.js';

const romePlaces = {
  status: 'OK',
  results: [
    { name: 'Colosseum', rating: 4.7, formatted_address: 'Piazza del Colosseo, Rome' },
    { name: 'Pantheon', formatted_address: 'Piazza della Rotonda, Rome' },
    { name: 'Trevi Fountain', rating: 4.8 },
  ],
};

describe('search_places', () => {
  it('lists the top results up to the configured limit', async () => {
    const http = fakeHttp(() => ok(romePlaces));
    const tool = createPlaceSearchTool({ apiKey: 'test-places-key', resultLimit: 2 });

    const text = await tool.invoke({ query: 'Rome', category: 'attractions' }, { http });

    expect(text).toBe(
      [
        'Top places for "top tourist attractions in Rome":',
        '1. Colosseum (rating 4.7) - Piazza del Colosseo, Rome',
        '2. Pantheon - Piazza della Rotonda, Rome',
      ].join('\n')
    );
    const url = new URL(http.requests[0]?.url ?? '');
    expect(url.searchParams.get('query')).toBe('top tourist attractions in Rome');
    expect(url.searchParams.get('key')).toBe('test-places-key');
  });

  it('searches the plain query without a category', async () => {
    const http = fakeHttp(() => ok(romePlaces));
    const tool = createPlaceSearchTool({ apiKey: 'test-places-key', resultLimit: 5 });

    const text = await tool.invoke({ query: 'gelato near Trastevere' }, { http });

    expect(text.split('\n')).toHaveLength(4);
    expect(text.split('\n')[3]).toBe('3. Trevi Fountain (rating 4.8)');
  });

  it('reports zero results', async () => {
    const http = fakeHttp(() => ok({ status: 'ZERO_RESULTS', results: [] }));
    const tool = createPlaceSearchTool({ apiKey: 'test-places-key', resultLimit: 5 });

    expect(await tool.invoke({ query: 'Nowhere' }, { http })).toBe('No places found for "Nowhere".');
  });

  it('reports an API error status', async () => {
    const http = fakeHttp(() => ok({ status: 'REQUEST_DENIED', error_message: 'bad key', results: [] }));
    const tool = createPlaceSearchTool({ apiKey: 'test-places-key', resultLimit: 5 });

    expect(await tool.invoke({ query: 'Rome' }, { http })).toBe('Place search unavailable: REQUEST_DENIED');
  });

  it('reports transport failures', async () => {
    const http = fakeHttp(() => fail('HTTP 503', 503));
    const tool = createPlaceSearchTool({ apiKey: 'test-places-key', resultLimit: 5 });

    expect(await tool.invoke({ query: 'Rome' }, { http })).toBe('Place search unavailable: HTTP 503');
  });

  it('rejects an unknown category', async () => {
    const http = fakeHttp(() => ok(romePlaces));
    const tool = createPlaceSearchTool({ apiKey: 'test-places-key', resultLimit: 5 });

    const text = await tool.invoke({ query: 'Rome', category: 'museums' }, { http });

    expect(text.startsWith('Invalid arguments for search_places: category: ')).toBe(true);
    expect(http.requests).toHaveLength(0);
  });

  it('is unavailable without an API key', async () => {
    const http = fakeHttp(() => ok(romePlaces));
    const tool = createPlaceSearchTool({ resultLimit: 5 });

    expect(await tool.invoke({ query: 'Rome' }, { http })).toBe(
      'Place search unavailable: places service is not configured'
    );
  });
});

describe('buildPlaceQuery', () => {
  it('prefixes the category phrase', () => {
    expect(buildPlaceQuery('Lisbon', 'restaurants')).toBe('best restaurants in Lisbon');
    expect(buildPlaceQuery('Lisbon', 'transportation')).toBe('public transportation in Lisbon');
    expect(buildPlaceQuery('Lisbon')).toBe('Lisbon');
  });
});
