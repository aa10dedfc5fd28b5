import { describe, it, expect } from 'vitest';
import { ConfigError, FetchError } from '../../src/errors.js';
import { MarketService } from '../../src/service/market-service.js';
import type { JsonValue } from '../../src/types/json.js';
import { TEST_CATALOG } from '../helpers/catalog.js';
import { FakeHttpClient } from '../helpers/fake-http.js';

const draftKingsBody: JsonValue = {
  events: [
    {
      id: 1,
      participants: [
        { name: 'Team A', venueRole: 'Away' },
        { name: 'Team B', venueRole: 'Home' },
      ],
    },
  ],
  markets: [{ id: 10, eventId: 1, name: 'Moneyline' }],
  selections: [
    { marketId: 10, label: 'Team A', displayOdds: { american: '+110' } },
    { marketId: 10, label: 'Team B', displayOdds: { american: '-130' } },
  ],
};

function respond(url: string): JsonValue | Error {
  if (url.includes('draftkings')) return draftKingsBody;
  return new FetchError(`GET ${url} returned HTTP 503`, url, { status: 503 });
}

describe('MarketService', () => {
  it('should collect every configured book and absorb a failing one', async () => {
    const http = new FakeHttpClient(respond);
    const service = new MarketService('test', { catalog: TEST_CATALOG, http, concurrency: 1 });

    const results = await service.collectDetailed();

    expect(http.calls).toHaveLength(2);
    expect(results.map((r) => r.book)).toEqual(['draftkings', 'fanduel']);
    expect(results[0]?.error).toBeNull();
    expect(results[0]?.events).toHaveLength(1);
    expect(results[1]?.events).toEqual([]);
    expect(results[1]?.error).toBeInstanceOf(FetchError);
  });

  it('should flatten events from the books that succeeded', async () => {
    const service = new MarketService('test', { catalog: TEST_CATALOG, http: new FakeHttpClient(respond) });

    const events = await service.collect();

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      book: 'DraftKings',
      sport: 'test',
      game: 'Team A @ Team B',
      away: 'TA',
      home: 'TB',
      awayMoneyline: '+110',
      homeMoneyline: '-130',
    });
  });

  it('should return nothing when every book fails', async () => {
    const http = new FakeHttpClient(() => new Error('connection reset'));
    const service = new MarketService('test', { catalog: TEST_CATALOG, http });
    expect(await service.collect()).toEqual([]);
  });

  it('should restrict collection to the requested books', async () => {
    const http = new FakeHttpClient(respond);
    const service = new MarketService('test', { catalog: TEST_CATALOG, http, books: ['DraftKings', 'draftkings'] });

    expect(service.adapters.map((a) => a.id)).toEqual(['draftkings']);
    await service.collect();
    expect(http.calls).toHaveLength(1);
  });

  it('should reject an unsupported book before any request', () => {
    const http = new FakeHttpClient(respond);
    expect(() => new MarketService('test', { catalog: TEST_CATALOG, http, books: ['betmgm'] })).toThrow(
      "Book 'betmgm' unsupported for sport Test League",
    );
    expect(http.calls).toHaveLength(0);
  });

  it('should reject an unknown sport', () => {
    const http = new FakeHttpClient(respond);
    expect(() => new MarketService('curling', { catalog: TEST_CATALOG, http })).toThrow(ConfigError);
  });

  it('should surface a book missing its required options', () => {
    const http = new FakeHttpClient(respond);
    expect(() => new MarketService('nodk', { catalog: TEST_CATALOG, http })).toThrow(ConfigError);
  });
});
