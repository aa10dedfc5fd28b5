import { describe, it, expect } from 'vitest';
import { FanDuelAdapter } from '../../src/adapters/fanduel.js';
import { SPORTS, getSportConfig } from '../../src/config/sports.js';
import type { JsonValue } from '../../src/types/json.js';
import { TEST_CATALOG } from '../helpers/catalog.js';
import { FakeHttpClient } from '../helpers/fake-http.js';
import { RETRIEVED_AT, loadFixture, payloadOf } from '../helpers/fixture-loader.js';

const noNetwork = new FakeHttpClient(() => new Error('unexpected request'));

function runner(name: string, odds: number, extra: Record<string, JsonValue> = {}): JsonValue {
  return { runnerName: name, winRunnerOdds: { americanDisplayOdds: { americanOddsInt: odds } }, ...extra };
}

/** Bare market map with no event index: teams come from AWAY/HOME runners. */
const runnerMap: JsonValue = {
  m1: {
    eventId: 7,
    marketType: 'MONEY_LINE',
    runners: [
      runner('Team A', 120, { result: { type: 'AWAY' } }),
      runner('Team B', -140, { result: { type: 'HOME' } }),
    ],
  },
  m2: {
    eventId: 7,
    marketType: 'MATCH_HANDICAP_(2-WAY)',
    runners: [
      runner('Team A', -110, { handicap: -2.5, result: { type: 'AWAY' } }),
      runner('Team B', -110, { handicap: 2.5, result: { type: 'HOME' } }),
    ],
  },
  m3: {
    eventId: 7,
    marketType: 'TOTAL_POINTS_(OVER/UNDER)',
    marketTime: '2025-01-01T12:00:00Z',
    runners: [runner('Over', -105, { handicap: 215.5 }), runner('Under', -115, { handicap: 215.5 })],
  },
};

describe('FanDuelAdapter', () => {
  const nba = new FanDuelAdapter(getSportConfig(SPORTS, 'nba'), { http: noNetwork });

  it('should build the custom page endpoint', async () => {
    const http = new FakeHttpClient(() => ({}));
    const adapter = new FanDuelAdapter(getSportConfig(TEST_CATALOG, 'nodk'), { http });

    const payload = await adapter.fetch();

    expect(payload.url).toBe(
      'https://sbapi.oh.sportsbook.fanduel.com/api/content-managed-page?page=CUSTOM&customPageId=nodk-page',
    );
    expect(http.calls[0]?.options?.headers?.['Origin']).toBe('https://sportsbook.fanduel.com');
  });

  it('should fall back to the sport key as page id', async () => {
    const http = new FakeHttpClient(() => ({}));
    const payload = await new FanDuelAdapter(getSportConfig(TEST_CATALOG, 'test'), { http }).fetch();
    expect(payload.url).toBe(
      'https://sbapi.oh.sportsbook.fanduel.com/api/content-managed-page?page=CUSTOM&customPageId=test',
    );
  });

  describe('transform (attachments layout)', () => {
    const events = nba.transform(payloadOf('fanduel', loadFixture('fanduel', 'nba-page.json')));

    it('should drop events that have no markets', () => {
      expect(events.map((e) => e.game)).toEqual([
        'Boston Celtics @ Los Angeles Lakers',
        'Milwaukee Bucks @ Golden State Warriors',
      ]);
    });

    it('should flatten the full-game markets and skip the first-half handicap', () => {
      expect(events[0]).toEqual({
        book: 'FanDuel',
        sport: 'nba',
        game: 'Boston Celtics @ Los Angeles Lakers',
        gameStart: new Date('2026-02-17T03:30:00.000Z'),
        away: 'BOS',
        home: 'LAL',
        total: 222.5,
        overPrice: '-112',
        underPrice: '-108',
        awayMoneyline: '-245',
        homeMoneyline: '+200',
        awaySpread: -6.5,
        awaySpreadPrice: '-110',
        homeSpread: 6.5,
        homeSpreadPrice: '-110',
        retrievedAt: RETRIEVED_AT,
      });
    });

    it('should keep a total-only event', () => {
      expect(events[1]?.away).toBe('MIL');
      expect(events[1]?.home).toBe('GSW');
      expect(events[1]?.total).toBe(231);
      expect(events[1]?.awayMoneyline).toBeNull();
      expect(events[1]?.homeSpread).toBeNull();
    });
  });

  describe('transform (sbEvents layout)', () => {
    const events = nba.transform(payloadOf('fanduel', loadFixture('fanduel', 'nba-sb-events.json')));

    it('should read events with nested selections', () => {
      expect(events).toHaveLength(2);
      expect(events[0]?.awayMoneyline).toBe('-240');
      expect(events[0]?.homeMoneyline).toBe('+198');
      expect(events[0]?.awaySpread).toBe(-6);
      expect(events[0]?.homeSpread).toBe(6);
      expect(events[0]?.total).toBeNull();
    });

    it('should read totals by Over/Under labels', () => {
      expect(events[1]?.away).toBe('PHX');
      expect(events[1]?.home).toBe('DEN');
      expect(events[1]?.total).toBe(229.5);
      expect(events[1]?.gameStart?.toISOString()).toBe('2026-02-17T02:00:00.000Z');
    });
  });

  describe('transform (bare market map)', () => {
    const adapter = new FanDuelAdapter(getSportConfig(TEST_CATALOG, 'test'), { http: noNetwork });
    const [event] = adapter.transform(payloadOf('fanduel', runnerMap));

    it('should take teams from runner roles and alias them', () => {
      expect(event?.game).toBe('Team A @ Team B');
      expect(event?.away).toBe('TA');
      expect(event?.home).toBe('TB');
    });

    it('should read integer odds and handicaps', () => {
      expect(event?.awayMoneyline).toBe('+120');
      expect(event?.homeMoneyline).toBe('-140');
      expect(event?.awaySpread).toBe(-2.5);
      expect(event?.homeSpreadPrice).toBe('-110');
      expect(event?.total).toBe(215.5);
      expect(event?.overPrice).toBe('-105');
    });

    it('should take the start time from a market when no event index exists', () => {
      expect(event?.gameStart?.toISOString()).toBe('2025-01-01T12:00:00.000Z');
    });
  });

  it('should read an unnamed market with zero handicaps as a moneyline', () => {
    const adapter = new FanDuelAdapter(getSportConfig(TEST_CATALOG, 'test'), { http: noNetwork });
    const [event] = adapter.transform(
      payloadOf('fanduel', {
        m1: {
          eventId: 8,
          runners: [
            runner('Team A', 120, { handicap: 0, result: { type: 'AWAY' } }),
            runner('Team B', -140, { handicap: 0, result: { type: 'HOME' } }),
          ],
        },
      }),
    );

    expect(event?.awayMoneyline).toBe('+120');
    expect(event?.homeMoneyline).toBe('-140');
    expect(event?.awaySpread).toBeNull();
    expect(event?.awaySpreadPrice).toBeNull();
  });

  it('should return no events for an unrecognized payload', () => {
    expect(nba.transform(payloadOf('fanduel', { layout: {} }))).toEqual([]);
  });
});
