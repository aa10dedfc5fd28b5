import { describe, it, expect } from 'vitest';
import {
  MarketEventBuilder,
  buildMarketEvent,
  type BuildContext,
  type EventCandidate,
  type EventHeader,
} from '../../src/pipeline/event-builder.js';

const header: EventHeader = {
  book: 'TestBook',
  sport: 'test',
  game: 'Team A @ Team B',
  gameStart: null,
  away: 'TA',
  home: 'TB',
  retrievedAt: new Date('2025-01-01T12:00:00.000Z'),
};

const ctx: BuildContext = {
  book: 'TestBook',
  sport: 'test',
  retrievedAt: new Date('2025-01-01T12:00:00.000Z'),
  aliasTeam: (raw) => (raw === 'Team A' ? 'TA' : raw === 'Team B' ? 'TB' : raw),
};

function candidate(overrides: Partial<EventCandidate> = {}): EventCandidate {
  return {
    id: 'ev1',
    name: null,
    awayRaw: 'Team A',
    homeRaw: 'Team B',
    gameStart: null,
    markets: [],
    ...overrides,
  };
}

describe('MarketEventBuilder', () => {
  it('should start with every market field null', () => {
    const event = new MarketEventBuilder(header).build();
    expect(event.total).toBeNull();
    expect(event.awayMoneyline).toBeNull();
    expect(event.homeSpreadPrice).toBeNull();
  });

  it('should keep the first market of each kind', () => {
    const builder = new MarketEventBuilder(header);
    expect(builder.apply('moneyline', [{ side: 'away', line: null, price: '+110' }])).toBe(true);
    expect(builder.apply('moneyline', [{ side: 'away', line: null, price: '+300' }])).toBe(false);
    expect(builder.build().awayMoneyline).toBe('+110');
  });

  it('should read spread sides independently', () => {
    const builder = new MarketEventBuilder(header);
    builder.apply('spread', [{ side: 'home', line: 3.5, price: '-110' }]);
    const event = builder.build();
    expect(event.homeSpread).toBe(3.5);
    expect(event.awaySpread).toBeNull();
    expect(event.awaySpreadPrice).toBeNull();
  });

  it('should let a later market fill a kind an empty one did not', () => {
    const builder = new MarketEventBuilder(header);
    expect(builder.apply('total', [])).toBe(false);
    expect(builder.hasMarkets()).toBe(false);
    builder.apply('total', [
      { side: 'over', line: 48.5, price: '-105' },
      { side: 'under', line: 48.5, price: '-115' },
    ]);
    expect(builder.build()).toMatchObject({ total: 48.5, overPrice: '-105', underPrice: '-115' });
    expect(builder.hasMarkets()).toBe(true);
  });
});

describe('buildMarketEvent', () => {
  it('should skip events without both team names', () => {
    expect(buildMarketEvent(candidate({ homeRaw: null }), ctx)).toEqual({
      kind: 'skipped',
      eventId: 'ev1',
      reason: 'missing team names',
    });
  });

  it('should skip events without a market list', () => {
    expect(buildMarketEvent(candidate({ markets: null }), ctx)).toEqual({
      kind: 'skipped',
      eventId: 'ev1',
      reason: 'no market list',
    });
  });

  it('should skip events whose markets are all unrecognized', () => {
    const result = buildMarketEvent(
      candidate({
        markets: [{ label: 'Winning Margin', outcomes: [{ label: 'Team A', role: null, line: null, price: '+400' }] }],
      }),
      ctx,
    );
    expect(result).toEqual({ kind: 'skipped', eventId: 'ev1', reason: 'no recognized markets' });
  });

  it('should build a canonical event with a default game label', () => {
    const result = buildMarketEvent(
      candidate({
        markets: [
          {
            label: 'Moneyline',
            outcomes: [
              { label: 'Team A', role: null, line: null, price: '+110' },
              { label: 'Team B', role: null, line: null, price: '-130' },
            ],
          },
        ],
      }),
      ctx,
    );

    expect(result).toEqual({
      kind: 'parsed',
      event: {
        ...header,
        total: null,
        overPrice: null,
        underPrice: null,
        awayMoneyline: '+110',
        homeMoneyline: '-130',
        awaySpread: null,
        awaySpreadPrice: null,
        homeSpread: null,
        homeSpreadPrice: null,
      },
    });
  });

  it('should prefer explicit roles over labels', () => {
    const result = buildMarketEvent(
      candidate({
        markets: [
          {
            label: null,
            outcomes: [
              { label: 'Team B', role: 'Away', line: null, price: '+150' },
              { label: 'Team A', role: 'Home', line: null, price: '-170' },
            ],
          },
        ],
      }),
      ctx,
    );
    expect(result.kind).toBe('parsed');
    if (result.kind === 'parsed') {
      expect(result.event.awayMoneyline).toBe('+150');
      expect(result.event.homeMoneyline).toBe('-170');
    }
  });
});
