import type {
  MarketEvent,
  MarketKind,
  OutcomeSide,
  ParseOutcome,
} from '../types/market-event.js';
import {
  classifyMarket,
  inferKindFromOutcomes,
  sideFromLabel,
  sideFromRole,
  type TeamNames,
} from './market-classifier.js';

export interface OutcomeQuote {
  side: OutcomeSide;
  /** Spread handicap or total line; null for moneylines */
  line: number | null;
  price: string | null;
}

export interface EventHeader {
  book: string;
  sport: string;
  game: string;
  gameStart: Date | null;
  away: string;
  home: string;
  retrievedAt: Date;
}

type MarketFields = Omit<MarketEvent, keyof EventHeader>;

const EMPTY_MARKETS: MarketFields = {
  total: null,
  overPrice: null,
  underPrice: null,
  awayMoneyline: null,
  homeMoneyline: null,
  awaySpread: null,
  awaySpreadPrice: null,
  homeSpread: null,
  homeSpreadPrice: null,
};

/**
 * Folds the per-market quotes of one game into a single flattened MarketEvent.
 *
 * The first market of each kind that contributes a value wins; later markets
 * of the same kind are ignored. Spread sides are taken as published, the home
 * line is never derived from the away line.
 */
export class MarketEventBuilder {
  private readonly fields: MarketFields = { ...EMPTY_MARKETS };
  private readonly filled = new Set<MarketKind>();

  constructor(private readonly header: EventHeader) {}

  /** Returns true if the market contributed at least one field. */
  apply(kind: MarketKind, quotes: readonly OutcomeQuote[]): boolean {
    if (this.filled.has(kind)) return false;

    let contributed = false;
    switch (kind) {
      case 'moneyline':
        contributed = this.applyMoneyline(quotes);
        break;
      case 'spread':
        contributed = this.applySpread(quotes);
        break;
      case 'total':
        contributed = this.applyTotal(quotes);
        break;
    }

    if (contributed) this.filled.add(kind);
    return contributed;
  }

  hasMarkets(): boolean {
    return this.filled.size > 0;
  }

  build(): MarketEvent {
    return { ...this.header, ...this.fields };
  }

  private applyMoneyline(quotes: readonly OutcomeQuote[]): boolean {
    const away = quotes.find((q) => q.side === 'away');
    const home = quotes.find((q) => q.side === 'home');
    this.fields.awayMoneyline = away?.price ?? null;
    this.fields.homeMoneyline = home?.price ?? null;
    return this.fields.awayMoneyline !== null || this.fields.homeMoneyline !== null;
  }

  private applySpread(quotes: readonly OutcomeQuote[]): boolean {
    const away = quotes.find((q) => q.side === 'away');
    const home = quotes.find((q) => q.side === 'home');
    this.fields.awaySpread = away?.line ?? null;
    this.fields.awaySpreadPrice = away?.price ?? null;
    this.fields.homeSpread = home?.line ?? null;
    this.fields.homeSpreadPrice = home?.price ?? null;
    return [
      this.fields.awaySpread,
      this.fields.awaySpreadPrice,
      this.fields.homeSpread,
      this.fields.homeSpreadPrice,
    ].some((v) => v !== null);
  }

  private applyTotal(quotes: readonly OutcomeQuote[]): boolean {
    const over = quotes.find((q) => q.side === 'over');
    const under = quotes.find((q) => q.side === 'under');
    // Both sides quote the same number; take whichever is present.
    this.fields.total = over?.line ?? under?.line ?? null;
    this.fields.overPrice = over?.price ?? null;
    this.fields.underPrice = under?.price ?? null;
    return (
      this.fields.total !== null || this.fields.overPrice !== null || this.fields.underPrice !== null
    );
  }
}

/** One outcome as extracted from a book payload, before side resolution. */
export interface OutcomeCandidate {
  label: string | null;
  /** Explicit role the book attaches: "AWAY", "HOME", "over", "under" */
  role: string | null;
  line: number | null;
  price: string | null;
}

export interface MarketCandidate {
  /** Market name or type code; null when the book sends none */
  label: string | null;
  outcomes: OutcomeCandidate[];
}

export interface EventCandidate {
  id: string | null;
  name: string | null;
  awayRaw: string | null;
  homeRaw: string | null;
  gameStart: Date | null;
  /** null when the event carries no market list at all */
  markets: MarketCandidate[] | null;
}

export interface BuildContext {
  book: string;
  sport: string;
  retrievedAt: Date;
  aliasTeam: (rawName: string) => string;
}

function resolveSide(outcome: OutcomeCandidate, teams: TeamNames): OutcomeSide | null {
  return sideFromRole(outcome.role) ?? sideFromLabel(outcome.label, teams);
}

/**
 * Turn one extracted event into a canonical MarketEvent, or a skip record
 * saying why it could not be used.
 */
export function buildMarketEvent(candidate: EventCandidate, ctx: BuildContext): ParseOutcome {
  const { id, awayRaw, homeRaw } = candidate;
  if (!awayRaw || !homeRaw) {
    return { kind: 'skipped', eventId: id, reason: 'missing team names' };
  }
  if (candidate.markets === null) {
    return { kind: 'skipped', eventId: id, reason: 'no market list' };
  }

  const teams: TeamNames = {
    awayRaw,
    homeRaw,
    away: ctx.aliasTeam(awayRaw),
    home: ctx.aliasTeam(homeRaw),
  };

  const builder = new MarketEventBuilder({
    book: ctx.book,
    sport: ctx.sport,
    game: candidate.name ?? `${awayRaw} @ ${homeRaw}`,
    gameStart: candidate.gameStart,
    away: teams.away,
    home: teams.home,
    retrievedAt: ctx.retrievedAt,
  });

  for (const market of candidate.markets) {
    const resolved = market.outcomes.map((outcome) => ({
      ...outcome,
      side: resolveSide(outcome, teams),
    }));
    const kind = market.label !== null ? classifyMarket(market.label) : inferKindFromOutcomes(resolved);
    if (!kind) continue;

    const quotes: OutcomeQuote[] = [];
    for (const outcome of resolved) {
      if (outcome.side) quotes.push({ side: outcome.side, line: outcome.line, price: outcome.price });
    }
    builder.apply(kind, quotes);
  }

  if (!builder.hasMarkets()) {
    return { kind: 'skipped', eventId: id, reason: 'no recognized markets' };
  }
  return { kind: 'parsed', event: builder.build() };
}
