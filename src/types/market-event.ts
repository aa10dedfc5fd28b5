/** The three market kinds that make up a canonical game line. */
export type MarketKind = 'moneyline' | 'spread' | 'total';

/** Which outcome of a two-way market a quote belongs to. */
export type OutcomeSide = 'away' | 'home' | 'over' | 'under';

/**
 * One snapshot of one game's odds from one book.
 * Every market field is independently nullable.
 */
export interface MarketEvent {
  book: string;
  sport: string;
  /** Display label, e.g. "Boston Celtics @ Los Angeles Lakers" */
  game: string;
  gameStart: Date | null;
  /** Alias-resolved team code */
  away: string;
  home: string;
  total: number | null;
  overPrice: string | null;
  underPrice: string | null;
  /** American odds as published, e.g. "+110" */
  awayMoneyline: string | null;
  homeMoneyline: string | null;
  awaySpread: number | null;
  awaySpreadPrice: string | null;
  homeSpread: number | null;
  homeSpreadPrice: string | null;
  retrievedAt: Date;
}

/** JSON-safe form: Date fields become ISO-8601 strings. */
export type SerializedMarketEvent = Omit<MarketEvent, 'gameStart' | 'retrievedAt'> & {
  gameStart: string | null;
  retrievedAt: string;
};

export type ParseOutcome =
  | { kind: 'parsed'; event: MarketEvent }
  | { kind: 'skipped'; eventId: string | null; reason: string };
