import type { Sql } from 'postgres';
import type { MarketEvent } from '../types/market-event.js';

export interface MarketEventRow {
  book: string;
  sport: string;
  game: string;
  game_start: Date | null;
  away: string;
  home: string;
  total: number | null;
  over_price: string | null;
  under_price: string | null;
  away_moneyline: string | null;
  home_moneyline: string | null;
  away_spread: number | null;
  away_spread_price: string | null;
  home_spread: number | null;
  home_spread_price: string | null;
  retrieved_at: Date;
}

const COLUMNS = [
  'book',
  'sport',
  'game',
  'game_start',
  'away',
  'home',
  'total',
  'over_price',
  'under_price',
  'away_moneyline',
  'home_moneyline',
  'away_spread',
  'away_spread_price',
  'home_spread',
  'home_spread_price',
  'retrieved_at',
] as const satisfies readonly (keyof MarketEventRow)[];

export function toRow(event: MarketEvent): MarketEventRow {
  return {
    book: event.book,
    sport: event.sport,
    game: event.game,
    game_start: event.gameStart,
    away: event.away,
    home: event.home,
    total: event.total,
    over_price: event.overPrice,
    under_price: event.underPrice,
    away_moneyline: event.awayMoneyline,
    home_moneyline: event.homeMoneyline,
    away_spread: event.awaySpread,
    away_spread_price: event.awaySpreadPrice,
    home_spread: event.homeSpread,
    home_spread_price: event.homeSpreadPrice,
    retrieved_at: event.retrievedAt,
  };
}

/** Append one snapshot of events to `market_events`. Returns the row count. */
export async function insertMarketEvents(sql: Sql, events: readonly MarketEvent[]): Promise<number> {
  if (events.length === 0) return 0;
  const rows = events.map(toRow);
  const result = await sql`
    INSERT INTO market_events ${sql(rows, ...COLUMNS)}
  `;
  return result.count;
}
