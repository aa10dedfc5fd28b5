import { z } from 'zod';
import type { MarketEvent, SerializedMarketEvent } from '../types/market-event.js';

export function serializeEvent(event: MarketEvent): SerializedMarketEvent {
  return {
    ...event,
    gameStart: event.gameStart ? event.gameStart.toISOString() : null,
    retrievedAt: event.retrievedAt.toISOString(),
  };
}

export function serializeEvents(events: Iterable<MarketEvent>): SerializedMarketEvent[] {
  return Array.from(events, serializeEvent);
}

const isoDate = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid timestamp' })
  .transform((value) => new Date(value));

const serializedEventSchema = z.object({
  book: z.string(),
  sport: z.string(),
  game: z.string(),
  gameStart: isoDate.nullable(),
  away: z.string(),
  home: z.string(),
  total: z.number().nullable(),
  overPrice: z.string().nullable(),
  underPrice: z.string().nullable(),
  awayMoneyline: z.string().nullable(),
  homeMoneyline: z.string().nullable(),
  awaySpread: z.number().nullable(),
  awaySpreadPrice: z.string().nullable(),
  homeSpread: z.number().nullable(),
  homeSpreadPrice: z.string().nullable(),
  retrievedAt: isoDate,
});

/** Inverse of serializeEvent. Throws a ZodError on records of the wrong shape. */
export function hydrateEvent(value: unknown): MarketEvent {
  return serializedEventSchema.parse(value);
}

export function hydrateEvents(values: readonly unknown[]): MarketEvent[] {
  return values.map(hydrateEvent);
}
