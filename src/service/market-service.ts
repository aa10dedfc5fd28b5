import type { Logger } from 'pino';
import { createAdapter } from '../adapters/index.js';
import { config } from '../config.js';
import { SPORTS, getSportConfig } from '../config/sports.js';
import { ConfigError } from '../errors.js';
import type { HttpClient, SportsbookAdapter } from '../types/adapter.js';
import type { MarketEvent } from '../types/market-event.js';
import type { SportCatalog, SportConfig } from '../types/sport.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { logger } from '../utils/logger.js';
import { UndiciHttpClient } from '../workers/http-client.js';

export interface MarketServiceOptions {
  /** Subset of book keys; defaults to every book configured for the sport */
  books?: readonly string[];
  catalog?: SportCatalog;
  http?: HttpClient;
  /** Books fetched at once */
  concurrency?: number;
}

export interface BookCollection {
  book: string;
  events: MarketEvent[];
  /** Set when this book's fetch or transform failed */
  error: Error | null;
}

/**
 * Collects market events for one sport across its configured books.
 *
 * Configuration problems throw ConfigError from the constructor, before any
 * request is made. A failing book is logged and contributes no events; it
 * never fails the collection.
 */
export class MarketService {
  readonly sport: SportConfig;
  readonly adapters: readonly SportsbookAdapter[];
  private readonly concurrency: number;
  private readonly log: Logger;

  constructor(sportKey: string, options: MarketServiceOptions = {}) {
    this.sport = getSportConfig(options.catalog ?? SPORTS, sportKey);
    this.concurrency = options.concurrency ?? config.COLLECT_CONCURRENCY;
    this.log = logger.child({ sport: this.sport.key });

    const http = options.http ?? new UndiciHttpClient();
    this.adapters = this.selectBooks(options.books).map((book) =>
      createAdapter(book, this.sport, { http }),
    );
  }

  private selectBooks(requested: readonly string[] | undefined): string[] {
    const available = Object.keys(this.sport.books);
    if (!requested || requested.length === 0) return available;

    const selected: string[] = [];
    for (const book of requested) {
      const key = book.toLowerCase();
      if (!available.includes(key)) {
        throw new ConfigError(
          `Book '${book}' unsupported for sport ${this.sport.displayName} (configured: ${available.join(', ')})`,
        );
      }
      if (!selected.includes(key)) selected.push(key);
    }
    return selected;
  }

  async collectDetailed(): Promise<BookCollection[]> {
    return mapWithConcurrency(this.adapters, this.concurrency, async (adapter) => {
      try {
        const events = await adapter.collect();
        return { book: adapter.id, events, error: null };
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        this.log.error({ book: adapter.id, err: error }, `Failed to collect from ${adapter.name}`);
        return { book: adapter.id, events: [], error };
      }
    });
  }

  async collect(): Promise<MarketEvent[]> {
    const results = await this.collectDetailed();
    const events = results.flatMap((r) => r.events);
    this.log.info(
      { count: events.length, failed: results.filter((r) => r.error).map((r) => r.book) },
      'Collected events',
    );
    return events;
  }
}
