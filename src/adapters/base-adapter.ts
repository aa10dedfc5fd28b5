import type { Logger } from 'pino';
import { ConfigError } from '../errors.js';
import { buildMarketEvent, type EventCandidate } from '../pipeline/event-builder.js';
import { TeamResolver } from '../pipeline/team-resolver.js';
import type { AdapterDeps, HttpClient, RawPayload, SportsbookAdapter } from '../types/adapter.js';
import type { MarketEvent, ParseOutcome } from '../types/market-event.js';
import type { BookOptions, SportConfig } from '../types/sport.js';
import { logger } from '../utils/logger.js';

export abstract class BaseAdapter implements SportsbookAdapter {
  protected readonly http: HttpClient;
  protected readonly options: BookOptions;
  protected readonly log: Logger;
  private readonly resolver: TeamResolver;

  protected constructor(
    readonly id: string,
    readonly name: string,
    readonly sport: SportConfig,
    deps: AdapterDeps,
  ) {
    const options = sport.books[id];
    if (!options) {
      throw new ConfigError(`${name} is not configured for sport: ${sport.key}`);
    }
    this.options = options;
    this.http = deps.http;
    this.resolver = new TeamResolver(sport.teamAliases);
    this.log = logger.child({ book: id, sport: sport.key });
  }

  /** Endpoint for the configured sport. */
  protected abstract buildUrl(): string;

  /** Extract every event in the payload, however the book nests it. */
  protected abstract extractEvents(payload: RawPayload): EventCandidate[];

  protected requestHeaders(): Record<string, string> {
    return {};
  }

  async fetch(): Promise<RawPayload> {
    const url = this.buildUrl();
    this.log.info({ url }, 'Fetching markets');
    const body = await this.http.getJson(url, { headers: this.requestHeaders() });
    return { book: this.id, url, retrievedAt: new Date(), body };
  }

  parse(payload: RawPayload): ParseOutcome[] {
    const ctx = {
      book: this.name,
      sport: this.sport.key,
      retrievedAt: payload.retrievedAt,
      aliasTeam: (raw: string) => this.aliasTeam(raw),
    };
    return this.extractEvents(payload).map((candidate) => buildMarketEvent(candidate, ctx));
  }

  transform(payload: RawPayload): MarketEvent[] {
    const events: MarketEvent[] = [];
    let skipped = 0;

    for (const outcome of this.parse(payload)) {
      if (outcome.kind === 'parsed') {
        events.push(outcome.event);
      } else {
        skipped++;
        this.log.debug({ eventId: outcome.eventId, reason: outcome.reason }, 'Skipped event');
      }
    }

    if (skipped > 0) {
      this.log.warn({ parsed: events.length, skipped }, 'Some events could not be parsed');
    }
    return events;
  }

  aliasTeam(rawName: string): string {
    return this.resolver.resolve(rawName);
  }

  async collect(): Promise<MarketEvent[]> {
    const payload = await this.fetch();
    const events = this.transform(payload);
    this.log.info({ count: events.length }, 'Markets collected');
    return events;
  }

  protected requireOption(key: string): string {
    const value = this.options[key];
    if (!value) {
      throw new ConfigError(`${this.name} requires option "${key}" for sport: ${this.sport.key}`);
    }
    return value;
  }
}
