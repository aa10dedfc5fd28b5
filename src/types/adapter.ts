import type { JsonValue } from './json.js';
import type { MarketEvent, ParseOutcome } from './market-event.js';
import type { SportConfig } from './sport.js';

export interface RawPayload {
  book: string;
  url: string;
  /** Stamped when the response arrived; copied onto every event */
  retrievedAt: Date;
  body: JsonValue;
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/** Network seam for adapters. Swapped for an in-process fake in tests. */
export interface HttpClient {
  getJson(url: string, options?: HttpRequestOptions): Promise<JsonValue>;
}

export interface SportsbookAdapter {
  /** Registry key, e.g. 'draftkings' */
  readonly id: string;
  /** Display name stamped on events, e.g. 'DraftKings' */
  readonly name: string;
  readonly sport: SportConfig;

  fetch(): Promise<RawPayload>;

  /** Per-event results, including what was skipped and why. */
  parse(payload: RawPayload): ParseOutcome[];

  /** Best-effort: malformed events are dropped, never thrown. */
  transform(payload: RawPayload): MarketEvent[];

  aliasTeam(rawName: string): string;

  collect(): Promise<MarketEvent[]>;
}

export interface AdapterDeps {
  http: HttpClient;
}

export type AdapterFactory = (sport: SportConfig, deps: AdapterDeps) => SportsbookAdapter;
