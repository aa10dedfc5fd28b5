export type { JsonValue, JsonObject, JsonPrimitive } from './json.js';
export type {
  MarketEvent,
  MarketKind,
  OutcomeSide,
  ParseOutcome,
  SerializedMarketEvent,
} from './market-event.js';
export type { SportConfig, SportCatalog, BookOptions } from './sport.js';
export type {
  SportsbookAdapter,
  AdapterDeps,
  AdapterFactory,
  HttpClient,
  HttpRequestOptions,
  RawPayload,
} from './adapter.js';
export type { DraftGroup, Draftable, PlayerPool, ShowdownTeams } from './pool.js';
