export type * from './types/index.js';
export { ConfigError, FetchError, DecodeError } from './errors.js';
export { SPORTS, DEFAULT_SPORTS, buildSportCatalog, getSportConfig } from './config/sports.js';
export { createAdapter, listBooks, DraftKingsAdapter, FanDuelAdapter } from './adapters/index.js';
export { BaseAdapter } from './adapters/base-adapter.js';
export { MarketService, type BookCollection, type MarketServiceOptions } from './service/market-service.js';
export { normalizeName, splitMatchup } from './pipeline/name-normalizer.js';
export { TeamResolver } from './pipeline/team-resolver.js';
export { classifyMarket } from './pipeline/market-classifier.js';
export { MarketEventBuilder, buildMarketEvent } from './pipeline/event-builder.js';
export { serializeEvent, serializeEvents, hydrateEvent, hydrateEvents } from './pipeline/serializer.js';
export { saveSnapshot, archiveSnapshots } from './snapshots/storage.js';
export { insertMarketEvents, toRow } from './db/queries.js';
export {
  DraftKingsPoolCollector,
  type PoolCollectorOptions,
  parseSports,
  parseDraftGroups,
  parseDraftables,
  buildPlayerPool,
} from './pools/draftkings-pools.js';
export { UndiciHttpClient } from './workers/http-client.js';
