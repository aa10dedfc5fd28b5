import { BaseAdapter } from './base-adapter.js';
import type { EventCandidate, MarketCandidate, OutcomeCandidate } from '../pipeline/event-builder.js';
import { splitMatchup, type Matchup } from '../pipeline/name-normalizer.js';
import {
  firstOf,
  idAt,
  isJsonObject,
  objectAt,
  objectsAt,
  objectValuesAt,
  stringAt,
  stringField,
  valueAt,
  valueField,
  type Strategy,
} from '../pipeline/probe.js';
import type { AdapterDeps, RawPayload } from '../types/adapter.js';
import type { JsonObject, JsonValue } from '../types/json.js';
import type { SportConfig } from '../types/sport.js';
import { parseStartTime } from '../utils/date.js';
import { formatAmericanOdds, parseLine } from '../utils/odds.js';

const BASE_URL = 'https://sbapi.oh.sportsbook.fanduel.com';

function isMarketObject(value: JsonObject): boolean {
  return idAt(value, 'eventId') !== null && Array.isArray(value['runners']);
}

/** Markets keyed by id, wherever this release of the page puts them. */
const locateMarkets = firstOf<JsonValue, JsonObject[]>(
  (body) => objectValuesAt(body, 'attachments', 'markets'),
  (body) => objectValuesAt(body, 'markets'),
  (body) => objectsAt(body, 'markets'),
  // Bare map of market id -> market at the top level
  (body) => {
    if (!isJsonObject(body)) return null;
    const markets = Object.values(body).filter(isJsonObject).filter(isMarketObject);
    return markets.length > 0 ? markets : null;
  },
);

const locateEventIndex = firstOf<JsonValue, JsonObject>(
  (body) => objectAt(body, 'attachments', 'events'),
  (body) => objectAt(body, 'events'),
);

const locateLegacyEvents = firstOf<JsonValue, JsonObject[]>(
  (body) => objectsAt(body, 'content', 'sbEvents'),
  (body) => objectsAt(body, 'sbEvents'),
);

const marketLabel = firstOf(
  stringField('marketType'),
  stringField('marketName'),
  stringField('name'),
);

const runnerPrice = firstOf<JsonValue, string>(
  (r) => formatAmericanOdds(valueAt(r, 'winRunnerOdds', 'americanDisplayOdds', 'americanOdds')),
  (r) => formatAmericanOdds(valueAt(r, 'winRunnerOdds', 'americanDisplayOdds', 'americanOddsInt')),
  (r) => formatAmericanOdds(valueAt(r, 'price', 'american')),
);

const runnerLine = firstOf<JsonValue, number>(
  (r) => parseLine(valueAt(r, 'handicap')),
  (r) => parseLine(valueAt(r, 'points')),
);

const runnerRole = firstOf(stringField('result', 'type'), stringField('type'));

const runnerLabel = firstOf(stringField('runnerName'), stringField('name'));

const eventStart = firstOf(
  valueField('openDate'),
  valueField('startTime'),
  valueField('marketTime'),
);

/** Away/home read off runners that carry an explicit AWAY/HOME result type. */
function teamsFromRunners(markets: readonly JsonObject[]): Matchup | null {
  let awayRaw: string | null = null;
  let homeRaw: string | null = null;
  for (const market of markets) {
    for (const runner of objectsAt(market, 'runners') ?? []) {
      const role = runnerRole(runner)?.toLowerCase();
      const name = runnerLabel(runner);
      if (role === 'away' && !awayRaw) awayRaw = name;
      if (role === 'home' && !homeRaw) homeRaw = name;
    }
    if (awayRaw && homeRaw) return { awayRaw, homeRaw };
  }
  return null;
}

const teamsFromLegacyEvent: Strategy<JsonValue, Matchup> = (event) => {
  const awayRaw = stringAt(event, 'awayTeam', 'name');
  const homeRaw = stringAt(event, 'homeTeam', 'name');
  return awayRaw && homeRaw ? { awayRaw, homeRaw } : null;
};

const teamsFromEventName: Strategy<JsonValue, Matchup> = (event) => {
  const name = stringAt(event, 'name') ?? stringAt(event, 'eventName');
  return name ? splitMatchup(name) : null;
};

/**
 * FanDuel sportsbook adapter.
 *
 * Endpoint: `/api/content-managed-page?page=CUSTOM&customPageId={custom_page_id}`.
 *
 * Understood layouts:
 *
 * 1. **Market map**: markets keyed by id under `attachments.markets` (or at
 *    the top level), each with an `eventId` and nested `runners`. Event
 *    headers come from `attachments.events` when present, otherwise from
 *    runners tagged `result.type` AWAY/HOME. Lines are `handicap`, prices
 *    `winRunnerOdds.americanDisplayOdds.americanOdds`.
 *
 * 2. **sbEvents** (older): `content.sbEvents[]` with `awayTeam`/`homeTeam`
 *    and nested `markets[].selections[]`.
 */
export class FanDuelAdapter extends BaseAdapter {
  private readonly customPageId: string;

  constructor(sport: SportConfig, deps: AdapterDeps) {
    super('fanduel', 'FanDuel', sport, deps);
    this.customPageId = this.options['custom_page_id'] || sport.key;
  }

  protected buildUrl(): string {
    const params = new URLSearchParams({ page: 'CUSTOM', customPageId: this.customPageId });
    return `${BASE_URL}/api/content-managed-page?${params.toString()}`;
  }

  protected override requestHeaders(): Record<string, string> {
    return {
      Referer: 'https://sportsbook.fanduel.com/',
      Origin: 'https://sportsbook.fanduel.com',
    };
  }

  protected extractEvents(payload: RawPayload): EventCandidate[] {
    const body = payload.body;

    const markets = locateMarkets(body);
    if (markets) return this.eventsFromMarketMap(body, markets);

    const legacy = locateLegacyEvents(body);
    if (legacy) return legacy.map((event) => this.legacyEvent(event));

    this.log.warn('No market or event collection found in payload');
    return [];
  }

  private eventsFromMarketMap(body: JsonValue, markets: JsonObject[]): EventCandidate[] {
    const eventIndex = locateEventIndex(body);

    // Insertion order keeps events in the order the page lists them.
    const byEvent = new Map<string, JsonObject[]>();
    if (eventIndex) {
      for (const event of Object.values(eventIndex).filter(isJsonObject)) {
        const id = idAt(event, 'eventId') ?? idAt(event, 'id');
        if (id !== null && !byEvent.has(id)) byEvent.set(id, []);
      }
    }
    for (const market of markets) {
      const id = idAt(market, 'eventId');
      if (id === null) continue;
      const group = byEvent.get(id);
      if (group) group.push(market);
      else byEvent.set(id, [market]);
    }

    return [...byEvent.entries()].map(([id, eventMarkets]) => {
      const event = eventIndex ? objectAt(eventIndex, id) : null;
      const teams = (event ? teamsFromEventName(event) : null) ?? teamsFromRunners(eventMarkets);
      const start = (event ? eventStart(event) : null) ?? firstMarketTime(eventMarkets);

      return {
        id,
        name: event ? stringAt(event, 'name') : null,
        awayRaw: teams?.awayRaw ?? null,
        homeRaw: teams?.homeRaw ?? null,
        gameStart: parseStartTime(start),
        markets: eventMarkets.length > 0 ? eventMarkets.map((m) => this.runnerMarket(m)) : null,
      };
    });
  }

  private runnerMarket(market: JsonObject): MarketCandidate {
    return {
      label: marketLabel(market),
      outcomes: (objectsAt(market, 'runners') ?? []).map((runner) => this.runnerOutcome(runner)),
    };
  }

  private runnerOutcome(runner: JsonObject): OutcomeCandidate {
    return {
      label: runnerLabel(runner),
      role: runnerRole(runner),
      line: runnerLine(runner),
      price: runnerPrice(runner),
    };
  }

  private legacyEvent(event: JsonObject): EventCandidate {
    const teams = firstOf(teamsFromLegacyEvent, teamsFromEventName)(event);
    const markets = objectsAt(event, 'markets');

    return {
      id: idAt(event, 'id') ?? idAt(event, 'eventId'),
      name: stringAt(event, 'name'),
      awayRaw: teams?.awayRaw ?? null,
      homeRaw: teams?.homeRaw ?? null,
      gameStart: parseStartTime(eventStart(event)),
      markets: markets
        ? markets.map((market) => ({
            label: marketLabel(market),
            outcomes: (objectsAt(market, 'selections') ?? []).map((s) => this.runnerOutcome(s)),
          }))
        : null,
    };
  }
}

function firstMarketTime(markets: readonly JsonObject[]): JsonValue | null {
  for (const market of markets) {
    const time = valueAt(market, 'marketTime');
    if (time !== null) return time;
  }
  return null;
}
