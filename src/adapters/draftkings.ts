import { BaseAdapter } from './base-adapter.js';
import type {
  EventCandidate,
  MarketCandidate,
  OutcomeCandidate,
} from '../pipeline/event-builder.js';
import { classifyMarket, sideFromRole } from '../pipeline/market-classifier.js';
import { splitMatchup, type Matchup } from '../pipeline/name-normalizer.js';
import {
  firstOf,
  idAt,
  isJsonObject,
  objectsAt,
  objectsField,
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

const BASE_URL = 'https://sportsbook-nash.draftkings.com';
const SITE = 'dkusoh';

/** Flat layout: events, markets and selections are sibling arrays joined by id. */
interface FlatIndex {
  marketsByEvent: Map<string, JsonObject[]>;
  selectionsByMarket: Map<string, JsonObject[]>;
}

function groupBy(items: JsonObject[], key: string): Map<string, JsonObject[]> {
  const groups = new Map<string, JsonObject[]>();
  for (const item of items) {
    const id = idAt(item, key);
    if (id === null) continue;
    const group = groups.get(id);
    if (group) group.push(item);
    else groups.set(id, [item]);
  }
  return groups;
}

function participantByRole(event: JsonValue, role: string): string | null {
  const participants = objectsAt(event, 'participants') ?? [];
  const match = participants.find((p) => stringAt(p, 'venueRole')?.toLowerCase() === role);
  return match ? stringAt(match, 'name') : null;
}

const teamsFromParticipants: Strategy<JsonValue, Matchup> = (event) => {
  const awayRaw = participantByRole(event, 'away');
  const homeRaw = participantByRole(event, 'home');
  return awayRaw && homeRaw ? { awayRaw, homeRaw } : null;
};

const teamsFromTeamObjects: Strategy<JsonValue, Matchup> = (event) => {
  const awayRaw = stringAt(event, 'awayTeam', 'name') ?? stringAt(event, 'teamName1');
  const homeRaw = stringAt(event, 'homeTeam', 'name') ?? stringAt(event, 'teamName2');
  return awayRaw && homeRaw ? { awayRaw, homeRaw } : null;
};

const teamsFromName: Strategy<JsonValue, Matchup> = (event) => {
  const name = stringAt(event, 'name');
  return name ? splitMatchup(name) : null;
};

const eventTeams = firstOf(teamsFromParticipants, teamsFromTeamObjects, teamsFromName);

const eventStart = firstOf(
  valueField('startEventDate'),
  valueField('startTime'),
  valueField('startDateTime'),
  valueField('startDate'),
);

const marketLabel = firstOf(
  stringField('marketType', 'name'),
  stringField('name'),
  stringField('marketTypeName'),
);

const outcomeLabel = firstOf(stringField('label'), stringField('name'));

const outcomeRole = firstOf<JsonValue, string>(
  stringField('outcomeType'),
  stringField('venueRole'),
  (selection) => {
    const participants = objectsAt(selection, 'participants');
    return participants?.[0] ? stringAt(participants[0], 'venueRole') : null;
  },
);

const outcomePrice = firstOf<JsonValue, string>(
  (o) => formatAmericanOdds(valueAt(o, 'displayOdds', 'american')),
  (o) => formatAmericanOdds(valueAt(o, 'price', 'american')),
  (o) => formatAmericanOdds(valueAt(o, 'oddsAmerican')),
);

const outcomeLine = firstOf<JsonValue, number>(
  (o) => parseLine(valueAt(o, 'points')),
  (o) => parseLine(valueAt(o, 'line')),
);

/** Nested layout groups events under `competitions` (or `events`) of each group. */
const nestedCompetitions = firstOf(objectsField('competitions'), objectsField('events'));

function isEventGroup(value: JsonObject): boolean {
  return nestedCompetitions(value) !== null;
}

/**
 * Only an over/under offer quotes one line for both outcomes. Spread sides
 * keep whatever they publish themselves.
 */
function sharesOfferLine(offer: JsonObject, label: string | null): boolean {
  if (label !== null) return classifyMarket(label) === 'total';
  const outcomes = objectsAt(offer, 'outcomes') ?? [];
  return outcomes.some((o) => {
    const side = sideFromRole(outcomeRole(o)) ?? sideFromRole(outcomeLabel(o));
    return side === 'over' || side === 'under';
  });
}

/**
 * DraftKings sportsbook adapter.
 *
 * Endpoint: `/api/sportscontent/{site}/v1/leagues/{league_id}`.
 *
 * Two payload layouts are understood:
 *
 * 1. **Flat** (current): top-level `events`, `markets` and `selections`
 *    arrays. Markets point at their event via `eventId`; selections point at
 *    their market via `marketId`. Teams come from `participants[].venueRole`,
 *    prices from `displayOdds.american`, lines from `points`.
 *
 * 2. **Nested** (older): `events` or `eventGroups`, each holding
 *    `competitions` with `awayTeam`/`homeTeam` and a `bettingOffers` list
 *    whose `outcomes` carry `price.american` and `line`.
 */
export class DraftKingsAdapter extends BaseAdapter {
  private readonly leagueId: string;

  constructor(sport: SportConfig, deps: AdapterDeps) {
    super('draftkings', 'DraftKings', sport, deps);
    this.leagueId = this.requireOption('league_id');
  }

  protected buildUrl(): string {
    return `${BASE_URL}/api/sportscontent/${SITE}/v1/leagues/${encodeURIComponent(this.leagueId)}`;
  }

  protected override requestHeaders(): Record<string, string> {
    return {
      Referer: 'https://sportsbook.draftkings.com/',
      Origin: 'https://sportsbook.draftkings.com',
      'X-Client-Name': 'web',
    };
  }

  protected extractEvents(payload: RawPayload): EventCandidate[] {
    const body = payload.body;
    const events = objectsAt(body, 'events');
    const markets = objectsAt(body, 'markets');

    // Flat events carry no nested competitions; without a market list they
    // still come through so each one is reported as skipped.
    if (events && (markets || !events.some(isEventGroup))) {
      const index: FlatIndex = {
        marketsByEvent: groupBy(markets ?? [], 'eventId'),
        selectionsByMarket: groupBy(objectsAt(body, 'selections') ?? [], 'marketId'),
      };
      return events.map((event) => this.flatEvent(event, index));
    }

    const groups = events ?? objectsAt(body, 'eventGroups');
    if (groups) {
      return groups.flatMap((group) => nestedCompetitions(group) ?? []).map((c) => this.nestedEvent(c));
    }

    this.log.warn({ keys: this.topLevelKeys(body) }, 'No event collection found in payload');
    return [];
  }

  private flatEvent(event: JsonObject, index: FlatIndex): EventCandidate {
    const id = idAt(event, 'id') ?? idAt(event, 'eventId');
    const markets = id !== null ? index.marketsByEvent.get(id) : undefined;

    return {
      ...this.eventHeader(event, id),
      markets: markets
        ? markets.map((market) => {
            const marketId = idAt(market, 'id');
            const selections = marketId !== null ? index.selectionsByMarket.get(marketId) : undefined;
            return {
              label: marketLabel(market),
              outcomes: (selections ?? []).map((s) => this.outcome(s, null)),
            };
          })
        : null,
    };
  }

  private nestedEvent(competition: JsonObject): EventCandidate {
    const id = idAt(competition, 'id') ?? idAt(competition, 'eventId');
    const offers = objectsAt(competition, 'bettingOffers');

    return {
      ...this.eventHeader(competition, id),
      markets: offers ? offers.map((offer) => this.nestedMarket(offer)) : null,
    };
  }

  private nestedMarket(offer: JsonObject): MarketCandidate {
    const label = marketLabel(offer);
    const offerLine = sharesOfferLine(offer, label) ? parseLine(valueAt(offer, 'line')) : null;
    return {
      label,
      outcomes: (objectsAt(offer, 'outcomes') ?? []).map((o) => this.outcome(o, offerLine)),
    };
  }

  private eventHeader(event: JsonObject, id: string | null): Omit<EventCandidate, 'markets'> {
    const teams = eventTeams(event);
    return {
      id,
      name: stringAt(event, 'name'),
      awayRaw: teams?.awayRaw ?? null,
      homeRaw: teams?.homeRaw ?? null,
      gameStart: parseStartTime(eventStart(event)),
    };
  }

  private outcome(selection: JsonObject, fallbackLine: number | null): OutcomeCandidate {
    return {
      label: outcomeLabel(selection),
      role: outcomeRole(selection),
      line: outcomeLine(selection) ?? fallbackLine,
      price: outcomePrice(selection),
    };
  }

  private topLevelKeys(body: JsonValue): string[] {
    return isJsonObject(body) ? Object.keys(body) : [];
  }
}
