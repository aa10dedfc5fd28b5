import type { Logger } from 'pino';
import { z } from 'zod';
import { config } from '../config.js';
import { objectsAt, stringAt } from '../pipeline/probe.js';
import type { HttpClient } from '../types/adapter.js';
import type { JsonValue } from '../types/json.js';
import type { DraftGroup, Draftable, PlayerPool, ShowdownTeams } from '../types/pool.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { parseStartTime } from '../utils/date.js';
import { logger } from '../utils/logger.js';
import { UndiciHttpClient } from '../workers/http-client.js';

const SPORTS_URL = 'https://api.draftkings.com/sites/US-DK/sports/v1/sports?format=json';
const CONTESTS_URL = 'https://www.draftkings.com/lobby/getcontests';
const DRAFTGROUPS_URL = 'https://api.draftkings.com/draftgroups/v1/draftgroups';

const POOL_GAME_TYPES: readonly string[] = ['Classic', 'Showdown Captain Mode'];

/** Extra slate types kept for sports whose main format is single-match. */
const EXTRA_GAME_TYPES: Readonly<Record<string, readonly string[]>> = {
  TEN: ['Single Game'],
};

const SHOWDOWN_TEAMS = /\((\w+)\s*@\s*(\w+)\)/;

export function isPoolGameType(gameType: string, sport: string): boolean {
  return POOL_GAME_TYPES.includes(gameType) || (EXTRA_GAME_TYPES[sport]?.includes(gameType) ?? false);
}

export function showdownTeams(contestName: string): ShowdownTeams | null {
  const match = SHOWDOWN_TEAMS.exec(contestName);
  const away = match?.[1];
  const home = match?.[2];
  return away && home ? { away, home } : null;
}

/** Lobby sport codes, de-duplicated and sorted. */
export function parseSports(body: JsonValue): string[] {
  const codes = new Set<string>();
  for (const sport of objectsAt(body, 'sports') ?? []) {
    const code = stringAt(sport, 'regionAbbreviatedSportName');
    if (code) codes.add(code);
  }
  return [...codes].sort();
}

const idSchema = z.union([z.number().int(), z.string().trim().min(1)]).transform(String);

const contestSchema = z.object({
  dg: idSchema,
  gameType: z.string().default('Unknown'),
  sdstring: z.string().nullish(),
  n: z.string().default(''),
});

/** Draft groups behind a sport's lobby contests, first contest per group wins. */
export function parseDraftGroups(sport: string, body: JsonValue): DraftGroup[] {
  const groups = new Map<string, DraftGroup>();
  for (const raw of objectsAt(body, 'Contests') ?? []) {
    const parsed = contestSchema.safeParse(raw);
    if (!parsed.success) continue;

    const contest = parsed.data;
    if (groups.has(contest.dg) || !isPoolGameType(contest.gameType, sport)) continue;

    const showdown = contest.gameType.includes('Showdown') || contest.gameType.includes('Captain');
    groups.set(contest.dg, {
      id: contest.dg,
      sport,
      gameType: contest.gameType,
      startLabel: contest.sdstring?.trim() || null,
      teams: showdown ? showdownTeams(contest.n) : null,
    });
  }
  return [...groups.values()];
}

const draftableSchema = z.object({
  draftableId: idSchema,
  playerId: idSchema.nullish(),
  displayName: z.string().trim().min(1),
  position: z.string().nullish(),
  salary: z.number().nullish(),
  teamAbbreviation: z.string().nullish(),
  status: z.string().nullish(),
  competition: z
    .object({
      competitionId: idSchema.nullish(),
      startTime: z.string().nullish(),
    })
    .nullish(),
});

export interface DraftablesResult {
  players: Draftable[];
  /** Entries dropped for missing an id or a name */
  rejected: number;
}

export function parseDraftables(body: JsonValue): DraftablesResult {
  const players: Draftable[] = [];
  let rejected = 0;

  for (const raw of objectsAt(body, 'draftables') ?? []) {
    const parsed = draftableSchema.safeParse(raw);
    if (!parsed.success) {
      rejected++;
      continue;
    }
    const d = parsed.data;
    players.push({
      draftableId: d.draftableId,
      playerId: d.playerId ?? null,
      name: d.displayName,
      position: d.position ?? null,
      salary: d.salary ?? null,
      team: d.teamAbbreviation ?? null,
      status: d.status ?? null,
      competitionId: d.competition?.competitionId ?? null,
      competitionStart: parseStartTime(d.competition?.startTime ?? null),
    });
  }
  return { players, rejected };
}

export function buildPlayerPool(
  draftGroup: DraftGroup,
  players: Draftable[],
  retrievedAt: Date,
): PlayerPool {
  const competitions = new Set<string>();
  let startTime: Date | null = null;
  for (const player of players) {
    if (player.competitionId !== null) competitions.add(player.competitionId);
    startTime ??= player.competitionStart;
  }
  return { draftGroup, players, gameCount: competitions.size, startTime, retrievedAt };
}

export interface PoolCollectorOptions {
  http?: HttpClient;
  /** Requests in flight at once */
  concurrency?: number;
}

/**
 * Daily-fantasy player pools from the DraftKings lobby:
 * sports -> contests -> draft groups -> draftables.
 *
 * The sport list is required and its failure propagates. A sport or draft
 * group that fails is logged and left out.
 */
export class DraftKingsPoolCollector {
  private readonly http: HttpClient;
  private readonly concurrency: number;
  private readonly log: Logger;

  constructor(options: PoolCollectorOptions = {}) {
    this.http = options.http ?? new UndiciHttpClient();
    this.concurrency = options.concurrency ?? config.COLLECT_CONCURRENCY;
    this.log = logger.child({ book: 'draftkings', feed: 'pools' });
  }

  async listSports(): Promise<string[]> {
    const sports = parseSports(await this.http.getJson(SPORTS_URL));
    this.log.info({ count: sports.length }, 'Fetched lobby sports');
    return sports;
  }

  async listDraftGroups(sport: string): Promise<DraftGroup[]> {
    const url = `${CONTESTS_URL}?${new URLSearchParams({ sport }).toString()}`;
    const groups = parseDraftGroups(sport, await this.http.getJson(url));
    this.log.info({ sport, count: groups.length }, 'Fetched draft groups');
    return groups;
  }

  async fetchPool(group: DraftGroup): Promise<PlayerPool> {
    const url = `${DRAFTGROUPS_URL}/${encodeURIComponent(group.id)}/draftables?format=json`;
    const body = await this.http.getJson(url);
    const retrievedAt = new Date();

    const { players, rejected } = parseDraftables(body);
    if (rejected > 0) {
      this.log.warn({ draftGroup: group.id, rejected }, 'Some draftables could not be parsed');
    }
    return buildPlayerPool(group, players, retrievedAt);
  }

  /** Pools for the given lobby sport codes, or for every sport the lobby lists. */
  async collect(sports?: readonly string[]): Promise<PlayerPool[]> {
    const selected =
      sports && sports.length > 0
        ? [...new Set(sports.map((s) => s.toUpperCase()))]
        : await this.listSports();

    const perSport = await mapWithConcurrency(selected, this.concurrency, async (sport) => {
      try {
        return await this.listDraftGroups(sport);
      } catch (err) {
        this.log.error({ sport, err }, 'Failed to fetch draft groups');
        return [];
      }
    });

    const groups = new Map<string, DraftGroup>();
    for (const group of perSport.flat()) {
      if (!groups.has(group.id)) groups.set(group.id, group);
    }

    const pools = await mapWithConcurrency([...groups.values()], this.concurrency, async (group) => {
      try {
        return await this.fetchPool(group);
      } catch (err) {
        this.log.error({ draftGroup: group.id, err }, 'Failed to fetch draftables');
        return null;
      }
    });

    const collected = pools.filter((pool): pool is PlayerPool => pool !== null);
    this.log.info({ pools: collected.length, failed: pools.length - collected.length }, 'Collected player pools');
    return collected;
  }
}
