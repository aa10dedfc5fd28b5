import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { normalizeName } from '../pipeline/name-normalizer.js';
import type { BookOptions, SportCatalog, SportConfig } from '../types/sport.js';
import nbaAliases from '../../config/team-aliases/nba.json' with { type: 'json' };
import nflAliases from '../../config/team-aliases/nfl.json' with { type: 'json' };

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const sportInputSchema = z.object({
  displayName: z.string().min(1),
  timezone: z.string().refine(isTimeZone, { message: 'Unknown IANA timezone' }),
  teamAliases: z.record(z.string()).default({}),
  books: z.record(z.record(z.string())),
});

const catalogInputSchema = z.record(sportInputSchema);

export type SportInput = z.input<typeof sportInputSchema>;
export type SportCatalogInput = Record<string, SportInput>;

/**
 * Validate a sport catalog and freeze it. Sport and book keys are
 * lower-cased; alias keys go through normalizeName so lookups ignore case
 * and punctuation.
 */
export function buildSportCatalog(input: unknown): SportCatalog {
  const parsed = catalogInputSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid sport catalog: ${detail}`, { cause: parsed.error });
  }

  const catalog: Record<string, SportConfig> = {};
  for (const [rawKey, sport] of Object.entries(parsed.data)) {
    const key = rawKey.toLowerCase();

    const teamAliases: Record<string, string> = {};
    for (const [raw, code] of Object.entries(sport.teamAliases)) {
      teamAliases[normalizeName(raw)] = code;
    }

    const books: Record<string, BookOptions> = {};
    for (const [book, options] of Object.entries(sport.books)) {
      books[book.toLowerCase()] = Object.freeze({ ...options });
    }

    catalog[key] = Object.freeze({
      key,
      displayName: sport.displayName,
      timezone: sport.timezone,
      teamAliases: Object.freeze(teamAliases),
      books: Object.freeze(books),
    });
  }
  return Object.freeze(catalog);
}

export function getSportConfig(catalog: SportCatalog, key: string): SportConfig {
  const sport = catalog[key.toLowerCase()];
  if (!sport) {
    throw new ConfigError(
      `Unsupported sport: ${key} (configured: ${Object.keys(catalog).join(', ')})`,
    );
  }
  return sport;
}

const EASTERN = 'America/New_York';

// DraftKings league ids and FanDuel custom page ids per sport.
export const DEFAULT_SPORTS: SportCatalogInput = {
  nba: {
    displayName: 'NBA',
    timezone: EASTERN,
    teamAliases: nbaAliases,
    books: {
      draftkings: { league_id: '42648' },
      fanduel: { custom_page_id: 'nba' },
    },
  },
  nfl: {
    displayName: 'NFL',
    timezone: EASTERN,
    teamAliases: nflAliases,
    books: {
      draftkings: { league_id: '88808' },
      fanduel: { custom_page_id: 'nfl' },
    },
  },
  ncaaf: {
    displayName: 'NCAA Football',
    timezone: EASTERN,
    books: {
      draftkings: { league_id: '87637' },
      fanduel: { custom_page_id: 'college-football' },
    },
  },
  ncaab: {
    displayName: 'NCAA Basketball',
    timezone: EASTERN,
    books: {
      draftkings: { league_id: '92483' },
      fanduel: { custom_page_id: 'college-basketball' },
    },
  },
  mlb: {
    displayName: 'MLB',
    timezone: EASTERN,
    books: {
      draftkings: { league_id: '84240' },
      fanduel: { custom_page_id: 'mlb' },
    },
  },
  nhl: {
    displayName: 'NHL',
    timezone: EASTERN,
    books: {
      draftkings: { league_id: '42133' },
      fanduel: { custom_page_id: 'nhl' },
    },
  },
  epl: {
    displayName: 'English Premier League',
    timezone: 'Europe/London',
    books: {
      draftkings: { league_id: '40685' },
      fanduel: { custom_page_id: 'epl' },
    },
  },
  tennis: {
    displayName: 'Tennis',
    timezone: EASTERN,
    books: {
      draftkings: { league_id: '72778' },
      fanduel: { custom_page_id: 'tennis' },
    },
  },
  golf: {
    displayName: 'PGA Tour',
    timezone: EASTERN,
    books: {
      draftkings: { league_id: '16936' },
      fanduel: { custom_page_id: 'pga' },
    },
  },
  mma: {
    displayName: 'MMA',
    timezone: EASTERN,
    books: {
      draftkings: { league_id: '9034' },
      fanduel: { custom_page_id: 'mma' },
    },
  },
  boxing: {
    displayName: 'Boxing',
    timezone: EASTERN,
    books: {
      draftkings: { league_id: '3655d966' },
      fanduel: { custom_page_id: 'boxing' },
    },
  },
  wnba: {
    displayName: 'WNBA',
    timezone: EASTERN,
    books: {
      draftkings: { league_id: '94682' },
      fanduel: { custom_page_id: 'wnba' },
    },
  },
};

export const SPORTS: SportCatalog = buildSportCatalog(DEFAULT_SPORTS);
