import type { MarketKind, OutcomeSide } from '../types/market-event.js';
import { normalizeName } from './name-normalizer.js';

/** Keyword tables, checked in order. First hit decides the kind. */
const KIND_KEYWORDS: ReadonlyArray<readonly [MarketKind, readonly string[]]> = [
  ['moneyline', ['money']],
  ['spread', ['spread', 'handicap']],
  ['total', ['total', 'over', 'under']],
];

/**
 * Partial-game and derivative markets share the keywords above but must not
 * overwrite the full-game line.
 */
const EXCLUDED_KEYWORDS = [
  '1st',
  '2nd',
  '3rd',
  '4th',
  'first',
  'second',
  'half',
  'quarter',
  'period',
  'inning',
  'alternate',
  'alt ',
  'team total',
  'race to',
  'odd/even',
  'odd even',
  'player',
];

export function isExcludedMarket(label: string): boolean {
  const lower = label.toLowerCase().replace(/_/g, ' ');
  return EXCLUDED_KEYWORDS.some((kw) => lower.includes(kw));
}

/**
 * Map a market name or type code to a market kind.
 * e.g. "Moneyline", "MONEY_LINE" -> moneyline; "MATCH_HANDICAP_(2-WAY)" -> spread;
 * "TOTAL_POINTS_(OVER/UNDER)" -> total.
 */
export function classifyMarket(label: string): MarketKind | null {
  if (isExcludedMarket(label)) return null;
  const lower = label.toLowerCase();
  for (const [kind, keywords] of KIND_KEYWORDS) {
    if (keywords.some((kw) => lower.includes(kw))) return kind;
  }
  return null;
}

export interface OutcomeShape {
  side: OutcomeSide | null;
  line: number | null;
}

/**
 * Fallback for markets published without a name: over/under outcomes make a
 * total, non-zero lines make a spread, two plain priced outcomes a moneyline.
 * A zero line counts as plain: some books stamp `handicap: 0` on moneyline
 * runners.
 */
export function inferKindFromOutcomes(outcomes: readonly OutcomeShape[]): MarketKind | null {
  if (outcomes.length === 0) return null;
  if (outcomes.some((o) => o.side === 'over' || o.side === 'under')) return 'total';
  if (outcomes.some((o) => o.line !== null && o.line !== 0)) return 'spread';
  if (outcomes.length === 2) return 'moneyline';
  return null;
}

export interface TeamNames {
  awayRaw: string;
  homeRaw: string;
  away: string;
  home: string;
}

/** Side from an explicit venue/result role such as "AWAY" or "home". */
export function sideFromRole(role: string | null): OutcomeSide | null {
  if (!role) return null;
  const lower = role.toLowerCase();
  if (lower === 'away' || lower === 'home' || lower === 'over' || lower === 'under') return lower;
  return null;
}

/** Side from an outcome label: a team name (raw or aliased) or "Over"/"Under". */
export function sideFromLabel(label: string | null, teams: TeamNames): OutcomeSide | null {
  if (!label) return null;
  const key = normalizeName(label);
  if (!key) return null;
  if (key === normalizeName(teams.awayRaw) || key === normalizeName(teams.away)) return 'away';
  if (key === normalizeName(teams.homeRaw) || key === normalizeName(teams.home)) return 'home';
  if (key === 'over' || key.startsWith('over ')) return 'over';
  if (key === 'under' || key.startsWith('under ')) return 'under';
  return null;
}
