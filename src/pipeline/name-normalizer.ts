const PUNCTUATION = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g;

/**
 * Lookup key for a team name: lower-cased, ASCII punctuation removed, trimmed.
 * Idempotent, so keys and lookups can both go through it.
 */
export function normalizeName(name: string): string {
  return name.toLowerCase().replace(PUNCTUATION, '').trim();
}

export interface Matchup {
  awayRaw: string;
  homeRaw: string;
}

/**
 * Split an event label into away/home names. "Away @ Home" and "Away at Home"
 * are US style; "Home v Away" and "Home vs Away" list the home side first.
 */
export function splitMatchup(label: string): Matchup | null {
  const awayFirst = label.split(/\s+(?:@|at)\s+/i);
  if (awayFirst.length === 2) return toMatchup(awayFirst[0], awayFirst[1], false);

  const homeFirst = label.split(/\s+vs?\.?\s+/i);
  if (homeFirst.length === 2) return toMatchup(homeFirst[0], homeFirst[1], true);

  return null;
}

function toMatchup(
  first: string | undefined,
  second: string | undefined,
  homeFirst: boolean,
): Matchup | null {
  const a = first?.trim();
  const b = second?.trim();
  if (!a || !b) return null;
  return homeFirst ? { awayRaw: b, homeRaw: a } : { awayRaw: a, homeRaw: b };
}
