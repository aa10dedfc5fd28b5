import type { JsonValue } from '../types/json.js';

const UNICODE_MINUS = /−/g;

/**
 * Keep a price as its American display string.
 * Numbers gain an explicit sign and the typographic minus some books send
 * becomes '-'. Unknown strings (e.g. "EVEN") pass through untouched.
 */
export function formatAmericanOdds(value: JsonValue | undefined): string | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    const rounded = Math.round(value);
    return rounded > 0 ? `+${rounded}` : String(rounded);
  }
  if (typeof value === 'string') {
    const cleaned = value.trim().replace(UNICODE_MINUS, '-');
    return cleaned ? cleaned : null;
  }
  return null;
}

/** Spread or total line. Accepts numbers and numeric strings ("+3.5", "220.5"). */
export function parseLine(value: JsonValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') {
    const cleaned = value.trim().replace(UNICODE_MINUS, '-');
    if (/^pk$/i.test(cleaned)) return 0;
    if (!/^[+-]?\d+(\.\d+)?$/.test(cleaned)) return null;
    return parseFloat(cleaned);
  }
  return null;
}
