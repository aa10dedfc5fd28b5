import type { JsonObject, JsonValue } from '../types/json.js';

/**
 * Upstream payloads drift between releases, so every field we need is read
 * through an ordered list of small extraction strategies. The first strategy
 * that yields a non-null value wins.
 */
export type Strategy<S, T> = (source: S) => T | null;

export function firstOf<S, T>(...strategies: Strategy<S, T>[]): Strategy<S, T> {
  return (source) => {
    for (const strategy of strategies) {
      const value = strategy(source);
      if (value !== null) return value;
    }
    return null;
  };
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Walk a key path; null as soon as a segment is missing or not an object. */
export function valueAt(source: JsonValue | undefined, ...path: string[]): JsonValue | null {
  let current: JsonValue | undefined = source;
  for (const key of path) {
    if (!isJsonObject(current)) return null;
    current = current[key];
  }
  return current ?? null;
}

export function objectAt(source: JsonValue | undefined, ...path: string[]): JsonObject | null {
  const value = valueAt(source, ...path);
  return isJsonObject(value) ? value : null;
}

/** Array at a path; only object members are kept. */
export function objectsAt(source: JsonValue | undefined, ...path: string[]): JsonObject[] | null {
  const value = valueAt(source, ...path);
  return Array.isArray(value) ? value.filter(isJsonObject) : null;
}

/** Values of an id-keyed map at a path, e.g. `{ "123": {...}, "456": {...} }`. */
export function objectValuesAt(
  source: JsonValue | undefined,
  ...path: string[]
): JsonObject[] | null {
  const value = valueAt(source, ...path);
  return isJsonObject(value) ? Object.values(value).filter(isJsonObject) : null;
}

export function stringAt(source: JsonValue | undefined, ...path: string[]): string | null {
  const value = valueAt(source, ...path);
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }
  return null;
}

/** Ids arrive as numbers from one book and strings from the other. */
export function idAt(source: JsonValue | undefined, ...path: string[]): string | null {
  const value = valueAt(source, ...path);
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'string' && value.trim()) return value.trim();
  return null;
}

/** Strategy reading a string at a path. */
export function stringField(...path: string[]): Strategy<JsonValue, string> {
  return (source) => stringAt(source, ...path);
}

/** Strategy reading an array of objects at a path. */
export function objectsField(...path: string[]): Strategy<JsonValue, JsonObject[]> {
  return (source) => objectsAt(source, ...path);
}

/** Strategy reading the raw value at a path. */
export function valueField(...path: string[]): Strategy<JsonValue, JsonValue> {
  return (source) => valueAt(source, ...path);
}
