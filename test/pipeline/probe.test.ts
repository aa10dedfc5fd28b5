import { describe, it, expect } from 'vitest';
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
} from '../../src/pipeline/probe.js';
import type { JsonValue } from '../../src/types/json.js';

const doc: JsonValue = {
  event: { id: 42, name: '  Team A @ Team B  ', blank: '   ' },
  list: [{ a: 1 }, 'skip', null, { a: 2 }],
  byId: { x: { a: 3 }, y: 7 },
  code: ' abc ',
};

describe('probe readers', () => {
  it('should walk key paths', () => {
    expect(valueAt(doc, 'event', 'id')).toBe(42);
    expect(valueAt(doc, 'event', 'missing')).toBeNull();
    expect(valueAt(doc, 'code', 'deeper')).toBeNull();
  });

  it('should only return objects from objectAt', () => {
    expect(objectAt(doc, 'event')).toEqual({ id: 42, name: '  Team A @ Team B  ', blank: '   ' });
    expect(objectAt(doc, 'list')).toBeNull();
  });

  it('should keep only object members of arrays', () => {
    expect(objectsAt(doc, 'list')).toEqual([{ a: 1 }, { a: 2 }]);
    expect(objectsAt(doc, 'event')).toBeNull();
  });

  it('should read id-keyed maps as lists', () => {
    expect(objectValuesAt(doc, 'byId')).toEqual([{ a: 3 }]);
  });

  it('should trim strings and treat blank as missing', () => {
    expect(stringAt(doc, 'event', 'name')).toBe('Team A @ Team B');
    expect(stringAt(doc, 'event', 'blank')).toBeNull();
    expect(stringAt(doc, 'event', 'id')).toBeNull();
  });

  it('should read numeric and string ids as strings', () => {
    expect(idAt(doc, 'event', 'id')).toBe('42');
    expect(idAt(doc, 'code')).toBe('abc');
    expect(idAt(doc, 'list')).toBeNull();
  });

  it('should tell objects from arrays and null', () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
  });
});

describe('firstOf', () => {
  it('should return the first non-null strategy result', () => {
    const name = firstOf(stringField('title'), stringField('event', 'name'), () => 'fallback');
    expect(name(doc)).toBe('Team A @ Team B');
  });

  it('should return null when every strategy misses', () => {
    const name = firstOf(stringField('title'), stringField('subtitle'));
    expect(name(doc)).toBeNull();
  });
});
