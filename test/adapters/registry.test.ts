import { describe, it, expect } from 'vitest';
import { DraftKingsAdapter, FanDuelAdapter, createAdapter, listBooks } from '../../src/adapters/index.js';
import { SPORTS, getSportConfig } from '../../src/config/sports.js';
import { ConfigError } from '../../src/errors.js';
import { FakeHttpClient } from '../helpers/fake-http.js';

describe('adapter registry', () => {
  const nba = getSportConfig(SPORTS, 'nba');
  const deps = { http: new FakeHttpClient(() => ({})) };

  it('should list both books', () => {
    expect(listBooks()).toEqual(['draftkings', 'fanduel']);
  });

  it('should create adapters by id, ignoring case', () => {
    expect(createAdapter('draftkings', nba, deps)).toBeInstanceOf(DraftKingsAdapter);
    expect(createAdapter('FanDuel', nba, deps)).toBeInstanceOf(FanDuelAdapter);
  });

  it('should reject unknown books', () => {
    expect(() => createAdapter('betmgm', nba, deps)).toThrow(ConfigError);
  });
});
