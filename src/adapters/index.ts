import { ConfigError } from '../errors.js';
import type { AdapterDeps, AdapterFactory, SportsbookAdapter } from '../types/adapter.js';
import type { SportConfig } from '../types/sport.js';
import { DraftKingsAdapter } from './draftkings.js';
import { FanDuelAdapter } from './fanduel.js';

const factories: Map<string, AdapterFactory> = new Map();

function register(id: string, factory: AdapterFactory): void {
  factories.set(id, factory);
}

register('draftkings', (sport, deps) => new DraftKingsAdapter(sport, deps));
register('fanduel', (sport, deps) => new FanDuelAdapter(sport, deps));

export function createAdapter(id: string, sport: SportConfig, deps: AdapterDeps): SportsbookAdapter {
  const factory = factories.get(id.toLowerCase());
  if (!factory) throw new ConfigError(`No adapter registered for book: ${id}`);
  return factory(sport, deps);
}

export function listBooks(): string[] {
  return Array.from(factories.keys());
}

export { DraftKingsAdapter, FanDuelAdapter };
