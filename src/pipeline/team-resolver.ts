import { normalizeName } from './name-normalizer.js';

/**
 * Alias table for one sport: normalized raw name -> canonical team code.
 * Unknown names pass through unchanged.
 */
export class TeamResolver {
  private readonly aliasMap: ReadonlyMap<string, string>;

  constructor(aliases: Readonly<Record<string, string>>) {
    const map = new Map<string, string>();
    for (const [raw, code] of Object.entries(aliases)) {
      map.set(normalizeName(raw), code);
    }
    this.aliasMap = map;
  }

  resolve(rawName: string): string {
    return this.aliasMap.get(normalizeName(rawName)) ?? rawName;
  }

  has(rawName: string): boolean {
    return this.aliasMap.has(normalizeName(rawName));
  }

  get size(): number {
    return this.aliasMap.size;
  }
}
