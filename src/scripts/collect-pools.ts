#!/usr/bin/env node
/**
 * Collect DraftKings daily-fantasy player pools and print them as JSON.
 * Usage: npx tsx src/scripts/collect-pools.ts [SPORT ...]
 * With no sport codes every sport in the lobby is collected.
 */
import { DraftKingsPoolCollector } from '../pools/draftkings-pools.js';
import { logger } from '../utils/logger.js';

const sports = process.argv.slice(2).filter((a) => !a.startsWith('--'));

try {
  const pools = await new DraftKingsPoolCollector().collect(sports);
  console.log(JSON.stringify(pools, null, 2));
} catch (err) {
  logger.error({ err }, 'Player pool collection failed');
  process.exit(1);
}
