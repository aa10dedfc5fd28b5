#!/usr/bin/env node
/**
 * Collect one sport's markets across its books and print them as JSON.
 * Usage: npx tsx src/scripts/collect.ts <sport> [book ...] [--save] [--db]
 *   --save  write a snapshot file under SNAPSHOT_DIR
 *   --db    append the events to the market_events table
 */
import { config } from '../config.js';
import { closeSql, getSql } from '../db/pool.js';
import { insertMarketEvents } from '../db/queries.js';
import { ConfigError } from '../errors.js';
import { serializeEvents } from '../pipeline/serializer.js';
import { MarketService } from '../service/market-service.js';
import { saveSnapshot } from '../snapshots/storage.js';
import { logger } from '../utils/logger.js';

const args = process.argv.slice(2);
const flags = new Set(args.filter((a) => a.startsWith('--')));
const [sport, ...books] = args.filter((a) => !a.startsWith('--'));

if (!sport) {
  console.error('Usage: collect <sport> [book ...] [--save] [--db]');
  process.exit(1);
}

let service: MarketService;
try {
  service = new MarketService(sport, { books });
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(err.message);
    process.exit(1);
  }
  throw err;
}

const events = await service.collect();
console.log(JSON.stringify(serializeEvents(events), null, 2));

if (flags.has('--save')) {
  saveSnapshot(events, {
    dir: config.SNAPSHOT_DIR,
    sport: service.sport.key,
    timezone: service.sport.timezone,
  });
}

if (flags.has('--db')) {
  try {
    const inserted = await insertMarketEvents(getSql(), events);
    logger.info({ inserted }, 'Stored events');
  } finally {
    await closeSql();
  }
}
