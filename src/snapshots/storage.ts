import fs from 'node:fs';
import path from 'node:path';
import type { MarketEvent } from '../types/market-event.js';
import { serializeEvents } from '../pipeline/serializer.js';
import { dateStringInZone } from '../utils/date.js';
import { logger } from '../utils/logger.js';

export interface SaveSnapshotOptions {
  dir: string;
  sport: string;
  /** Zone that decides the file's calendar date */
  timezone: string;
  now?: Date;
}

/**
 * Write serialized events to `<dir>/<sport>-<YYYY-MM-DD>.json`.
 * A later snapshot on the same local day replaces the earlier one.
 */
export function saveSnapshot(events: readonly MarketEvent[], options: SaveSnapshotOptions): string {
  const date = dateStringInZone(options.now ?? new Date(), options.timezone);
  const target = path.join(options.dir, `${options.sport}-${date}.json`);

  fs.mkdirSync(options.dir, { recursive: true });
  fs.writeFileSync(target, JSON.stringify(serializeEvents(events), null, 2), 'utf-8');

  logger.info({ path: target, count: events.length }, 'Saved snapshot');
  return target;
}

/** Move every snapshot in `baseDir` whose name is not in `keep` into `archiveDir`. */
export function archiveSnapshots(
  baseDir: string,
  archiveDir: string,
  keep: ReadonlySet<string>,
): string[] {
  fs.mkdirSync(baseDir, { recursive: true });
  fs.mkdirSync(archiveDir, { recursive: true });

  const moved: string[] = [];
  for (const file of fs.readdirSync(baseDir).sort()) {
    if (!file.endsWith('.json') || keep.has(file)) continue;
    fs.renameSync(path.join(baseDir, file), path.join(archiveDir, file));
    moved.push(file);
    logger.info({ file }, 'Archived snapshot');
  }
  return moved;
}
