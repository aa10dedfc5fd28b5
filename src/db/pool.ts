import postgres, { type Sql } from 'postgres';
import { config } from '../config.js';
import { ConfigError } from '../errors.js';

let client: Sql | null = null;

/** Shared connection pool, opened on first use. */
export function getSql(): Sql {
  if (!config.DATABASE_URL) {
    throw new ConfigError('DATABASE_URL is not set');
  }
  client ??= postgres(config.DATABASE_URL, {
    max: 5,
    idle_timeout: 20,
    connect_timeout: 10,
  });
  return client;
}

export async function closeSql(): Promise<void> {
  if (!client) return;
  await client.end();
  client = null;
}
