import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
  /** Per-request deadline for sportsbook calls, in ms */
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  /** How many books are fetched at once for one sport */
  COLLECT_CONCURRENCY: z.coerce.number().int().positive().default(2),
  SNAPSHOT_DIR: z.string().default('./snapshots'),
  ARCHIVE_DIR: z.string().default('./snapshots/archive'),
  DATABASE_URL: z.string().optional(),
});

export const config = envSchema.parse(process.env);
export type Config = z.infer<typeof envSchema>;
