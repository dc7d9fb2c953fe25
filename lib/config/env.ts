/**
 * Sync engine configuration, read once from environment variables.
 */

import { IANAZone } from 'luxon';
import { z } from 'zod';

export const DEFAULT_SYNC_TIMEZONE = 'America/Los_Angeles';

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

/**
 * Zod schema for the environment. Empty strings count as unset.
 */
export const SyncEnvSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  ENCRYPTION_KEY: z.string().min(1).optional(),
  SYNC_TIMEZONE: z
    .string()
    .default(DEFAULT_SYNC_TIMEZONE)
    .refine((zone) => IANAZone.isValidZone(zone), {
      message: 'SYNC_TIMEZONE must be an IANA timezone such as America/Chicago',
    }),
  SYNC_CHUNK_SIZE: intFromEnv(10),
  SYNC_CHUNK_DELAY_MS: z.coerce.number().int().min(0).default(500),
  SYNC_TIMEOUT_MS: intFromEnv(30 * 60 * 1000),
  SYNC_CHECKPOINT_TTL_MS: intFromEnv(24 * 60 * 60 * 1000),
  CANVAS_MAX_ATTEMPTS: intFromEnv(5),
  CANVAS_PAGE_CONCURRENCY: intFromEnv(5),
  CANVAS_RETRY_BASE_MS: intFromEnv(1000),
  SYNC_RUNNER: z.enum(['inline', 'queued']).default('inline'),
  SYNC_QUEUE_CONCURRENCY: intFromEnv(2),
});

export interface SyncConfig {
  databaseUrl?: string;
  encryptionKey?: string;
  timezone: string;
  chunkSize: number;
  chunkDelayMs: number;
  timeoutMs: number;
  checkpointTtlMs: number;
  canvas: {
    maxAttempts: number;
    pageConcurrency: number;
    retryBaseMs: number;
  };
  runner: 'inline' | 'queued';
  queueConcurrency: number;
}

/**
 * Parse an environment map into a SyncConfig.
 *
 * @throws Error listing every invalid variable
 */
export function parseSyncConfig(env: NodeJS.ProcessEnv): SyncConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = SyncEnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid sync configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    databaseUrl: vars.DATABASE_URL,
    encryptionKey: vars.ENCRYPTION_KEY,
    timezone: vars.SYNC_TIMEZONE,
    chunkSize: vars.SYNC_CHUNK_SIZE,
    chunkDelayMs: vars.SYNC_CHUNK_DELAY_MS,
    timeoutMs: vars.SYNC_TIMEOUT_MS,
    checkpointTtlMs: vars.SYNC_CHECKPOINT_TTL_MS,
    canvas: {
      maxAttempts: vars.CANVAS_MAX_ATTEMPTS,
      pageConcurrency: vars.CANVAS_PAGE_CONCURRENCY,
      retryBaseMs: vars.CANVAS_RETRY_BASE_MS,
    },
    runner: vars.SYNC_RUNNER,
    queueConcurrency: vars.SYNC_QUEUE_CONCURRENCY,
  };
}

let cachedConfig: SyncConfig | null = null;

export function getSyncConfig(): SyncConfig {
  if (!cachedConfig) {
    cachedConfig = parseSyncConfig(process.env);
  }
  return cachedConfig;
}

/** Drop the cached config (tests stub env vars between cases). */
export function resetSyncConfig(): void {
  cachedConfig = null;
}
