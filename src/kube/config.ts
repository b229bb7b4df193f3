import { z } from 'zod';

import { UsageError } from './errors.js';

export const WatchConfigSchema = z.object({
  idleTimeoutMs: z
    .number()
    .int()
    .nonnegative()
    .default(300_000)
    .describe('Reconnect when the stream delivers no frame for this long (0 disables)'),
  authRetryLimit: z
    .number()
    .int()
    .nonnegative()
    .default(3)
    .describe('Consecutive 401/403 responses retried before the watch terminates'),
  maxTransportRetries: z
    .number()
    .int()
    .nonnegative()
    .optional()
    .describe('Consecutive transport failures tolerated (unbounded if omitted)'),
  backoffBaseMs: z.number().nonnegative().default(500).describe('First reconnect delay'),
  backoffMaxMs: z.number().nonnegative().default(30_000).describe('Upper bound for reconnect delays'),
  backoffJitter: z.number().min(0).max(1).default(0.2).describe('Relative jitter applied to each delay'),
  allowBookmarks: z.boolean().default(true).describe('Ask the server for BOOKMARK events'),
});

export type WatchConfig = z.infer<typeof WatchConfigSchema>;
export type WatchConfigInput = z.input<typeof WatchConfigSchema>;

export function resolveWatchConfig(input: WatchConfigInput = {}): WatchConfig {
  const parsed = WatchConfigSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new UsageError(`Invalid watch configuration: ${detail}`);
  }
  return parsed.data;
}

function envNumber(env: NodeJS.ProcessEnv, variable: string): number | undefined {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new UsageError(`${variable} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Reads watch defaults from the environment; unset variables fall back to
 * the schema defaults.
 */
export function loadWatchConfig(env: NodeJS.ProcessEnv = process.env): WatchConfig {
  return resolveWatchConfig({
    idleTimeoutMs: envNumber(env, 'KUBE_WATCH_IDLE_TIMEOUT_MS'),
    authRetryLimit: envNumber(env, 'KUBE_WATCH_AUTH_RETRY_LIMIT'),
    backoffBaseMs: envNumber(env, 'KUBE_WATCH_BACKOFF_BASE_MS'),
    backoffMaxMs: envNumber(env, 'KUBE_WATCH_BACKOFF_MAX_MS'),
  });
}
