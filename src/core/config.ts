import { z } from 'zod';
import { ConfigurationError } from './errors';
import { createLogger } from '../utils/logger';

const log = createLogger('config');

const count = (min: number, fallback: number) => z.number().int().min(min).default(fallback);

/**
 * Queue configuration schema. Unknown keys are rejected.
 */
export const queueConfigSchema = z
  .object({
    /** Concurrent executors in the worker pool */
    workerCount: count(1, 1),
    /** Retries allowed after the first transient failure */
    maxRetries: count(0, 3),
    baseBackoffMs: count(0, 1000),
    maxBackoffMs: count(0, 60_000),
    /** Pending time before a one-band promotion; 0 disables aging */
    agingThresholdMs: count(0, 300_000),
    /** Periodic snapshot interval; 0 disables the timer */
    snapshotIntervalMs: count(0, 300_000),
    /** Changes that force an immediate snapshot */
    dirtyThreshold: count(1, 10),
    /** Active (pending + running) item limit; 0 = unlimited */
    maxQueueSize: count(0, 1000),
    retentionMs: count(0, 86_400_000),
    maxRetainedTerminal: count(0, 100),
    /** Per-attempt processing timeout; 0 = none */
    processingTimeoutMs: count(0, 0),
  })
  .strict()
  .refine((config) => config.maxBackoffMs >= config.baseBackoffMs, {
    message: 'maxBackoffMs must be greater than or equal to baseBackoffMs',
    path: ['maxBackoffMs'],
  });

export type QueueConfig = Readonly<z.infer<typeof queueConfigSchema>>;
export type QueueConfigInput = z.input<typeof queueConfigSchema>;

/**
 * Validate configuration once and freeze it.
 */
export function resolveQueueConfig(input: unknown = {}): QueueConfig {
  const result = queueConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    log.error({ issues }, 'Invalid queue configuration');
    throw new ConfigurationError(issues);
  }

  return Object.freeze(result.data);
}

const ENV_KEYS: Record<keyof QueueConfigInput, string> = {
  workerCount: 'QUEUE_WORKER_COUNT',
  maxRetries: 'QUEUE_MAX_RETRIES',
  baseBackoffMs: 'QUEUE_BASE_BACKOFF_MS',
  maxBackoffMs: 'QUEUE_MAX_BACKOFF_MS',
  agingThresholdMs: 'QUEUE_AGING_THRESHOLD_MS',
  snapshotIntervalMs: 'QUEUE_SNAPSHOT_INTERVAL_MS',
  dirtyThreshold: 'QUEUE_DIRTY_THRESHOLD',
  maxQueueSize: 'QUEUE_MAX_SIZE',
  retentionMs: 'QUEUE_RETENTION_MS',
  maxRetainedTerminal: 'QUEUE_MAX_RETAINED_TERMINAL',
  processingTimeoutMs: 'QUEUE_PROCESSING_TIMEOUT_MS',
};

const envNumber = z.coerce.number({ invalid_type_error: 'must be a number' });

/**
 * Read QUEUE_* variables; unset ones fall back to defaults.
 */
export function loadQueueConfigFromEnv(env: NodeJS.ProcessEnv = process.env): QueueConfig {
  const raw: Record<string, number> = {};
  const issues: string[] = [];

  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName];
    if (value === undefined || value.trim() === '') continue;

    const parsed = envNumber.safeParse(value);
    if (parsed.success && !Number.isNaN(parsed.data)) {
      raw[key] = parsed.data;
    } else {
      issues.push(`${envName}: expected a number, received '${value}'`);
    }
  }

  if (issues.length > 0) {
    log.error({ issues }, 'Invalid queue environment');
    throw new ConfigurationError(issues);
  }

  const config = resolveQueueConfig(raw);
  log.info({ workerCount: config.workerCount, maxRetries: config.maxRetries }, 'Configuration loaded');
  return config;
}
