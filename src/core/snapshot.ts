import { z } from 'zod';
import { StatisticsAggregator, type StatisticsState } from './StatisticsAggregator';
import { PRIORITIES, type ItemState, type QueueItem, isTerminal } from './types';

export const SNAPSHOT_VERSION = 2;

/**
 * Persisted queue state. Payloads and results must be JSON-serializable.
 */
export interface QueueSnapshot {
  version: typeof SNAPSHOT_VERSION;
  savedAt: number;
  nextSequence: number;
  items: QueueItem[];
  statistics: StatisticsState;
}

export type DecodeOutcome =
  | { ok: true; snapshot: QueueSnapshot; migratedFrom?: 'legacy' }
  | { ok: false; reason: string };

const timestamp = z.number().finite().nonnegative();
const counter = z.number().int().nonnegative();

const itemSchema = z.object({
  id: z.string().min(1),
  payload: z.unknown(),
  priority: z.enum(PRIORITIES),
  submittedAt: timestamp,
  sequence: counter,
  ownerId: z.string().optional(),
  state: z.enum(['pending', 'running', 'succeeded', 'failed', 'cancelled']),
  attempts: counter,
  lastError: z.string().optional(),
  startedAt: timestamp.optional(),
  completedAt: timestamp.optional(),
  durationMs: timestamp.optional(),
  availableAt: timestamp.optional(),
  promoted: z.boolean().default(false),
  cancelRequested: z.boolean().default(false),
  progress: z.number().min(0).max(100).default(0),
  result: z.unknown().optional(),
});

const counterStateSchema = z.object({
  submitted: counter,
  pending: counter,
  running: counter,
  succeeded: counter,
  failed: counter,
  cancelled: counter,
  durationSum: z.number().finite().nonnegative(),
  durationCount: counter,
  recentDurations: z.array(z.number().finite().nonnegative()),
});

const statisticsSchema = z.object({
  global: counterStateSchema,
  byPriority: z.object({
    low: counterStateSchema,
    normal: counterStateSchema,
    high: counterStateSchema,
    urgent: counterStateSchema,
  }),
});

const snapshotSchema = z
  .object({
    version: z.literal(SNAPSHOT_VERSION),
    savedAt: timestamp,
    nextSequence: counter,
    items: z.array(itemSchema),
    statistics: statisticsSchema,
  })
  .superRefine((snapshot, ctx) => {
    const seen = new Set<string>();
    snapshot.items.forEach((item, position) => {
      if (seen.has(item.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['items', position, 'id'],
          message: `duplicate item id ${item.id}`,
        });
      }
      seen.add(item.id);
    });
  });

/**
 * Queue file written by the bot before snapshots were versioned: a bare array
 * of items with snake_case fields.
 */
const legacyItemSchema = z
  .object({
    id: z.string().min(1),
    chat_id: z.union([z.number(), z.string()]).optional(),
    url: z.string().optional(),
    download_type: z.string().optional(),
    user_name: z.string().optional(),
    priority: z.enum(PRIORITIES).catch('normal'),
    status: z.string(),
    created_time: z.string(),
    started_time: z.string().nullish(),
    completed_time: z.string().nullish(),
    error_message: z.string().nullish(),
    format_id: z.string().nullish(),
    video_index: z.number().nullish(),
    progress: z.number().catch(0),
    retry_count: z.number().int().nonnegative().catch(0),
    metadata: z.record(z.unknown()).nullish(),
  })
  .passthrough();

const LEGACY_STATES: Record<string, ItemState> = {
  pending: 'pending',
  paused: 'pending',
  downloading: 'running',
  processing: 'running',
  completed: 'succeeded',
  failed: 'failed',
  cancelled: 'cancelled',
};

export function encodeSnapshot(snapshot: QueueSnapshot): string {
  return JSON.stringify(snapshot, null, 2);
}

export function decodeSnapshot(text: string): DecodeOutcome {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { ok: false, reason: `malformed JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  if (Array.isArray(raw)) {
    return migrateLegacy(raw);
  }

  if (typeof raw === 'object' && raw !== null && 'version' in raw && raw.version !== SNAPSHOT_VERSION) {
    return { ok: false, reason: `unsupported snapshot version ${String(raw.version)}` };
  }

  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ') };
  }

  const { version, savedAt, nextSequence, statistics } = parsed.data;
  const items = parsed.data.items.map(
    (item): QueueItem => ({
      ...item,
      payload: item.payload,
      result: item.result,
    })
  );

  return {
    ok: true,
    snapshot: {
      version,
      savedAt,
      nextSequence: Math.max(nextSequence, ...items.map((item) => item.sequence + 1)),
      items,
      statistics,
    },
  };
}

function toEpoch(value: string | null | undefined): number | undefined {
  if (value === null || value === undefined) return undefined;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Best-effort conversion of the legacy array format. Entries that cannot be
 * read are dropped; counters are rebuilt from the surviving items.
 */
function migrateLegacy(entries: unknown[]): DecodeOutcome {
  const items: QueueItem[] = [];
  const seen = new Set<string>();

  entries.forEach((entry, position) => {
    const parsed = legacyItemSchema.safeParse(entry);
    if (!parsed.success || seen.has(parsed.data.id)) return;

    const legacy = parsed.data;
    const state = LEGACY_STATES[legacy.status];
    const submittedAt = toEpoch(legacy.created_time);
    if (state === undefined || submittedAt === undefined) return;
    seen.add(legacy.id);

    const startedAt = toEpoch(legacy.started_time);
    const completedAt = toEpoch(legacy.completed_time);
    const durationMs =
      startedAt !== undefined && completedAt !== undefined && completedAt >= startedAt
        ? completedAt - startedAt
        : undefined;

    items.push({
      id: legacy.id,
      payload: {
        url: legacy.url,
        downloadType: legacy.download_type,
        userName: legacy.user_name,
        formatId: legacy.format_id ?? undefined,
        videoIndex: legacy.video_index ?? undefined,
        metadata: legacy.metadata ?? undefined,
      },
      priority: legacy.priority,
      submittedAt,
      sequence: position,
      ownerId: legacy.chat_id === undefined ? undefined : String(legacy.chat_id),
      state,
      attempts: legacy.retry_count + (state === 'pending' ? 0 : 1),
      lastError: legacy.error_message ?? undefined,
      startedAt,
      completedAt,
      durationMs: isTerminal(state) ? durationMs : undefined,
      promoted: false,
      cancelRequested: false,
      progress: Math.min(Math.max(legacy.progress, 0), 100),
    });
  });

  return {
    ok: true,
    migratedFrom: 'legacy',
    snapshot: {
      version: SNAPSHOT_VERSION,
      savedAt: Date.now(),
      nextSequence: entries.length,
      items,
      statistics: tallyItems(items),
    },
  };
}

/**
 * Counters as if every item had been submitted and moved straight to its
 * current state.
 */
export function tallyItems(items: readonly QueueItem[]): StatisticsState {
  const aggregator = new StatisticsAggregator();
  for (const item of items) {
    aggregator.record({
      kind: 'submitted',
      itemId: item.id,
      priority: item.priority,
      from: null,
      to: item.state,
      at: item.submittedAt,
      attempts: item.attempts,
      durationMs: item.durationMs,
    });
  }
  return aggregator.export();
}
