export const PRIORITIES = ['low', 'normal', 'high', 'urgent'] as const;

export type Priority = (typeof PRIORITIES)[number];

export type ItemState = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export const TERMINAL_STATES: readonly ItemState[] = ['succeeded', 'failed', 'cancelled'];

/**
 * Allowed state changes. Terminal states have no outgoing edges.
 */
export const STATE_TRANSITIONS: Record<ItemState, readonly ItemState[]> = {
  pending: ['running', 'cancelled'],
  running: ['succeeded', 'pending', 'failed', 'cancelled'],
  succeeded: [],
  failed: [],
  cancelled: [],
};

export function isPriority(value: unknown): value is Priority {
  return typeof value === 'string' && (PRIORITIES as readonly string[]).includes(value);
}

export function isTerminal(state: ItemState): boolean {
  return TERMINAL_STATES.includes(state);
}

/** Numeric rank of a band, higher dispatches first. */
export function priorityRank(priority: Priority): number {
  return PRIORITIES.indexOf(priority);
}

export interface QueueItem<T = unknown> {
  readonly id: string;
  readonly payload: T;
  readonly priority: Priority;
  readonly submittedAt: number;
  readonly sequence: number;
  readonly ownerId?: string;

  state: ItemState;
  attempts: number;
  lastError?: string;
  startedAt?: number;
  completedAt?: number;
  durationMs?: number;
  // Set while a retrying item waits out its backoff
  availableAt?: number;
  promoted: boolean;
  cancelRequested: boolean;
  progress: number;
  result?: unknown;
}

/**
 * Frozen copy handed to readers; never aliases the live record.
 */
export type QueueItemView<T = unknown> = Readonly<QueueItem<T>>;

export interface SubmitOptions {
  ownerId?: string;
}

export interface JobContext {
  readonly itemId: string;
  readonly attempt: number;
  /** Aborted when the item is cancelled or the processing timeout elapses. */
  readonly signal: AbortSignal;
  reportProgress(percent: number): void;
}

export type ProcessSuccess<R = unknown> = { ok: true; data?: R };
export type ProcessFailure = { ok: false; transient: boolean; reason: string };
export type ProcessResult<R = unknown> = ProcessSuccess<R> | ProcessFailure;

export type Processor<T = unknown, R = unknown> = (
  payload: T,
  context: JobContext
) => Promise<ProcessResult<R>>;

export type TransitionKind =
  | 'submitted'
  | 'dispatched'
  | 'succeeded'
  | 'retrying'
  | 'failed'
  | 'cancelled'
  | 'recovered';

export interface TransitionEvent {
  readonly kind: TransitionKind;
  readonly itemId: string;
  readonly priority: Priority;
  readonly from: ItemState | null;
  readonly to: ItemState;
  readonly at: number;
  readonly attempts: number;
  readonly durationMs?: number;
  readonly error?: string;
}

export type TransitionListener = (event: TransitionEvent) => void | Promise<void>;
