import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { v4 as uuid } from 'uuid';
import type { z } from 'zod';
import { createLogger } from '../utils/logger';
import { resolveQueueConfig, type QueueConfig, type QueueConfigInput } from './config';
import {
  InvalidPriorityError,
  InvalidTransitionError,
  ItemNotFoundError,
  ItemStateError,
  QueueClosedError,
  QueueFullError,
} from './errors';
import { EventBus, type Unsubscribe } from './EventBus';
import { PersistenceService, type LoadResult, type PersistenceStatus } from './PersistenceService';
import { nextBand, PriorityIndex, type IndexEntry } from './PriorityIndex';
import { RetryPolicy } from './RetryPolicy';
import { SNAPSHOT_VERSION, tallyItems, type QueueSnapshot } from './snapshot';
import type { SnapshotStore } from './SnapshotStore';
import { StatisticsAggregator, type QueueStatistics } from './StatisticsAggregator';
import {
  STATE_TRANSITIONS,
  isPriority,
  isTerminal,
  type ItemState,
  type Priority,
  type Processor,
  type QueueItem,
  type QueueItemView,
  type SubmitOptions,
  type TransitionEvent,
  type TransitionKind,
  type TransitionListener,
} from './types';
import { WorkerPool, type Claim, type Outcome, type WorkSource } from './WorkerPool';

export type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

interface BaseOptions<T> {
  processor: Processor<T>;
  config?: QueueConfigInput;
  now?: () => number;
}

interface InMemoryOptions<T> extends BaseOptions<T> {
  store?: undefined;
  payloadSchema?: PayloadSchema<T>;
}

interface PersistentOptions<T> extends BaseOptions<T> {
  store: SnapshotStore;
  /** Validates payloads read back from a snapshot */
  payloadSchema: PayloadSchema<T>;
}

/** Without a store the queue runs in memory only */
export type QueueManagerOptions<T> = InMemoryOptions<T> | PersistentOptions<T>;

export type Lifecycle = 'created' | 'running' | 'stopping' | 'stopped';

export interface QueueStatus {
  lifecycle: Lifecycle;
  paused: boolean;
  workers: { size: number; active: number; idle: number };
  queued: number;
  running: number;
  waitingRetry: number;
  retained: number;
  persistence: PersistenceStatus | null;
}

interface ManagerEvents {
  'queue:started': [info: { recovered: number; source: LoadResult['source'] }];
  'queue:paused': [];
  'queue:resumed': [];
  'queue:shutdown': [];
  'item:promoted': [info: { itemId: string; from: Priority; to: Priority }];
  'item:reprioritized': [info: { itemId: string; from: Priority; to: Priority }];
  'item:progress': [info: { itemId: string; progress: number }];
}

interface Waiter<T> {
  resolve: (item: QueueItemView<T>) => void;
  reject: (err: Error) => void;
}

/** Detached copy; payloads and results are JSON data */
function viewOf<T>(item: QueueItem<T>): QueueItemView<T> {
  return Object.freeze(structuredClone(item));
}

function effectiveBand(item: QueueItem): Priority {
  return item.promoted ? nextBand(item.priority) : item.priority;
}

/**
 * Owns the item map and the state machine, and wires the index, worker pool,
 * retry policy, statistics, event bus and persistence together.
 *
 * Every mutation runs synchronously on the event loop, so claim and submit
 * never interleave; only the processor call is awaited.
 */
export class QueueManager<T = unknown> extends EventEmitter<ManagerEvents> implements WorkSource<T> {
  readonly config: QueueConfig;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly items = new Map<string, QueueItem<T>>();
  private readonly claims = new Map<string, Claim<T>>();
  private readonly retryTimers = new Map<string, NodeJS.Timeout>();
  private readonly waiters = new Map<string, Waiter<T>[]>();
  private idleWaiters: Array<() => void> = [];
  private readonly index: PriorityIndex;
  private readonly retryPolicy: RetryPolicy;
  private readonly statistics = new StatisticsAggregator();
  private readonly bus = new EventBus();
  private readonly pool: WorkerPool<T>;
  private readonly persistence: PersistenceService | null;
  private readonly payloadSchema?: PayloadSchema<T>;
  private sequence = 0;
  private lifecycle: Lifecycle = 'created';
  private restoring = false;

  constructor(options: QueueManagerOptions<T>) {
    super();
    this.config = resolveQueueConfig(options.config ?? {});
    this.logger = createLogger('queue-manager');
    this.now = options.now ?? Date.now;
    this.payloadSchema = options.payloadSchema;

    this.index = new PriorityIndex({
      agingThresholdMs: this.config.agingThresholdMs,
      now: this.now,
      onPromote: (entry, from) => this.handlePromotion(entry, from),
    });
    this.retryPolicy = new RetryPolicy(this.config);
    this.pool = new WorkerPool<T>(this, options.processor, this.config);

    if (options.store) {
      this.persistence = new PersistenceService({
        store: options.store,
        intervalMs: this.config.snapshotIntervalMs,
        dirtyThreshold: this.config.dirtyThreshold,
        capture: () => this.capture(),
        accept: (snapshot) => this.parsePayloads(snapshot).rejected,
        onTick: () => {
          this.sweep();
        },
      });
    } else {
      this.persistence = null;
      this.logger.warn('No snapshot store provided, queue state will not survive a restart');
    }
  }

  /**
   * Recover the last snapshot, then start dispatching.
   */
  async start(): Promise<void> {
    if (this.lifecycle !== 'created') {
      throw new QueueClosedError(this.lifecycle);
    }

    let recovered = 0;
    let source: LoadResult['source'] = 'empty';
    if (this.persistence) {
      const loaded = await this.persistence.load();
      source = loaded.source;
      if (loaded.snapshot) {
        recovered = this.restore(loaded.snapshot);
        if (loaded.migratedFrom) {
          this.logger.info({ items: loaded.snapshot.items.length }, 'Migrated legacy queue file');
          this.persistence.markDirty(this.config.dirtyThreshold);
        }
      }
      this.persistence.start();
    }

    this.lifecycle = 'running';
    this.pool.start();
    this.logger.info({ recovered, source, workerCount: this.config.workerCount }, 'Queue started');
    this.emitSafely('queue:started', () => this.emit('queue:started', { recovered, source }));
  }

  /**
   * Accept a job. Returns its id.
   */
  submit(payload: T, priority: string = 'normal', options: SubmitOptions = {}): string {
    if (!isPriority(priority)) {
      throw new InvalidPriorityError(priority);
    }
    if (this.lifecycle !== 'running') {
      throw new QueueClosedError(this.lifecycle);
    }
    if (this.config.maxQueueSize > 0 && this.activeCount() >= this.config.maxQueueSize) {
      throw new QueueFullError(this.config.maxQueueSize);
    }

    const item: QueueItem<T> = {
      id: uuid(),
      payload,
      priority,
      submittedAt: this.now(),
      sequence: this.sequence++,
      ownerId: options.ownerId,
      state: 'pending',
      attempts: 0,
      promoted: false,
      cancelRequested: false,
      progress: 0,
    };

    this.items.set(item.id, item);
    this.index.insert(item.id, priority, item.sequence);
    this.publish(item, null, 'submitted');
    this.logger.info({ itemId: item.id, priority, ownerId: item.ownerId }, 'Item submitted');

    this.pool.notify();
    return item.id;
  }

  /**
   * Cancel an item. Returns the state after the call; a running item reports
   * 'running' until its worker returns.
   */
  cancel(id: string): ItemState {
    const item = this.items.get(id);
    if (!item) {
      throw new ItemNotFoundError(id);
    }
    if (isTerminal(item.state)) {
      return item.state;
    }

    if (item.state === 'running') {
      if (!item.cancelRequested) {
        item.cancelRequested = true;
        this.claims.get(id)?.controller.abort();
        this.persistence?.markDirty();
        this.logger.info({ itemId: id }, 'Cancellation requested for running item');
      }
      return item.state;
    }

    this.index.remove(id);
    this.clearRetryTimer(id);
    item.availableAt = undefined;
    item.completedAt = this.now();
    this.transition(item, 'cancelled', 'cancelled');
    this.logger.info({ itemId: id }, 'Item cancelled');
    this.checkIdle();
    return item.state;
  }

  /**
   * Cancel every non-terminal item submitted by an owner.
   */
  cancelOwner(ownerId: string): number {
    let affected = 0;
    for (const item of [...this.items.values()]) {
      if (item.ownerId !== ownerId || isTerminal(item.state)) continue;
      this.cancel(item.id);
      affected++;
    }
    this.logger.info({ ownerId, affected }, 'Owner queue cleared');
    return affected;
  }

  /**
   * Remove a pending item and insert it again under a new priority.
   */
  reprioritize(id: string, priority: string): QueueItemView<T> {
    if (!isPriority(priority)) {
      throw new InvalidPriorityError(priority);
    }
    const item = this.items.get(id);
    if (!item) {
      throw new ItemNotFoundError(id);
    }
    if (item.state !== 'pending') {
      throw new ItemStateError('reprioritize', id, item.state);
    }

    const replacement: QueueItem<T> = { ...item, priority, promoted: false };
    this.items.set(id, replacement);
    if (this.index.remove(id)) {
      this.index.insert(id, priority, replacement.sequence);
    }
    this.statistics.reassign(item.priority, priority);
    this.persistence?.markDirty();

    const change = { itemId: id, from: item.priority, to: priority };
    this.logger.info(change, 'Item reprioritized');
    this.emitSafely('item:reprioritized', () => this.emit('item:reprioritized', change));
    return viewOf(replacement);
  }

  /**
   * Drop a terminal item from memory and from later snapshots.
   */
  purge(id: string): boolean {
    const item = this.items.get(id);
    if (!item) return false;
    if (!isTerminal(item.state)) {
      throw new ItemStateError('purge', id, item.state);
    }
    this.evict(item);
    return true;
  }

  purgeTerminal(): number {
    let removed = 0;
    for (const item of [...this.items.values()]) {
      if (isTerminal(item.state)) {
        this.evict(item);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Evict terminal items past the retention window, then the oldest beyond
   * maxRetainedTerminal. Zero disables either rule.
   */
  sweep(now: number = this.now()): number {
    const terminal = [...this.items.values()]
      .filter((item) => isTerminal(item.state))
      .sort((a, b) => (a.completedAt ?? a.submittedAt) - (b.completedAt ?? b.submittedAt));

    let removed = 0;
    let remaining = terminal.length;
    for (const item of terminal) {
      const finishedAt = item.completedAt ?? item.submittedAt;
      const expired = this.config.retentionMs > 0 && finishedAt + this.config.retentionMs <= now;
      const overflow = this.config.maxRetainedTerminal > 0 && remaining > this.config.maxRetainedTerminal;
      if (!expired && !overflow) continue;
      this.evict(item);
      removed++;
      remaining--;
    }

    if (removed > 0) {
      this.logger.info({ removed }, 'Evicted finished items');
    }
    return removed;
  }

  getItem(id: string): QueueItemView<T> | undefined {
    const item = this.items.get(id);
    return item ? viewOf(item) : undefined;
  }

  /**
   * Pending items in dispatch order, then those waiting out a retry backoff.
   */
  listPending(priority?: Priority): QueueItemView<T>[] {
    const queued = this.index
      .ordered(priority)
      .map((entry) => this.items.get(entry.id))
      .filter((item): item is QueueItem<T> => item !== undefined);

    const waiting = [...this.retryTimers.keys()]
      .map((id) => this.items.get(id))
      .filter((item): item is QueueItem<T> => item !== undefined && item.state === 'pending')
      .filter((item) => priority === undefined || effectiveBand(item) === priority)
      .sort((a, b) => (a.availableAt ?? 0) - (b.availableAt ?? 0));

    return [...queued, ...waiting].map(viewOf);
  }

  listByOwner(ownerId: string): QueueItemView<T>[] {
    return [...this.items.values()]
      .filter((item) => item.ownerId === ownerId)
      .sort((a, b) => a.sequence - b.sequence)
      .map(viewOf);
  }

  /**
   * 1-based dispatch position among queued items, -1 when not queued.
   */
  getQueuePosition(id: string): number {
    const position = this.index.ordered().findIndex((entry) => entry.id === id);
    return position === -1 ? -1 : position + 1;
  }

  getStatistics(): QueueStatistics {
    return this.statistics.snapshot(this.now());
  }

  /**
   * Counts over the items still retained for one owner.
   */
  getOwnerStatistics(ownerId: string): QueueStatistics {
    const aggregator = new StatisticsAggregator();
    aggregator.restore(tallyItems([...this.items.values()].filter((item) => item.ownerId === ownerId)));
    return aggregator.snapshot(this.now());
  }

  getStatus(): QueueStatus {
    return {
      lifecycle: this.lifecycle,
      paused: this.pool.isPaused,
      workers: { size: this.pool.size, active: this.pool.activeCount, idle: this.pool.idleCount },
      queued: this.index.size,
      running: this.claims.size,
      waitingRetry: this.retryTimers.size,
      retained: this.items.size,
      persistence: this.persistence?.getStatus() ?? null,
    };
  }

  subscribe(kinds: TransitionKind | readonly TransitionKind[] | '*', listener: TransitionListener): Unsubscribe {
    return this.bus.subscribe(kinds, listener);
  }

  /**
   * Resolves with the item once it reaches a terminal state.
   */
  waitFor(id: string): Promise<QueueItemView<T>> {
    const item = this.items.get(id);
    if (!item) {
      return Promise.reject(new ItemNotFoundError(id));
    }
    if (isTerminal(item.state)) {
      return Promise.resolve(viewOf(item));
    }

    return new Promise((resolve, reject) => {
      const list = this.waiters.get(id) ?? [];
      list.push({ resolve, reject });
      this.waiters.set(id, list);
    });
  }

  /**
   * Resolves once nothing is queued, running or waiting to retry.
   */
  onIdle(): Promise<void> {
    if (this.activeCount() === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  pause(): void {
    this.pool.pause();
    this.logger.info('Dispatch paused');
    this.emitSafely('queue:paused', () => this.emit('queue:paused'));
  }

  resume(): void {
    this.pool.resume();
    this.logger.info('Dispatch resumed');
    this.emitSafely('queue:resumed', () => this.emit('queue:resumed'));
  }

  /**
   * Stop accepting work, let in-flight attempts finish and write a final
   * snapshot. With abortRunning the running attempts are signalled first.
   */
  async shutdown(options: { abortRunning?: boolean } = {}): Promise<void> {
    if (this.lifecycle === 'stopping' || this.lifecycle === 'stopped') return;
    if (this.lifecycle === 'created') {
      // Never started: nothing was recovered, so there is nothing to write back
      this.lifecycle = 'stopped';
      this.emitSafely('queue:shutdown', () => this.emit('queue:shutdown'));
      return;
    }
    this.lifecycle = 'stopping';

    for (const id of [...this.retryTimers.keys()]) {
      this.clearRetryTimer(id);
    }
    if (options.abortRunning) {
      for (const claim of this.claims.values()) {
        claim.controller.abort();
      }
    }

    await this.pool.stop();
    await this.bus.drain();
    if (this.persistence) {
      await this.persistence.shutdown();
    }

    this.lifecycle = 'stopped';
    for (const [id, list] of this.waiters) {
      for (const waiter of list) waiter.reject(new QueueClosedError(`stopped before item ${id} finished`));
    }
    this.waiters.clear();
    this.resolveIdle();

    this.logger.info('Queue shut down');
    this.emitSafely('queue:shutdown', () => this.emit('queue:shutdown'));
  }

  /** @internal WorkSource */
  claim(workerId: number): Claim<T> | undefined {
    if (this.lifecycle !== 'running') return undefined;

    for (;;) {
      const entry = this.index.dequeue();
      if (!entry) return undefined;

      const item = this.items.get(entry.id);
      if (!item || item.state !== 'pending') {
        this.logger.warn({ itemId: entry.id }, 'Dropping index entry without a pending item');
        continue;
      }

      item.attempts++;
      item.startedAt = this.now();
      item.completedAt = undefined;
      item.durationMs = undefined;
      item.progress = 0;
      this.transition(item, 'running', 'dispatched');

      const claim: Claim<T> = { item, attempt: item.attempts, controller: new AbortController() };
      this.claims.set(item.id, claim);
      this.logger.debug({ itemId: item.id, workerId, attempt: item.attempts }, 'Item dispatched');
      return claim;
    }
  }

  /** @internal WorkSource */
  settle(claim: Claim<T>, outcome: Outcome, workerId: number): void {
    const { item } = claim;
    if (this.claims.get(item.id) !== claim) {
      this.logger.warn({ itemId: item.id, workerId }, 'Ignoring outcome for a claim that is no longer held');
      return;
    }

    try {
      this.applyOutcome(claim, outcome, workerId);
    } finally {
      // Still running means nothing was applied; the claim stays for a forced failure
      if (item.state !== 'running') this.claims.delete(item.id);
    }
    this.checkIdle();
  }

  private applyOutcome(claim: Claim<T>, outcome: Outcome, workerId: number): void {
    const { item } = claim;
    const completedAt = this.now();
    const durationMs = Math.max(completedAt - (item.startedAt ?? completedAt), 0);

    if (item.cancelRequested) {
      this.finish(item, 'cancelled', completedAt, durationMs);
      this.logger.info({ itemId: item.id, discarded: outcome.kind }, 'Running item cancelled');
    } else if (outcome.kind === 'success') {
      item.result = outcome.data;
      item.progress = 100;
      this.finish(item, 'succeeded', completedAt, durationMs);
      this.logger.info({ itemId: item.id, attempts: item.attempts, durationMs }, 'Item succeeded');
    } else if (outcome.kind === 'fault') {
      item.lastError = outcome.error.message;
      this.finish(item, 'failed', completedAt, durationMs);
      this.logger.error({ itemId: item.id, workerId, err: outcome.error }, 'Item failed on worker fault');
    } else {
      item.lastError = outcome.reason;
      const decision = this.retryPolicy.decide(item.attempts, outcome);
      if (decision.retry) {
        this.transition(item, 'pending', 'retrying');
        this.scheduleRetry(item, decision.delayMs);
        this.logger.warn(
          { itemId: item.id, attempts: item.attempts, delayMs: decision.delayMs, reason: outcome.reason },
          'Item failed, retry scheduled'
        );
      } else {
        this.finish(item, 'failed', completedAt, durationMs);
        this.logger.error(
          { itemId: item.id, attempts: item.attempts, reason: outcome.reason, cause: decision.reason },
          'Item failed'
        );
      }
    }
  }

  /** @internal WorkSource */
  reportProgress(claim: Claim<T>, percent: number): void {
    if (this.claims.get(claim.item.id) !== claim || !Number.isFinite(percent)) return;
    const progress = Math.min(Math.max(percent, 0), 100);
    claim.item.progress = progress;
    this.emitSafely('item:progress', () => this.emit('item:progress', { itemId: claim.item.id, progress }));
  }

  private finish(item: QueueItem<T>, to: 'succeeded' | 'failed' | 'cancelled', completedAt: number, durationMs: number): void {
    item.completedAt = completedAt;
    item.durationMs = durationMs;
    if (to !== 'succeeded') item.result = undefined;
    this.transition(item, to, to, { durationMs });
  }

  private transition(item: QueueItem<T>, to: ItemState, kind: TransitionKind, details: { durationMs?: number } = {}): void {
    const from = item.state;
    if (!STATE_TRANSITIONS[from].includes(to)) {
      const err = new InvalidTransitionError(item.id, from, to);
      this.logger.error({ err, itemId: item.id }, 'Rejected state transition');
      throw err;
    }

    item.state = to;
    this.publish(item, from, kind, details.durationMs);
  }

  private publish(item: QueueItem<T>, from: ItemState | null, kind: TransitionKind, durationMs?: number): void {
    const event: TransitionEvent = {
      kind,
      itemId: item.id,
      priority: item.priority,
      from,
      to: item.state,
      at: this.now(),
      attempts: item.attempts,
      durationMs,
      error: kind === 'retrying' || kind === 'failed' ? item.lastError : undefined,
    };

    this.statistics.record(event);
    this.bus.publish(event);
    if (!this.restoring) this.persistence?.markDirty();

    if (isTerminal(item.state)) {
      const list = this.waiters.get(item.id);
      if (list) {
        this.waiters.delete(item.id);
        const view = viewOf(item);
        for (const waiter of list) waiter.resolve(view);
      }
    }
  }

  private scheduleRetry(item: QueueItem<T>, delayMs: number): void {
    item.availableAt = this.now() + delayMs;
    // Shutting down: leave it pending with availableAt for the next start
    if (this.lifecycle !== 'running') return;

    const timer = setTimeout(() => this.releaseRetry(item.id), delayMs);
    this.retryTimers.set(item.id, timer);
  }

  private releaseRetry(id: string): void {
    this.retryTimers.delete(id);
    const item = this.items.get(id);
    if (!item || item.state !== 'pending') return;

    item.availableAt = undefined;
    this.index.insert(id, effectiveBand(item), item.sequence, item.promoted);
    this.persistence?.markDirty();
    this.pool.notify();
  }

  private clearRetryTimer(id: string): void {
    const timer = this.retryTimers.get(id);
    if (timer) {
      clearTimeout(timer);
      this.retryTimers.delete(id);
    }
  }

  private handlePromotion(entry: IndexEntry, from: Priority): void {
    const item = this.items.get(entry.id);
    if (item) item.promoted = true;
    if (!this.restoring) this.persistence?.markDirty();
    this.logger.info({ itemId: entry.id, from, to: entry.band }, 'Aged item promoted');
    this.emitSafely('item:promoted', () => this.emit('item:promoted', { itemId: entry.id, from, to: entry.band }));
  }

  /**
   * Emit without letting a listener error escape; some emits run inside claim.
   */
  private emitSafely(event: keyof ManagerEvents, emit: () => void): void {
    try {
      emit();
    } catch (err) {
      this.logger.error({ err, event }, 'Queue listener failed');
    }
  }

  private evict(item: QueueItem<T>): void {
    this.items.delete(item.id);
    this.persistence?.markDirty();
  }

  private activeCount(): number {
    return this.index.size + this.claims.size + this.retryTimers.size;
  }

  private checkIdle(): void {
    if (this.activeCount() === 0) this.resolveIdle();
  }

  private resolveIdle(): void {
    const waiting = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiting) resolve();
  }

  private capture(): QueueSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      savedAt: this.now(),
      nextSequence: this.sequence,
      items: [...this.items.values()].map((item) => ({ ...item })),
      statistics: this.statistics.export(),
    };
  }

  /**
   * Load snapshot state. Items that were running lost their worker and go back
   * to pending, unless a cancel had been requested. The snapshot is marked
   * dirty once at the end so no save sees a half-restored queue.
   */
  private restore(snapshot: QueueSnapshot): number {
    const { payloads } = this.parsePayloads(snapshot);
    this.statistics.restore(snapshot.statistics);
    this.sequence = snapshot.nextSequence;
    const now = this.now();
    let changed = 0;

    this.restoring = true;
    try {
      const ordered = [...snapshot.items].sort((a, b) => a.sequence - b.sequence);
      for (const saved of ordered) {
        const payload = payloads.get(saved.id);
        if (payload === undefined) continue;
        const item: QueueItem<T> = { ...saved, payload: payload.value, cancelRequested: false };
        this.items.set(item.id, item);

        if (saved.state === 'running') {
          item.startedAt = undefined;
          changed++;
          if (saved.cancelRequested) {
            item.completedAt = now;
            this.transition(item, 'cancelled', 'cancelled');
            continue;
          }
          this.transition(item, 'pending', 'recovered');
        }

        if (item.state !== 'pending') continue;

        if (item.availableAt !== undefined && item.availableAt > now) {
          const delayMs = item.availableAt - now;
          this.retryTimers.set(item.id, setTimeout(() => this.releaseRetry(item.id), delayMs));
        } else {
          item.availableAt = undefined;
          this.index.insert(item.id, effectiveBand(item), item.sequence, item.promoted);
        }
      }
    } finally {
      this.restoring = false;
    }

    if (changed > 0) this.persistence?.markDirty(changed);
    const active = this.activeCount();
    this.logger.info({ items: snapshot.items.length, active }, 'Snapshot restored');
    return active;
  }

  /**
   * Validate every stored payload. A rejection makes the whole snapshot
   * unreadable, so loading moves on to the backup.
   */
  private parsePayloads(snapshot: QueueSnapshot): { payloads: Map<string, { value: T }>; rejected?: string } {
    const payloads = new Map<string, { value: T }>();
    const schema = this.payloadSchema;
    if (!schema) {
      return snapshot.items.length > 0 ? { payloads, rejected: 'snapshot has items but no payload schema was given' } : { payloads };
    }

    for (const saved of snapshot.items) {
      const parsed = schema.safeParse(saved.payload);
      if (!parsed.success) {
        const detail = parsed.error.issues.map((issue) => issue.message).join('; ');
        return { payloads, rejected: `payload of item ${saved.id} rejected: ${detail}` };
      }
      payloads.set(saved.id, { value: parsed.data });
    }
    return { payloads };
  }
}
