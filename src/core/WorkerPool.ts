import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { createLogger } from '../utils/logger';
import { PermanentProcessingFailure, TransientProcessingFailure, WorkerFaultError } from './errors';
import type { JobContext, Processor, QueueItem } from './types';

/**
 * An item handed to one worker, together with its cancellation handle.
 */
export interface Claim<T> {
  readonly item: QueueItem<T>;
  readonly attempt: number;
  readonly controller: AbortController;
}

export type Outcome =
  | { kind: 'success'; data: unknown }
  | { kind: 'failure'; transient: boolean; reason: string }
  | { kind: 'fault'; error: WorkerFaultError };

/**
 * Where workers take work from and report back to. claim() must move the item
 * to running before it returns.
 */
export interface WorkSource<T> {
  claim(workerId: number): Claim<T> | undefined;
  settle(claim: Claim<T>, outcome: Outcome, workerId: number): void;
  reportProgress(claim: Claim<T>, percent: number): void;
}

export interface WorkerPoolOptions {
  workerCount: number;
  /** 0 = no timeout */
  processingTimeoutMs: number;
}

/** Pause before a crashed executor loop starts over */
const RESTART_DELAY_MS = 50;

interface PoolEvents {
  'worker:started': [workerId: number];
  'worker:stopped': [workerId: number];
  'worker:fault': [workerId: number, error: WorkerFaultError];
  'pool:paused': [];
  'pool:resumed': [];
}

/**
 * Fixed set of executors. Each one loops claim → process → settle and parks on
 * a promise when there is nothing to claim.
 */
export class WorkerPool<T> extends EventEmitter<PoolEvents> {
  private readonly logger: Logger;
  private readonly waiters = new Set<() => void>();
  private loops: Promise<void>[] = [];
  private running = false;
  private paused = false;
  private busy = 0;

  constructor(
    private readonly source: WorkSource<T>,
    private readonly processor: Processor<T>,
    private readonly options: WorkerPoolOptions
  ) {
    super();
    this.logger = createLogger('worker-pool');
  }

  start(): void {
    if (this.running) return;
    this.running = true;

    this.loops = Array.from({ length: this.options.workerCount }, (_, workerId) => this.supervise(workerId));

    this.logger.info({ workerCount: this.options.workerCount }, 'Worker pool started');
  }

  /**
   * Wake parked workers so they look for work again.
   */
  notify(): void {
    if (this.waiters.size === 0) return;
    const waiting = [...this.waiters];
    this.waiters.clear();
    for (const wake of waiting) wake();
  }

  pause(): void {
    if (this.paused) return;
    this.paused = true;
    this.emit('pool:paused');
  }

  resume(): void {
    if (!this.paused) return;
    this.paused = false;
    this.emit('pool:resumed');
    this.notify();
  }

  /**
   * Stop claiming and wait for in-flight attempts to settle.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.notify();
    await Promise.all(this.loops);
    this.loops = [];
    this.logger.info('Worker pool stopped');
  }

  get size(): number {
    return this.options.workerCount;
  }

  get activeCount(): number {
    return this.busy;
  }

  get idleCount(): number {
    return this.waiters.size;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  /**
   * Keep one executor alive until the pool stops.
   */
  private async supervise(workerId: number): Promise<void> {
    while (this.running) {
      try {
        await this.run(workerId);
      } catch (err) {
        this.logger.error({ err, workerId }, 'Worker loop crashed, restarting');
        await new Promise<void>((resolve) => setTimeout(resolve, RESTART_DELAY_MS));
      }
    }
  }

  private async run(workerId: number): Promise<void> {
    this.emit('worker:started', workerId);

    while (this.running) {
      const claim = this.paused ? undefined : this.source.claim(workerId);
      if (!claim) {
        await this.park();
        continue;
      }

      this.busy++;
      try {
        const outcome = await this.execute(claim, workerId);
        this.settle(claim, outcome, workerId);
      } finally {
        this.busy--;
      }
    }

    this.emit('worker:stopped', workerId);
  }

  private park(): Promise<void> {
    return new Promise((resolve) => {
      this.waiters.add(resolve);
    });
  }

  private settle(claim: Claim<T>, outcome: Outcome, workerId: number): void {
    if (outcome.kind === 'fault') {
      this.emit('worker:fault', workerId, outcome.error);
    }

    try {
      this.source.settle(claim, outcome, workerId);
    } catch (err) {
      // Settling itself blew up; force the item out of running
      const fault = new WorkerFaultError(workerId, err);
      this.logger.error({ err, itemId: claim.item.id, workerId }, 'Settling outcome failed');
      this.emit('worker:fault', workerId, fault);
      this.source.settle(claim, { kind: 'fault', error: fault }, workerId);
    }
  }

  private async execute(claim: Claim<T>, workerId: number): Promise<Outcome> {
    const context: JobContext = {
      itemId: claim.item.id,
      attempt: claim.attempt,
      signal: claim.controller.signal,
      reportProgress: (percent) => this.source.reportProgress(claim, percent),
    };

    try {
      const result = await this.withTimeout(this.processor(claim.item.payload, context), claim.controller);
      return result.ok
        ? { kind: 'success', data: result.data }
        : { kind: 'failure', transient: result.transient, reason: result.reason };
    } catch (err) {
      if (err instanceof TransientProcessingFailure) {
        return { kind: 'failure', transient: true, reason: err.message };
      }
      if (err instanceof PermanentProcessingFailure) {
        return { kind: 'failure', transient: false, reason: err.message };
      }
      this.logger.error({ err, itemId: claim.item.id, workerId }, 'Processor faulted');
      return { kind: 'fault', error: new WorkerFaultError(workerId, err) };
    }
  }

  private withTimeout<R>(work: Promise<R>, controller: AbortController): Promise<R> {
    const timeoutMs = this.options.processingTimeoutMs;
    if (timeoutMs <= 0) return work;

    return new Promise<R>((resolve, reject) => {
      const timer = setTimeout(() => {
        const failure = new TransientProcessingFailure(`timed out after ${timeoutMs}ms`);
        controller.abort(failure);
        reject(failure);
      }, timeoutMs);

      void work.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        }
      );
    });
  }
}
