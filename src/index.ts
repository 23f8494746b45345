import { QueueManager, type PayloadSchema } from './core/QueueManager';
import type { QueueConfigInput } from './core/config';
import { FileSnapshotStore } from './core/SnapshotStore';
import type { Processor } from './core/types';

// Main classes
export { QueueManager } from './core/QueueManager';
export { PriorityIndex } from './core/PriorityIndex';
export { WorkerPool } from './core/WorkerPool';
export { RetryPolicy } from './core/RetryPolicy';
export { StatisticsAggregator } from './core/StatisticsAggregator';
export { EventBus } from './core/EventBus';
export { PersistenceService } from './core/PersistenceService';
export { FileSnapshotStore, MemorySnapshotStore } from './core/SnapshotStore';
export { createQueueApiRoutes } from './lib/ApiIntegration';
export { resolveQueueConfig, loadQueueConfigFromEnv } from './core/config';
export { PRIORITIES, isPriority } from './core/types';
export * from './core/errors';

// Types
export type {
  Priority,
  ItemState,
  QueueItemView,
  SubmitOptions,
  JobContext,
  ProcessResult,
  Processor,
  TransitionEvent,
  TransitionKind,
  TransitionListener,
} from './core/types';

export type { QueueManagerOptions, QueueStatus, Lifecycle, PayloadSchema } from './core/QueueManager';
export type { QueueConfig, QueueConfigInput } from './core/config';
export type { QueueStatistics, BandStatistics } from './core/StatisticsAggregator';
export type { SnapshotStore } from './core/SnapshotStore';
export type { ApiIntegrationOptions } from './lib/ApiIntegration';
export type * from './lib/types';

export interface CreateQueueOptions<T> {
  processor: Processor<T>;
  payloadSchema: PayloadSchema<T>;
  /** JSON snapshot file; omit for an in-memory queue */
  snapshotPath?: string;
  config?: QueueConfigInput;
}

/**
 * Create a queue manager, recover its snapshot and start its workers.
 */
export async function createQueue<T>(options: CreateQueueOptions<T>): Promise<QueueManager<T>> {
  const manager = options.snapshotPath
    ? new QueueManager<T>({
        processor: options.processor,
        payloadSchema: options.payloadSchema,
        config: options.config,
        store: new FileSnapshotStore({ path: options.snapshotPath }),
      })
    : new QueueManager<T>({
        processor: options.processor,
        payloadSchema: options.payloadSchema,
        config: options.config,
      });

  await manager.start();
  return manager;
}
