import type { ItemState } from './types';

export type QueueErrorCode =
  | 'INVALID_PRIORITY'
  | 'INVALID_TRANSITION'
  | 'WORKER_FAULT'
  | 'TRANSIENT_FAILURE'
  | 'PERMANENT_FAILURE'
  | 'PERSISTENCE_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'QUEUE_FULL'
  | 'QUEUE_CLOSED'
  | 'ITEM_NOT_FOUND'
  | 'ITEM_STATE';

/**
 * Base class for every error the queue raises or records on an item.
 */
export class QueueError extends Error {
  readonly code: QueueErrorCode;

  constructor(code: QueueErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'QueueError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown by submit when the priority is not one of the four bands.
 */
export class InvalidPriorityError extends QueueError {
  readonly received: unknown;

  constructor(received: unknown) {
    super('INVALID_PRIORITY', `Invalid priority '${String(received)}'. Expected one of: low, normal, high, urgent`);
    this.name = 'InvalidPriorityError';
    this.received = received;
  }
}

export class InvalidTransitionError extends QueueError {
  readonly itemId: string;
  readonly from: ItemState;
  readonly to: ItemState;

  constructor(itemId: string, from: ItemState, to: ItemState) {
    super('INVALID_TRANSITION', `Invalid transition for item ${itemId}: '${from}' -> '${to}'`);
    this.name = 'InvalidTransitionError';
    this.itemId = itemId;
    this.from = from;
    this.to = to;
  }
}

/**
 * Recorded on an item when its executor faulted instead of reporting an outcome.
 */
export class WorkerFaultError extends QueueError {
  readonly workerId: number;

  constructor(workerId: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('WORKER_FAULT', `Worker ${workerId} faulted: ${detail}`, { cause });
    this.name = 'WorkerFaultError';
    this.workerId = workerId;
  }
}

/**
 * A processor may throw this to report a failure that is safe to retry.
 */
export class TransientProcessingFailure extends QueueError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super('TRANSIENT_FAILURE', reason, options);
    this.name = 'TransientProcessingFailure';
  }
}

/**
 * A processor may throw this to report a failure that must not be retried.
 */
export class PermanentProcessingFailure extends QueueError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super('PERMANENT_FAILURE', reason, options);
    this.name = 'PermanentProcessingFailure';
  }
}

export class PersistenceError extends QueueError {
  readonly operation: 'load' | 'save';

  constructor(operation: 'load' | 'save', cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('PERSISTENCE_ERROR', `Snapshot ${operation} failed: ${detail}`, { cause });
    this.name = 'PersistenceError';
    this.operation = operation;
  }
}

export class ConfigurationError extends QueueError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIGURATION_ERROR', `Configuration validation failed: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class QueueFullError extends QueueError {
  readonly limit: number;

  constructor(limit: number) {
    super('QUEUE_FULL', `Queue reached its limit of ${limit} active items`);
    this.name = 'QueueFullError';
    this.limit = limit;
  }
}

export class QueueClosedError extends QueueError {
  readonly lifecycle: string;

  constructor(lifecycle: string) {
    super('QUEUE_CLOSED', `Queue is not accepting work (${lifecycle})`);
    this.name = 'QueueClosedError';
    this.lifecycle = lifecycle;
  }
}

export class ItemNotFoundError extends QueueError {
  readonly itemId: string;

  constructor(itemId: string) {
    super('ITEM_NOT_FOUND', `Item ${itemId} not found`);
    this.name = 'ItemNotFoundError';
    this.itemId = itemId;
  }
}

/**
 * The operation does not apply to the item in its current state.
 */
export class ItemStateError extends QueueError {
  readonly itemId: string;
  readonly state: ItemState;

  constructor(operation: string, itemId: string, state: ItemState) {
    super('ITEM_STATE', `Cannot ${operation} item ${itemId} in state '${state}'`);
    this.name = 'ItemStateError';
    this.itemId = itemId;
    this.state = state;
  }
}
