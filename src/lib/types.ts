import type { QueueErrorCode } from '../core/errors';
import type { QueueStatus } from '../core/QueueManager';
import type { QueueStatistics } from '../core/StatisticsAggregator';
import type { ItemState, Priority, QueueItemView } from '../core/types';

// Request and response bodies of the HTTP routes

export interface SubmitJobRequest<T = unknown> {
  payload: T;
  priority?: Priority;
  ownerId?: string;
}

export interface ApiFailure {
  success: false;
  error: string;
  code?: QueueErrorCode;
}

export interface SubmitJobResponse {
  success: true;
  jobId: string;
  status: 'pending';
  /** 1-based dispatch position, -1 once a worker already took it */
  position: number;
}

export interface JobListResponse<T = unknown> {
  success: true;
  count: number;
  items: QueueItemView<T>[];
}

export interface JobResponse<T = unknown> {
  success: true;
  item: QueueItemView<T>;
  position: number;
}

export interface CancelJobResponse {
  success: true;
  jobId: string;
  state: ItemState;
}

export interface StatsResponse {
  success: true;
  statistics: QueueStatistics;
  status: QueueStatus;
  timestamp: string;
}
