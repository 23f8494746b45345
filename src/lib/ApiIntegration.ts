import express, { type Request, type RequestHandler, type Response, type Router } from 'express';
import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { QueueError, type QueueErrorCode } from '../core/errors';
import type { PayloadSchema, QueueManager } from '../core/QueueManager';
import { isPriority } from '../core/types';
import type { ApiFailure, CancelJobResponse, JobListResponse, JobResponse, StatsResponse, SubmitJobResponse } from './types';

const logger = createLogger('api');

/**
 * Options for configuring the API integration
 */
export interface ApiIntegrationOptions<T> {
  /** Validates the `payload` field of submitted jobs */
  payloadSchema: PayloadSchema<T>;

  /** Jobs path (defaults to '/jobs') */
  jobsPath?: string;

  /** Statistics path (defaults to '/stats') */
  statsPath?: string;

  /** Optional middleware to run before every route */
  middleware?: RequestHandler[];
}

const submitBodySchema = z
  .object({
    payload: z.unknown(),
    priority: z.string().optional(),
    ownerId: z.string().min(1).optional(),
  })
  .strict();

const STATUS_BY_CODE: Partial<Record<QueueErrorCode, number>> = {
  INVALID_PRIORITY: 400,
  ITEM_NOT_FOUND: 404,
  ITEM_STATE: 409,
  QUEUE_FULL: 503,
  QUEUE_CLOSED: 503,
};

function sendError(res: Response, err: unknown, action: string): void {
  if (err instanceof QueueError) {
    const status = STATUS_BY_CODE[err.code] ?? 500;
    if (status >= 500) {
      logger.warn({ err, code: err.code }, `Could not ${action}`);
    }
    res.status(status).json({ success: false, error: err.message, code: err.code } satisfies ApiFailure);
    return;
  }

  logger.error({ err }, `Unexpected error while trying to ${action}`);
  res.status(500).json({
    success: false,
    error: err instanceof Error ? err.message : 'Unknown error',
  } satisfies ApiFailure);
}

/**
 * Creates Express routes for submitting, inspecting and cancelling jobs.
 * The router expects `express.json()` (or equivalent) to have parsed the body.
 */
export function createQueueApiRoutes<T>(manager: QueueManager<T>, options: ApiIntegrationOptions<T>): Router {
  const router = express.Router();
  const { payloadSchema, jobsPath = '/jobs', statsPath = '/stats', middleware = [] } = options;

  if (middleware.length > 0) {
    router.use(middleware);
  }

  router.post(jobsPath, (req: Request, res: Response) => {
    const body = submitBodySchema.safeParse(req.body);
    if (!body.success) {
      const error = body.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
      res.status(400).json({ success: false, error } satisfies ApiFailure);
      return;
    }

    const payload = payloadSchema.safeParse(body.data.payload);
    if (!payload.success) {
      const error = payload.error.issues
        .map((issue) => `payload${issue.path.length > 0 ? '.' + issue.path.join('.') : ''}: ${issue.message}`)
        .join('; ');
      res.status(400).json({ success: false, error } satisfies ApiFailure);
      return;
    }

    try {
      const jobId = manager.submit(payload.data, body.data.priority, { ownerId: body.data.ownerId });
      const response: SubmitJobResponse = {
        success: true,
        jobId,
        status: 'pending',
        position: manager.getQueuePosition(jobId),
      };
      res.status(201).json(response);
    } catch (err) {
      sendError(res, err, 'add job to queue');
    }
  });

  router.get(jobsPath, (req: Request, res: Response) => {
    const { priority } = req.query;
    if (priority !== undefined && !isPriority(priority)) {
      res.status(400).json({
        success: false,
        error: `Invalid priority '${String(priority)}'. Expected one of: low, normal, high, urgent`,
        code: 'INVALID_PRIORITY',
      } satisfies ApiFailure);
      return;
    }

    const items = manager.listPending(priority);
    const response: JobListResponse<T> = { success: true, count: items.length, items };
    res.status(200).json(response);
  });

  router.get(`${jobsPath}/:id`, (req: Request, res: Response) => {
    const item = manager.getItem(req.params.id);
    if (!item) {
      res.status(404).json({ success: false, error: `Item ${req.params.id} not found`, code: 'ITEM_NOT_FOUND' } satisfies ApiFailure);
      return;
    }

    const response: JobResponse<T> = { success: true, item, position: manager.getQueuePosition(item.id) };
    res.status(200).json(response);
  });

  router.delete(`${jobsPath}/:id`, (req: Request, res: Response) => {
    try {
      const state = manager.cancel(req.params.id);
      const response: CancelJobResponse = { success: true, jobId: req.params.id, state };
      res.status(200).json(response);
    } catch (err) {
      sendError(res, err, 'cancel job');
    }
  });

  router.get(statsPath, (_req: Request, res: Response) => {
    const response: StatsResponse = {
      success: true,
      statistics: manager.getStatistics(),
      status: manager.getStatus(),
      timestamp: new Date().toISOString(),
    };
    res.status(200).json(response);
  });

  return router;
}
