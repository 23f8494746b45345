import type { Logger } from 'pino';
import { createLogger } from '../utils/logger';

export interface RetryPolicyOptions {
  maxRetries: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
}

export interface FailureReport {
  transient: boolean;
  reason: string;
}

export type RetryDecision =
  | { retry: true; delayMs: number }
  | { retry: false; reason: 'permanent' | 'exhausted' };

/**
 * Decides whether a failed attempt is resubmitted, and after how long.
 */
export class RetryPolicy {
  private readonly logger: Logger;

  constructor(private readonly options: RetryPolicyOptions) {
    this.logger = createLogger('retry-policy');
  }

  get maxRetries(): number {
    return this.options.maxRetries;
  }

  /**
   * @param attempts - dispatches made so far, including the one that just failed
   */
  decide(attempts: number, failure: FailureReport): RetryDecision {
    if (!failure.transient) {
      return { retry: false, reason: 'permanent' };
    }

    if (attempts > this.options.maxRetries) {
      this.logger.debug({ attempts, maxRetries: this.options.maxRetries }, 'Retries exhausted');
      return { retry: false, reason: 'exhausted' };
    }

    return { retry: true, delayMs: this.calculateDelay(attempts) };
  }

  /**
   * Exponential backoff: baseBackoffMs * 2^(attempts - 1), capped at maxBackoffMs.
   */
  calculateDelay(attempts: number): number {
    const exponent = Math.max(attempts - 1, 0);
    const delay = this.options.baseBackoffMs * Math.pow(2, exponent);
    return Math.min(delay, this.options.maxBackoffMs);
  }
}
