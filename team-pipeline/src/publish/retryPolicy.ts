/**
 * Bounded retry with exponential backoff for push and pull request calls.
 */

import { describeError } from '../utils/errors.js';
import type { Logger } from '../types/Logger.js';

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  /** Decide whether a failure is worth another attempt. Defaults to always. */
  isRetriable?: (err: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  log?: Logger;
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly label: string,
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(`${label} failed after ${attempts} attempt(s): ${describeError(lastError)}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  private readonly isRetriable: (err: unknown) => boolean;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log?: Logger;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.baseDelayMs = options.baseDelayMs;
    this.isRetriable = options.isRetriable ?? (() => true);
    this.sleep = options.sleep ?? sleep;
    this.log = options.log;
  }

  /** Delay before the attempt following `attempt` (1-based). */
  delayFor(attempt: number): number {
    return this.baseDelayMs * Math.pow(2, attempt - 1);
  }

  /**
   * Run `task` until it succeeds, fails with a non-retriable error, or the
   * attempts run out. Every failure ends in RetryExhaustedError.
   */
  async execute<T>(label: string, task: () => Promise<T>): Promise<T> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await task();
      } catch (err) {
        lastError = err;
        if (!this.isRetriable(err)) {
          throw new RetryExhaustedError(label, attempt, err);
        }
        if (attempt < this.maxAttempts) {
          const waitMs = this.delayFor(attempt);
          this.log?.warn(`[retry] ⚠️  ${label} failed (${describeError(err)}). Waiting ${waitMs}ms before retry...`);
          await this.sleep(waitMs);
        }
      }
    }
    throw new RetryExhaustedError(label, this.maxAttempts, lastError);
  }
}
