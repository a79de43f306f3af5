/**
 * Rate Limiter
 * Keeps outbound Graph traffic under the Intune per-tenant quotas
 * (sliding window over total and write requests, exponential backoff on 429)
 */

import { RateLimitConfig } from '../types';
import { sleep } from '../utils/async';
import { CancelledError } from '../utils/errors';
import { GRAPH_API, RATE_LIMITS } from '../utils/constants';
import { logger } from '../utils/logger';

export type RequestKind = 'read' | 'write';

export interface RateLimiterOptions extends Partial<RateLimitConfig> {
  baseRetryDelayMs?: number;
  maxRetryDelayMs?: number;
  jitter?: boolean;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface RateLimitStatus {
  total: number;
  write: number;
  maxTotal: number;
  maxWrite: number;
  consecutiveRateLimits: number;
  pausedForMs: number;
}

export class RateLimiter {
  private readonly maxWriteRequests: number;
  private readonly maxTotalRequests: number;
  private readonly windowMs: number;
  private readonly baseRetryDelayMs: number;
  private readonly maxRetryDelayMs: number;
  private readonly jitter: boolean;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  private requestTimestamps: number[] = [];
  private writeTimestamps: number[] = [];
  private lastRateLimitAt: number | null = null;
  private consecutiveRateLimits = 0;
  private pausedUntil = 0;

  // Tail of the acquisition queue; callers are admitted one at a time
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: RateLimiterOptions = {}) {
    this.maxWriteRequests = options.maxWriteRequests ?? RATE_LIMITS.MAX_WRITE_REQUESTS;
    this.maxTotalRequests = options.maxTotalRequests ?? RATE_LIMITS.MAX_TOTAL_REQUESTS;
    this.windowMs = options.windowMs ?? RATE_LIMITS.WINDOW_MS;
    this.baseRetryDelayMs = options.baseRetryDelayMs ?? GRAPH_API.RETRY_DELAY_MS;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? GRAPH_API.MAX_RETRY_DELAY_MS;
    this.jitter = options.jitter ?? true;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;

    if (this.maxWriteRequests < 1 || this.maxTotalRequests < 1 || this.windowMs <= 0) {
      throw new RangeError('Rate limits must allow at least one request per positive window');
    }
  }

  /**
   * Wait for permission to issue the next request.
   * Resolves with the number of milliseconds the caller was held back.
   * Rejects with CancelledError, without taking a slot, when `isCancelled`
   * reports true once the wait is over.
   */
  acquire(kind: RequestKind = 'write', isCancelled?: () => boolean): Promise<number> {
    const turn = this.queue.then(() => this.waitForSlot(kind, isCancelled));
    // A rejected turn is reported to its own caller; the queue keeps moving
    this.queue = turn.then(
      () => undefined,
      () => undefined
    );
    return turn;
  }

  private async waitForSlot(kind: RequestKind, isCancelled?: () => boolean): Promise<number> {
    let waited = 0;

    for (;;) {
      const wait = this.timeUntilSlot(kind);
      if (wait <= 0) {
        break;
      }
      logger.debug(`Rate limiter holding ${kind} request for ${wait}ms`);
      await this.sleep(wait);
      waited += wait;
    }

    const preventive = this.calculateDelay(kind);
    if (preventive > 0) {
      await this.sleep(preventive);
      waited += preventive;
    }

    if (isCancelled?.()) {
      throw new CancelledError();
    }

    this.recordRequest(kind);
    return waited;
  }

  private timeUntilSlot(kind: RequestKind): number {
    const now = this.now();
    this.cleanupOldTimestamps(now);

    let wait = Math.max(0, this.pausedUntil - now);

    if (this.requestTimestamps.length >= this.maxTotalRequests) {
      wait = Math.max(wait, this.requestTimestamps[0] + this.windowMs - now);
    }

    if (kind === 'write' && this.writeTimestamps.length >= this.maxWriteRequests) {
      wait = Math.max(wait, this.writeTimestamps[0] + this.windowMs - now);
    }

    return wait;
  }

  /**
   * Record a request that was issued outside acquire()
   */
  recordRequest(kind: RequestKind): void {
    const now = this.now();
    this.requestTimestamps.push(now);
    if (kind === 'write') {
      this.writeTimestamps.push(now);
    }

    if (this.requestTimestamps.length > this.maxTotalRequests * 2) {
      this.cleanupOldTimestamps(now);
    }
  }

  /**
   * Register a 429 from the service. Every queued caller is paused for the
   * returned delay; the limiter never re-issues the request itself.
   */
  recordRateLimit(retryAfterMs?: number): number {
    const now = this.now();
    this.lastRateLimitAt = now;
    this.consecutiveRateLimits += 1;

    const delay = this.calculateRetryDelay(this.consecutiveRateLimits, retryAfterMs);
    this.pausedUntil = Math.max(this.pausedUntil, now + delay);

    logger.warn(
      `Rate limit hit (${this.consecutiveRateLimits} consecutive). Backing off for ${delay}ms`
    );
    return delay;
  }

  /**
   * Reset backoff tracking after a successful request
   */
  recordSuccess(): void {
    if (this.consecutiveRateLimits > 0) {
      logger.info('Rate limit tracking reset after successful request');
      this.consecutiveRateLimits = 0;
    }
  }

  /**
   * Preventive delay before the next request, based on recent throttling and
   * window utilisation
   */
  calculateDelay(kind: RequestKind): number {
    const now = this.now();
    this.cleanupOldTimestamps(now);

    if (
      this.lastRateLimitAt !== null &&
      this.consecutiveRateLimits > 0 &&
      now - this.lastRateLimitAt < RATE_LIMITS.RATE_LIMIT_MEMORY_MS
    ) {
      return Math.min(this.consecutiveRateLimits * 2000, RATE_LIMITS.MAX_PREVENTIVE_DELAY_MS);
    }

    const threshold = RATE_LIMITS.PREVENTIVE_THRESHOLD;

    if (kind === 'write') {
      const writeUtilization = this.writeTimestamps.length / this.maxWriteRequests;
      if (writeUtilization > threshold) {
        return Math.round(5000 * (writeUtilization - threshold));
      }
    }

    const totalUtilization = this.requestTimestamps.length / this.maxTotalRequests;
    if (totalUtilization > threshold) {
      return Math.round(5000 * (totalUtilization - threshold));
    }

    return 0;
  }

  /**
   * Exponential backoff for attempt N (1-based); Retry-After wins when present
   */
  calculateRetryDelay(attemptNumber: number, retryAfterMs?: number): number {
    if (retryAfterMs !== undefined && retryAfterMs >= 0) {
      logger.info(`Using Retry-After value: ${retryAfterMs}ms`);
      return retryAfterMs;
    }

    const exponential = this.baseRetryDelayMs * Math.pow(2, Math.max(0, attemptNumber - 1));
    const jittered = this.jitter ? exponential * (0.8 + this.random() * 0.4) : exponential;
    const delay = Math.round(Math.min(jittered, this.maxRetryDelayMs));

    logger.debug(`Calculated retry delay: ${delay}ms (attempt ${attemptNumber})`);
    return delay;
  }

  /**
   * Largest batch that fits the remaining window capacity with 20% headroom
   */
  calculateOptimalBatchSize(): number {
    this.cleanupOldTimestamps(this.now());

    const remainingTotal = this.maxTotalRequests - this.requestTimestamps.length;
    const remainingWrites = this.maxWriteRequests - this.writeTimestamps.length;
    const available = Math.min(remainingTotal, remainingWrites);
    const safeCapacity = Math.floor(available * 0.8);

    return Math.max(1, Math.min(safeCapacity, RATE_LIMITS.MAX_BATCH_SIZE));
  }

  /**
   * Chunk items by the current batch size. The service sizes its worker pool
   * from calculateOptimalBatchSize() directly; this is for callers that submit
   * their own batches.
   */
  splitIntoBatches<T>(items: readonly T[]): T[][] {
    const batchSize = this.calculateOptimalBatchSize();
    const batches: T[][] = [];

    for (let i = 0; i < items.length; i += batchSize) {
      batches.push(items.slice(i, i + batchSize));
    }

    logger.debug(`Split ${items.length} items into ${batches.length} batches of size ${batchSize}`);
    return batches;
  }

  getStatus(): RateLimitStatus {
    const now = this.now();
    this.cleanupOldTimestamps(now);
    return {
      total: this.requestTimestamps.length,
      write: this.writeTimestamps.length,
      maxTotal: this.maxTotalRequests,
      maxWrite: this.maxWriteRequests,
      consecutiveRateLimits: this.consecutiveRateLimits,
      pausedForMs: Math.max(0, this.pausedUntil - now),
    };
  }

  private cleanupOldTimestamps(now: number): void {
    const cutoff = now - this.windowMs;
    while (this.requestTimestamps.length > 0 && this.requestTimestamps[0] <= cutoff) {
      this.requestTimestamps.shift();
    }
    while (this.writeTimestamps.length > 0 && this.writeTimestamps[0] <= cutoff) {
      this.writeTimestamps.shift();
    }
  }
}
