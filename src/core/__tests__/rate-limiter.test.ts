import { describe, it, expect } from 'vitest';
import { RateLimiter, RateLimiterOptions } from '../rate-limiter';
import { FakeClock } from './fakes';
import { CancelledError } from '../../utils/errors';

function createLimiter(clock: FakeClock, options: RateLimiterOptions = {}): RateLimiter {
  return new RateLimiter({ now: clock.now, sleep: clock.sleep, jitter: false, ...options });
}

describe('RateLimiter', () => {
  describe('acquire', () => {
    it('admits requests immediately while the window has room', async () => {
      const clock = new FakeClock();
      const limiter = createLimiter(clock);

      expect(await limiter.acquire('write')).toBe(0);
      expect(await limiter.acquire('read')).toBe(0);

      expect(limiter.getStatus()).toMatchObject({ total: 2, write: 1 });
      expect(clock.sleeps).toEqual([]);
    });

    it('holds a write until the oldest one leaves the window', async () => {
      const clock = new FakeClock();
      const limiter = createLimiter(clock, { maxWriteRequests: 2, maxTotalRequests: 10, windowMs: 1000 });

      await limiter.acquire('write');
      await limiter.acquire('write');
      const waited = await limiter.acquire('write');

      expect(waited).toBe(1000);
      expect(limiter.getStatus().write).toBe(1);
    });

    it('does not count reads against the write quota', async () => {
      const clock = new FakeClock();
      const limiter = createLimiter(clock, { maxWriteRequests: 1, maxTotalRequests: 10, windowMs: 1000 });

      await limiter.acquire('write');

      expect(await limiter.acquire('read')).toBe(0);
    });

    it('serializes concurrent callers', async () => {
      const clock = new FakeClock();
      const limiter = createLimiter(clock, { maxWriteRequests: 2, maxTotalRequests: 10, windowMs: 1000 });

      const waits = await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

      expect(waits).toEqual([0, 0, 1000]);
      expect(limiter.getStatus().write).toBe(1);
    });

    it('gives up a held write without taking its slot once cancelled', async () => {
      const clock = new FakeClock();
      const limiter = createLimiter(clock, { maxWriteRequests: 1, maxTotalRequests: 10, windowMs: 1000 });

      await limiter.acquire('write');
      await expect(limiter.acquire('write', () => true)).rejects.toBeInstanceOf(CancelledError);

      expect(clock.sleeps).toEqual([1000]);
      expect(limiter.getStatus()).toMatchObject({ total: 0, write: 0 });
      expect(await limiter.acquire('write', () => false)).toBe(0);
    });

    it('slows down above 80% utilisation', async () => {
      const clock = new FakeClock();
      const limiter = createLimiter(clock, { maxWriteRequests: 10, maxTotalRequests: 1000, windowMs: 20000 });

      const waits: number[] = [];
      for (let i = 0; i < 10; i++) {
        waits.push(await limiter.acquire('write'));
      }

      expect(waits).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0, 500]);
    });

    it('keeps every caller paused after a rate limit', async () => {
      const clock = new FakeClock();
      const limiter = createLimiter(clock);

      limiter.recordRateLimit(3000);
      const waited = await limiter.acquire('read');

      // 3000ms pause plus the 2000ms preventive delay for one recent 429
      expect(waited).toBe(5000);
    });
  });

  describe('recordRateLimit', () => {
    it('honours Retry-After', () => {
      const clock = new FakeClock();
      const limiter = createLimiter(clock);

      expect(limiter.recordRateLimit(5000)).toBe(5000);
      expect(limiter.getStatus()).toMatchObject({ consecutiveRateLimits: 1, pausedForMs: 5000 });
    });

    it('backs off exponentially without Retry-After', () => {
      const clock = new FakeClock();
      const limiter = createLimiter(clock);

      expect(limiter.recordRateLimit()).toBe(1000);
      expect(limiter.recordRateLimit()).toBe(2000);
      expect(limiter.recordRateLimit()).toBe(4000);
    });

    it('resets after a success', () => {
      const clock = new FakeClock();
      const limiter = createLimiter(clock);
      limiter.recordRateLimit();
      limiter.recordRateLimit();

      limiter.recordSuccess();

      expect(limiter.getStatus().consecutiveRateLimits).toBe(0);
      expect(limiter.calculateDelay('write')).toBe(0);
    });
  });

  describe('calculateDelay', () => {
    it('adds a delay while a rate limit is recent', () => {
      const clock = new FakeClock();
      const limiter = createLimiter(clock);
      limiter.recordRateLimit(0);
      limiter.recordRateLimit(0);

      expect(limiter.calculateDelay('write')).toBe(4000);

      clock.current += 61000;
      expect(limiter.calculateDelay('write')).toBe(0);
    });

    it('caps the delay after many rate limits', () => {
      const clock = new FakeClock();
      const limiter = createLimiter(clock);
      for (let i = 0; i < 8; i++) {
        limiter.recordRateLimit(0);
      }

      expect(limiter.calculateDelay('read')).toBe(10000);
    });
  });

  describe('calculateRetryDelay', () => {
    it('doubles per attempt up to the maximum', () => {
      const limiter = createLimiter(new FakeClock());

      expect(limiter.calculateRetryDelay(1)).toBe(1000);
      expect(limiter.calculateRetryDelay(2)).toBe(2000);
      expect(limiter.calculateRetryDelay(3)).toBe(4000);
      expect(limiter.calculateRetryDelay(10)).toBe(32000);
    });

    it('applies up to 20% jitter either way', () => {
      const low = new RateLimiter({ random: () => 0 });
      const high = new RateLimiter({ random: () => 1 });

      expect(low.calculateRetryDelay(1)).toBe(800);
      expect(high.calculateRetryDelay(1)).toBe(1200);
    });

    it('prefers Retry-After', () => {
      const limiter = createLimiter(new FakeClock());

      expect(limiter.calculateRetryDelay(3, 7000)).toBe(7000);
    });
  });

  describe('batch sizing', () => {
    it('never exceeds the batch limit', () => {
      const limiter = createLimiter(new FakeClock());

      expect(limiter.calculateOptimalBatchSize()).toBe(20);
    });

    it('keeps 20% headroom in the remaining window', async () => {
      const clock = new FakeClock();
      const limiter = createLimiter(clock, { maxWriteRequests: 10 });

      expect(limiter.calculateOptimalBatchSize()).toBe(8);

      for (let i = 0; i < 9; i++) {
        limiter.recordRequest('write');
      }
      expect(limiter.calculateOptimalBatchSize()).toBe(1);
    });

    it('splits items into batches of the optimal size', () => {
      const limiter = createLimiter(new FakeClock(), { maxWriteRequests: 10 });
      const items = Array.from({ length: 20 }, (_, i) => i);

      const batches = limiter.splitIntoBatches(items);

      expect(batches.map((batch) => batch.length)).toEqual([8, 8, 4]);
      expect(batches.flat()).toEqual(items);
    });
  });

  it('rejects limits that admit nothing', () => {
    expect(() => new RateLimiter({ maxWriteRequests: 0 })).toThrow(RangeError);
    expect(() => new RateLimiter({ windowMs: 0 })).toThrow(RangeError);
  });
});
