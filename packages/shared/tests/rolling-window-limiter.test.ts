import { describe, it, expect, vi } from 'vitest';
import { RollingWindowLimiter, createSeededRandom } from '@profile-pulse/shared';

const QUIET = { burstThreshold: 1000, burstInterval: 1000, burstCooldown: 1000, minInterCallDelay: 0 };

describe('RollingWindowLimiter', () => {
  describe('rolling window', () => {
    it('denies once the window is full and reports when the oldest call expires', () => {
      const limiter = new RollingWindowLimiter({ ...QUIET, windowDuration: 1000, maxRequestsPerWindow: 3 });

      for (const t of [0, 100, 200]) {
        expect(limiter.acquire(t).admitted).toBe(true);
      }

      expect(limiter.tryAdmit(300)).toEqual({ admitted: false, retryAfterMs: 700, reason: 'window' });
    });

    it('treats a call exactly one window old as expired', () => {
      const limiter = new RollingWindowLimiter({ ...QUIET, windowDuration: 1000, maxRequestsPerWindow: 3 });
      for (const t of [0, 100, 200]) {
        limiter.recordAttempt(t);
      }

      expect(limiter.tryAdmit(999).admitted).toBe(false);
      expect(limiter.tryAdmit(1000)).toEqual({ admitted: true, retryAfterMs: 0 });
    });

    it('never has more than the limit recorded inside any window', () => {
      const windowDuration = 5000;
      const maxRequestsPerWindow = 7;
      const limiter = new RollingWindowLimiter({ ...QUIET, windowDuration, maxRequestsPerWindow });
      const random = createSeededRandom(42);
      const admitted: number[] = [];

      let now = 0;
      for (let i = 0; i < 2000; i++) {
        now += Math.floor(random.next() * 400);
        if (limiter.acquire(now).admitted) {
          admitted.push(now);
        }
      }

      expect(admitted.length).toBeGreaterThan(maxRequestsPerWindow);
      for (const t of admitted) {
        const inWindow = admitted.filter(other => other > t - windowDuration && other <= t).length;
        expect(inWindow).toBeLessThanOrEqual(maxRequestsPerWindow);
      }
    });

    it('does not record anything when only checking admission', () => {
      const limiter = new RollingWindowLimiter({ ...QUIET, maxRequestsPerWindow: 2 });

      limiter.tryAdmit(0);
      limiter.tryAdmit(10);

      expect(limiter.getStats(10).inWindow).toBe(0);
    });
  });

  describe('minimum delay', () => {
    it('spaces consecutive calls', () => {
      const limiter = new RollingWindowLimiter({ ...QUIET, minInterCallDelay: 2000 });
      limiter.recordAttempt(0);

      expect(limiter.tryAdmit(500)).toEqual({ admitted: false, retryAfterMs: 1500, reason: 'min-delay' });
      expect(limiter.tryAdmit(2000).admitted).toBe(true);
    });

    it('reports the longest of several applicable waits', () => {
      const limiter = new RollingWindowLimiter({
        ...QUIET,
        windowDuration: 1000,
        maxRequestsPerWindow: 1,
        minInterCallDelay: 2000,
      });
      limiter.recordAttempt(0);

      expect(limiter.tryAdmit(100)).toEqual({ admitted: false, retryAfterMs: 1900, reason: 'min-delay' });
    });
  });

  describe('burst protection', () => {
    const burstConfig = {
      windowDuration: 3_600_000,
      maxRequestsPerWindow: 1000,
      minInterCallDelay: 0,
      burstThreshold: 10,
      burstInterval: 10_000,
      burstCooldown: 60_000,
    };

    it('cools down after the threshold is reached inside the burst interval', () => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const limiter = new RollingWindowLimiter(burstConfig, logger);

      for (let i = 0; i < 10; i++) {
        expect(limiter.acquire(i * 100).admitted).toBe(true);
      }

      expect(limiter.tryAdmit(1000)).toEqual({ admitted: false, retryAfterMs: 59_900, reason: 'burst' });
      expect(limiter.getStats(1000)).toMatchObject({ coolingDown: true, cooldownRemainingMs: 59_900 });
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('admits again when the cooldown ends', () => {
      const limiter = new RollingWindowLimiter(burstConfig);
      for (let i = 0; i < 10; i++) {
        limiter.recordAttempt(i * 100);
      }

      expect(limiter.tryAdmit(60_899).admitted).toBe(false);
      expect(limiter.tryAdmit(60_900).admitted).toBe(true);
      expect(limiter.getStats(60_900).coolingDown).toBe(false);
    });

    it('starts counting the next burst from zero after a cooldown', () => {
      const limiter = new RollingWindowLimiter({ ...burstConfig, burstCooldown: 5000 });
      for (let i = 0; i < 10; i++) {
        limiter.recordAttempt(i * 100);
      }

      // Calls before the cooldown are still inside the burst interval but no longer count.
      expect(limiter.acquire(5900).admitted).toBe(true);
      expect(limiter.tryAdmit(6000).admitted).toBe(true);
    });
  });

  describe('stats', () => {
    it('reports utilization with one decimal and keeps the lifetime total', () => {
      const limiter = new RollingWindowLimiter({ ...QUIET, windowDuration: 1000, maxRequestsPerWindow: 3 });
      limiter.recordAttempt(0);

      expect(limiter.getStats(10)).toEqual({
        totalRecorded: 1,
        inWindow: 1,
        limit: 3,
        utilization: 33.3,
        coolingDown: false,
        cooldownRemainingMs: 0,
      });
      expect(limiter.getStats(5000)).toMatchObject({ totalRecorded: 1, inWindow: 0, utilization: 0 });
    });

    it('forgets everything on reset', () => {
      const limiter = new RollingWindowLimiter({ ...QUIET, maxRequestsPerWindow: 1, minInterCallDelay: 1000 });
      limiter.recordAttempt(0);

      limiter.reset();

      expect(limiter.tryAdmit(1).admitted).toBe(true);
      expect(limiter.getStats(1).totalRecorded).toBe(0);
    });
  });
});
