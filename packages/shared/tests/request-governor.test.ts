import { describe, it, expect, vi } from 'vitest';
import {
  ExponentialBackoffPolicy,
  FatalError,
  GovernorError,
  GovernorTransition,
  IRateLimiter,
  RequestGovernor,
  RollingWindowLimiter,
  TransientError,
  createSeededRandom,
  unwrapResult,
} from '@profile-pulse/shared';
import { FakeClock, fixedRandom } from './helpers/fake-clock.js';

const OPEN_LIMITER = {
  windowDuration: 3_600_000,
  maxRequestsPerWindow: 1000,
  minInterCallDelay: 0,
  burstThreshold: 1000,
  burstInterval: 1000,
  burstCooldown: 1000,
};

function setup(options: { minInterCallDelay?: number; maxAttempts?: number; jitterRatio?: number } = {}) {
  const clock = new FakeClock();
  const limiter = new RollingWindowLimiter({ ...OPEN_LIMITER, minInterCallDelay: options.minInterCallDelay ?? 0 });
  const backoff = new ExponentialBackoffPolicy(
    {
      baseDelay: 1000,
      multiplier: 2,
      delayCeiling: 60_000,
      jitterRatio: options.jitterRatio ?? 0.3,
      maxAttempts: options.maxAttempts ?? 3,
    },
    options.jitterRatio === undefined ? fixedRandom(0.5) : createSeededRandom(99)
  );
  const transitions: GovernorTransition[] = [];
  const governor = new RequestGovernor({
    limiter,
    backoff,
    clock,
    onTransition: transition => transitions.push(transition),
  });
  return { clock, limiter, backoff, governor, transitions };
}

describe('RequestGovernor', () => {
  it('returns the value of a call that succeeds first time', async () => {
    const { governor, clock, transitions } = setup();
    const operation = vi.fn().mockResolvedValue('ok');

    const result = await governor.execute(operation, { label: 'profile' });

    expect(result).toEqual({
      status: 'success',
      value: 'ok',
      attempts: 1,
      history: [{ timestamp: 0, outcome: 'success', attempt: 1 }],
    });
    expect(operation).toHaveBeenCalledWith({ attempt: 1, signal: undefined });
    expect(clock.sleeps).toEqual([]);
    expect(transitions.map(t => t.state)).toEqual(['idle', 'executing', 'success']);
  });

  it('retries transient failures with exponential delays', async () => {
    const { governor, clock } = setup();
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new TransientError('throttled'))
      .mockRejectedValueOnce(new TransientError('throttled'))
      .mockResolvedValueOnce(42);

    const result = await governor.execute(operation);

    expect(result.status).toBe('success');
    expect(result.attempts).toBe(3);
    expect(clock.sleeps).toEqual([1000, 2000]);
    expect(result.history.map(record => [record.timestamp, record.outcome])).toEqual([
      [0, 'failure'],
      [1000, 'failure'],
      [3000, 'success'],
    ]);
  });

  it('gives up after the attempt budget is spent', async () => {
    const { governor, clock, transitions } = setup();
    const operation = vi.fn().mockRejectedValue(new TransientError('server error', { status: 503 }));

    const result = await governor.execute(operation);

    expect(result.status).toBe('exhausted');
    expect(result.attempts).toBe(3);
    expect(operation).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([1000, 2000]);
    expect(transitions[transitions.length - 1]).toEqual({ state: 'exhausted', label: 'request', attempt: 3 });
    if (result.status === 'exhausted') {
      expect(result.error.status).toBe(503);
    }
  });

  it('keeps total backoff within the jittered bounds when exhausting', async () => {
    const { governor, clock } = setup({ jitterRatio: 0.3, maxAttempts: 4 });

    const result = await governor.execute(() => Promise.reject(new TransientError('timeout')));

    expect(result.status).toBe('exhausted');
    expect(result.attempts).toBe(4);
    expect(clock.sleeps).toHaveLength(3);
    // 1000 + 2000 + 4000 with ±30 %
    expect(clock.slept).toBeGreaterThanOrEqual(7000 * 0.7);
    expect(clock.slept).toBeLessThanOrEqual(7000 * 1.3);
    expect(clock.now()).toBe(clock.slept);
  });

  it('does not retry fatal failures', async () => {
    const { governor, clock } = setup();
    const operation = vi.fn().mockRejectedValue(new FatalError('bad token', { reason: 'auth' }));

    const result = await governor.execute(operation);

    expect(result.status).toBe('fatal');
    expect(result.attempts).toBe(1);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
    if (result.status === 'fatal') {
      expect(result.error.reason).toBe('auth');
    }
  });

  it('treats unknown errors as fatal', async () => {
    const { governor } = setup();

    const result = await governor.execute(() => Promise.reject(new Error('boom')));

    expect(result.status).toBe('fatal');
    if (result.status === 'fatal') {
      expect(result.error).toBeInstanceOf(FatalError);
      expect(result.error.message).toBe('boom');
    }
  });

  it('accepts a custom classifier', async () => {
    const clock = new FakeClock();
    const governor = new RequestGovernor({
      limiter: new RollingWindowLimiter(OPEN_LIMITER),
      backoff: new ExponentialBackoffPolicy({ baseDelay: 10, jitterRatio: 0, maxAttempts: 2 }),
      clock,
      classify: () => 'transient',
    });
    const operation = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce('ok');

    const result = await governor.execute(operation);

    expect(result.status).toBe('success');
    expect(clock.sleeps).toEqual([10]);
  });

  it('waits at least as long as the server asks', async () => {
    const { governor, clock } = setup();
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new TransientError('rate limited', { status: 429, retryAfterMs: 30_000 }))
      .mockResolvedValueOnce('ok');

    await governor.execute(operation);

    expect(clock.sleeps).toEqual([30_000]);
  });

  it('keeps the backoff delay when the server hint is shorter', async () => {
    const { governor, clock } = setup();
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new TransientError('rate limited', { retryAfterMs: 200 }))
      .mockResolvedValueOnce('ok');

    await governor.execute(operation);

    expect(clock.sleeps).toEqual([1000]);
  });

  it('waits for admission without counting the wait as an attempt', async () => {
    const { governor, clock, transitions } = setup({ minInterCallDelay: 2000 });
    await governor.execute(() => Promise.resolve('first'));
    transitions.length = 0;

    const result = await governor.execute(() => Promise.resolve('second'));

    expect(result.status).toBe('success');
    expect(result.attempts).toBe(1);
    expect(clock.sleeps).toEqual([2000]);
    expect(result.history).toEqual([
      { timestamp: 0, outcome: 'denied', attempt: 1 },
      { timestamp: 2000, outcome: 'success', attempt: 1 },
    ]);
    expect(transitions[1]).toEqual({
      state: 'waiting-for-admission',
      label: 'request',
      attempt: 1,
      waitMs: 2000,
      reason: 'min-delay',
    });
  });

  it('never lets concurrent calls exceed the window quota', async () => {
    const clock = new FakeClock();
    const limiter = new RollingWindowLimiter({ ...OPEN_LIMITER, windowDuration: 1000, maxRequestsPerWindow: 3 });
    const governor = new RequestGovernor({
      limiter,
      backoff: new ExponentialBackoffPolicy({ baseDelay: 10, jitterRatio: 0, maxAttempts: 1 }),
      clock,
    });

    const results = await Promise.all(
      Array.from({ length: 10 }, (_, index) => governor.execute(() => Promise.resolve(index)))
    );

    expect(results.map(result => result.status)).toEqual(Array(10).fill('success'));
    const admissions = results
      .flatMap(result => result.history)
      .filter(record => record.outcome !== 'denied')
      .map(record => record.timestamp)
      .sort((a, b) => a - b);
    expect(admissions).toHaveLength(10);
    for (const at of admissions) {
      const inWindow = admissions.filter(other => other > at - 1000 && other <= at);
      expect(inWindow.length).toBeLessThanOrEqual(3);
    }
    expect(limiter.getStats(clock.now()).totalRecorded).toBe(10);
  });

  it('runs against any limiter that can admit and record', async () => {
    const recorded: number[] = [];
    const limiter: IRateLimiter = {
      tryAdmit: now => (now < 500 ? { admitted: false, retryAfterMs: 500 - now, reason: 'window' } : { admitted: true, retryAfterMs: 0 }),
      recordAttempt: now => {
        recorded.push(now);
      },
    };
    const clock = new FakeClock();
    const governor = new RequestGovernor({
      limiter,
      backoff: new ExponentialBackoffPolicy({ baseDelay: 10, jitterRatio: 0, maxAttempts: 1 }),
      clock,
    });

    const result = await governor.execute(() => Promise.resolve('ok'));

    expect(result.status).toBe('success');
    expect(clock.sleeps).toEqual([500]);
    expect(recorded).toEqual([500]);
  });

  it('records every issued attempt with the limiter', async () => {
    const { governor, limiter } = setup();

    await governor.execute(() => Promise.reject(new TransientError('flaky')));

    expect(limiter.getStats(0).totalRecorded).toBe(3);
  });

  describe('cancellation', () => {
    it('does not call the operation when already cancelled', async () => {
      const { governor } = setup();
      const controller = new AbortController();
      controller.abort();
      const operation = vi.fn().mockResolvedValue('ok');

      const result = await governor.execute(operation, { signal: controller.signal });

      expect(result).toEqual({ status: 'cancelled', attempts: 0, history: [] });
      expect(operation).not.toHaveBeenCalled();
    });

    it('stops during a backoff wait', async () => {
      const { governor, clock } = setup();
      const controller = new AbortController();
      clock.onSleep = () => controller.abort();
      const operation = vi.fn().mockRejectedValue(new TransientError('flaky'));

      const result = await governor.execute(operation, { signal: controller.signal });

      expect(result.status).toBe('cancelled');
      expect(result.attempts).toBe(1);
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('stops during an admission wait without recording an attempt', async () => {
      const { governor, clock, limiter } = setup({ minInterCallDelay: 2000 });
      await governor.execute(() => Promise.resolve('first'));
      const controller = new AbortController();
      clock.onSleep = () => controller.abort();
      const operation = vi.fn().mockResolvedValue('second');

      const result = await governor.execute(operation, { signal: controller.signal });

      expect(result).toEqual({
        status: 'cancelled',
        attempts: 0,
        history: [{ timestamp: 0, outcome: 'denied', attempt: 1 }],
      });
      expect(operation).not.toHaveBeenCalled();
      expect(clock.sleeps).toEqual([2000]);
      expect(limiter.getStats(clock.now()).totalRecorded).toBe(1);
    });

    it('reports a call that fails because it was aborted as cancelled', async () => {
      const { governor } = setup();
      const controller = new AbortController();

      const result = await governor.execute(
        () => {
          controller.abort();
          return Promise.reject(new Error('canceled'));
        },
        { signal: controller.signal }
      );

      expect(result.status).toBe('cancelled');
      expect(result.attempts).toBe(1);
    });
  });

  describe('unwrapResult', () => {
    it('returns the value of a success', async () => {
      const { governor } = setup();

      expect(unwrapResult(await governor.execute(() => Promise.resolve(7)))).toBe(7);
    });

    it('throws a GovernorError carrying the kind and attempts', async () => {
      const { governor } = setup();
      const result = await governor.execute(() => Promise.reject(new TransientError('timeout')));

      let thrown: unknown;
      try {
        unwrapResult(result, 'posts page 1');
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(GovernorError);
      if (thrown instanceof GovernorError) {
        expect(thrown.kind).toBe('exhausted');
        expect(thrown.attempts).toBe(3);
        expect(thrown.message).toBe('posts page 1 failed after 3 attempts: timeout');
        expect(thrown.cause).toBeInstanceOf(TransientError);
      }
    });
  });
});
