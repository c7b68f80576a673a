import { AdmissionDecision, DenialReason, IRateLimiter, LimiterStats } from '../interfaces/rate-limiter.js';
import { ILogger } from '../interfaces/logger.js';
import { DEFAULT_GOVERNANCE_CONFIG, LimiterConfig } from './config.js';

/**
 * Rolling-window limiter with burst protection and a minimum gap between calls.
 *
 * Admission and recording are separate: `tryAdmit` only inspects state, the caller
 * confirms with `recordAttempt` once it actually issues the call. Both are
 * synchronous, so calling them back to back with no `await` in between is the
 * critical section that keeps concurrent callers from overshooting the quota.
 *
 * Timestamps must come from a monotonic clock.
 */
export class RollingWindowLimiter implements IRateLimiter {
  private timestamps: number[] = [];
  private lastAttemptAt: number | null = null;
  private cooldownUntil: number | null = null;
  private burstEpoch = Number.NEGATIVE_INFINITY;
  private totalRecorded = 0;

  private readonly config: LimiterConfig;
  private readonly logger?: ILogger;

  constructor(config: Partial<LimiterConfig> = {}, logger?: ILogger) {
    this.config = {
      windowDuration: config.windowDuration ?? DEFAULT_GOVERNANCE_CONFIG.windowDuration,
      maxRequestsPerWindow: config.maxRequestsPerWindow ?? DEFAULT_GOVERNANCE_CONFIG.maxRequestsPerWindow,
      minInterCallDelay: config.minInterCallDelay ?? DEFAULT_GOVERNANCE_CONFIG.minInterCallDelay,
      burstThreshold: config.burstThreshold ?? DEFAULT_GOVERNANCE_CONFIG.burstThreshold,
      burstInterval: config.burstInterval ?? DEFAULT_GOVERNANCE_CONFIG.burstInterval,
      burstCooldown: config.burstCooldown ?? DEFAULT_GOVERNANCE_CONFIG.burstCooldown,
    };
    this.logger = logger;
  }

  tryAdmit(now: number): AdmissionDecision {
    this.prune(now);
    this.refreshCooldown(now);

    const waits: Array<{ reason: DenialReason; wait: number }> = [];

    if (this.timestamps.length >= this.config.maxRequestsPerWindow) {
      waits.push({ reason: 'window', wait: this.timestamps[0] + this.config.windowDuration - now });
    }

    if (this.cooldownUntil !== null) {
      waits.push({ reason: 'burst', wait: this.cooldownUntil - now });
    }

    if (this.lastAttemptAt !== null && now - this.lastAttemptAt < this.config.minInterCallDelay) {
      waits.push({ reason: 'min-delay', wait: this.lastAttemptAt + this.config.minInterCallDelay - now });
    }

    if (waits.length === 0) {
      return { admitted: true, retryAfterMs: 0 };
    }

    const longest = waits.reduce((a, b) => (b.wait > a.wait ? b : a));
    return { admitted: false, retryAfterMs: Math.max(0, longest.wait), reason: longest.reason };
  }

  recordAttempt(now: number): void {
    this.prune(now);
    this.refreshCooldown(now);

    this.timestamps.push(now);
    this.lastAttemptAt = now;
    this.totalRecorded++;

    if (this.cooldownUntil === null && this.countBurst(now) >= this.config.burstThreshold) {
      this.cooldownUntil = now + this.config.burstCooldown;
      this.logger?.warn(`Burst detected (${this.config.burstThreshold} calls within ${this.config.burstInterval}ms), cooling down`, {
        cooldownMs: this.config.burstCooldown,
      });
    }
  }

  /**
   * Admit and record in one step.
   */
  acquire(now: number): AdmissionDecision {
    const decision = this.tryAdmit(now);
    if (decision.admitted) {
      this.recordAttempt(now);
    }
    return decision;
  }

  getStats(now: number): LimiterStats {
    this.prune(now);
    this.refreshCooldown(now);

    const inWindow = this.timestamps.length;
    return {
      totalRecorded: this.totalRecorded,
      inWindow,
      limit: this.config.maxRequestsPerWindow,
      utilization: Math.round((inWindow / this.config.maxRequestsPerWindow) * 1000) / 10,
      coolingDown: this.cooldownUntil !== null,
      cooldownRemainingMs: this.cooldownUntil !== null ? this.cooldownUntil - now : 0,
    };
  }

  reset(): void {
    this.timestamps = [];
    this.lastAttemptAt = null;
    this.cooldownUntil = null;
    this.burstEpoch = Number.NEGATIVE_INFINITY;
    this.totalRecorded = 0;
  }

  private prune(now: number): void {
    const cutoff = now - this.config.windowDuration;
    let expired = 0;
    while (expired < this.timestamps.length && this.timestamps[expired] <= cutoff) {
      expired++;
    }
    if (expired > 0) {
      this.timestamps.splice(0, expired);
    }
  }

  // Full reset once the cooldown has elapsed: nothing recorded before it counts toward the next burst.
  private refreshCooldown(now: number): void {
    if (this.cooldownUntil !== null && now >= this.cooldownUntil) {
      this.burstEpoch = this.cooldownUntil;
      this.cooldownUntil = null;
      this.logger?.debug('Burst cooldown finished');
    }
  }

  private countBurst(now: number): number {
    const cutoff = now - this.config.burstInterval;
    let count = 0;
    for (let i = this.timestamps.length - 1; i >= 0; i--) {
      const t = this.timestamps[i];
      if (t <= cutoff || t < this.burstEpoch) break;
      count++;
    }
    return count;
  }
}
