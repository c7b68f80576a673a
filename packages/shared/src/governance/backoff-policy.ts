import { IBackoffPolicy, RandomSource } from '../interfaces/rate-limiter.js';
import { BackoffConfig, DEFAULT_GOVERNANCE_CONFIG } from './config.js';
import { mathRandom } from './clock.js';

/**
 * Exponential backoff with a ceiling and symmetric jitter.
 *
 * Attempt 1 is the first retry, not the original call. Jitter is drawn fresh on every
 * call so concurrent callers retrying the same failure spread out.
 */
export class ExponentialBackoffPolicy implements IBackoffPolicy {
  readonly maxAttempts: number;

  private readonly baseDelay: number;
  private readonly multiplier: number;
  private readonly delayCeiling: number;
  private readonly jitterRatio: number;
  private readonly random: RandomSource;

  constructor(config: Partial<BackoffConfig> = {}, random: RandomSource = mathRandom) {
    this.baseDelay = config.baseDelay ?? DEFAULT_GOVERNANCE_CONFIG.baseDelay;
    this.multiplier = config.multiplier ?? DEFAULT_GOVERNANCE_CONFIG.multiplier;
    this.delayCeiling = config.delayCeiling ?? DEFAULT_GOVERNANCE_CONFIG.delayCeiling;
    this.jitterRatio = config.jitterRatio ?? DEFAULT_GOVERNANCE_CONFIG.jitterRatio;
    this.maxAttempts = config.maxAttempts ?? DEFAULT_GOVERNANCE_CONFIG.maxAttempts;
    this.random = random;
  }

  /** Delay before jitter; non-decreasing in the attempt number. */
  baseDelayForAttempt(attemptNumber: number): number {
    const exponent = Math.max(1, Math.floor(attemptNumber)) - 1;
    return Math.min(this.delayCeiling, this.baseDelay * Math.pow(this.multiplier, exponent));
  }

  delayForAttempt(attemptNumber: number): number {
    const delay = this.baseDelayForAttempt(attemptNumber);
    const jitter = (this.random.next() * 2 - 1) * this.jitterRatio;
    return Math.max(0, delay * (1 + jitter));
  }

  /** Largest delay `delayForAttempt` can return. */
  maxDelay(): number {
    return this.delayCeiling * (1 + this.jitterRatio);
  }
}
