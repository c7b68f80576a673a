export type DenialReason = 'window' | 'burst' | 'min-delay';

export interface AdmissionDecision {
  admitted: boolean;
  /** Milliseconds until a new check may succeed; 0 when admitted. */
  retryAfterMs: number;
  reason?: DenialReason;
}

export interface LimiterStats {
  totalRecorded: number;
  inWindow: number;
  limit: number;
  /** Share of the window quota in use, 0..100, one decimal. */
  utilization: number;
  coolingDown: boolean;
  cooldownRemainingMs: number;
}

export interface IRateLimiter {
  tryAdmit(now: number): AdmissionDecision;
  recordAttempt(now: number): void;
}

export interface IBackoffPolicy {
  readonly maxAttempts: number;
  delayForAttempt(attemptNumber: number): number;
}

export interface Clock {
  /** Monotonic milliseconds. */
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}
