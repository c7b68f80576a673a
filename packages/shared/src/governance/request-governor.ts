import { Clock, DenialReason, IBackoffPolicy, IRateLimiter } from '../interfaces/rate-limiter.js';
import { ILogger } from '../interfaces/logger.js';
import { FatalError, GovernorError, TransientError, createAbortError, isAbortError } from '../errors.js';
import { systemClock } from './clock.js';

export type GovernorState =
  | 'idle'
  | 'waiting-for-admission'
  | 'executing'
  | 'backing-off'
  | 'success'
  | 'fatal'
  | 'exhausted'
  | 'cancelled';

export interface GovernorTransition {
  state: GovernorState;
  label: string;
  attempt: number;
  waitMs?: number;
  reason?: DenialReason;
}

export interface RequestRecord {
  timestamp: number;
  outcome: 'success' | 'failure' | 'denied';
  attempt: number;
}

export interface OperationContext {
  attempt: number;
  signal?: AbortSignal;
}

export type GovernedOperation<T> = (context: OperationContext) => Promise<T>;

export type FailureClass = 'transient' | 'fatal';
export type ErrorClassifier = (error: unknown) => FailureClass;

interface ResultBase {
  /** Calls actually issued; admission waits are not attempts. */
  attempts: number;
  history: RequestRecord[];
}

export type GovernorResult<T> =
  | (ResultBase & { status: 'success'; value: T })
  | (ResultBase & { status: 'fatal'; error: FatalError })
  | (ResultBase & { status: 'exhausted'; error: TransientError })
  | (ResultBase & { status: 'cancelled' });

export interface RequestGovernorOptions {
  limiter: IRateLimiter;
  backoff: IBackoffPolicy;
  clock?: Clock;
  classify?: ErrorClassifier;
  logger?: ILogger;
  onTransition?: (transition: GovernorTransition) => void;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Shown in logs and transitions, e.g. "profile" or "posts page 2". */
  label?: string;
}

export const defaultClassifier: ErrorClassifier = error => (error instanceof TransientError ? 'transient' : 'fatal');

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toFatal(error: unknown): FatalError {
  return error instanceof FatalError ? error : new FatalError(messageOf(error), { cause: error });
}

function toTransient(error: unknown): TransientError {
  return error instanceof TransientError ? error : new TransientError(messageOf(error), { cause: error });
}

/**
 * Wraps remote calls with limiter admission and bounded exponential retries.
 *
 * Idle → WaitingForAdmission → Executing → Success | BackingOff → WaitingForAdmission | Fatal | Exhausted.
 * Any suspension may end in Cancelled when the caller's signal aborts.
 */
export class RequestGovernor {
  private readonly limiter: IRateLimiter;
  private readonly backoff: IBackoffPolicy;
  private readonly clock: Clock;
  private readonly classify: ErrorClassifier;
  private readonly logger?: ILogger;
  private readonly onTransition?: (transition: GovernorTransition) => void;

  constructor(options: RequestGovernorOptions) {
    this.limiter = options.limiter;
    this.backoff = options.backoff;
    this.clock = options.clock ?? systemClock;
    this.classify = options.classify ?? defaultClassifier;
    this.logger = options.logger;
    this.onTransition = options.onTransition;
  }

  async execute<T>(operation: GovernedOperation<T>, options: ExecuteOptions = {}): Promise<GovernorResult<T>> {
    const { signal } = options;
    const label = options.label ?? 'request';
    const history: RequestRecord[] = [];
    const issued = () => history.filter(record => record.outcome !== 'denied').length;
    let attempt = 1;

    this.transition({ state: 'idle', label, attempt });

    try {
      for (;;) {
        const startedAt = await this.waitForAdmission(label, attempt, history, signal);
        this.transition({ state: 'executing', label, attempt });

        try {
          const value = await operation({ attempt, signal });
          history.push({ timestamp: startedAt, outcome: 'success', attempt });
          this.transition({ state: 'success', label, attempt });
          return { status: 'success', value, attempts: issued(), history };
        } catch (error) {
          history.push({ timestamp: startedAt, outcome: 'failure', attempt });

          if (signal?.aborted) {
            this.transition({ state: 'cancelled', label, attempt });
            return { status: 'cancelled', attempts: issued(), history };
          }

          if (this.classify(error) === 'fatal') {
            this.logger?.error(`${label} failed permanently: ${messageOf(error)}`, { attempt });
            this.transition({ state: 'fatal', label, attempt });
            return { status: 'fatal', error: toFatal(error), attempts: issued(), history };
          }

          const transient = toTransient(error);
          this.logger?.warn(`${label} failed (attempt ${attempt}/${this.backoff.maxAttempts}): ${transient.message}`);

          if (attempt >= this.backoff.maxAttempts) {
            this.logger?.error(`${label} failed after ${attempt} attempts`);
            this.transition({ state: 'exhausted', label, attempt });
            return { status: 'exhausted', error: transient, attempts: issued(), history };
          }

          const delay = Math.max(this.backoff.delayForAttempt(attempt), transient.retryAfterMs ?? 0);
          this.logger?.info(`Retrying ${label} in ${(delay / 1000).toFixed(1)}s`);
          this.transition({ state: 'backing-off', label, attempt, waitMs: delay });
          await this.clock.sleep(delay, signal);
          attempt++;
        }
      }
    } catch (error) {
      if (isAbortError(error)) {
        this.transition({ state: 'cancelled', label, attempt });
        return { status: 'cancelled', attempts: issued(), history };
      }
      throw error;
    }
  }

  /**
   * Blocks until the limiter admits the call, then records it. Returns the admission time.
   */
  private async waitForAdmission(
    label: string,
    attempt: number,
    history: RequestRecord[],
    signal?: AbortSignal
  ): Promise<number> {
    for (;;) {
      if (signal?.aborted) {
        throw createAbortError();
      }

      const now = this.clock.now();
      const decision = this.limiter.tryAdmit(now);
      if (decision.admitted) {
        this.limiter.recordAttempt(now);
        return now;
      }

      history.push({ timestamp: now, outcome: 'denied', attempt });
      if (decision.retryAfterMs >= 5000) {
        this.logger?.warn(`Rate limit (${decision.reason}): waiting ${(decision.retryAfterMs / 1000).toFixed(1)}s before ${label}`);
      } else {
        this.logger?.debug(`Rate limiting: waiting ${Math.round(decision.retryAfterMs)}ms before ${label}`);
      }
      this.transition({
        state: 'waiting-for-admission',
        label,
        attempt,
        waitMs: decision.retryAfterMs,
        reason: decision.reason,
      });
      await this.clock.sleep(decision.retryAfterMs, signal);
    }
  }

  private transition(transition: GovernorTransition): void {
    this.logger?.debug(`[${transition.label}] ${transition.state}`, {
      attempt: transition.attempt,
      waitMs: transition.waitMs,
    });
    this.onTransition?.(transition);
  }
}

/**
 * Return the value of a successful result or throw a GovernorError describing the failure.
 */
export function unwrapResult<T>(result: GovernorResult<T>, label = 'request'): T {
  switch (result.status) {
    case 'success':
      return result.value;
    case 'fatal':
      throw new GovernorError('fatal', `${label} failed: ${result.error.message}`, result.attempts, result.error);
    case 'exhausted':
      throw new GovernorError(
        'exhausted',
        `${label} failed after ${result.attempts} attempts: ${result.error.message}`,
        result.attempts,
        result.error
      );
    case 'cancelled':
      throw new GovernorError('cancelled', `${label} was cancelled`, result.attempts);
  }
}
