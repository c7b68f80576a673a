/**
 * Progress sink for a collection run. Messages are short, user-facing lines;
 * `done`/`total` count posts.
 */
export interface IProgressReporter {
  start(message: string): void;
  update(message: string, done?: number, total?: number): void;
  /** The run is paused on the rate limiter or a retry backoff. */
  waiting(message: string, waitMs: number): void;
  succeed(message: string): void;
  fail(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  stop(): void;
}
