import chalk from 'chalk';
import { ConfigurationError, FatalError, GovernorError, isCancellation } from '@profile-pulse/shared';

export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export function exitCodeFor(error: unknown): number {
  return isCancellation(error) ? EXIT_INTERRUPTED : EXIT_FAILURE;
}

function hintFor(error: unknown): string | undefined {
  const cause = error instanceof GovernorError ? error.cause : error;
  if (cause instanceof FatalError) {
    switch (cause.reason) {
      case 'auth':
        return 'The access token was rejected. Run "profile-pulse auth login" with a fresh token.';
      case 'permission':
        return 'The token lacks the instagram_basic permission or the app is not approved for business discovery.';
      case 'not-found':
        return 'Only public business and creator accounts can be analyzed.';
      default:
        return undefined;
    }
  }
  if (error instanceof GovernorError && error.kind === 'exhausted') {
    return 'The API kept failing. Try again later.';
  }
  if (error instanceof ConfigurationError) {
    return 'Check "profile-pulse config show" and the PP_* environment variables.';
  }
  return undefined;
}

export function printError(context: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`${context}: ${message}`));
  const hint = hintFor(error);
  if (hint) {
    console.error(chalk.gray(hint));
  }
}
