// CLI error handling utilities

import {
  FormworkError,
  DefinitionError,
  ConfigError,
  InputError,
  InvalidArgumentError
} from '../../core/errors.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof DefinitionError) {
    const issues = error.issues.map((issue) => `\n  - ${issue}`).join('');
    return `Definition Error: ${error.message}${issues}`;
  }

  if (error instanceof ConfigError) {
    const issues = error.context?.issues;
    const details = Array.isArray(issues)
      ? issues.map((issue) => `\n  - ${String(issue)}`).join('')
      : '';
    return `Configuration Error: ${error.message}${details}`;
  }

  if (error instanceof InputError) {
    const source = error.source ? ` (${error.source})` : '';
    return `Input Error${source}: ${error.message}`;
  }

  if (error instanceof InvalidArgumentError) {
    const argument = error.argument ? ` (argument: ${error.argument})` : '';
    return `Invalid Argument${argument}: ${error.message}`;
  }

  if (error instanceof FormworkError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Exit code for an error: each formwork error class carries its own,
 * anything else exits with 1
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof FormworkError ? error.exitCode : 1;
}

/**
 * Handle CLI errors with proper exit codes
 */
export function handleError(error: unknown): never {
  console.error(`\n❌ ${formatError(error)}\n`);
  process.exit(exitCodeFor(error));
}

/**
 * Wrap an async CLI action with error handling
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}
