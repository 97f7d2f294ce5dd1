/**
 * Error handling utilities
 */

import { UnsupportedPositionError } from '@gobook/core';
import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';
import { AnalysisFailedError, LAYER_NAMES } from '../orchestrator/errors.js';

import { CliError } from './cli-errors.js';

/**
 * Exit code for an analysis no layer could answer
 */
export const ANALYSIS_FAILED_EXIT_CODE = 3;

/**
 * Format and display an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigValidationError) {
    return chalk.red(error.format());
  }

  if (error instanceof CliError) {
    return chalk.red(error.format());
  }

  if (error instanceof UnsupportedPositionError) {
    return chalk.red(`Unsupported position: ${error.message}`);
  }

  if (error instanceof AnalysisFailedError) {
    const lines = [chalk.red(`Analysis failed: ${error.message}`)];
    for (const attempt of error.attempts) {
      lines.push(chalk.dim(`  ${LAYER_NAMES[attempt.layer]}: ${attempt.outcome} (${attempt.reason})`));
    }
    return lines.join('\n');
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`);
  }

  return chalk.red(`Error: ${String(error)}`);
}

/**
 * Exit code for an error
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }
  if (error instanceof UnsupportedPositionError) {
    return 2;
  }
  if (error instanceof AnalysisFailedError) {
    return ANALYSIS_FAILED_EXIT_CODE;
  }
  return 1;
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));
  process.exit(exitCodeFor(error));
}

/**
 * Wrap an async function with error handling
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}
