/**
 * Error handling utilities
 */

import chalk from 'chalk';

import { DatabaseError } from '@tbx/database';
import { GrpcClientError } from '@tbx/grpc-client';

import { ConfigValidationError } from '../config/validation.js';

import { CliError, ServiceError } from './cli-errors.js';

/**
 * Known data sources and how to bring them up
 */
const SUGGESTIONS: Record<string, string> = {
  Tablebase: 'Start the probe service, or point --host/--port (TBX_PROBE_HOST, TBX_PROBE_PORT) at it',
  Statistics: `Import a dump with 'tbx import-stats <stats.json> <stats.db>', or pass --stats-json`,
};

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigValidationError) {
    return chalk.red(error.format());
  }

  if (error instanceof CliError) {
    return chalk.red(error.format());
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`);
  }

  return chalk.red(`Error: ${String(error)}`);
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  const cliError = toCliError(error);
  console.error(formatError(cliError));

  let exitCode = 1;
  if (cliError instanceof CliError) {
    exitCode = cliError.exitCode;
  }

  process.exit(exitCode);
}

/**
 * Attach a suggestion to adapter errors; anything else passes through
 */
export function toCliError(error: unknown): unknown {
  if (error instanceof GrpcClientError) {
    return new ServiceError('Tablebase', error.message, SUGGESTIONS['Tablebase']);
  }
  if (error instanceof DatabaseError) {
    return new ServiceError('Statistics', error.message, SUGGESTIONS['Statistics']);
  }
  return error;
}
