/**
 * Error Handler
 * Logs failures with context, prints one user-facing line, picks the exit code
 */

import { type Logger, createLogger } from '../core/logger.js';
import { isKeepcError } from '../core/errors.js';
import type { Output } from './output.js';

export interface ErrorContext {
  /** Subcommand being run, when known */
  command?: string;
}

export interface ErrorHandler {
  /** Reports the error and returns the process exit code */
  handle(error: unknown, ctx: ErrorContext): number;
}

/**
 * Exit code for failures that are not KeepcErrors
 */
export const GENERIC_EXIT_CODE = 1;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Message shown to the user for an error
 */
export function userMessage(error: Error): string {
  return isKeepcError(error) ? `Error: ${error.message}` : `Unexpected error: ${error.message}`;
}

export class ErrorHandlerImpl implements ErrorHandler {
  private logger: Logger;
  private output: Output;

  constructor(output: Output, logger?: Logger) {
    this.output = output;
    this.logger = logger ?? createLogger('error');
  }

  handle(rawError: unknown, ctx: ErrorContext): number {
    const error = toError(rawError);
    const code = isKeepcError(error) ? error.code : undefined;
    const exitCode = isKeepcError(error) ? error.exitCode : GENERIC_EXIT_CODE;

    // Expected failures are user errors; only surprises get the error level
    if (code) {
      this.logger.debug('Command failed', { command: ctx.command, code, exitCode });
    } else {
      this.logger.error('Unexpected failure', error, { command: ctx.command });
    }

    this.output.error(userMessage(error));
    return exitCode;
  }
}

export function createErrorHandler(output: Output, logger?: Logger): ErrorHandler {
  return new ErrorHandlerImpl(output, logger);
}
