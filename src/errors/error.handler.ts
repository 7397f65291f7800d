import { BaseError } from './base.error';
import { ExternalToolFailedError } from './tool.error';
import { logger } from '../utils/logger.service';
import { CommandResult } from '../types/config.types';

/**
 * Exit codes reported by every sub-command
 */
export const EXIT_CODES = {
  success: 0,
  applicationError: 1,
  gitError: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Longest diagnostic excerpt echoed to the terminal
 */
const MAX_DETAIL_LINES = 20;

/**
 * Turns errors into the one-line summary plus captured diagnostics
 */
export class ErrorHandler {
  /**
   * Exit code for an error: 2 when git itself reported the failure
   */
  public static exitCodeFor(error: unknown): ExitCode {
    if (error instanceof ExternalToolFailedError && error.tool === 'git') {
      return EXIT_CODES.gitError;
    }
    return EXIT_CODES.applicationError;
  }

  /**
   * Normalise any thrown value into an Error instance
   */
  public static toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
  }

  /**
   * Failed CommandResult for a caught error
   */
  public static toResult<T = never>(error: unknown, fallbackMessage: string): CommandResult<T> {
    return {
      success: false,
      message: error instanceof BaseError ? error.message : fallbackMessage,
      error: ErrorHandler.toError(error),
      exitCode: ErrorHandler.exitCodeFor(error),
    };
  }

  /**
   * Lines shown to the user, summary first
   */
  public static format(error: unknown, command?: string): string[] {
    const prefix = command ? `${command}: ` : '';
    if (!(error instanceof BaseError)) {
      return [`${prefix}${BaseError.messageOf(error)}`];
    }

    const lines = [`${prefix}${error.message} [${error.code}]`];
    if (error.details) {
      const detailLines = error.details.trimEnd().split('\n');
      const shown = detailLines.slice(-MAX_DETAIL_LINES);
      if (shown.length < detailLines.length) {
        lines.push(`  ... ${detailLines.length - shown.length} earlier line(s) omitted`);
      }
      lines.push(...shown.map(line => `  ${line}`));
    }
    if (error.hint) {
      lines.push(`Hint: ${error.hint}`);
    }
    return lines;
  }

  /**
   * Print the failure and return the exit code the process should use
   */
  public static handle(error: unknown, command?: string): ExitCode {
    const [summary = 'Unknown error', ...rest] = ErrorHandler.format(error, command);
    logger.error(summary);
    for (const line of rest) {
      logger.info(line);
    }
    if (error instanceof Error && error.stack && !(error instanceof BaseError)) {
      logger.debug(error.stack);
    }
    return ErrorHandler.exitCodeFor(error);
  }
}
