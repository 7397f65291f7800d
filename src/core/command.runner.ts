import execa from 'execa';
import { BaseError } from '../errors/base.error';
import {
  ExternalToolFailedError,
  ExternalToolMissingError,
  ExternalToolTimedOutError,
} from '../errors/tool.error';
import { logger } from '../utils/logger.service';

/**
 * Captured outcome of one external program invocation
 */
export interface ToolResult {
  program: string;
  args: string[];
  exitCode: number;
  stdout: string;
  stderr: string;
  elapsedMs: number;
}

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
}

export const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * Runs external programs one at a time and maps failures onto the tool
 * error taxonomy
 */
export class CommandRunner {
  private readonly defaultTimeoutMs: number;

  constructor(defaultTimeoutMs: number = DEFAULT_TIMEOUT_MS) {
    this.defaultTimeoutMs = defaultTimeoutMs;
  }

  public async run(program: string, args: string[] = [], options: RunOptions = {}): Promise<ToolResult> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const startedAt = Date.now();
    logger.debug(`$ ${[program, ...args].join(' ')}${options.cwd ? ` (in ${options.cwd})` : ''}`);

    try {
      const result = await execa(program, args, {
        cwd: options.cwd,
        timeout: timeoutMs,
        stripFinalNewline: true,
      });

      return {
        program,
        args,
        exitCode: result.exitCode,
        stdout: result.stdout,
        stderr: result.stderr,
        elapsedMs: Date.now() - startedAt,
      };
    } catch (error) {
      throw toToolError(program, timeoutMs, error);
    }
  }

  /**
   * True when `<program> --version` runs
   */
  public async isAvailable(program: string): Promise<boolean> {
    try {
      await this.run(program, ['--version'], { timeoutMs: 10_000 });
      return true;
    } catch (error) {
      if (error instanceof ExternalToolMissingError) {
        return false;
      }
      throw error;
    }
  }
}

/**
 * Translate an execa rejection into ExternalToolMissing, TimedOut or Failed
 */
export function toToolError(program: string, timeoutMs: number, error: unknown): BaseError {
  if (error instanceof BaseError) {
    return error;
  }
  if (!(error instanceof Error)) {
    return new ExternalToolFailedError(program, null, String(error));
  }

  if ('code' in error && error.code === 'ENOENT') {
    return new ExternalToolMissingError(program, error.message);
  }
  if ('timedOut' in error && error.timedOut === true) {
    return new ExternalToolTimedOutError(program, timeoutMs);
  }

  const exitCode = 'exitCode' in error && typeof error.exitCode === 'number' ? error.exitCode : null;
  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';
  const stdout = 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : '';
  return new ExternalToolFailedError(program, exitCode, stderr || stdout || error.message);
}
