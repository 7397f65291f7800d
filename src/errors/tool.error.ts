import { BaseError } from './base.error';

/**
 * External program could not be located on PATH
 */
export class ExternalToolMissingError extends BaseError {
  public readonly code = 'EXTERNAL_TOOL_MISSING';
  public readonly recoverable = false;
  public readonly tool: string;

  constructor(tool: string, details?: string) {
    super(`Required program not found: ${tool}`, details, installHint(tool));
    this.tool = tool;
  }
}

/**
 * External program exited with a nonzero status
 */
export class ExternalToolFailedError extends BaseError {
  public readonly code = 'EXTERNAL_TOOL_FAILED';
  public readonly recoverable = true;
  public readonly tool: string;
  public readonly exitCode: number | null;
  public readonly stderr: string;

  constructor(tool: string, exitCode: number | null, stderr: string, message?: string) {
    super(
      message ?? `${tool} exited with ${exitCode === null ? 'an error' : `code ${exitCode}`}`,
      stderr.trim() || undefined,
    );
    this.tool = tool;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * External program did not finish within its time limit
 */
export class ExternalToolTimedOutError extends BaseError {
  public readonly code = 'EXTERNAL_TOOL_TIMED_OUT';
  public readonly recoverable = true;
  public readonly tool: string;
  public readonly timeoutMs: number;

  constructor(tool: string, timeoutMs: number) {
    super(
      `${tool} did not finish within ${timeoutMs}ms`,
      undefined,
      'Raise COMMAND_TIMEOUT_MS in your .env file',
    );
    this.tool = tool;
    this.timeoutMs = timeoutMs;
  }
}

function installHint(tool: string): string {
  switch (tool) {
    case 'git':
      return 'Install git from https://git-scm.com and make sure it is on your PATH';
    case 'pdflatex':
      return 'Install TeX Live or MiKTeX and make sure pdflatex is on your PATH';
    default:
      return `Install ${tool} and make sure it is on your PATH`;
  }
}
