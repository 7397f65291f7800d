import { BaseError } from './base.error';

/**
 * Document compiler failed or produced no output artifact
 */
export class DocumentBuildFailedError extends BaseError {
  public readonly code = 'DOCUMENT_BUILD_FAILED';
  public readonly recoverable = true;
  public readonly source?: string | undefined;

  constructor(message: string, source?: string, compilerOutput?: string) {
    super(message, compilerOutput);
    this.source = source;
  }
}
