import { BaseError } from './base.error';

/**
 * File system operation failed
 */
export class FileSystemError extends BaseError {
  public readonly code = 'FILESYSTEM_ERROR';
  public readonly recoverable = true;
}

/**
 * Expected file is not there
 */
export class FileNotFoundError extends BaseError {
  public readonly code = 'FILE_NOT_FOUND';
  public readonly recoverable = false;
}
