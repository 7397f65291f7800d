import { BaseError } from './base.error';

/**
 * Working tree is not a git repository
 */
export class RepositoryNotFoundError extends BaseError {
  public readonly code = 'REPOSITORY_NOT_FOUND';
  public readonly recoverable = false;
}

/**
 * Tag name is already taken in the local repository
 */
export class TagAlreadyExistsError extends BaseError {
  public readonly code = 'TAG_ALREADY_EXISTS';
  public readonly recoverable = false;
  public readonly tagName: string;

  constructor(tagName: string) {
    super(`Tag already exists: ${tagName}`, undefined, 'Choose a new tag name or delete the old tag first');
    this.tagName = tagName;
  }
}

/**
 * Nothing was staged; raised only when the empty commit policy is "fail"
 */
export class NothingToCommitError extends BaseError {
  public readonly code = 'NOTHING_TO_COMMIT';
  public readonly recoverable = true;
}

/**
 * Branch, tag or message input rejected before reaching git
 */
export class InvalidInputError extends BaseError {
  public readonly code = 'INVALID_INPUT';
  public readonly recoverable = true;
}
