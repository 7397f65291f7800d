import { BaseError } from './base.error';

/**
 * GitHub REST API answered with a non-success status
 */
export class GitHubApiError extends BaseError {
  public readonly code = 'GITHUB_API_ERROR';
  public readonly recoverable = true;
  public readonly statusCode: number;

  constructor(statusCode: number, body: string, endpoint: string) {
    super(`GitHub API request to ${endpoint} failed with status ${statusCode}`, body, hintFor(statusCode));
    this.statusCode = statusCode;
  }
}

function hintFor(statusCode: number): string | undefined {
  if (statusCode === 401) {
    return 'Check GITHUB_TOKEN; it may be expired or revoked';
  }
  if (statusCode === 403) {
    return 'The token lacks permission for this repository, or the rate limit was hit';
  }
  if (statusCode === 404) {
    return 'Check GITHUB_USERNAME and GITHUB_REPO';
  }
  return undefined;
}
