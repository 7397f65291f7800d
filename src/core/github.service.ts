import { request } from 'undici';
import { z } from 'zod';
import { GitHubApiError } from '../errors/github.error';
import { BaseError } from '../errors/base.error';
import { logger } from '../utils/logger.service';

const GITHUB_API_URL = 'https://api.github.com';
const USER_AGENT = 'gitchore-cli';

// Docs: https://docs.github.com/en/rest/repos/repos#get-a-repository
const RepositoryResponseSchema = z.object({
  name: z.string(),
  full_name: z.string(),
  description: z.string().nullable(),
  default_branch: z.string(),
  private: z.boolean(),
  visibility: z.string().optional(),
  html_url: z.string(),
  pushed_at: z.string().nullable(),
  open_issues_count: z.number(),
  stargazers_count: z.number(),
});

const UserResponseSchema = z.object({
  login: z.string(),
  name: z.string().nullable().optional(),
});

/**
 * Remote metadata the local git binary cannot report
 */
export interface RemoteRepositoryInfo {
  fullName: string;
  description: string | null;
  defaultBranch: string;
  visibility: string;
  htmlUrl: string;
  pushedAt: string | null;
  openIssues: number;
  stars: number;
}

export interface GitHubUser {
  login: string;
  name: string | null;
}

export interface GitHubServiceOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Minimal GitHub REST client authenticated with a personal access token
 */
export class GitHubService {
  private readonly token: string;
  private readonly owner: string;
  private readonly repo: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(token: string, owner: string, repo: string, options: GitHubServiceOptions = {}) {
    this.token = token;
    this.owner = owner;
    this.repo = repo;
    this.baseUrl = options.baseUrl ?? GITHUB_API_URL;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  public async getRepository(): Promise<RemoteRepositoryInfo> {
    const data = await this.get(`/repos/${this.owner}/${this.repo}`, RepositoryResponseSchema);
    return {
      fullName: data.full_name,
      description: data.description,
      defaultBranch: data.default_branch,
      visibility: data.visibility ?? (data.private ? 'private' : 'public'),
      htmlUrl: data.html_url,
      pushedAt: data.pushed_at,
      openIssues: data.open_issues_count,
      stars: data.stargazers_count,
    };
  }

  /**
   * The account the token belongs to; used to verify credentials
   */
  public async getAuthenticatedUser(): Promise<GitHubUser> {
    const data = await this.get('/user', UserResponseSchema);
    return { login: data.login, name: data.name ?? null };
  }

  private async get<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    logger.debug(`GET ${this.baseUrl}${endpoint}`);

    const { body, statusCode } = await request(`${this.baseUrl}${endpoint}`, {
      method: 'GET',
      headers: {
        Authorization: `Bearer ${this.token}`,
        'User-Agent': USER_AGENT,
        Accept: 'application/vnd.github+json',
        'X-GitHub-Api-Version': '2022-11-28',
      },
      headersTimeout: this.timeoutMs,
      bodyTimeout: this.timeoutMs,
    });

    if (statusCode < 200 || statusCode >= 300) {
      const text = await body.text();
      throw new GitHubApiError(statusCode, parseGitHubMessage(text), endpoint);
    }

    const result = schema.safeParse(await body.json());
    if (!result.success) {
      throw new GitHubApiError(statusCode, `Unexpected response shape: ${result.error.message}`, endpoint);
    }
    return result.data;
  }
}

/**
 * GitHub error bodies are JSON with a `message`; fall back to the raw text
 */
export function parseGitHubMessage(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === 'object' && parsed !== null && 'message' in parsed && typeof parsed.message === 'string') {
      return parsed.message;
    }
  } catch (error) {
    logger.debug(`GitHub error body is not JSON: ${BaseError.messageOf(error)}`);
  }
  return text;
}
