import * as path from 'path';
import { simpleGit, SimpleGit, StatusResult, GitPluginError } from 'simple-git';
import { FileSystemService } from './filesystem.service';
import { BaseError } from '../errors/base.error';
import { RepositoryNotFoundError, InvalidInputError } from '../errors/git.error';
import {
  ExternalToolFailedError,
  ExternalToolMissingError,
  ExternalToolTimedOutError,
} from '../errors/tool.error';
import {
  BranchList,
  CommitSummary,
  GitCredentials,
  GitLogEntry,
  GitStatus,
} from '../types/git.types';
import { parseCount, parsePathList } from '../utils/git.parsers';
import { logger } from '../utils/logger.service';

export interface GitServiceOptions {
  timeoutMs?: number;
  credentials?: GitCredentials;
  fileSystem?: FileSystemService;
  /** Pre-built client, used instead of spawning git through simple-git */
  client?: SimpleGit;
}

/**
 * Exit code and stderr of the last git process that failed
 */
export interface GitFailure {
  exitCode: number;
  stderr: string;
}

const DEFAULT_GIT_TIMEOUT_MS = 60_000;

/**
 * Git service wrapper with TypeScript support
 */
export class GitService {
  private readonly workingDir: string;
  private readonly fileSystem: FileSystemService;
  private readonly timeoutMs: number;
  private readonly credentials?: GitCredentials | undefined;
  private client?: SimpleGit | undefined;
  private lastFailure?: GitFailure | undefined;

  constructor(workingDir: string, options: GitServiceOptions = {}) {
    this.workingDir = path.resolve(workingDir);
    this.fileSystem = options.fileSystem || new FileSystemService();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS;
    this.credentials = options.credentials;
    this.client = options.client;
  }

  public getWorkingDir(): string {
    return this.workingDir;
  }

  /**
   * Installed git version; fails with ExternalToolMissing when git is absent
   */
  public async ensureGitAvailable(): Promise<string> {
    const version = await this.exec(git => git.version());
    if (!version.installed) {
      throw new ExternalToolMissingError('git');
    }
    return `${version.major}.${version.minor}.${version.patch}`;
  }

  /**
   * Check if directory is a git repository
   */
  public async isRepository(): Promise<boolean> {
    if (!(await this.fileSystem.isDirectory(this.workingDir))) {
      return false;
    }

    try {
      const output = await this.exec(git => git.revparse(['--is-inside-work-tree']));
      return output.trim() === 'true';
    } catch (error) {
      if (error instanceof ExternalToolMissingError || error instanceof ExternalToolTimedOutError) {
        throw error;
      }
      return false;
    }
  }

  public async ensureRepository(): Promise<void> {
    if (!(await this.isRepository())) {
      throw new RepositoryNotFoundError(
        `Not a git repository: ${this.workingDir}`,
        undefined,
        'Check LOCAL_REPO_PATH in your .env file',
      );
    }
  }

  /**
   * Get repository status
   */
  public async getStatus(): Promise<GitStatus> {
    const status: StatusResult = await this.exec(git => git.status());

    return {
      current: status.current,
      tracking: status.tracking,
      ahead: status.ahead,
      behind: status.behind,
      staged: status.staged,
      modified: status.modified,
      untracked: status.not_added,
      deleted: status.deleted,
      conflicted: status.conflicted,
      isClean: status.isClean(),
    };
  }

  /**
   * Modified, deleted and untracked (not ignored) files matching any pathspec
   */
  public async listChangedFiles(patterns: readonly string[]): Promise<string[]> {
    if (patterns.length === 0) {
      return [];
    }

    const output = await this.exec(git =>
      git.raw(['ls-files', '--modified', '--deleted', '--others', '--exclude-standard', '-z', '--', ...patterns]),
    );
    return parsePathList(output);
  }

  /**
   * Stage the given paths, including deletions
   */
  public async stageFiles(files: readonly string[]): Promise<void> {
    if (files.length === 0) {
      return;
    }
    await this.exec(git => git.raw(['add', '-A', '--', ...files]));
  }

  /**
   * Paths currently in the index that differ from HEAD
   */
  public async getStagedFiles(): Promise<string[]> {
    const output = await this.exec(git => git.raw(['diff', '--cached', '--name-only', '-z']));
    return parsePathList(output);
  }

  /**
   * Commit changes
   */
  public async commit(message: string): Promise<CommitSummary> {
    if (!message || !message.trim()) {
      throw new InvalidInputError('Commit message cannot be empty');
    }

    const result = await this.exec(git => git.commit(message.trim()));
    return {
      hash: result.commit,
      branch: result.branch,
      changes: result.summary.changes,
      insertions: result.summary.insertions,
      deletions: result.summary.deletions,
    };
  }

  public async tagExists(tagName: string): Promise<boolean> {
    const tags = await this.exec(git => git.tags());
    return tags.all.includes(tagName);
  }

  public async createAnnotatedTag(tagName: string, message: string): Promise<void> {
    await this.exec(git => git.addAnnotatedTag(tagName, message));
  }

  public async getCurrentBranch(): Promise<string> {
    const branch = await this.exec(git => git.revparse(['--abbrev-ref', 'HEAD']));
    return branch.trim();
  }

  /**
   * Push a branch, and optionally a tag, in one git invocation
   */
  public async push(remote: string, branch: string, tagName?: string): Promise<void> {
    const refs = tagName ? [`refs/tags/${tagName}`] : [];
    await this.exec(git => git.push(remote, branch, refs), true);
  }

  public async pushTag(remote: string, tagName: string): Promise<void> {
    await this.exec(git => git.push(remote, `refs/tags/${tagName}`), true);
  }

  public async pull(remote: string, branch: string): Promise<{ changes: number; files: string[] }> {
    const result = await this.exec(git => git.pull(remote, branch), true);
    return { changes: result.summary.changes, files: result.files };
  }

  /**
   * Whether HEAD points at a commit yet
   */
  public async hasCommits(): Promise<boolean> {
    const output = await this.exec(git => git.raw(['rev-list', '-n', '1', '--all']));
    return output.trim().length > 0;
  }

  public async countCommits(): Promise<number> {
    if (!(await this.hasCommits())) {
      return 0;
    }
    const output = await this.exec(git => git.raw(['rev-list', '--count', 'HEAD']));
    return parseCount(output);
  }

  /**
   * Most recent commits on HEAD, newest first; empty for a fresh repository
   */
  public async getLog(maxCount: number): Promise<GitLogEntry[]> {
    if (!(await this.hasCommits())) {
      return [];
    }

    const log = await this.exec(git => git.log({ maxCount }));
    return log.all.map(entry => ({
      hash: entry.hash,
      shortHash: entry.hash.slice(0, 7),
      date: entry.date,
      message: entry.message,
      author: entry.author_name,
      email: entry.author_email,
    }));
  }

  public async getBranches(): Promise<BranchList> {
    const summary = await this.exec(git => git.branchLocal());
    return {
      current: summary.current,
      branches: summary.all.map(name => {
        const branch = summary.branches[name];
        return {
          name,
          commit: branch ? branch.commit : '',
          current: name === summary.current,
        };
      }),
    };
  }

  /**
   * Create a branch at HEAD without switching to it
   */
  public async createBranch(branchName: string): Promise<void> {
    await this.exec(git => git.branch([branchName]));
  }

  public async switchBranch(branchName: string): Promise<void> {
    await this.exec(git => git.checkout(branchName));
  }

  /**
   * Fetch URL of a remote, or null when it is not configured
   */
  public async getRemoteUrl(remote: string): Promise<string | null> {
    const remotes = await this.exec(git => git.getRemotes(true));
    const match = remotes.find(candidate => candidate.name === remote);
    return match ? match.refs.fetch : null;
  }

  /**
   * Run one simple-git call and translate its failure into the tool error taxonomy
   */
  private async exec<T>(operation: (git: SimpleGit) => Promise<T>, authenticated = false): Promise<T> {
    this.lastFailure = undefined;
    try {
      const git = authenticated && this.credentials ? this.createClient(this.credentials) : this.getClient();
      return await operation(git);
    } catch (error) {
      throw toGitToolError(error, this.timeoutMs, this.lastFailure);
    }
  }

  private getClient(): SimpleGit {
    if (!this.client) {
      this.client = this.createClient();
    }
    return this.client;
  }

  private createClient(credentials?: GitCredentials): SimpleGit {
    logger.debug(`Opening git client in ${this.workingDir}${credentials ? ' (authenticated)' : ''}`);
    return simpleGit({
      baseDir: this.workingDir,
      config: credentials ? [authHeaderConfig(credentials)] : [],
      timeout: { block: this.timeoutMs },
      errors: createErrorHook(failure => {
        this.lastFailure = failure;
      }),
    });
  }
}

/**
 * Process result handed to simple-git's `errors` option
 */
export interface GitExitResult {
  exitCode: number;
  stdOut: Buffer[];
  stdErr: Buffer[];
}

export type GitErrorHook = (error: Buffer | Error | undefined, result: GitExitResult) => Buffer | Error | undefined;

/**
 * simple-git runs its own error detection before this hook, so `error` is
 * usually set already. The exit code is reported before anything is returned.
 */
export function createErrorHook(onFailure: (failure: GitFailure) => void): GitErrorHook {
  return (error, result) => {
    if (result.exitCode !== 0) {
      onFailure({ exitCode: result.exitCode, stderr: Buffer.concat(result.stdErr).toString('utf-8') });
    }
    if (error) {
      return error;
    }
    if (result.exitCode === 0) {
      return undefined;
    }
    return Buffer.concat([...result.stdOut, ...result.stdErr]);
  };
}

/**
 * `-c` entry that sends the token as basic auth to github.com only
 */
export function authHeaderConfig(credentials: GitCredentials): string {
  const encoded = Buffer.from(`${credentials.username}:${credentials.token}`).toString('base64');
  return `http.https://github.com/.extraheader=AUTHORIZATION: basic ${encoded}`;
}

/**
 * Map a simple-git rejection onto ExternalToolMissing, TimedOut or Failed
 */
export function toGitToolError(error: unknown, timeoutMs: number, failure?: GitFailure): BaseError {
  if (error instanceof BaseError) {
    return error;
  }
  if (error instanceof GitPluginError && error.plugin === 'timeout') {
    return new ExternalToolTimedOutError('git', timeoutMs);
  }

  const message = BaseError.messageOf(error);
  if (/\bENOENT\b/.test(message)) {
    return new ExternalToolMissingError('git', message);
  }
  if (/Cannot use simple-git on a directory that does not exist/.test(message)) {
    return new RepositoryNotFoundError(`Repository path does not exist`, message);
  }

  return new ExternalToolFailedError('git', failure ? failure.exitCode : null, failure?.stderr || message);
}
