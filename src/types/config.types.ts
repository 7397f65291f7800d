/**
 * What the push workflow does when no file matched the configured patterns
 */
export type EmptyCommitPolicy = 'succeed' | 'fail';

/**
 * Fully validated configuration, built once per process from the .env file
 */
export interface RepoConfig {
  readonly username: string;
  readonly token: string;
  readonly repository: string;
  /** Absolute path of the local working tree */
  readonly localPath: string;
  readonly commitMessage: string;
  readonly pushPatterns: readonly string[];
  readonly remote: string;
  readonly emptyCommitPolicy: EmptyCommitPolicy;
  readonly docs: DocsSettings;
  readonly commandTimeoutMs: number;
  readonly historyLimit: number;
}

export interface DocsSettings {
  /** Directory, relative to the working tree, searched for .tex sources */
  readonly directory: string;
  readonly compiler: string;
  readonly passes: number;
}

/**
 * Keys recognised in the .env file
 */
export const CONFIG_KEYS = {
  username: 'GITHUB_USERNAME',
  token: 'GITHUB_TOKEN',
  repository: 'GITHUB_REPO',
  localPath: 'LOCAL_REPO_PATH',
  commitMessage: 'COMMIT_MESSAGE',
  pushPatterns: 'PUSH_PATTERNS',
  remote: 'GIT_REMOTE',
  emptyCommitPolicy: 'EMPTY_COMMIT_POLICY',
  docsDirectory: 'DOCS_DIR',
  docsCompiler: 'DOCS_COMPILER',
  docsPasses: 'DOCS_PASSES',
  commandTimeoutMs: 'COMMAND_TIMEOUT_MS',
  historyLimit: 'HISTORY_LIMIT',
} as const;

export const REQUIRED_CONFIG_KEYS = [
  CONFIG_KEYS.username,
  CONFIG_KEYS.token,
  CONFIG_KEYS.repository,
  CONFIG_KEYS.localPath,
] as const;

export const DEFAULT_SETTINGS = {
  commitMessage: 'Update documentation',
  pushPatterns: ['*'],
  remote: 'origin',
  emptyCommitPolicy: 'succeed',
  docsDirectory: 'docs',
  docsCompiler: 'pdflatex',
  docsPasses: 2,
  commandTimeoutMs: 60_000,
  historyLimit: 5,
} as const;

export const DEFAULT_PATHS = {
  config: '.env',
  statusJson: 'repo_status.json',
  statusText: 'repo_status.txt',
} as const;

export const FALLBACK_VERSION = '0.3.0';

/**
 * Command execution options
 */
export interface CommandOptions {
  verbose?: boolean;
}

/**
 * Outcome every command reports back to the CLI layer
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message?: string;
  data?: T;
  error?: Error;
  exitCode: number;
}
