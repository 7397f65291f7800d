import { GitService } from '../core/git.service';
import { PushSummary } from '../core/push.workflow';
import { Prompter, TextPromptOptions } from '../utils/prompter';
import { RepoConfig } from '../types/config.types';
import { GitLogEntry, GitStatus } from '../types/git.types';

export function createConfig(overrides: Partial<RepoConfig> = {}): RepoConfig {
  return {
    username: 'octocat',
    token: 'test-secret',
    repository: 'demo',
    localPath: '/test/workspace/demo',
    commitMessage: 'Update documentation',
    pushPatterns: ['*.md'],
    remote: 'origin',
    emptyCommitPolicy: 'succeed',
    docs: { directory: 'docs', compiler: 'pdflatex', passes: 2 },
    commandTimeoutMs: 60000,
    historyLimit: 5,
    ...overrides,
  };
}

export function createStatus(overrides: Partial<GitStatus> = {}): GitStatus {
  return {
    current: 'main',
    tracking: 'origin/main',
    ahead: 0,
    behind: 0,
    staged: [],
    modified: [],
    untracked: [],
    deleted: [],
    conflicted: [],
    isClean: true,
    ...overrides,
  };
}

export function createLogEntry(hash: string, message: string, date = '2024-03-01T10:00:00+00:00'): GitLogEntry {
  return {
    hash,
    shortHash: hash.slice(0, 7),
    date,
    message,
    author: 'Octo Cat',
    email: 'octocat@example.com',
  };
}

export function createMockGit(): jest.Mocked<GitService> {
  return {
    getWorkingDir: jest.fn().mockReturnValue('/test/workspace/demo'),
    ensureGitAvailable: jest.fn().mockResolvedValue(undefined),
    isRepository: jest.fn().mockResolvedValue(true),
    ensureRepository: jest.fn().mockResolvedValue(undefined),
    getStatus: jest.fn(),
    listChangedFiles: jest.fn().mockResolvedValue([]),
    stageFiles: jest.fn().mockResolvedValue(undefined),
    getStagedFiles: jest.fn().mockResolvedValue([]),
    commit: jest.fn(),
    tagExists: jest.fn().mockResolvedValue(false),
    createAnnotatedTag: jest.fn().mockResolvedValue(undefined),
    getCurrentBranch: jest.fn().mockResolvedValue('main'),
    push: jest.fn().mockResolvedValue(undefined),
    pushTag: jest.fn().mockResolvedValue(undefined),
    pull: jest.fn(),
    hasCommits: jest.fn().mockResolvedValue(true),
    countCommits: jest.fn().mockResolvedValue(0),
    getLog: jest.fn().mockResolvedValue([]),
    getBranches: jest.fn(),
    createBranch: jest.fn().mockResolvedValue(undefined),
    switchBranch: jest.fn().mockResolvedValue(undefined),
    getRemoteUrl: jest.fn().mockResolvedValue(null),
  } as unknown as jest.Mocked<GitService>;
}

export function createPushSummary(overrides: Partial<PushSummary> = {}): PushSummary {
  return {
    status: 'pushed',
    stagedFiles: ['README.md'],
    branch: 'main',
    remote: 'origin',
    report: { workflow: 'push', steps: [], halted: false },
    ...overrides,
  };
}

/**
 * Prompter that replays canned answers; an exhausted script reads as a cancel
 */
export function createScriptedPrompter(
  answers: Array<string | null>,
  confirmations: Array<boolean | null> = [],
): jest.Mocked<Prompter> {
  const texts = [...answers];
  const confirms = [...confirmations];
  const next = (): string | null => (texts.length > 0 ? (texts.shift() ?? null) : null);

  return {
    text: jest.fn<Promise<string | null>, [string, TextPromptOptions?]>(async () => next()),
    secret: jest.fn<Promise<string | null>, [string]>(async () => next()),
    confirm: jest.fn<Promise<boolean | null>, [string, boolean?]>(async () =>
      confirms.length > 0 ? (confirms.shift() ?? null) : null,
    ),
  };
}
