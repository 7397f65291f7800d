/**
 * Working tree status as reported by `git status`
 */
export interface GitStatus {
  current: string | null;
  tracking: string | null;
  ahead: number;
  behind: number;
  staged: string[];
  modified: string[];
  untracked: string[];
  deleted: string[];
  conflicted: string[];
  isClean: boolean;
}

/**
 * Git log entry
 */
export interface GitLogEntry {
  hash: string;
  shortHash: string;
  date: string;
  message: string;
  author: string;
  email: string;
}

export interface BranchInfo {
  name: string;
  commit: string;
  current: boolean;
}

export interface BranchList {
  current: string;
  branches: BranchInfo[];
}

/**
 * Commit created by a workflow
 */
export interface CommitSummary {
  hash: string;
  branch: string;
  changes: number;
  insertions: number;
  deletions: number;
}

/**
 * Basic auth credential handed to git for pushes and pulls
 */
export interface GitCredentials {
  username: string;
  token: string;
}
