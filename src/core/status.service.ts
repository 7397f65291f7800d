import { GitService } from './git.service';
import { RemoteRepositoryInfo } from './github.service';
import { BranchInfo, GitLogEntry } from '../types/git.types';
import { redactRemoteUrl } from '../utils/git.parsers';

/**
 * Snapshot of one working tree, assembled from read-only git queries
 */
export interface StatusReport {
  repository: {
    path: string;
    remoteName: string;
    remoteUrl: string | null;
  };
  branch: {
    current: string | null;
    tracking: string | null;
    ahead: number;
    behind: number;
    totalCommits: number;
  };
  changes: {
    clean: boolean;
    staged: string[];
    modified: string[];
    deleted: string[];
    untracked: string[];
    conflicted: string[];
  };
  recentCommits: GitLogEntry[];
  branches: BranchInfo[];
  github?: RemoteRepositoryInfo;
}

export interface StatusQueryOptions {
  remote: string;
  historyLimit: number;
}

/**
 * Runs the fixed battery of read-only queries behind the monitor
 */
export class StatusService {
  private readonly git: GitService;

  constructor(git: GitService) {
    this.git = git;
  }

  public async collect(options: StatusQueryOptions): Promise<StatusReport> {
    await this.git.ensureRepository();

    const status = await this.git.getStatus();
    const totalCommits = await this.git.countCommits();
    const recentCommits = await this.git.getLog(options.historyLimit);
    const branches = totalCommits > 0 ? (await this.git.getBranches()).branches : [];
    const remoteUrl = await this.git.getRemoteUrl(options.remote);

    return {
      repository: {
        path: this.git.getWorkingDir(),
        remoteName: options.remote,
        remoteUrl: remoteUrl === null ? null : redactRemoteUrl(remoteUrl),
      },
      branch: {
        current: status.current,
        tracking: status.tracking,
        ahead: status.ahead,
        behind: status.behind,
        totalCommits,
      },
      changes: {
        clean: status.isClean,
        staged: status.staged,
        modified: status.modified,
        deleted: status.deleted,
        untracked: status.untracked,
        conflicted: status.conflicted,
      },
      recentCommits,
      branches,
    };
  }
}
