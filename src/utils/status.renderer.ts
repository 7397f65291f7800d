import { StatusReport } from '../core/status.service';
import { commitSubject } from './git.parsers';

const RULE = '='.repeat(70);

/**
 * Machine-readable form of a status report, one key per text section
 */
export interface StatusExport {
  repository: { path: string; remote: { name: string; url: string | null } };
  branch: { name: string | null; tracking: string | null; totalCommits: number };
  aheadBehind: { ahead: number; behind: number };
  changes: {
    clean: boolean;
    staged: string[];
    modified: string[];
    deleted: string[];
    untracked: string[];
    conflicted: string[];
  };
  recentCommits: Array<{ hash: string; date: string; author: string; subject: string }>;
  branches: Array<{ name: string; commit: string; current: boolean }>;
  github?: {
    fullName: string;
    defaultBranch: string;
    visibility: string;
    url: string;
    pushedAt: string | null;
    openIssues: number;
    stars: number;
  };
}

export function toStatusExport(report: StatusReport): StatusExport {
  const exported: StatusExport = {
    repository: {
      path: report.repository.path,
      remote: { name: report.repository.remoteName, url: report.repository.remoteUrl },
    },
    branch: {
      name: report.branch.current,
      tracking: report.branch.tracking,
      totalCommits: report.branch.totalCommits,
    },
    aheadBehind: { ahead: report.branch.ahead, behind: report.branch.behind },
    changes: {
      clean: report.changes.clean,
      staged: [...report.changes.staged],
      modified: [...report.changes.modified],
      deleted: [...report.changes.deleted],
      untracked: [...report.changes.untracked],
      conflicted: [...report.changes.conflicted],
    },
    recentCommits: report.recentCommits.map(commit => ({
      hash: commit.shortHash,
      date: commit.date,
      author: commit.author,
      subject: commitSubject(commit.message, 100),
    })),
    branches: report.branches.map(branch => ({ ...branch })),
  };

  if (report.github) {
    exported.github = {
      fullName: report.github.fullName,
      defaultBranch: report.github.defaultBranch,
      visibility: report.github.visibility,
      url: report.github.htmlUrl,
      pushedAt: report.github.pushedAt,
      openIssues: report.github.openIssues,
      stars: report.github.stars,
    };
  }

  return exported;
}

export function renderStatusJson(report: StatusReport): string {
  return `${JSON.stringify(toStatusExport(report), null, 2)}\n`;
}

/**
 * Multi-section plain text report
 */
export function renderStatusText(report: StatusReport): string {
  const lines: string[] = [RULE, 'REPOSITORY STATUS', RULE];
  const section = (title: string): void => {
    lines.push('', `${title}:`);
  };

  section('REPOSITORY');
  lines.push(`  Path: ${report.repository.path}`);
  lines.push(`  Remote: ${report.repository.remoteName} ${report.repository.remoteUrl ?? '(not configured)'}`);

  section('BRANCH');
  lines.push(`  Current: ${report.branch.current ?? '(detached)'}`);
  lines.push(`  Tracking: ${report.branch.tracking ?? '(none)'}`);
  lines.push(
    report.branch.tracking
      ? `  Ahead/behind: ${report.branch.ahead} ahead, ${report.branch.behind} behind`
      : '  Ahead/behind: no upstream',
  );
  lines.push(`  Total commits: ${report.branch.totalCommits}`);
  lines.push(`  Status: ${report.changes.clean ? 'clean' : `dirty (${countChanges(report)} changed)`}`);

  section('BRANCHES');
  if (report.branches.length === 0) {
    lines.push('  (none)');
  }
  for (const branch of report.branches) {
    lines.push(`  ${branch.current ? '▶' : ' '} ${branch.name} (${branch.commit})`);
  }

  section('RECENT COMMITS');
  if (report.recentCommits.length === 0) {
    lines.push('  (none)');
  }
  report.recentCommits.forEach((commit, index) => {
    lines.push(`  ${index + 1}. ${commit.shortHash} - ${commitSubject(commit.message)}`);
    lines.push(`     ${commit.author} (${commit.date.slice(0, 10)})`);
  });

  section('CHANGED FILES');
  const changed = [
    ...report.changes.staged.map(file => `  A ${file}`),
    ...report.changes.modified.map(file => `  M ${file}`),
    ...report.changes.deleted.map(file => `  D ${file}`),
    ...report.changes.untracked.map(file => `  ? ${file}`),
    ...report.changes.conflicted.map(file => `  U ${file}`),
  ];
  lines.push(...(changed.length > 0 ? changed : ['  (none)']));

  if (report.github) {
    section('GITHUB');
    lines.push(`  Repository: ${report.github.fullName} (${report.github.visibility})`);
    lines.push(`  Default branch: ${report.github.defaultBranch}`);
    lines.push(`  URL: ${report.github.htmlUrl}`);
    lines.push(`  Last push: ${report.github.pushedAt ?? 'never'}`);
    lines.push(`  Open issues: ${report.github.openIssues}`);
  }

  lines.push('', RULE, '');
  return lines.join('\n');
}

function countChanges(report: StatusReport): number {
  const { staged, modified, deleted, untracked, conflicted } = report.changes;
  return new Set([...staged, ...modified, ...deleted, ...untracked, ...conflicted]).size;
}
