/**
 * Translation functions for raw git output. Every place that reads git's
 * text directly goes through here.
 */

/**
 * Split `-z` output into paths, dropping blanks and duplicates while
 * keeping first-seen order
 */
export function parsePathList(output: string): string[] {
  const seen = new Set<string>();
  for (const entry of output.split(/[\0\n]/)) {
    const trimmed = entry.replace(/\r$/, '');
    if (trimmed.length > 0) {
      seen.add(trimmed);
    }
  }
  return [...seen];
}

/**
 * Parse the single integer printed by `rev-list --count`
 */
export function parseCount(output: string): number {
  const value = Number.parseInt(output.trim(), 10);
  return Number.isNaN(value) ? 0 : value;
}

export interface RemoteSlug {
  owner: string;
  repo: string;
}

/**
 * Owner and repository name from a GitHub remote URL, or null for other hosts.
 * Handles https, ssh and scp-like forms.
 */
export function parseGitHubRemote(url: string): RemoteSlug | null {
  const match = /github\.com[:/]([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/.exec(url.trim());
  if (!match || !match[1] || !match[2]) {
    return null;
  }
  return { owner: match[1], repo: match[2] };
}

/**
 * Slug of the GitHub remote when there is one, else the configured fallback
 */
export function resolveGitHubSlug(remoteUrl: string | null, fallback: RemoteSlug): RemoteSlug {
  return (remoteUrl ? parseGitHubRemote(remoteUrl) : null) ?? fallback;
}

/**
 * Strip credentials embedded in a remote URL before it is displayed
 */
export function redactRemoteUrl(url: string): string {
  return url.replace(/^(https?:\/\/)[^@/]+@/, '$1');
}

/**
 * First line of a commit message, cut to `maxLength` characters
 */
export function commitSubject(message: string, maxLength = 60): string {
  const [subject = ''] = message.trim().split('\n');
  return subject.length > maxLength ? `${subject.slice(0, maxLength - 3)}...` : subject;
}
