import type { ProposalSummary } from "../types/index.js";

/**
 * Reduce a Launchpad repository name or git remote URL to its path,
 * e.g. "git+ssh://user@git.launchpad.net/~team/proj/+git/repo.git" -> "~team/proj/+git/repo"
 */
export function normalizeRepoPath(value: string): string {
  return value
    .trim()
    .replace(/^lp:/, "")
    .replace(/^[a-z+]+:\/\/[^/]+\//, "")
    .replace(/^[^@/]+@[^:/]+:/, "")
    .replace(/\.git$/, "")
    .replace(/\/+$/, "");
}

/**
 * Whether the proposal targets a repository that is one of the local remotes
 */
export function matchesLocalRemote(mp: ProposalSummary, remoteUrls: readonly string[]): boolean {
  if (!mp.targetRepo) return false;
  const target = normalizeRepoPath(mp.targetRepo);
  return remoteUrls.some((url) => normalizeRepoPath(url) === target);
}
