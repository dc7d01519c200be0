import type { ProposalSummary } from "../types/index.js";

export interface CommitMessageParts {
  author: string;
  /** Comma-joined reviewer names */
  reviewers: string;
  sourceBranch: string;
  targetBranch: string;
  commitMessage: string;
  webLink: string;
}

/**
 * Builds the agreed merge commit message. Fields are inserted verbatim.
 */
export function buildCommitMessage(parts: CommitMessageParts): string {
  return (
    `Merge ${parts.sourceBranch} into ${parts.targetBranch} ` +
    `[a=${parts.author}] [r=${parts.reviewers}]\n\n` +
    `${parts.commitMessage}\n\n` +
    `MP: ${parts.webLink}`
  );
}

export function commitMessageFor(
  mp: ProposalSummary,
  branches: { sourceBranch: string; targetBranch: string } = mp
): string {
  return buildCommitMessage({
    author: mp.author,
    reviewers: mp.reviewers.join(","),
    sourceBranch: branches.sourceBranch,
    targetBranch: branches.targetBranch,
    commitMessage: mp.commitMessage,
    webLink: mp.webLink,
  });
}
