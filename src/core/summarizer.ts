import { MalformedProposal } from "./errors.js";
import type { ProposalSummary, RawProposal, SummarizeOptions } from "../types/index.js";

const HEADS_PREFIX = "refs/heads/";
const APPROVE = "Approve";

/**
 * Strip the refs/heads/ prefix from a git ref path
 */
export function formatGitBranchName(ref: string): string {
  return ref.startsWith(HEADS_PREFIX) ? ref.slice(HEADS_PREFIX.length) : ref;
}

interface BranchPair {
  sourceRepo: string;
  targetRepo: string;
  sourceRepoUrl: string;
  sourceBranch: string;
  targetBranch: string;
}

function resolveBranches(mp: RawProposal): BranchPair {
  if (mp.sourceGitRepository) {
    if (!mp.targetGitRepository || !mp.sourceGitPath || !mp.targetGitPath) {
      throw new MalformedProposal(mp.webLink, "incomplete git repository/ref pair");
    }
    return {
      sourceRepo: mp.sourceGitRepository.displayName,
      targetRepo: mp.targetGitRepository.displayName,
      sourceRepoUrl: mp.sourceGitRepository.cloneUrl ?? mp.sourceGitRepository.displayName,
      sourceBranch: formatGitBranchName(mp.sourceGitPath),
      targetBranch: formatGitBranchName(mp.targetGitPath),
    };
  }

  if (!mp.sourceBranch || !mp.targetBranch) {
    throw new MalformedProposal(mp.webLink, "no source/target branch information");
  }
  return {
    sourceRepo: "",
    targetRepo: "",
    sourceRepoUrl: "",
    sourceBranch: mp.sourceBranch.displayName,
    targetBranch: mp.targetBranch.displayName,
  };
}

function repoPrefix(repo: string): string {
  return repo ? `${repo}/` : "";
}

/**
 * Picker label for a summary
 */
export function renderSummary(mp: Omit<ProposalSummary, "summary">): string {
  return (
    `${repoPrefix(mp.sourceRepo)}${mp.sourceBranch}` +
    `\n->${repoPrefix(mp.targetRepo)}${mp.targetBranch}` +
    `\n    ${mp.shortCommitMessage}` +
    `\n    ${mp.approvalCount} approvals (${mp.reviewers.join(",")})` +
    `\n    ${mp.dateCreated.toISOString()} - ${mp.webLink}`
  );
}

/**
 * Build the summary of a single proposal.
 * Throws MalformedProposal when the record lacks an author or branch info.
 */
export function summarizeProposal(mp: RawProposal, approvalsOnly = false): ProposalSummary {
  if (!mp.registrant) {
    throw new MalformedProposal(mp.webLink, "no registrant");
  }
  const branches = resolveBranches(mp);

  const reviewers: string[] = [];
  let approvalCount = 0;
  for (const vote of mp.votes) {
    if (vote.isPending) continue;
    const approved = vote.vote === APPROVE;
    if (approved) approvalCount++;
    if (vote.reviewer !== null && (approved || !approvalsOnly)) {
      reviewers.push(vote.reviewer);
    }
  }
  reviewers.sort();

  const commitMessage = mp.commitMessage || mp.description || "";
  const shortCommitMessage = commitMessage ? commitMessage.split(/\r?\n/)[0] : "";

  const fields = {
    author: mp.registrant,
    commitMessage,
    shortCommitMessage,
    reviewers: Object.freeze(reviewers),
    approvalCount,
    webLink: mp.webLink,
    ...branches,
    dateCreated: mp.dateCreated,
  };

  return Object.freeze({ ...fields, summary: renderSummary(fields) });
}

/**
 * Summarize a batch of proposals, newest first.
 * Malformed records are left out and reported through onMalformed.
 */
export function summarize(
  rawProposals: readonly RawProposal[],
  options: SummarizeOptions = {}
): ProposalSummary[] {
  const summaries: ProposalSummary[] = [];
  for (const mp of rawProposals) {
    try {
      summaries.push(summarizeProposal(mp, options.approvalsOnly));
    } catch (error) {
      if (!(error instanceof MalformedProposal)) throw error;
      options.onMalformed?.(error, mp);
    }
  }
  // Array.prototype.sort is stable, equal timestamps keep input order
  return summaries.sort((a, b) => b.dateCreated.getTime() - a.dateCreated.getTime());
}
