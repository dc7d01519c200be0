/**
 * Core type definitions for lpshipit
 * Raw review records, their normalized summaries, and the collaborators the
 * tools drive.
 */

// =============================================================================
// Review Records
// =============================================================================

export interface RawVote {
  /** Reviewer's Launchpad name; null when the reviewer could not be resolved */
  reviewer: string | null;
  isPending: boolean;
  /** Vote value from the review comment, e.g. "Approve", "Needs Fixing" */
  vote: string | null;
}

export interface RawRepository {
  displayName: string;
  cloneUrl: string | null;
}

export interface RawBranch {
  displayName: string;
}

/**
 * A merge proposal as fetched from the review system, with linked resources
 * already resolved.
 */
export interface RawProposal {
  registrant: string | null;
  description: string | null;
  commitMessage: string | null;
  votes: RawVote[];
  webLink: string;
  dateCreated: Date;
  // git-backed proposals
  sourceGitRepository?: RawRepository | null;
  targetGitRepository?: RawRepository | null;
  sourceGitPath?: string | null;
  targetGitPath?: string | null;
  // bzr branch-backed proposals
  sourceBranch?: RawBranch | null;
  targetBranch?: RawBranch | null;
}

export interface ProposalSummary {
  readonly author: string;
  readonly commitMessage: string;
  readonly shortCommitMessage: string;
  readonly reviewers: readonly string[];
  readonly approvalCount: number;
  readonly webLink: string;
  /** Display name; empty for non-git proposals */
  readonly sourceRepo: string;
  readonly targetRepo: string;
  /** Clone URL of the source repository; empty for non-git proposals */
  readonly sourceRepoUrl: string;
  readonly sourceBranch: string;
  readonly targetBranch: string;
  readonly dateCreated: Date;
  /** Multi-line label shown in pickers */
  readonly summary: string;
}

export interface SummarizeOptions {
  /** Only list reviewers whose vote was an approval */
  approvalsOnly?: boolean;
  onMalformed?: (error: Error, proposal: RawProposal) => void;
}

// =============================================================================
// Collaborators
// =============================================================================

export interface ReviewSource {
  /** Name of the authenticated person */
  me(): Promise<string>;
  fetchProposals(owner: string, statuses: readonly string[]): Promise<RawProposal[]>;
}

export interface LocalVcs {
  listLocalBranches(): string[];
  /** Checked-out branch, undefined on a detached HEAD */
  currentBranch(): string | undefined;
  checkout(branch: string): void;
  mergeNoFf(sourceBranch: string, message: string): void;
  listRemoteUrls(): string[];
}

export interface ChoicePresenter {
  /** Resolves with the selected index, or null when the user cancels */
  presentChoice(options: readonly string[], title: string, defaultIndex?: number): Promise<number | null>;
}

export type LineSink = (line: string) => void;

export interface CommandResult {
  code: number;
  /** Combined output lines; empty unless the run asked to capture them */
  output: string;
}

export interface ProcessRunOptions {
  cwd?: string;
  onLine?: LineSink;
  capture?: boolean;
}

export type ProcessRunner = (
  file: string,
  args: readonly string[],
  options?: ProcessRunOptions
) => Promise<CommandResult>;

export interface EnvironmentSpec {
  /** Image release, e.g. "22.04" */
  release: string;
  /** Local directory made available inside the environment */
  workspace: string;
}

export interface EnvironmentHandle {
  name: string;
  user: string;
  home: string;
  /** Path of the pushed workspace inside the environment */
  workspace: string;
}

export interface EnvironmentProvisioner {
  provision(spec: EnvironmentSpec, onLine?: LineSink): Promise<EnvironmentHandle>;
  run(handle: EnvironmentHandle, command: string, onLine?: LineSink): Promise<number>;
  teardown(handle: EnvironmentHandle, onLine?: LineSink): Promise<void>;
}
