/**
 * lpshipit - Launchpad merge proposal tooling
 *
 * Programmatic API for summarizing merge proposals, building merge commit
 * messages and driving the merge flow.
 *
 * @example
 * ```ts
 * import { LaunchpadClient, loadCredentials, summarize, commitMessageFor } from 'lpshipit';
 *
 * const client = new LaunchpadClient({
 *   apiRoot: 'https://api.launchpad.net/devel/',
 *   credentials: loadCredentials('/home/me/.lp_creds'),
 * });
 * const proposals = await client.fetchProposals('me', ['Needs review', 'Approved']);
 * const [newest] = summarize(proposals);
 * console.log(commitMessageFor(newest));
 * ```
 */

// Types
export * from "./types/index.js";

// Errors
export * from "./core/errors.js";

// Core - Summaries & messages
export { summarize, summarizeProposal, renderSummary, formatGitBranchName } from "./core/summarizer.js";
export { buildCommitMessage, commitMessageFor } from "./core/commit-message.js";

// Core - Selection
export { SelectionFlow } from "./core/selection.js";
export { TerminalPicker } from "./core/picker.js";

// Core - Merge flow
export {
  startMergeFlow,
  advance,
  promptFor,
  isSettled,
  defaultBranchIndex,
  runMergeFlow,
  describeOutcome,
  type MergeContext,
  type MergeState,
  type MergeOutcome,
  type MergeInput,
  type PendingChoice,
} from "./core/merge-flow.js";

// Collaborators
export { LaunchpadClient, loadCredentials, parseCredentials, authorizationHeader } from "./core/launchpad.js";
export { GitRepository, openRepository, cloneBranch, headSummary } from "./core/git.js";
export { LxcProvisioner } from "./core/lxc.js";
export { spawnProcess } from "./core/process.js";
export { runTests, DEFAULT_TEST_COMMAND, DEFAULT_PREPARE_COMMANDS } from "./core/test-runner.js";
export { matchesLocalRemote, normalizeRepoPath } from "./core/remotes.js";
export { loadConfig, type AppConfig } from "./core/config.js";
