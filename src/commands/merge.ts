import pc from "picocolors";
import { input } from "@inquirer/prompts";
import { loadConfig, type AppConfig } from "../core/config.js";
import { openRepository } from "../core/git.js";
import { describeOutcome, runMergeFlow } from "../core/merge-flow.js";
import { TerminalPicker } from "../core/picker.js";
import { matchesLocalRemote } from "../core/remotes.js";
import { createReviewSource, debugLog, findByWebLink, loadSummaries } from "./shared.js";
import type { ChoicePresenter, LocalVcs, ReviewSource } from "../types/index.js";

export interface MergeCommandOptions {
  directory?: string;
  sourceBranch?: string;
  targetBranch?: string;
  mpOwner?: string;
  /** Web link of the proposal to merge, skipping the proposal picker */
  mp?: string;
  matchRemotes?: boolean;
  approvalsOnly?: boolean;
  debug?: boolean;
}

export interface MergeCommandDeps {
  config: AppConfig;
  openRepository: (directory: string) => LocalVcs;
  createReviewSource: (config: AppConfig) => ReviewSource;
  presenter: ChoicePresenter;
  askDirectory: (defaultDirectory: string) => Promise<string>;
}

function defaultDeps(): MergeCommandDeps {
  return {
    config: loadConfig(),
    openRepository,
    createReviewSource,
    presenter: new TerminalPicker(),
    askDirectory: (defaultDirectory) => input({ message: "Which directory", default: defaultDirectory }),
  };
}

/**
 * Merge the chosen proposal's source branch into its target branch with a
 * no-fast-forward merge. Nothing is pushed.
 */
export async function mergeCommand(
  options: MergeCommandOptions,
  deps: MergeCommandDeps = defaultDeps()
): Promise<number> {
  const directory = options.directory ?? (await deps.askDirectory(process.cwd()));
  const vcs = deps.openRepository(directory);
  debugLog(options.debug, `Using repository at ${directory}`);

  const remoteUrls = options.matchRemotes ? vcs.listRemoteUrls() : [];
  const summaries = await loadSummaries(deps.createReviewSource(deps.config), {
    mpOwner: options.mpOwner,
    statuses: deps.config.statuses,
    approvalsOnly: options.approvalsOnly,
    debug: options.debug,
    filter: options.matchRemotes ? (mp) => matchesLocalRemote(mp, remoteUrls) : undefined,
  });

  const outcome = await runMergeFlow(
    {
      proposals: summaries,
      localBranches: vcs.listLocalBranches(),
      checkedOutBranch: vcs.currentBranch(),
      proposal: options.mp ? findByWebLink(summaries, options.mp) : undefined,
      sourceBranch: options.sourceBranch,
      targetBranch: options.targetBranch,
    },
    deps.presenter,
    vcs
  );

  switch (outcome.kind) {
    case "confirmed":
      debugLog(options.debug, `Commit message:\n${outcome.message}`);
      console.log(pc.green(describeOutcome(outcome)));
      return 0;
    case "rejected":
      console.error(pc.red(describeOutcome(outcome)));
      return outcome.error.exitCode;
    case "cancelled":
      console.log(pc.dim(describeOutcome(outcome)));
      return 0;
  }
}
