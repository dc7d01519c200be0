import { loadConfig, type AppConfig } from "../core/config.js";
import { commitMessageFor } from "../core/commit-message.js";
import { TerminalPicker } from "../core/picker.js";
import { chooseProposal, createReviewSource, loadSummaries } from "./shared.js";
import type { ChoicePresenter, ReviewSource } from "../types/index.js";

export interface MessageCommandOptions {
  mpOwner?: string;
  approvalsOnly?: boolean;
  debug?: boolean;
}

export interface MessageCommandDeps {
  config: AppConfig;
  createReviewSource: (config: AppConfig) => ReviewSource;
  presenter: ChoicePresenter;
  print: (text: string) => void;
}

/**
 * Print the merge commit message for the chosen proposal
 */
export async function messageCommand(
  options: MessageCommandOptions,
  deps: MessageCommandDeps = {
    config: loadConfig(),
    createReviewSource,
    presenter: new TerminalPicker(),
    print: console.log,
  }
): Promise<number> {
  const summaries = await loadSummaries(deps.createReviewSource(deps.config), {
    mpOwner: options.mpOwner,
    statuses: deps.config.statuses,
    approvalsOnly: options.approvalsOnly,
    debug: options.debug,
  });

  const chosen = await chooseProposal(deps.presenter, summaries, "Merge Proposal");
  if (chosen) {
    deps.print(commitMessageFor(chosen));
  }
  return 0;
}
