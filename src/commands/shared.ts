import pc from "picocolors";
import { LaunchpadClient, loadCredentials } from "../core/launchpad.js";
import { NoEligibleProposals, ShipitError } from "../core/errors.js";
import { summarize } from "../core/summarizer.js";
import type { AppConfig } from "../core/config.js";
import type { ChoicePresenter, ProposalSummary, ReviewSource } from "../types/index.js";

export interface ProposalQuery {
  /** Launchpad name of the MP owner; defaults to the authenticated person */
  mpOwner?: string;
  statuses: readonly string[];
  approvalsOnly?: boolean;
  debug?: boolean;
  /** Keep only proposals matching this predicate */
  filter?: (mp: ProposalSummary) => boolean;
}

export function describeStatuses(statuses: readonly string[]): string {
  const quoted = statuses.map((s) => `'${s}'`);
  if (quoted.length === 1) return `${quoted[0]} state`;
  return `either ${quoted.slice(0, -1).join(", ")} or ${quoted[quoted.length - 1]} state`;
}

export function debugLog(enabled: boolean | undefined, message: string): void {
  if (enabled) console.log(pc.dim(`Debug: ${message}`));
}

export function createReviewSource(config: AppConfig): ReviewSource {
  return new LaunchpadClient({
    apiRoot: config.apiRoot,
    credentials: loadCredentials(config.credentialsFile),
    onWarning: (message) => console.warn(pc.yellow(`⚠ ${message}`)),
  });
}

/**
 * Fetch and summarize the owner's proposals.
 * Throws NoEligibleProposals when none are left.
 */
export async function loadSummaries(source: ReviewSource, query: ProposalQuery): Promise<ProposalSummary[]> {
  console.log(pc.cyan("Retrieving Merge Proposals from Launchpad..."));
  const owner = query.mpOwner ?? (await source.me());
  const proposals = await source.fetchProposals(owner, query.statuses);
  debugLog(query.debug, `Launchpad returned ${proposals.length} merge proposals`);

  const summaries = summarize(proposals, {
    approvalsOnly: query.approvalsOnly,
    onMalformed: (error) => console.warn(pc.yellow(`⚠ ${error.message}`)),
  });
  const eligible = query.filter ? summaries.filter(query.filter) : summaries;
  debugLog(query.debug, `${eligible.length} of ${summaries.length} merge proposals are eligible`);

  if (eligible.length === 0) {
    throw new NoEligibleProposals(`You have no Merge Proposals in ${describeStatuses(query.statuses)}`);
  }
  return eligible;
}

/**
 * Pick one summary, null when cancelled
 */
export async function chooseProposal(
  presenter: ChoicePresenter,
  summaries: readonly ProposalSummary[],
  title: string
): Promise<ProposalSummary | null> {
  const index = await presenter.presentChoice(
    summaries.map((mp) => mp.summary),
    title,
    0
  );
  return index === null ? null : summaries[index];
}

/**
 * Find the proposal with the given web link
 */
export function findByWebLink(summaries: readonly ProposalSummary[], webLink: string): ProposalSummary {
  const normalized = webLink.replace(/\/+$/, "");
  const match = summaries.find((mp) => mp.webLink.replace(/\/+$/, "") === normalized);
  if (!match) {
    throw new NoEligibleProposals(`No eligible Merge Proposal has the link ${webLink}`);
  }
  return match;
}

/**
 * Run a command action, printing failures as plain text.
 * Resolves with the process exit code.
 */
export async function runAction(action: () => Promise<number>, options: { debug?: boolean } = {}): Promise<number> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof ShipitError) {
      console.error(pc.red(error.message));
      return error.exitCode;
    }
    const message = error instanceof Error ? error.message : String(error);
    console.error(pc.red(`❌ ${message}`));
    if (options.debug && error instanceof Error && error.stack) {
      console.error(pc.dim(error.stack));
    }
    return 1;
  }
}
