import { commitMessageFor } from "./commit-message.js";
import { SameBranchRejection } from "./errors.js";
import type { ChoicePresenter, LocalVcs, ProposalSummary } from "../types/index.js";

/**
 * Cascading merge flow:
 * choosingProposal -> choosingSourceBranch -> choosingTargetBranch -> confirmed | rejected
 * Any pending state can move to cancelled. Pre-supplied values skip their step.
 */

export interface MergeContext {
  proposals: readonly ProposalSummary[];
  localBranches: readonly string[];
  checkedOutBranch?: string;
  /** Pre-supplied values skip their picker */
  proposal?: ProposalSummary;
  sourceBranch?: string;
  targetBranch?: string;
}

export type MergeState =
  | { kind: "choosingProposal"; context: MergeContext }
  | { kind: "choosingSourceBranch"; context: MergeContext; proposal: ProposalSummary }
  | {
      kind: "choosingTargetBranch";
      context: MergeContext;
      proposal: ProposalSummary;
      sourceBranch: string;
    }
  | {
      kind: "confirmed";
      proposal: ProposalSummary;
      sourceBranch: string;
      targetBranch: string;
      message: string;
    }
  | {
      kind: "rejected";
      proposal: ProposalSummary;
      sourceBranch: string;
      targetBranch: string;
      error: SameBranchRejection;
    }
  | { kind: "cancelled" };

export type MergeOutcome = Extract<MergeState, { kind: "confirmed" | "rejected" | "cancelled" }>;
export type PendingMergeState = Exclude<MergeState, MergeOutcome>;

export type MergeInput = { type: "selected"; index: number } | { type: "cancelled" };

export interface PendingChoice {
  title: string;
  options: readonly string[];
  defaultIndex: number;
}

export function isSettled(state: MergeState): state is MergeOutcome {
  return state.kind === "confirmed" || state.kind === "rejected" || state.kind === "cancelled";
}

function finish(proposal: ProposalSummary, sourceBranch: string, targetBranch: string): MergeOutcome {
  if (sourceBranch === targetBranch) {
    return {
      kind: "rejected",
      proposal,
      sourceBranch,
      targetBranch,
      error: new SameBranchRejection(sourceBranch),
    };
  }
  return {
    kind: "confirmed",
    proposal,
    sourceBranch,
    targetBranch,
    message: commitMessageFor(proposal, { sourceBranch, targetBranch }),
  };
}

function afterSource(context: MergeContext, proposal: ProposalSummary, sourceBranch: string): MergeState {
  if (context.targetBranch === undefined) {
    return { kind: "choosingTargetBranch", context, proposal, sourceBranch };
  }
  return finish(proposal, sourceBranch, context.targetBranch);
}

function afterProposal(context: MergeContext, proposal: ProposalSummary): MergeState {
  if (context.sourceBranch === undefined) {
    return { kind: "choosingSourceBranch", context, proposal };
  }
  return afterSource(context, proposal, context.sourceBranch);
}

export function startMergeFlow(context: MergeContext): MergeState {
  if (context.proposal) return afterProposal(context, context.proposal);
  return { kind: "choosingProposal", context };
}

function pick<T>(items: readonly T[], index: number): T {
  if (!Number.isInteger(index) || index < 0 || index >= items.length) {
    throw new RangeError(`selection ${index} is outside 0..${items.length - 1}`);
  }
  return items[index];
}

/**
 * Pure transition. Settled states are returned unchanged.
 */
export function advance(state: MergeState, input: MergeInput): MergeState {
  if (isSettled(state)) return state;
  if (input.type === "cancelled") return { kind: "cancelled" };

  const { context } = state;
  switch (state.kind) {
    case "choosingProposal":
      return afterProposal(context, pick(context.proposals, input.index));
    case "choosingSourceBranch":
      return afterSource(context, state.proposal, pick(context.localBranches, input.index));
    case "choosingTargetBranch":
      return finish(state.proposal, state.sourceBranch, pick(context.localBranches, input.index));
  }
}

/**
 * Index of preferred in branches, else of fallback, else 0
 */
export function defaultBranchIndex(
  branches: readonly string[],
  preferred: string,
  fallback?: string
): number {
  const index = branches.indexOf(preferred);
  if (index >= 0) return index;
  if (fallback !== undefined && branches.includes(fallback)) return branches.indexOf(fallback);
  return 0;
}

export function promptFor(state: PendingMergeState): PendingChoice {
  const { context } = state;
  switch (state.kind) {
    case "choosingProposal":
      return {
        title: "Merge Proposal",
        options: context.proposals.map((mp) => mp.summary),
        defaultIndex: 0,
      };
    case "choosingSourceBranch":
      return {
        title: "Source Branch",
        options: context.localBranches,
        defaultIndex: defaultBranchIndex(
          context.localBranches,
          state.proposal.sourceBranch,
          context.checkedOutBranch
        ),
      };
    case "choosingTargetBranch":
      return {
        title: "Target Branch",
        options: context.localBranches,
        defaultIndex: defaultBranchIndex(context.localBranches, state.proposal.targetBranch),
      };
  }
}

/**
 * Drive the flow to a settled state, merging on confirmation.
 */
export async function runMergeFlow(
  context: MergeContext,
  presenter: ChoicePresenter,
  vcs: LocalVcs
): Promise<MergeOutcome> {
  let state = startMergeFlow(context);
  for (;;) {
    if (isSettled(state)) {
      if (state.kind === "confirmed") {
        vcs.checkout(state.targetBranch);
        vcs.mergeNoFf(state.sourceBranch, state.message);
      }
      return state;
    }
    const choice = promptFor(state);
    const index = await presenter.presentChoice(choice.options, choice.title, choice.defaultIndex);
    state = advance(state, index === null ? { type: "cancelled" } : { type: "selected", index });
  }
}

export function describeOutcome(outcome: MergeOutcome): string {
  switch (outcome.kind) {
    case "confirmed":
      return `${outcome.sourceBranch} has been merged in to ${outcome.targetBranch} \nChanges have _NOT_ been pushed`;
    case "rejected":
      return outcome.error.message;
    case "cancelled":
      return "Cancelled, nothing was merged";
  }
}
