import { vi } from "vitest";
import type { AppConfig } from "../core/config.js";
import type { ChoicePresenter, LocalVcs, RawProposal, ReviewSource } from "../types/index.js";

export const WEB_LINK = "https://code.launchpad.net/~alice/proj/+git/proj/+merge/101";

export function rawProposal(overrides: Partial<RawProposal> = {}): RawProposal {
  return {
    registrant: "alice",
    description: "Fix the thing\nLonger explanation",
    commitMessage: null,
    votes: [
      { reviewer: "carol", isPending: false, vote: "Approve" },
      { reviewer: "bob", isPending: false, vote: "Needs Fixing" },
      { reviewer: "dave", isPending: true, vote: null },
    ],
    webLink: WEB_LINK,
    dateCreated: new Date("2024-03-01T10:00:00.000Z"),
    sourceGitRepository: {
      displayName: "~alice/proj/+git/proj",
      cloneUrl: "git+ssh://git.launchpad.net/~alice/proj/+git/proj",
    },
    targetGitRepository: { displayName: "~proj-team/proj/+git/proj", cloneUrl: null },
    sourceGitPath: "refs/heads/feature-x",
    targetGitPath: "refs/heads/main",
    ...overrides,
  };
}

export function bzrProposal(overrides: Partial<RawProposal> = {}): RawProposal {
  return rawProposal({
    sourceGitRepository: null,
    targetGitRepository: null,
    sourceGitPath: null,
    targetGitPath: null,
    sourceBranch: { displayName: "lp:~alice/proj/feature" },
    targetBranch: { displayName: "lp:proj" },
    ...overrides,
  });
}

export const testConfig: AppConfig = {
  credentialsFile: "/nonexistent/.lp_creds",
  apiRoot: "https://api.test/devel/",
  statuses: ["Needs review", "Approved"],
  testCommand: "make test",
  lxcImage: "ubuntu",
};

export function fakeSource(proposals: RawProposal[]) {
  return {
    me: vi.fn(async () => "alice"),
    fetchProposals: vi.fn(async (_owner: string, _statuses: readonly string[]) => proposals),
  } satisfies ReviewSource;
}

export function fakeVcs(branches: string[] = ["develop", "feature-x", "main"], current?: string) {
  return {
    listLocalBranches: vi.fn(() => branches),
    currentBranch: vi.fn(() => current),
    checkout: vi.fn((_branch: string) => {}),
    mergeNoFf: vi.fn((_source: string, _message: string) => {}),
    listRemoteUrls: vi.fn((): string[] => []),
  } satisfies LocalVcs;
}

/**
 * Presenter answering from a script. "default" picks the offered default
 * index, null cancels.
 */
export function scriptedPresenter(answers: Array<number | "default" | null>) {
  const queue = [...answers];
  return {
    presentChoice: vi.fn(async (_options: readonly string[], _title: string, defaultIndex = 0) => {
      if (queue.length === 0) throw new Error("presenter asked more questions than scripted");
      const answer = queue.shift();
      if (answer === "default") return defaultIndex;
      return answer ?? null;
    }),
  } satisfies ChoicePresenter;
}
