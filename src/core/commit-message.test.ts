import { describe, it, expect } from "vitest";
import { buildCommitMessage, commitMessageFor } from "./commit-message.js";
import { summarizeProposal } from "./summarizer.js";
import { rawProposal, WEB_LINK } from "../testing/fixtures.js";

describe("buildCommitMessage", () => {
  it("fills the merge template", () => {
    const message = buildCommitMessage({
      author: "alice",
      reviewers: "bob,carol",
      sourceBranch: "feat",
      targetBranch: "main",
      commitMessage: "fix thing",
      webLink: "http://x/1",
    });

    expect(message).toBe("Merge feat into main [a=alice] [r=bob,carol]\n\nfix thing\n\nMP: http://x/1");
  });

  it("inserts fields verbatim", () => {
    const message = buildCommitMessage({
      author: "a]b",
      reviewers: "",
      sourceBranch: "x",
      targetBranch: "y",
      commitMessage: "line one\n\nline \"two\"",
      webLink: "l",
    });

    expect(message).toBe("Merge x into y [a=a]b] [r=]\n\nline one\n\nline \"two\"\n\nMP: l");
  });
});

describe("commitMessageFor", () => {
  it("uses the proposal's own branches by default", () => {
    const mp = summarizeProposal(rawProposal());

    expect(commitMessageFor(mp)).toBe(
      `Merge feature-x into main [a=alice] [r=bob,carol]\n\nFix the thing\nLonger explanation\n\nMP: ${WEB_LINK}`
    );
  });

  it("uses the branches actually merged when given", () => {
    const mp = summarizeProposal(rawProposal());

    const message = commitMessageFor(mp, { sourceBranch: "local-feature", targetBranch: "release" });

    expect(message.split("\n")[0]).toBe("Merge local-feature into release [a=alice] [r=bob,carol]");
  });
});
