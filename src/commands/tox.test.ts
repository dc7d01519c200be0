import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { toxCommand, type ToxCommandDeps } from "./tox.js";
import { runAction } from "./shared.js";
import { bzrProposal, fakeSource, rawProposal, scriptedPresenter, testConfig } from "../testing/fixtures.js";
import type { ProcessRunOptions, RawProposal } from "../types/index.js";

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "lpshipit-tox-"));
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function deps(proposals: RawProposal[], answers: Array<number | null>, code = 0) {
  const clone = vi.fn((_url: string, _branch: string, destination: string) => {
    fs.mkdirSync(destination);
  });
  const runProcess = vi.fn(async (_file: string, _args: readonly string[], _options?: ProcessRunOptions) => ({
    code,
    output: "",
  }));
  const presenter = scriptedPresenter(answers);
  const d: ToxCommandDeps = {
    config: testConfig,
    createReviewSource: () => fakeSource(proposals),
    presenter,
    testRun: { runProcess, clone, describeHead: () => "0123abc head", output: () => {}, tmpDir },
  };
  return { d, clone, runProcess, presenter };
}

describe("toxCommand", () => {
  it("runs the configured command against the chosen branch and returns its exit code", async () => {
    const { d, clone, runProcess } = deps([rawProposal()], [0], 2);

    const code = await toxCommand({}, d);

    expect(code).toBe(2);
    expect(clone.mock.calls[0][0]).toBe("git+ssh://git.launchpad.net/~alice/proj/+git/proj");
    expect(clone.mock.calls[0][1]).toBe("feature-x");
    expect(runProcess.mock.calls[0][0]).toBe("sh");
    expect(runProcess.mock.calls[0][1]).toEqual(["-c", "make test"]);
  });

  it("prefers the command given on the command line", async () => {
    const { d, runProcess } = deps([rawProposal()], [0]);

    await toxCommand({ command: "tox -e lint" }, d);

    expect(runProcess.mock.calls[0][1]).toEqual(["-c", "tox -e lint"]);
  });

  it("offers only git proposals", async () => {
    const { d, presenter } = deps([bzrProposal({ webLink: "bzr" }), rawProposal()], [null]);

    const code = await toxCommand({}, d);

    expect(code).toBe(0);
    expect(presenter.presentChoice.mock.calls[0][0]).toHaveLength(1);
  });

  it("exits non-zero when only branch proposals exist", async () => {
    const { d, clone } = deps([bzrProposal()], []);

    const code = await runAction(() => toxCommand({}, d));

    expect(code).toBe(1);
    expect(clone).not.toHaveBeenCalled();
  });
});
