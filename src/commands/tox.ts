import pc from "picocolors";
import { loadConfig, type AppConfig } from "../core/config.js";
import { LxcProvisioner } from "../core/lxc.js";
import { TerminalPicker } from "../core/picker.js";
import { spawnProcess } from "../core/process.js";
import { runTests, type TestRunDeps } from "../core/test-runner.js";
import { chooseProposal, createReviewSource, loadSummaries } from "./shared.js";
import type { ChoicePresenter, ReviewSource } from "../types/index.js";

export interface ToxCommandOptions {
  mpOwner?: string;
  /** Release (22.04, 24.04, ...) to run the tests in; local run when absent */
  environment?: string;
  command?: string;
  logFile?: string;
  debug?: boolean;
}

export interface ToxCommandDeps {
  config: AppConfig;
  createReviewSource: (config: AppConfig) => ReviewSource;
  presenter: ChoicePresenter;
  testRun: TestRunDeps;
}

function defaultDeps(): ToxCommandDeps {
  const config = loadConfig();
  return {
    config,
    createReviewSource,
    presenter: new TerminalPicker(),
    testRun: {
      runProcess: spawnProcess,
      // container steps are reported through the run's output and log file
      provisioner: new LxcProvisioner({ run: spawnProcess, image: config.lxcImage }),
    },
  };
}

/**
 * Run the test command against the chosen proposal's source branch.
 * Resolves with the test command's exit code.
 */
export async function toxCommand(options: ToxCommandOptions, deps: ToxCommandDeps = defaultDeps()): Promise<number> {
  const summaries = await loadSummaries(deps.createReviewSource(deps.config), {
    mpOwner: options.mpOwner,
    statuses: deps.config.statuses,
    debug: options.debug,
    // only git proposals can be cloned
    filter: (mp) => mp.sourceRepoUrl !== "",
  });

  const chosen = await chooseProposal(deps.presenter, summaries, "Merge Proposal to test");
  if (!chosen) return 0;

  const code = await runTests(
    {
      sourceRepo: chosen.sourceRepoUrl,
      sourceBranch: chosen.sourceBranch,
      command: options.command ?? deps.config.testCommand,
      environment: options.environment,
      logFile: options.logFile ?? deps.config.testLogFile,
    },
    deps.testRun
  );

  const report = `\`${options.command ?? deps.config.testCommand}\` exited with status ${code}`;
  console.log(code === 0 ? pc.green(`✅ ${report}`) : pc.red(`❌ ${report}`));
  return code;
}
