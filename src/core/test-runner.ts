import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { EnvironmentProvisionFailure } from "./errors.js";
import { cloneBranch, headSummary } from "./git.js";
import type { EnvironmentProvisioner, LineSink, ProcessRunner } from "../types/index.js";

export const DEFAULT_TEST_COMMAND = "tox --recreate --parallel auto";

/** Commands run in a fresh environment before the test command */
export const DEFAULT_PREPARE_COMMANDS: readonly string[] = [
  'sudo --preserve-env="http_proxy,https_proxy" apt-get update',
  'sudo --preserve-env="http_proxy,https_proxy" apt-get install -y python3-pip',
  'sudo --preserve-env="http_proxy,https_proxy" pip3 install tox',
];

export interface TestRunOptions {
  sourceRepo: string;
  sourceBranch: string;
  command?: string;
  /** Release to provision an isolated environment for; runs locally when absent */
  environment?: string;
  prepareCommands?: readonly string[];
  /** File every output line is appended to */
  logFile?: string;
}

export interface TestRunDeps {
  runProcess: ProcessRunner;
  provisioner?: EnvironmentProvisioner;
  clone?: (url: string, branch: string, destination: string) => void;
  describeHead?: (directory: string) => string;
  output?: LineSink;
  tmpDir?: string;
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function createSink(output: LineSink, logFile?: string): LineSink {
  return (line) => {
    if (logFile) fs.appendFileSync(logFile, `${line}\n`);
    output(line);
  };
}

async function runLocally(
  workspace: string,
  command: string,
  runProcess: ProcessRunner,
  sink: LineSink
): Promise<number> {
  sink(`Running \`${command}\` in ${workspace} ...`);
  const result = await runProcess("sh", ["-c", command], { cwd: workspace, onLine: sink });
  return result.code;
}

async function runInEnvironment(
  release: string,
  workspace: string,
  options: TestRunOptions,
  command: string,
  provisioner: EnvironmentProvisioner,
  sink: LineSink
): Promise<number> {
  sink(`Running \`${command}\` in ${release} environment ...`);
  const handle = await provisioner.provision({ release, workspace }, sink);
  try {
    for (const prepare of options.prepareCommands ?? DEFAULT_PREPARE_COMMANDS) {
      const code = await provisioner.run(handle, prepare, sink);
      if (code !== 0) {
        throw new EnvironmentProvisionFailure(`\`${prepare}\` exited with status ${code} in ${handle.name}`);
      }
    }
    return await provisioner.run(handle, `cd ${shellQuote(handle.workspace)} && ${command}`, sink);
  } finally {
    await provisioner.teardown(handle, sink);
  }
}

/**
 * Clone the source branch into a temporary workspace and run the test
 * command against it. The workspace is removed on every exit path.
 * Resolves with the test command's exit code.
 */
export async function runTests(options: TestRunOptions, deps: TestRunDeps): Promise<number> {
  const command = options.command ?? DEFAULT_TEST_COMMAND;
  const sink = createSink(deps.output ?? console.log, options.logFile);
  const clone = deps.clone ?? cloneBranch;
  const describeHead = deps.describeHead ?? headSummary;

  const workspace = fs.mkdtempSync(path.join(deps.tmpDir ?? os.tmpdir(), "mptest-"));
  try {
    sink(`Cloning ${options.sourceRepo} (branch ${options.sourceBranch}) in to tmp directory ${workspace} ...`);
    // clone wants an empty or missing destination
    const checkout = path.join(workspace, "source");
    clone(options.sourceRepo, options.sourceBranch, checkout);
    sink(describeHead(checkout));

    if (options.environment === undefined) {
      return await runLocally(checkout, command, deps.runProcess, sink);
    }
    if (!deps.provisioner) {
      throw new EnvironmentProvisionFailure(`No provisioner available for ${options.environment}`);
    }
    return await runInEnvironment(options.environment, checkout, options, command, deps.provisioner, sink);
  } finally {
    fs.rmSync(workspace, { recursive: true, force: true });
  }
}
