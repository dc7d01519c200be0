import { execFileSync } from "node:child_process";
import * as path from "node:path";
import { ChildProcessFailure, InvalidDirectory } from "./errors.js";
import { isDirectory } from "./utils.js";
import type { LocalVcs } from "../types/index.js";

interface ExecError {
  status?: number | null;
  stdout?: Buffer | string;
  stderr?: Buffer | string;
  message: string;
}

function isExecError(error: unknown): error is ExecError {
  return error instanceof Error;
}

/**
 * Run git synchronously, returning trimmed stdout
 */
export function git(args: readonly string[], cwd?: string): string {
  try {
    return execFileSync("git", [...args], {
      cwd,
      stdio: ["pipe", "pipe", "pipe"],
    })
      .toString()
      .trim();
  } catch (error) {
    if (!isExecError(error)) throw error;
    const output = [error.stdout, error.stderr]
      .map((chunk) => (chunk ? chunk.toString() : ""))
      .filter(Boolean)
      .join("\n");
    throw new ChildProcessFailure(["git", ...args].join(" "), error.status ?? 1, output || error.message);
  }
}

/**
 * Local git clone the merge tool works in
 */
export class GitRepository implements LocalVcs {
  constructor(readonly directory: string) {}

  listLocalBranches(): string[] {
    const output = git(["for-each-ref", "--format=%(refname:short)", "refs/heads"], this.directory);
    return output ? output.split("\n") : [];
  }

  currentBranch(): string | undefined {
    try {
      const branch = git(["rev-parse", "--abbrev-ref", "HEAD"], this.directory);
      return branch === "HEAD" ? undefined : branch;
    } catch {
      // No commits yet
      return undefined;
    }
  }

  checkout(branch: string): void {
    git(["checkout", branch], this.directory);
  }

  mergeNoFf(sourceBranch: string, message: string): void {
    git(["merge", "--no-ff", sourceBranch, "-m", message], this.directory);
  }

  listRemoteUrls(): string[] {
    const output = git(["remote", "-v"], this.directory);
    const urls = output
      .split("\n")
      .map((line) => line.split(/\s+/)[1])
      .filter((url): url is string => Boolean(url));
    return [...new Set(urls)];
  }
}

/**
 * Open the git work tree at directory.
 * Throws InvalidDirectory for anything that is not a directory inside a work tree.
 */
export function openRepository(directory: string): GitRepository {
  const resolved = path.resolve(directory);
  if (!isDirectory(resolved)) {
    throw new InvalidDirectory(resolved);
  }
  try {
    git(["rev-parse", "--is-inside-work-tree"], resolved);
  } catch {
    throw new InvalidDirectory(resolved, "is not a git repository");
  }
  return new GitRepository(resolved);
}

/**
 * Shallow, single-branch clone of url at branch into destination
 */
export function cloneBranch(url: string, branch: string, destination: string): void {
  git(["clone", "--depth", "1", "--single-branch", "--branch", branch, url, destination]);
}

/**
 * "<sha> <subject>" of HEAD
 */
export function headSummary(directory: string): string {
  return git(["log", "-1", "--format=%H %s"], directory);
}
