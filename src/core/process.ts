import { spawn } from "node:child_process";
import * as os from "node:os";
import * as readline from "node:readline";
import { ChildProcessFailure } from "./errors.js";
import type { ProcessRunner } from "../types/index.js";

/**
 * Shell-style exit status: the exit code, or 128 plus the number of the
 * signal that killed the process.
 */
export function exitStatus(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal === null) return 1;
  const entry: [string, number] | undefined = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return 128 + (entry ? entry[1] : 0);
}

/**
 * Spawn a command and stream its combined stdout/stderr line by line.
 * Resolves with the exit status once the process closes. A throwing
 * onLine kills the child and rejects with that error.
 */
export const spawnProcess: ProcessRunner = (file, args, options = {}) =>
  new Promise((resolve, reject) => {
    const child = spawn(file, [...args], {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let failure: unknown;
    let failed = false;
    const lines: string[] = [];
    const collect = (line: string) => {
      if (failed) return;
      if (options.capture) lines.push(line);
      try {
        options.onLine?.(line);
      } catch (error) {
        failed = true;
        failure = error;
        child.kill();
      }
    };
    readline.createInterface({ input: child.stdout }).on("line", collect);
    readline.createInterface({ input: child.stderr }).on("line", collect);

    child.on("error", (error) => {
      reject(new ChildProcessFailure([file, ...args].join(" "), 127, error.message));
    });
    child.on("close", (code, signal) => {
      if (failed) {
        reject(failure);
        return;
      }
      resolve({ code: exitStatus(code, signal), output: lines.join("\n") });
    });
  });
