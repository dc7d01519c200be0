#!/usr/bin/env node
import { Command } from "commander";
import { mergeCommand, type MergeCommandOptions } from "../commands/merge.js";
import { runAction } from "../commands/shared.js";

const program = new Command();

program
  .name("lpshipit")
  .description(
    "Merge a Launchpad merge proposal into a local branch as a single no-fast-forward merge " +
      "with the agreed commit message. Changes are never pushed."
  )
  .version("0.5.0")
  .option("--directory <dir>", "Path to the local git clone (prompted for when omitted)")
  .option("--source-branch <name>", "Source branch name (skips the source branch picker)")
  .option("--target-branch <name>", "Target branch name (skips the target branch picker)")
  .option("--mp-owner <name>", "Launchpad username of the owner of the MPs (defaults to the logged in user)")
  .option("--mp <link>", "Web link of the MP to merge (skips the MP picker)")
  .option("--match-remotes", "Only offer MPs that target one of the clone's remotes")
  .option("--approvals-only", "Only list reviewers who approved")
  .option("--debug", "Print debug output", false)
  .action(async (opts: MergeCommandOptions) => {
    process.exitCode = await runAction(() => mergeCommand(opts), opts);
  });

await program.parseAsync();
