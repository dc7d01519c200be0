#!/usr/bin/env node
import { Command } from "commander";
import { messageCommand, type MessageCommandOptions } from "../commands/message.js";
import { runAction } from "../commands/shared.js";

const program = new Command();

program
  .name("lpmpmessage")
  .description("Print the formatted merge commit message for the chosen merge proposal")
  .version("0.5.0")
  .option("--mp-owner <name>", "Launchpad username of the owner of the MPs (defaults to the logged in user)")
  .option("--approvals-only", "Only list reviewers who approved")
  .option("--debug", "Print debug output", false)
  .action(async (opts: MessageCommandOptions) => {
    process.exitCode = await runAction(() => messageCommand(opts), opts);
  });

await program.parseAsync();
