#!/usr/bin/env node
import { Command } from "commander";
import { toxCommand, type ToxCommandOptions } from "../commands/tox.js";
import { runAction } from "../commands/shared.js";

const program = new Command();

program
  .name("lpmptox")
  .description("Run tox (or another test command) against the source branch of the chosen merge proposal")
  .version("0.5.0")
  .option("--mp-owner <name>", "Launchpad username of the owner of the MPs (defaults to the logged in user)")
  .option("--environment <release>", "Ubuntu release (22.04, 24.04, ...) to run the tests in an LXD container")
  .option("--command <cmd>", "Test command (default: $MP_TEST_COMMAND or tox --recreate --parallel auto)")
  .option("--log-file <path>", "Append all output to this file")
  .option("--debug", "Print debug output", false)
  .action(async (opts: ToxCommandOptions) => {
    process.exitCode = await runAction(() => toxCommand(opts), opts);
  });

await program.parseAsync();
