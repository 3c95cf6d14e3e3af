#!/usr/bin/env node

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { initCommand } from "./commands/init";
import { generateCommand } from "./commands/generate";

yargs(hideBin(process.argv))
  .scriptName("changedoc")
  .usage("$0 <cmd> [args]")
  .command(initCommand)
  .command(generateCommand)
  .demandCommand(1, "Please specify a command.")
  .help()
  .version()
  .strict()
  .parse();
