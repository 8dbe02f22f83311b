#!/usr/bin/env -S node --import tsx
import { program } from "commander";
import chalk from "chalk";
import { registerAuthCommand } from "./auth.ts";
import { registerConfigCommand } from "./config.ts";
import { registerLabelCommand } from "./label.ts";
import { didYouMean, handleError, setDebug, debug } from "../utils/errors.ts";
import { cliExit } from "../utils/exit.ts";
import { initLogger, getLogger, setLogLevel } from "../utils/logger.ts";

program
  .name("labelctl")
  .description("Manage project labels over the REST API")
  .version("0.3.0")
  .option("--debug", "Enable debug output")
  .hook("preAction", () => {
    if (program.opts().debug) {
      setDebug(true);
      setLogLevel("debug");
      debug("Debug mode enabled");
    }
  });

registerAuthCommand(program);
registerConfigCommand(program);
registerLabelCommand(program);

async function main(): Promise<void> {
  initLogger();
  const log = getLogger("cli");
  log.info("Starting labelctl v" + program.version());

  const knownCommands = program.commands.map((c) => c.name());

  program.on("command:*", (operands: string[]) => {
    const unknown = operands[0];
    if (unknown) {
      const suggestion = didYouMean(unknown, knownCommands);
      console.error(chalk.red(`Unknown command: ${unknown}`));
      if (suggestion) {
        console.error(chalk.yellow(`Did you mean: ${chalk.bold(suggestion)}?`));
      }
      console.error(chalk.dim("Run 'labelctl --help' for usage information."));
      cliExit(2);
    }
  });

  await program.parseAsync();
}

main().catch(handleError);
