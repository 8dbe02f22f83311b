import type { Command } from "commander";
import chalk from "chalk";
import { createInterface } from "readline";
import { ApiClient } from "../api/client.ts";
import { setToken } from "../config/index.ts";
import { handleError } from "../utils/errors.ts";
import { cliExit } from "../utils/exit.ts";

export function registerAuthCommand(program: Command): void {
  program
    .command("auth")
    .description("Store a personal access token")
    .option("--no-verify", "Save the token without checking it against the API")
    .action(async (opts: { verify: boolean }) => {
      const rl = createInterface({
        input: process.stdin,
        output: process.stdout,
      });

      const token = await new Promise<string>((resolve) => {
        rl.question("Enter your personal access token: ", (answer) => {
          rl.close();
          resolve(answer.trim());
        });
      });

      if (!token) {
        console.error(chalk.red("Token cannot be empty."));
        cliExit(1);
      }

      if (opts.verify) {
        try {
          await new ApiClient({ token }).send("GET", "/user");
        } catch (err) {
          handleError(err);
        }
      }

      setToken(token);
      console.log(chalk.green("Token saved."));
    });
}
