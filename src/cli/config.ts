import type { Command } from "commander";
import chalk from "chalk";
import { getApiConfig, getDefaultProject, getToken } from "../config/index.ts";
import { handleError } from "../utils/errors.ts";

function maskToken(token: string): string {
  return token.length <= 4 ? "****" : `${"*".repeat(token.length - 4)}${token.slice(-4)}`;
}

export function registerConfigCommand(program: Command): void {
  program
    .command("config")
    .description("Show the effective configuration")
    .action(() => {
      try {
        const api = getApiConfig();
        const token = getToken();
        console.log(`${chalk.dim("base_url:")} ${api.base_url}`);
        console.log(`${chalk.dim("timeout:")}  ${api.timeout}s`);
        console.log(`${chalk.dim("token:")}    ${token ? maskToken(token) : chalk.yellow("not set")}`);
        console.log(`${chalk.dim("project:")}  ${getDefaultProject() ?? chalk.dim("none")}`);
      } catch (err) {
        handleError(err);
      }
    });
}
