import type { Command } from "commander";
import chalk from "chalk";
import { labels as defaultLabels, type LabelsModule } from "../api/labels.ts";
import type { Label, ListLabelsOptions, UpdateLabelOptions } from "../api/types.ts";
import { requireToken } from "../config/index.ts";
import { handleError } from "../utils/errors.ts";
import { cliExit } from "../utils/exit.ts";
import { colorSwatch, formatLabelRow, labelTableHeader, tableSeparatorWidth } from "../utils/format.ts";
import { printJsonFields } from "../utils/json-output.ts";
import { parseIdArg, resolveProjectArg } from "../utils/resolve.ts";
import { validateColor, validateLabelName, validatePositiveInt, validatePriority } from "../utils/validation.ts";

const LABEL_ARG_HELP = "Label ID or name (name:<label> for a name made of digits)";

interface ProjectOpt {
  project?: string;
}

function fail(message: string): never {
  console.error(chalk.red(message));
  return cliExit(1);
}

function check(error: string | null): void {
  if (error) fail(error);
}

function parseIntOpt(value: string | undefined, validate: (n: number) => string | null): number | undefined {
  if (value === undefined) return undefined;
  const n = value.trim() === "" ? NaN : Number(value);
  check(validate(n));
  return n;
}

function printLabel(l: Label): void {
  console.log(`${chalk.bold(l.name)} ${chalk.dim(`(${l.id})`)}`);
  console.log(`  ${chalk.dim("Color:")}       ${colorSwatch(l.color)}`);
  if (l.text_color) console.log(`  ${chalk.dim("Text color:")}  ${l.text_color}`);
  if (l.description) console.log(`  ${chalk.dim("Description:")} ${l.description}`);
  console.log(`  ${chalk.dim("Priority:")}    ${l.priority ?? "none"}`);
  console.log(`  ${chalk.dim("Issues:")}      ${l.open_issues_count} open, ${l.closed_issues_count} closed`);
  console.log(`  ${chalk.dim("MRs:")}         ${l.open_merge_requests_count} open`);
  console.log(`  ${chalk.dim("Subscribed:")}  ${l.subscribed ? "yes" : "no"}`);
}

/**
 * `labelctl label ...`. `checkAuth` runs before every subcommand and throws
 * when no token is configured.
 */
export function registerLabelCommand(
  program: Command,
  labels: LabelsModule = defaultLabels,
  checkAuth: () => void = requireToken,
): void {
  const label = program
    .command("label")
    .description("Manage project labels")
    .hook("preAction", () => {
      checkAuth();
    });

  label
    .command("list")
    .description("List the labels of a project")
    .option("-p, --project <id-or-path>", "Project ID or path (default: defaults.project)")
    .option("--page <n>", "Page number")
    .option("--per-page <n>", "Labels per page")
    .option("--search <term>", "Only labels whose name contains the term")
    .option("--with-counts", "Include issue and merge request counts")
    .option("--include-ancestor-groups", "Include labels inherited from ancestor groups")
    .option("--json <fields>", "Output JSON with specified fields (comma-separated)")
    .option("-q, --quiet", "Print only label IDs")
    .action(async (opts: ProjectOpt & {
      page?: string;
      perPage?: string;
      search?: string;
      withCounts?: boolean;
      includeAncestorGroups?: boolean;
      json?: string;
      quiet?: boolean;
    }) => {
      try {
        const listOpts: ListLabelsOptions = {
          page: parseIntOpt(opts.page, (n) => validatePositiveInt(n, "--page")),
          per_page: parseIntOpt(opts.perPage, (n) => validatePositiveInt(n, "--per-page")),
          search: opts.search,
          with_counts: opts.withCounts,
          include_ancestor_groups: opts.includeAncestorGroups,
        };
        const { data, response } = await labels.list(resolveProjectArg(opts.project), listOpts);

        if (opts.quiet) {
          for (const l of data) console.log(l.id);
          return;
        }

        if (opts.json !== undefined) {
          printJsonFields(data, opts.json);
          return;
        }

        if (data.length === 0) {
          console.log(chalk.dim("No labels found."));
          return;
        }

        console.log(chalk.bold(labelTableHeader()));
        console.log(chalk.dim("-".repeat(tableSeparatorWidth())));
        for (const l of data) console.log(formatLabelRow(l));

        const { currentPage, totalPages, nextPage } = response.pagination;
        if (currentPage !== undefined && totalPages !== undefined && totalPages > 1) {
          const more = nextPage !== undefined ? ` (next: --page ${nextPage})` : "";
          console.log(chalk.dim(`Page ${currentPage} of ${totalPages}${more}`));
        }
      } catch (err) {
        handleError(err);
      }
    });

  label
    .command("show")
    .description("Show one label")
    .argument("<label>", LABEL_ARG_HELP)
    .option("-p, --project <id-or-path>", "Project ID or path")
    .option("--json <fields>", "Output JSON with specified fields (comma-separated)")
    .action(async (rawLabel: string, opts: ProjectOpt & { json?: string }) => {
      try {
        const { data } = await labels.get(resolveProjectArg(opts.project), parseIdArg(rawLabel));
        if (opts.json !== undefined) {
          printJsonFields([data], opts.json);
          return;
        }
        printLabel(data);
      } catch (err) {
        handleError(err);
      }
    });

  label
    .command("create")
    .description("Create a label")
    .argument("<name>", "Label name")
    .requiredOption("-c, --color <color>", "Color as #RRGGBB or a CSS color name")
    .option("-d, --description <text>", "Description")
    .option("--priority <n>", "Priority (0 is highest)")
    .option("-p, --project <id-or-path>", "Project ID or path")
    .option("-q, --quiet", "Print only the label ID")
    .action(async (name: string, opts: ProjectOpt & {
      color: string;
      description?: string;
      priority?: string;
      quiet?: boolean;
    }) => {
      try {
        check(validateLabelName(name));
        check(validateColor(opts.color));
        const priority = parseIntOpt(opts.priority, validatePriority);

        const { data } = await labels.create(resolveProjectArg(opts.project), {
          name: name.trim(),
          color: opts.color,
          description: opts.description,
          priority,
        });
        if (opts.quiet) {
          console.log(data.id);
        } else {
          console.log(chalk.green(`Label created: ${data.name} (${data.id})`));
        }
      } catch (err) {
        handleError(err);
      }
    });

  label
    .command("update")
    .description("Update a label")
    .argument("<label>", LABEL_ARG_HELP)
    .option("--name <name>", "New label name")
    .option("-c, --color <color>", "New color")
    .option("-d, --description <text>", "New description")
    .option("--clear-description", "Remove the description")
    .option("--priority <n>", "New priority")
    .option("--clear-priority", "Remove the priority")
    .option("-p, --project <id-or-path>", "Project ID or path")
    .action(async (rawLabel: string, opts: ProjectOpt & {
      name?: string;
      color?: string;
      description?: string;
      clearDescription?: boolean;
      priority?: string;
      clearPriority?: boolean;
    }) => {
      try {
        const params: UpdateLabelOptions = {};
        if (opts.name !== undefined) {
          check(validateLabelName(opts.name));
          params.new_name = opts.name.trim();
        }
        if (opts.color !== undefined) {
          check(validateColor(opts.color));
          params.color = opts.color;
        }
        if (opts.clearDescription) params.description = null;
        else if (opts.description !== undefined) params.description = opts.description;
        if (opts.clearPriority) params.priority = null;
        else if (opts.priority !== undefined) params.priority = parseIntOpt(opts.priority, validatePriority);

        if (Object.keys(params).length === 0) {
          fail("No update options provided. Use --name, --color, --description or --priority.");
        }

        const { data } = await labels.update(resolveProjectArg(opts.project), parseIdArg(rawLabel), params);
        console.log(chalk.green(`Label ${data.id} updated: ${data.name}`));
      } catch (err) {
        handleError(err);
      }
    });

  label
    .command("delete")
    .description("Delete a label")
    .argument("<label>", LABEL_ARG_HELP)
    .option("-p, --project <id-or-path>", "Project ID or path")
    .action(async (rawLabel: string, opts: ProjectOpt) => {
      try {
        const id = parseIdArg(rawLabel);
        await labels.delete(
          resolveProjectArg(opts.project),
          id,
          id.kind === "path" ? { name: id.value } : undefined,
        );
        console.log(chalk.green(`Label ${rawLabel} deleted.`));
      } catch (err) {
        handleError(err);
      }
    });

  label
    .command("subscribe")
    .description("Get notified about issues and merge requests with this label")
    .argument("<label>", LABEL_ARG_HELP)
    .option("-p, --project <id-or-path>", "Project ID or path")
    .action(async (rawLabel: string, opts: ProjectOpt) => {
      try {
        const { data } = await labels.subscribe(resolveProjectArg(opts.project), parseIdArg(rawLabel));
        if (data === null) {
          console.log(chalk.dim(`Already subscribed to ${rawLabel}.`));
        } else {
          console.log(chalk.green(`Subscribed to ${data.name}.`));
        }
      } catch (err) {
        handleError(err);
      }
    });

  label
    .command("unsubscribe")
    .description("Stop notifications for this label")
    .argument("<label>", LABEL_ARG_HELP)
    .option("-p, --project <id-or-path>", "Project ID or path")
    .action(async (rawLabel: string, opts: ProjectOpt) => {
      try {
        const response = await labels.unsubscribe(resolveProjectArg(opts.project), parseIdArg(rawLabel));
        if (response.status === 304) {
          console.log(chalk.dim(`Not subscribed to ${rawLabel}.`));
        } else {
          console.log(chalk.green(`Unsubscribed from ${rawLabel}.`));
        }
      } catch (err) {
        handleError(err);
      }
    });

  label
    .command("promote")
    .description("Promote a project label to a group label")
    .argument("<label>", LABEL_ARG_HELP)
    .option("-p, --project <id-or-path>", "Project ID or path")
    .action(async (rawLabel: string, opts: ProjectOpt) => {
      try {
        await labels.promote(resolveProjectArg(opts.project), parseIdArg(rawLabel));
        console.log(chalk.green(`Label ${rawLabel} promoted to a group label.`));
      } catch (err) {
        handleError(err);
      }
    });
}
