/**
 * treeorder command definitions
 */

import { Command } from "commander";
import { FULL_PATH_PROPERTY, VERSION } from "@treeorder/sdk";
import { openCliIndex } from "./lib/order.js";
import { parseItemName, parseNonEmpty } from "./lib/arg.js";
import { printJson, printLines, printOrder, colorize } from "./lib/render.js";
import { indexMetrics, withTiming, type MetricOptions } from "./lib/telemetry.js";

/**
 * Options shared by every command
 */
export interface GlobalOptions {
  manifest?: string;
  projectDir?: string;
  verbose?: boolean;
  quiet?: boolean;
}

interface IndexOptions {
  raw?: boolean;
}

interface EvalOptions {
  folder?: boolean;
  type?: string;
  fullPath?: string;
  json?: boolean;
}

interface ItemsOptions {
  json?: boolean;
}

/**
 * Build the CLI program. Errors, usage errors included, are thrown to the caller.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  program
    .name("treeorder")
    .description("treeorder - display order for project trees from ordered item lists")
    .version(VERSION)
    .option("--manifest <path>", "Ordered item manifest (.json, or one include per line)")
    .option("--project-dir <dir>", "Directory includes are rooted against")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Print nothing for nodes without a display order, and no metrics");

  const metricOptions = (): MetricOptions => ({ quiet: program.opts<GlobalOptions>().quiet });

  // Items command
  program
    .command("items")
    .description("List the ordered items from the manifest")
    .option("--json", "Output as JSON array")
    .action(async (options: ItemsOptions) => {
      await withTiming(
        "cli.items",
        async (fields) => {
          const { manifest, provider } = await openCliIndex(program.opts<GlobalOptions>());
          Object.assign(fields, indexMetrics(provider));
          const includes = manifest.items.map((item) => item.evaluatedInclude);

          if (options.json) {
            printJson(includes);
          } else {
            printLines(includes);
          }
        },
        metricOptions()
      );
    });

  // Index command
  program
    .command("index")
    .description("Print the name and rooted path order maps")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (options: IndexOptions) => {
      await withTiming(
        "cli.index",
        async (fields) => {
          const { provider } = await openCliIndex(program.opts<GlobalOptions>());
          Object.assign(fields, indexMetrics(provider));

          printJson(
            {
              names: Object.fromEntries(provider.index.nameOrder()),
              paths: Object.fromEntries(provider.index.pathOrder()),
            },
            { raw: options.raw }
          );
        },
        metricOptions()
      );
    });

  // Eval command
  program
    .command("eval")
    .description("Evaluate the display order of one tree node")
    .argument("<name>", "Display name of the node", parseItemName)
    .option("--folder", "The node is a folder")
    .option("--type <type>", "Project item type of the node", (val) => parseNonEmpty(val, "--type"))
    .option("--full-path <path>", "Node path, rooted against the project directory")
    .option("--json", "Output as JSON")
    .action(async (name: string, options: EvalOptions) => {
      await withTiming(
        "cli.eval",
        async (fields) => {
          const globals = program.opts<GlobalOptions>();
          const { provider, makeRooted } = await openCliIndex(globals);
          Object.assign(fields, indexMetrics(provider));

          const metadata =
            options.fullPath === undefined ? {} : { [FULL_PATH_PROPERTY]: makeRooted(options.fullPath) };
          const order = provider.index.evaluate(name, Boolean(options.folder), options.type, metadata);
          fields.ordered = order !== undefined;

          printOrder(order, { json: options.json, quiet: globals.quiet });
        },
        metricOptions()
      );
    });

  return program;
}
