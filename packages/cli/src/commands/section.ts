/**
 * Section inspection commands for CLI
 */

import type { Command } from "commander";
import { resolveResourcePath } from "../lib/env.js";
import { printEntries, printSectionNames } from "../lib/render.js";
import { openCliStore, unwrap } from "../lib/store.js";
import { timed } from "../lib/telemetry.js";

type GlobalOptions = {
  file?: string;
  verbose?: boolean;
};

/**
 * Attach the `section` command group
 *
 * Created through `program.command` so the group inherits the program's
 * output and exit settings.
 */
export function registerSectionCommands(program: Command): void {
  const section = program.command("section").description("Inspect sections").addHelpText(
    "after",
    `
Examples:
  $ inikv section list
  $ inikv section show db
  $ inikv section show db --json`
  );

  const open = () => {
    const opts = program.opts<GlobalOptions>();
    return openCliStore(resolveResourcePath(opts.file), { verbose: opts.verbose });
  };

  section
    .command("list")
    .description("List section names")
    .option("--json", "Output as JSON array")
    .action((options: { json?: boolean }) => {
      timed("section list", () => {
        printSectionNames(open().sections(), options.json ?? false);
      });
    });

  section
    .command("show <name>")
    .description("Print the entries of one section")
    .option("--json", "Output as JSON object")
    .action((name: string, options: { json?: boolean }) => {
      timed("section show", () => {
        printEntries(unwrap(open().entries(name)), options.json ?? false);
      });
    });
}
