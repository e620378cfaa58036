/**
 * inikv command-line program
 */

import { Command, CommanderError } from "commander";
import { resolveResourcePath } from "./lib/env.js";
import { red } from "./lib/render.js";
import { mapErrorToExitCode, formatCliError } from "./lib/errors.js";
import { openCliStore, unwrap } from "./lib/store.js";
import { timed } from "./lib/telemetry.js";
import { registerSectionCommands } from "./commands/section.js";

export const CLI_VERSION = "0.1.0";

type GlobalOptions = {
  file?: string;
  quiet?: boolean;
  verbose?: boolean;
};

/**
 * Build the command tree
 *
 * Commander errors are thrown as CommanderError instead of exiting, so the
 * program can run inside another process. Subcommands inherit this because
 * they are all created with `command()`.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(red(str, process.stderr)),
    })
    .exitOverride();

  // Global options
  program
    .name("inikv")
    .description("Read and edit sectioned key=value resource files")
    .version(CLI_VERSION)
    .option("--file <path>", "Resource file (default: $INIKV_FILE or ./config.ini)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  const open = () => {
    const opts = program.opts<GlobalOptions>();
    return { opts, store: openCliStore(resolveResourcePath(opts.file), { verbose: opts.verbose }) };
  };

  // Get command
  program
    .command("get <key>")
    .description("Print the value of section.key")
    .action((key: string) => {
      timed("get", () => {
        const { store } = open();
        console.log(unwrap(store.get(key)));
      });
    });

  // Set command
  program
    .command("set <key> <value>")
    .description("Set section.key to value and rewrite the file")
    .action((key: string, value: string) => {
      timed("set", () => {
        const { opts, store } = open();
        unwrap(store.set(key, value));

        if (!opts.quiet) {
          console.log(`Set ${key.trim()}`);
        }
      });
    });

  // Remove command
  program
    .command("rm <key>")
    .description("Remove section.key and rewrite the file")
    .action((key: string) => {
      timed("rm", () => {
        const { opts, store } = open();
        unwrap(store.delete(key));

        if (!opts.quiet) {
          console.log(`Removed ${key.trim()}`);
        }
      });
    });

  // Dump command
  program
    .command("dump")
    .description("Rewrite the file in canonical form (sorted, comments dropped)")
    .action(() => {
      timed("dump", () => {
        const { opts, store } = open();
        unwrap(store.persist());

        if (!opts.quiet) {
          console.log(`Wrote ${store.backingPath ?? ""}`);
        }
      });
    });

  registerSectionCommands(program);

  return program;
}

/**
 * Run the program and return its exit code
 * @param argv - Full argv, including the node and script entries
 */
export async function main(argv: string[]): Promise<number> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    // Commander already printed its own message (or help/version output)
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const opts = program.opts<GlobalOptions>();
    console.error(`Error: ${formatCliError(err, opts.verbose)}`);
    return mapErrorToExitCode(err);
  }
}
