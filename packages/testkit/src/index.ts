/**
 * Test helpers shared by inikv packages
 */

export { createTempDir, removeDir, writeResourceFile, withTempDir, withTempStore } from "./fs.js";
export { runCli, CLI_ENTRY, type CliResult, type CliExecOptions } from "./cli.js";
