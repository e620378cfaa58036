/**
 * Basic Usage Example
 *
 * Demonstrates load, read, write and delete against a resource file.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { openStore, KeyNotFoundError } from "@inikv/sdk";
import { mkdir, rm, writeFile, readFile } from "node:fs/promises";
import { join } from "node:path";

async function main() {
  // Setup: write a resource file into a scratch directory
  const dataDir = "./examples-data/basic";
  await rm(dataDir, { recursive: true, force: true });
  await mkdir(dataDir, { recursive: true });
  const resource = join(dataDir, "service.ini");
  await writeFile(resource, "; service settings\n[db]\nhost = localhost\nport = 5432\n\n[app]\nname = demo\n");

  const store = openStore({ onPersistFailure: "rollback" });

  const loaded = store.load(resource);
  if (!loaded.ok) {
    throw loaded.error;
  }

  // READ
  const port = store.get("db.port");
  console.log("db.port =", port.ok ? port.value : port.error.message);

  // WRITE: every mutation rewrites the file
  store.set("db.port", "5433");
  store.set("cache.ttl", "60");

  // DELETE: removing the last key drops the section
  store.delete("app.name");

  const missing = store.get("db.user");
  if (!missing.ok && missing.error instanceof KeyNotFoundError) {
    console.log(`db.user is not set (${missing.error.code})`);
  }

  console.log("\nSections:", store.sections().join(", "));
  console.log("\nFile now reads:\n" + (await readFile(resource, "utf-8")));

  await rm(dataDir, { recursive: true, force: true });
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
