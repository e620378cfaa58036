/**
 * Integration tests: full load → mutate → persist → reload cycles on disk
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openStore } from "./store.js";
import { Logger } from "./observability/logs.js";
import { iniEqual } from "./format.js";
import { SectionNotFoundError } from "./errors.js";
import type { Store } from "./types.js";
import { withTempStore } from "@inikv/testkit";

function quietStore(): Store {
  const logger = new Logger();
  logger.setEnabled(false);
  return openStore({ logger });
}

describe("Store on-disk cycles", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "inikv-cycle-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("should run the db/app scenario end to end", async () => {
    const scenario = "[db]\nhost = localhost\nport = 5432\n\n[app]\nname = demo\n";

    await withTempStore(scenario, async (store, filePath) => {
      expect(store.get("db.port")).toEqual({ ok: true, value: "5432" });
      expect(store.set("db.port", "5433").ok).toBe(true);

      const reloaded = quietStore();
      reloaded.load(filePath);
      expect(reloaded.get("db.port")).toEqual({ ok: true, value: "5433" });

      expect(store.delete("app.name").ok).toBe(true);
      const missing = store.get("app.name");
      expect(missing.ok).toBe(false);
      if (!missing.ok) {
        expect(missing.error).toBeInstanceOf(SectionNotFoundError);
      }
    });
  });

  it.each([
    ["plain", "[a]\nx = 1\ny = 2\n"],
    ["comments and blanks", "; generated\n\n[a]\n; note\nx = 1\n\n\n[b]\ny=2\n"],
    ["root section", "top = level\n[a]\nx = 1\n"],
    ["dotted keys and '=' in values", "[paths]\nlog.dir = /var/log\nquery = a=b\n"],
    ["tabs and CRLF", "[t]\r\n\tkey\t=\tvalue\r\n"],
  ])("should round-trip %s without losing content", async (_label, original) => {
    const filePath = join(testDir, "roundtrip.ini");
    await writeFile(filePath, original);
    const store = quietStore();
    store.load(filePath);

    expect(store.persist().ok).toBe(true);

    const written = await readFile(filePath, "utf-8");
    expect(iniEqual(written, original)).toBe(true);
  });

  it("should read back every value it sets", async () => {
    await withTempStore("[seed]\nk = v\n", async (store, filePath) => {
      const pairs: Array<[string, string]> = [
        ["seed.k", "replaced"],
        ["net.http.port", "8080"],
        ["net.http.host", "0.0.0.0"],
        ["flags.verbose", "true"],
        ["flags.empty", ""],
      ];

      for (const [key, value] of pairs) {
        expect(store.set(key, value).ok).toBe(true);
        expect(store.get(key)).toEqual({ ok: true, value });
      }

      const reloaded = quietStore();
      reloaded.load(filePath);
      expect(reloaded.snapshot()).toEqual(store.snapshot());
    });
  });

  it("should discard unpersisted state of the previous resource on reload", async () => {
    const first = join(testDir, "first.ini");
    const second = join(testDir, "second.ini");
    await writeFile(first, "[a]\nx = 1\n");
    await writeFile(second, "[b]\ny = 2\n");
    const store = quietStore();

    store.load(first);
    store.set("a.z", "3");
    store.load(second);
    store.set("b.w", "4");

    expect(await readFile(first, "utf-8")).toBe("[a]\nx = 1\nz = 3\n\n");
    expect(await readFile(second, "utf-8")).toBe("[b]\nw = 4\ny = 2\n\n");
  });
});
