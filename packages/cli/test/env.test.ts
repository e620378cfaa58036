/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { resolveResourcePath, expandTilde, isVerbose } from "../src/lib/env.js";

describe("environment resolution", () => {
  let originalFile: string | undefined;
  let originalDebug: string | undefined;

  beforeEach(() => {
    originalFile = process.env.INIKV_FILE;
    originalDebug = process.env.INIKV_CLI_DEBUG;
  });

  afterEach(() => {
    if (originalFile !== undefined) {
      process.env.INIKV_FILE = originalFile;
    } else {
      delete process.env.INIKV_FILE;
    }
    if (originalDebug !== undefined) {
      process.env.INIKV_CLI_DEBUG = originalDebug;
    } else {
      delete process.env.INIKV_CLI_DEBUG;
    }
  });

  describe("resolveResourcePath", () => {
    it("should use CLI option when provided", () => {
      process.env.INIKV_FILE = "/env/app.ini";
      expect(resolveResourcePath("/cli/app.ini")).toBe(path.resolve("/cli/app.ini"));
    });

    it("should use INIKV_FILE env var when CLI option not provided", () => {
      process.env.INIKV_FILE = "/env/app.ini";
      expect(resolveResourcePath()).toBe(path.resolve("/env/app.ini"));
    });

    it("should use default ./config.ini when neither provided", () => {
      delete process.env.INIKV_FILE;
      expect(resolveResourcePath()).toBe(path.resolve("./config.ini"));
    });

    it("should trim surrounding blanks", () => {
      expect(resolveResourcePath("  /cli/app.ini\n")).toBe(path.resolve("/cli/app.ini"));
    });

    it("should expand a leading tilde", () => {
      expect(resolveResourcePath("~/conf/app.ini")).toBe(path.join(homedir(), "conf/app.ini"));
    });
  });

  describe("expandTilde", () => {
    it("should expand a bare tilde", () => {
      expect(expandTilde("~")).toBe(homedir());
    });

    it("should leave other paths alone", () => {
      expect(expandTilde("./app.ini")).toBe("./app.ini");
      expect(expandTilde("~other/app.ini")).toBe("~other/app.ini");
    });
  });

  describe("isVerbose", () => {
    it("should follow INIKV_CLI_DEBUG", () => {
      delete process.env.INIKV_CLI_DEBUG;
      expect(isVerbose()).toBe(false);
      process.env.INIKV_CLI_DEBUG = "1";
      expect(isVerbose()).toBe(true);
    });
  });
});
