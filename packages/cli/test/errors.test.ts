/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import {
  FileOpenError,
  KeyNotFoundError,
  SectionNotFoundError,
  StoreNotLoadedError,
} from "@inikv/sdk";
import { CliError, mapErrorToExitCode, formatCliError } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("not found", { exitCode: 2 });
      expect(err.exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapErrorToExitCode", () => {
    it("should map missing sections and keys to exit code 2", () => {
      expect(mapErrorToExitCode(new SectionNotFoundError("db"))).toBe(2);
      expect(mapErrorToExitCode(new KeyNotFoundError("db", "user"))).toBe(2);
    });

    it("should map other store errors to exit code 1", () => {
      expect(mapErrorToExitCode(new FileOpenError("/missing.ini"))).toBe(1);
      expect(mapErrorToExitCode(new StoreNotLoadedError())).toBe(1);
    });

    it("should use the exit code of a CliError", () => {
      expect(mapErrorToExitCode(new CliError("custom", { exitCode: 7 }))).toBe(7);
    });

    it("should default to exit code 1 for unknown values", () => {
      expect(mapErrorToExitCode(new Error("boom"))).toBe(1);
      expect(mapErrorToExitCode("string error")).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should append the code of store errors", () => {
      expect(formatCliError(new SectionNotFoundError("db"))).toBe(
        "Section 'db' not found in the resource file [E_NO_SECTION]"
      );
    });

    it("should include the cause in verbose mode", () => {
      const err = new FileOpenError("/missing.ini", { cause: new Error("ENOENT: no such file") });
      const message = formatCliError(err, true);
      expect(message.startsWith(
        "Unable to open resource file: /missing.ini [E_OPEN]\n  Cause: ENOENT: no such file\n"
      )).toBe(true);
    });

    it("should stringify non-errors", () => {
      expect(formatCliError(42)).toBe("42");
    });
  });
});
