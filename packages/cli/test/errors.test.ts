/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { CommanderError, InvalidArgumentError } from "commander";
import { ManifestNotFoundError, ManifestParseError } from "@treeorder/sdk";
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
      expect(new CliError("not found", { exitCode: 2 }).exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      expect(new CliError("wrapper", { cause }).cause).toBe(cause);
    });
  });

  describe("mapErrorToExitCode", () => {
    it("should map ManifestNotFoundError to exit code 2", () => {
      expect(mapErrorToExitCode(new ManifestNotFoundError("/x/order.json"))).toBe(2);
    });

    it("should map parse errors to exit code 1", () => {
      expect(mapErrorToExitCode(new ManifestParseError("/x/order.json", ["(root): bad"]))).toBe(1);
    });

    it("should keep commander exit codes", () => {
      expect(mapErrorToExitCode(new InvalidArgumentError("bad"))).toBe(1);
      expect(mapErrorToExitCode(new CommanderError(0, "commander.helpDisplayed", "(outputHelp)"))).toBe(0);
    });

    it("should default to exit code 1 for unknown errors", () => {
      expect(mapErrorToExitCode(new Error("unknown"))).toBe(1);
      expect(mapErrorToExitCode("string error")).toBe(1);
      expect(mapErrorToExitCode(null)).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should format error message", () => {
      expect(formatCliError(new Error("test error"))).toBe("test error");
    });

    it("should truncate long messages", () => {
      const formatted = formatCliError(new Error("x".repeat(3000)));
      expect(formatted).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should include cause and stack in verbose mode", () => {
      const err = new Error("wrapper", { cause: new Error("underlying") });
      const formatted = formatCliError(err, true);
      expect(formatted.startsWith("wrapper\n  Cause: Error: underlying\n")).toBe(true);
      expect(formatted).toContain("Error: wrapper");
    });

    it("should not include stack in non-verbose mode", () => {
      expect(formatCliError(new Error("test"), false)).toBe("test");
    });

    it("should handle non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(42)).toBe("42");
      expect(formatCliError(null)).toBe("null");
    });
  });
});
