/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { CommanderError } from "commander";
import { BackendRequestError, ConfigError } from "@tablemat/sdk";
import { CliError, formatCliError, mapSdkErrorToExitCode } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should carry a custom exit code and cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("not found", { exitCode: 2, cause });
      expect(err.exitCode).toBe(2);
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapSdkErrorToExitCode", () => {
    it("should use the exit code of a CliError", () => {
      expect(mapSdkErrorToExitCode(new CliError("partial", { exitCode: 3 }))).toBe(3);
    });

    it("should map a backend 404 to exit code 2", () => {
      expect(mapSdkErrorToExitCode(new BackendRequestError(404, "ResourceNotFound", "gone"))).toBe(2);
    });

    it("should map other backend failures to exit code 1", () => {
      expect(mapSdkErrorToExitCode(new BackendRequestError(409, "EntityAlreadyExists", "dup"))).toBe(1);
      expect(mapSdkErrorToExitCode(new ConfigError("bad"))).toBe(1);
    });

    it("should map commander exits", () => {
      expect(mapSdkErrorToExitCode(new CommanderError(0, "commander.helpDisplayed", "(outputHelp)"))).toBe(0);
      expect(mapSdkErrorToExitCode(new CommanderError(1, "commander.unknownCommand", "unknown"))).toBe(1);
    });

    it("should default to exit code 1 for unknown errors", () => {
      expect(mapSdkErrorToExitCode(new Error("unknown"))).toBe(1);
      expect(mapSdkErrorToExitCode("string error")).toBe(1);
      expect(mapSdkErrorToExitCode(null)).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should return the message", () => {
      expect(formatCliError(new Error("test error"))).toBe("test error");
    });

    it("should truncate long messages", () => {
      const formatted = formatCliError(new Error("x".repeat(3000)));
      expect(formatted).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should add the error code, cause and stack in verbose mode", () => {
      const err = new ConfigError("bad config", [], { cause: new Error("underlying") });
      const formatted = formatCliError(err, true);

      expect(formatted.startsWith("[E_CONFIG] bad config\n  Cause: underlying\n")).toBe(true);
      expect(formatted.endsWith(`\n${err.stack ?? ""}`)).toBe(true);
    });

    it("should handle non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(42)).toBe("42");
      expect(formatCliError(null)).toBe("null");
    });
  });
});
