import { AbortError, FetchError } from "@fedora-l10n/core";
import { CommanderError } from "commander";
import { describe, expect, it } from "vitest";
import { EXIT_CODES, exitCodeFor, UsageError } from "../exit-codes.js";

describe("exitCodeFor", () => {
  it("maps aborts to 130", () => {
    expect(exitCodeFor(new AbortError())).toBe(EXIT_CODES.INTERRUPTED);
  });

  it("maps usage errors to 2", () => {
    expect(exitCodeFor(new UsageError("bad flag"))).toBe(EXIT_CODES.USAGE_ERROR);
    expect(exitCodeFor(new CommanderError(1, "commander.unknownOption", "unknown option"))).toBe(
      EXIT_CODES.USAGE_ERROR
    );
  });

  it("treats --help and --version as success", () => {
    expect(exitCodeFor(new CommanderError(0, "commander.version", "1.0.0"))).toBe(EXIT_CODES.SUCCESS);
    expect(exitCodeFor(new CommanderError(0, "commander.helpDisplayed", "(outputHelp)"))).toBe(
      EXIT_CODES.SUCCESS
    );
  });

  it("maps everything else to 1", () => {
    expect(exitCodeFor(FetchError.fromStatus("https://weblate.example.test/api/", 500))).toBe(
      EXIT_CODES.ERROR
    );
    expect(exitCodeFor("boom")).toBe(EXIT_CODES.ERROR);
  });
});
