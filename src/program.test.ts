/**
 * Tests for command-line flag parsing.
 */

import { describe, it, expect } from "vitest";
import { Command, CommanderError } from "commander";
import { buildProgram } from "./program.js";
import { CliOptions } from "./commands/dispatch.js";

function quietProgram(): Command {
  return buildProgram().configureOutput({
    writeOut: () => {},
    writeErr: () => {},
    outputError: () => {},
  });
}

function parseError(args: string[]): CommanderError {
  try {
    quietProgram().parse(args, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err;
    throw err;
  }
  throw new Error(`expected ${args.join(" ")} to be rejected`);
}

describe("buildProgram", () => {
  it("should parse operation and setting flags", () => {
    const program = quietProgram().parse(
      ["--get-forward-links", "a.md", "--notes-dir", "vault", "-v"],
      { from: "user" },
    );

    expect(program.opts<CliOptions>()).toEqual({
      getForwardLinks: "a.md",
      notesDir: "vault",
      verbose: true,
    });
  });

  it("should reject stray positional arguments", () => {
    const err = parseError(["stray", "--list-public-posts"]);

    expect(err.code).toBe("commander.excessArguments");
    expect(err.exitCode).toBe(1);
  });

  it("should reject unknown options", () => {
    expect(parseError(["--list-posts"]).code).toBe("commander.unknownOption");
  });

  it("should reject an option missing its argument", () => {
    expect(parseError(["--get-forward-links"]).code).toBe(
      "commander.optionMissingArgument",
    );
  });
});
