/**
 * Command-line flags for bloggy.
 */

import { Command } from "commander";

export const VERSION = "0.1.0";

/**
 * Build the commander program. Parsing throws a `CommanderError` instead of
 * exiting, so the caller decides the exit status.
 */
export function buildProgram(): Command {
  return new Command()
    .name("bloggy")
    .description("Selective note publishing for a static blog")
    .version(VERSION, "-V, --version", "output the version number")
    .option(
      "--list-public-posts",
      "output absolute paths of public notes (for piping to ln -s)",
    )
    .option(
      "--get-forward-links <file>",
      "output forward (asset) links for a specific note file",
    )
    .option(
      "--list-public-assets",
      "output all assets referenced by public notes (whitelist)",
    )
    .option(
      "--link-public-assets",
      "create symlinks for public assets in the posts assets directory",
    )
    .option(
      "--link-now-posts",
      "create symlinks for #now posts in the now directory",
    )
    .option("--notes-dir <path>", "notes directory (default: ../Notes)")
    .option(
      "--config <path>",
      "config file (default: ./bloggy.toml if present)",
    )
    .option("-v, --verbose", "enable verbose logging output")
    .allowExcessArguments(false)
    .showHelpAfterError()
    .exitOverride();
}
