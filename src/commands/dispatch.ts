/**
 * Operation selection and execution for the CLI.
 *
 * Exactly one operation flag is accepted per invocation. Operations report
 * their primary output through `out` and diagnostics through the logger;
 * the caller turns the returned code into the process exit status.
 */

import {
  BloggyConfig,
  ExitCode,
  ExitCodes,
  LinkOutcome,
} from "../lib/models.js";
import { NoteReadError, NotesDirError } from "../lib/errors.js";
import { Logger } from "../lib/logger.js";
import { summarizeOutcomes } from "../lib/symlink.js";
import { listPublicPosts } from "./posts.js";
import { getForwardLinks } from "./links.js";
import { linkPublicAssets, listPublicAssets } from "./assets.js";
import { linkNowPosts } from "./now.js";

/**
 * Parsed CLI flags.
 */
export type CliOptions = {
  listPublicPosts?: boolean;
  getForwardLinks?: string;
  listPublicAssets?: boolean;
  linkPublicAssets?: boolean;
  linkNowPosts?: boolean;
  notesDir?: string;
  config?: string;
  verbose?: boolean;
};

export type Operation =
  | { kind: "list-public-posts" }
  | { kind: "get-forward-links"; file: string }
  | { kind: "list-public-assets" }
  | { kind: "link-public-assets" }
  | { kind: "link-now-posts" };

export type Selection =
  | { ok: true; operation: Operation }
  | { ok: false; error: string };

/**
 * Pick the single requested operation.
 */
export function selectOperation(options: CliOptions): Selection {
  const requested: Operation[] = [];

  if (options.listPublicPosts) requested.push({ kind: "list-public-posts" });
  if (options.getForwardLinks !== undefined) {
    requested.push({ kind: "get-forward-links", file: options.getForwardLinks });
  }
  if (options.listPublicAssets) requested.push({ kind: "list-public-assets" });
  if (options.linkPublicAssets) requested.push({ kind: "link-public-assets" });
  if (options.linkNowPosts) requested.push({ kind: "link-now-posts" });

  if (requested.length === 0) {
    return { ok: false, error: "no operation given" };
  }
  if (requested.length > 1) {
    const names = requested.map((op) => `--${op.kind}`).join(", ");
    return { ok: false, error: `operations are mutually exclusive: ${names}` };
  }
  return { ok: true, operation: requested[0] };
}

function reportLinks(
  outcomes: LinkOutcome[],
  noun: string,
  logger: Logger,
): void {
  const counts = summarizeOutcomes(outcomes);
  const linked = counts.created + counts.unchanged;
  logger.info(
    `Linked ${linked}/${outcomes.length} ${noun} (${counts.created} new, ${counts.unchanged} unchanged)`,
  );

  const skipped = counts.conflict + counts["missing-source"] + counts.failed;
  if (skipped > 0) {
    logger.warn(
      `Skipped ${skipped} ${noun}: ${counts.conflict} conflicts, ${counts["missing-source"]} missing sources, ${counts.failed} failures`,
    );
  }
}

/**
 * Run one operation. Returns DATA_ERROR when the notes root or the named
 * note cannot be read; other errors propagate.
 */
export function runOperation(
  operation: Operation,
  config: BloggyConfig,
  out: (line: string) => void,
  logger: Logger,
): ExitCode {
  try {
    switch (operation.kind) {
      case "list-public-posts":
        listPublicPosts(config, logger).forEach((line) => out(line));
        break;
      case "get-forward-links":
        getForwardLinks(operation.file, config, logger).forEach((line) =>
          out(line),
        );
        break;
      case "list-public-assets":
        listPublicAssets(config, logger).forEach((line) => out(line));
        break;
      case "link-public-assets":
        reportLinks(linkPublicAssets(config, logger), "assets", logger);
        break;
      case "link-now-posts":
        reportLinks(linkNowPosts(config, logger), "#now posts", logger);
        break;
    }
  } catch (err) {
    if (err instanceof NotesDirError || err instanceof NoteReadError) {
      logger.error(err.message);
      return ExitCodes.DATA_ERROR;
    }
    throw err;
  }

  return ExitCodes.SUCCESS;
}
