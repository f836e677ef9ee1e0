/**
 * Symlink management.
 *
 * Links are created pointing at the absolute source path. An existing link
 * to the same source is left alone; anything else at the destination is
 * reported and never overwritten.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { LinkOutcome } from "./models.js";
import { errorMessage, hasErrorCode } from "./errors.js";
import { Logger, silentLogger } from "./logger.js";

export interface LinkOptions {
  /** Link file name, defaults to the source's base name */
  name?: string;
  logger?: Logger;
}

function lstatOrNull(filePath: string): fs.Stats | null {
  try {
    return fs.lstatSync(filePath);
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) return null;
    throw err;
  }
}

function describeOccupant(destination: string, stats: fs.Stats): string {
  if (stats.isSymbolicLink()) {
    return `links to ${fs.readlinkSync(destination)}`;
  }
  if (stats.isDirectory()) return "is a directory";
  return "is a regular file";
}

/**
 * Create `destDir/<name>` as a symlink to the absolute path of `source`.
 */
export function linkInto(
  source: string,
  destDir: string,
  options: LinkOptions = {},
): LinkOutcome {
  const logger = options.logger ?? silentLogger;
  const absoluteSource = path.resolve(source);
  const destination = path.join(
    destDir,
    options.name ?? path.basename(absoluteSource),
  );

  if (!fs.existsSync(absoluteSource)) {
    logger.warn(`Source file not found: ${absoluteSource}`);
    return { status: "missing-source", source: absoluteSource, destination };
  }

  try {
    const existing = lstatOrNull(destination);
    if (existing) {
      if (
        existing.isSymbolicLink() &&
        path.resolve(path.dirname(destination), fs.readlinkSync(destination)) ===
          absoluteSource
      ) {
        logger.debug(`  Already linked: ${destination}`);
        return { status: "unchanged", source: absoluteSource, destination };
      }

      const detail = describeOccupant(destination, existing);
      logger.warn(`Not overwriting ${destination}: it ${detail}`);
      return {
        status: "conflict",
        source: absoluteSource,
        destination,
        detail,
      };
    }

    fs.mkdirSync(path.dirname(destination), { recursive: true });
    fs.symlinkSync(absoluteSource, destination);
  } catch (err) {
    const detail = errorMessage(err);
    logger.warn(`Failed to link ${destination}: ${detail}`);
    return { status: "failed", source: absoluteSource, destination, detail };
  }

  logger.debug(`  Linked: ${destination} -> ${absoluteSource}`);
  return { status: "created", source: absoluteSource, destination };
}

/**
 * Count outcomes by status.
 */
export function summarizeOutcomes(
  outcomes: LinkOutcome[],
): Record<LinkOutcome["status"], number> {
  const counts: Record<LinkOutcome["status"], number> = {
    created: 0,
    unchanged: 0,
    conflict: 0,
    "missing-source": 0,
    failed: 0,
  };
  for (const outcome of outcomes) {
    counts[outcome.status]++;
  }
  return counts;
}
