/**
 * --get-forward-links - asset links referenced by a single note.
 */

import * as path from "node:path";
import { BloggyConfig } from "../lib/models.js";
import { readNote } from "../lib/frontmatter.js";
import { extractAssetLinks } from "../lib/parsing.js";
import { Logger } from "../lib/logger.js";

/**
 * Asset links in the note at `file` (resolved against the working directory),
 * in order of appearance. Throws NoteReadError if the file cannot be read.
 */
export function getForwardLinks(
  file: string,
  config: BloggyConfig,
  logger: Logger,
): string[] {
  const note = readNote(path.resolve(file));
  logger.debug(`Extracting assets from: ${path.basename(note.path)}`);

  const links = [...extractAssetLinks(note.body, config.assetDirName)];
  for (const link of links) {
    logger.debug(`  Found asset link: ${link}`);
  }
  logger.debug(`Outputting ${links.length} forward links`);
  return links;
}
