/**
 * --list-public-posts - absolute paths of public notes.
 */

import { BloggyConfig } from "../lib/models.js";
import { findPublicNotes } from "../lib/scanner.js";
import { Logger } from "../lib/logger.js";

export function listPublicPosts(config: BloggyConfig, logger: Logger): string[] {
  logger.debug(`Scanning for public notes in: ${config.notesDir}`);
  const notes = findPublicNotes(config.notesDir, { logger });

  logger.debug(`Outputting ${notes.length} public note paths`);
  return notes.map((note) => note.path);
}
