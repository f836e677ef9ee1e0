/**
 * --link-now-posts - link notes tagged `now` into the now directory.
 */

import * as path from "node:path";
import { BloggyConfig, LinkOutcome } from "../lib/models.js";
import { findNowNotes } from "../lib/scanner.js";
import { linkInto } from "../lib/symlink.js";
import { Logger } from "../lib/logger.js";

const DATED_FILENAME_REGEX = /^(19|20)\d{2}-\d{2}-\d{2}/;

/**
 * Name of the link for a now post. Files already named YYYY-MM-DD... keep
 * their name; otherwise the front-matter date, if any, becomes a prefix.
 */
export function nowPostFilename(filename: string, date?: string): string {
  if (DATED_FILENAME_REGEX.test(filename)) return filename;
  if (!date) return filename;
  return `${date.replace(/[\\/]/g, "-")}_${filename}`;
}

export function linkNowPosts(
  config: BloggyConfig,
  logger: Logger,
): LinkOutcome[] {
  logger.debug(`Target directory: ${config.nowDir}`);
  const posts = findNowNotes(config.notesDir, { logger });
  logger.info(`Found ${posts.length} #now posts`);

  return posts.map((post) => {
    const name = nowPostFilename(path.basename(post.path), post.date);
    logger.debug(`  Source: ${post.path}`);
    return linkInto(post.path, config.nowDir, { name, logger });
  });
}
