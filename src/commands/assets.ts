/**
 * --list-public-assets and --link-public-assets.
 *
 * The whitelist is every asset link found in a public note. Linking mirrors
 * each whitelisted asset from <notes>/assets into the posts assets directory,
 * keeping any subdirectories.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { BloggyConfig, LinkOutcome } from "../lib/models.js";
import { assertNotesDir, collectPublicAssets } from "../lib/scanner.js";
import { assetRelativePath } from "../lib/parsing.js";
import { linkInto } from "../lib/symlink.js";
import { Logger } from "../lib/logger.js";

function isInside(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return (
    relative !== "" &&
    relative !== ".." &&
    !relative.startsWith(`..${path.sep}`) &&
    !path.isAbsolute(relative)
  );
}

export function listPublicAssets(
  config: BloggyConfig,
  logger: Logger,
): string[] {
  logger.debug(`Collecting public assets from: ${config.notesDir}`);
  const assets = collectPublicAssets(config.notesDir, {
    assetMarker: config.assetDirName,
    logger,
  });

  logger.debug(`Found ${assets.length} unique assets in public notes`);
  return assets;
}

export function linkPublicAssets(
  config: BloggyConfig,
  logger: Logger,
): LinkOutcome[] {
  assertNotesDir(config.notesDir);

  const sourceDir = path.join(config.notesDir, config.assetDirName);
  logger.debug(`Source assets directory: ${sourceDir}`);
  logger.debug(`Target directory: ${config.postsAssetsDir}`);

  if (!fs.existsSync(sourceDir)) {
    logger.warn(`Source assets directory not found: ${sourceDir}`);
    return [];
  }

  const assets = listPublicAssets(config, logger);
  logger.info(
    `Linking ${assets.length} public assets to ${config.postsAssetsDir}...`,
  );

  const outcomes: LinkOutcome[] = [];
  for (const asset of assets) {
    const relative = assetRelativePath(asset, config.assetDirName);
    if (relative === "") {
      logger.warn(`Asset link ${asset} does not name a file, skipping`);
      continue;
    }

    const source = path.join(sourceDir, relative);
    const destination = path.join(config.postsAssetsDir, relative);
    if (
      !isInside(sourceDir, source) ||
      !isInside(config.postsAssetsDir, destination)
    ) {
      logger.warn(`Asset link ${asset} leaves the assets directory, skipping`);
      continue;
    }

    const destDir = path.dirname(destination);
    logger.debug(`  Source: ${source}`);
    outcomes.push(linkInto(source, destDir, { logger }));
  }

  return outcomes;
}
