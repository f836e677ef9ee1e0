/**
 * Bloggy - selective note publishing for a static blog.
 *
 * This is the library entry point for programmatic usage.
 * For CLI usage, see cli.ts.
 */

// Re-export models
export * from "./lib/models.js";

export {
  NotesDirError,
  NoteReadError,
  ConfigError,
} from "./lib/errors.js";

export {
  parseFrontMatter,
  parseFields,
  parseValue,
  detectBlock,
  readNote,
  FRONT_MATTER_MARKER,
} from "./lib/frontmatter.js";
export type { ParsedContent } from "./lib/frontmatter.js";

export { isPublic, isNow, noteDate, NOW_TAG } from "./lib/classify.js";

export {
  extractLinks,
  extractAssetLinks,
  assetRelativePath,
} from "./lib/parsing.js";
export type { InlineLink } from "./lib/parsing.js";

export {
  walkMarkdownFiles,
  scanNotes,
  findPublicNotes,
  findNowNotes,
  collectPublicAssets,
  assertNotesDir,
} from "./lib/scanner.js";
export type { ScanOptions } from "./lib/scanner.js";

export { linkInto, summarizeOutcomes } from "./lib/symlink.js";
export type { LinkOptions } from "./lib/symlink.js";

export {
  resolveConfig,
  loadConfigFile,
  CONFIG_FILE,
  NOTES_DIR_ENV,
} from "./lib/config.js";

export { createLogger, silentLogger } from "./lib/logger.js";
export type { Logger, LoggerOptions } from "./lib/logger.js";

// Operations
export { listPublicPosts } from "./commands/posts.js";
export { getForwardLinks } from "./commands/links.js";
export { listPublicAssets, linkPublicAssets } from "./commands/assets.js";
export { linkNowPosts, nowPostFilename } from "./commands/now.js";
export { selectOperation, runOperation } from "./commands/dispatch.js";
export type { CliOptions, Operation } from "./commands/dispatch.js";
