/**
 * Core data models for Bloggy.
 *
 * Notes are plain markdown files with an optional front-matter block. Nothing
 * here is persisted: every invocation re-reads the notes directory.
 */

/**
 * A front-matter value. Front-matter has no fixed schema, so each value is
 * either a single string or an ordered list of strings.
 */
export type FrontMatterValue =
  | { kind: "string"; value: string }
  | { kind: "list"; items: string[] };

/**
 * Parsed front-matter, keyed by field name.
 */
export type FrontMatter = Record<string, FrontMatterValue>;

/**
 * State of the front-matter block at the top of a note:
 * - closed: opening and closing markers found
 * - missing: no opening marker
 * - unterminated: opening marker without a closing one
 */
export type FrontMatterBlock = "closed" | "missing" | "unterminated";

/**
 * A note read from disk.
 */
export interface Note {
  /** Absolute file path */
  path: string;
  /** Parsed front-matter (empty unless the block is closed) */
  frontmatter: FrontMatter;
  /** Content after the front-matter block */
  body: string;
  block: FrontMatterBlock;
}

/**
 * Classification of a note produced by a directory scan.
 */
export interface ScannedNote {
  /** Absolute file path */
  path: string;
  isPublic: boolean;
  isNow: boolean;
  /** Value of the `date` field, if any */
  date?: string;
  /** Asset link targets, in order of appearance (only when requested) */
  assetLinks?: string[];
}

/**
 * Result of a single symlink request:
 * - created: a new link was made
 * - unchanged: the link already pointed at the source
 * - conflict: something else occupies the destination
 * - missing-source: the source file does not exist
 * - failed: the filesystem refused the operation
 */
export type LinkStatus =
  | "created"
  | "unchanged"
  | "conflict"
  | "missing-source"
  | "failed";

export interface LinkOutcome {
  status: LinkStatus;
  /** Absolute path the link points at */
  source: string;
  /** Path of the link itself */
  destination: string;
  /** Reason for conflict or failure */
  detail?: string;
}

/**
 * Resolved runtime configuration. All paths are absolute.
 */
export interface BloggyConfig {
  /** Root of the notes directory */
  notesDir: string;
  /** Where public asset links are created */
  postsAssetsDir: string;
  /** Where now-post links are created */
  nowDir: string;
  /** Name of the assets directory under notesDir, also the link filter */
  assetDirName: string;
}

/**
 * Default configuration values, relative to the working directory.
 */
export const DEFAULT_CONFIG: BloggyConfig = {
  notesDir: "../Notes",
  postsAssetsDir: "docs/posts/assets",
  nowDir: "docs/now",
  assetDirName: "assets",
};

/**
 * Process exit codes.
 */
export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE_ERROR: 2,
  DATA_ERROR: 3,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];
