/**
 * Notes directory scanning.
 *
 * Walks the notes root for markdown files and classifies each one. Entries
 * are visited in name order so repeated runs over an unchanged tree produce
 * identical output.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { Note, ScannedNote } from "./models.js";
import { readNote } from "./frontmatter.js";
import { isNow, isPublic, noteDate } from "./classify.js";
import { extractAssetLinks } from "./parsing.js";
import { NotesDirError, errorMessage } from "./errors.js";
import { Logger, silentLogger } from "./logger.js";

export const NOTE_EXTENSION = ".md";

export interface ScanOptions {
  /** Also extract asset links from each note */
  withAssets?: boolean;
  /** Substring an asset link target must contain */
  assetMarker?: string;
  logger?: Logger;
}

/**
 * Order strings by UTF-16 code unit, independent of locale.
 */
export function byCodeUnit(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Ensure the notes root exists, is a directory and can be listed.
 */
export function assertNotesDir(notesDir: string): void {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(notesDir);
  } catch {
    throw new NotesDirError(notesDir, "not found");
  }
  if (!stats.isDirectory()) {
    throw new NotesDirError(notesDir, "is not a directory");
  }
  try {
    fs.readdirSync(notesDir);
  } catch (err) {
    throw new NotesDirError(notesDir, `is not readable: ${errorMessage(err)}`);
  }
}

function isFileTarget(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

function* walk(dir: string, logger: Logger): Generator<string> {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    logger.warn(`Skipping unreadable directory ${dir}: ${errorMessage(err)}`);
    return;
  }

  entries.sort((a, b) => byCodeUnit(a.name, b.name));

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      yield* walk(fullPath, logger);
      continue;
    }
    if (!entry.name.endsWith(NOTE_EXTENSION)) continue;

    // Symlinked files count, symlinked directories are not followed
    if (
      entry.isFile() ||
      (entry.isSymbolicLink() && isFileTarget(fullPath))
    ) {
      yield fullPath;
    }
  }
}

/**
 * Yield absolute paths of markdown files under the root, recursively.
 */
export function walkMarkdownFiles(
  notesDir: string,
  logger: Logger = silentLogger,
): Generator<string> {
  const root = path.resolve(notesDir);
  assertNotesDir(root);
  return walk(root, logger);
}

function* classify(
  files: Generator<string>,
  options: ScanOptions,
  logger: Logger,
): Generator<ScannedNote> {
  const marker = options.assetMarker ?? "assets";

  for (const filePath of files) {
    let note: Note;
    try {
      note = readNote(filePath);
    } catch (err) {
      logger.warn(`Skipping ${filePath}: ${errorMessage(err)}`);
      continue;
    }

    if (note.block === "unterminated") {
      logger.warn(
        `Unterminated front-matter in ${filePath}, treating as private`,
      );
    }

    const scanned: ScannedNote = {
      path: note.path,
      isPublic: isPublic(note.frontmatter),
      isNow: isNow(note.frontmatter),
    };
    const date = noteDate(note.frontmatter);
    if (date !== undefined) scanned.date = date;
    if (options.withAssets) {
      scanned.assetLinks = [...extractAssetLinks(note.body, marker)];
    }

    yield scanned;
  }
}

/**
 * Scan the notes root and classify every readable markdown file.
 * Throws NotesDirError up front if the root itself is unusable.
 */
export function scanNotes(
  notesDir: string,
  options: ScanOptions = {},
): Generator<ScannedNote> {
  const logger = options.logger ?? silentLogger;
  return classify(walkMarkdownFiles(notesDir, logger), options, logger);
}

/**
 * Notes with `public: true`, in scan order.
 */
export function findPublicNotes(
  notesDir: string,
  options: ScanOptions = {},
): ScannedNote[] {
  return [...scanNotes(notesDir, options)].filter((note) => note.isPublic);
}

/**
 * Notes tagged `now`, in scan order.
 */
export function findNowNotes(
  notesDir: string,
  options: ScanOptions = {},
): ScannedNote[] {
  return [...scanNotes(notesDir, options)].filter((note) => note.isNow);
}

/**
 * The asset whitelist: unique asset links across all public notes, sorted.
 */
export function collectPublicAssets(
  notesDir: string,
  options: Omit<ScanOptions, "withAssets"> = {},
): string[] {
  const logger = options.logger ?? silentLogger;
  const assets = new Set<string>();
  let noteCount = 0;

  for (const note of scanNotes(notesDir, { ...options, withAssets: true })) {
    if (!note.isPublic) continue;
    noteCount++;
    const links = note.assetLinks ?? [];
    for (const link of links) assets.add(link);
    logger.debug(`  ${path.basename(note.path)}: ${links.length} assets`);
  }

  const whitelist = [...assets].sort(byCodeUnit);
  logger.debug(
    `Collected ${whitelist.length} unique assets from ${noteCount} public notes`,
  );
  return whitelist;
}
