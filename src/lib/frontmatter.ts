/**
 * Front-matter parsing for notes.
 *
 * gray-matter splits the block from the body; the block itself is read as
 * simple `key: value` lines rather than full YAML, so that hand-written values
 * like `title: Part 1: intro` never make a note unreadable.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import matter from "gray-matter";
import {
  FrontMatter,
  FrontMatterBlock,
  FrontMatterValue,
  Note,
} from "./models.js";
import { NoteReadError, errorMessage } from "./errors.js";

/** Marker line that opens and closes the block */
export const FRONT_MATTER_MARKER = "---";

const BLOCK_LIST_ITEM_REGEX = /^\s*-\s+(.*)$/;

/**
 * Result of splitting a file into front-matter and body.
 */
export interface ParsedContent {
  frontmatter: FrontMatter;
  body: string;
  block: FrontMatterBlock;
}

function isQuoted(value: string): boolean {
  if (value.length < 2) return false;
  const quote = value[0];
  if (quote !== '"' && quote !== "'") return false;
  return value.endsWith(quote) && !value.slice(1, -1).includes(quote);
}

function unquote(value: string): string {
  return isQuoted(value) ? value.slice(1, -1) : value;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => unquote(item.trim()))
    .filter((item) => item !== "");
}

/**
 * Parse a single front-matter value.
 *
 * - `"quoted, text"` stays a string (quotes removed)
 * - `[a, b]` and `a, b` become lists
 * - anything else is a trimmed string
 */
export function parseValue(raw: string): FrontMatterValue {
  const value = raw.trim();

  if (isQuoted(value)) {
    return { kind: "string", value: value.slice(1, -1) };
  }
  if (value.startsWith("[") && value.endsWith("]")) {
    return { kind: "list", items: splitList(value.slice(1, -1)) };
  }
  if (value.includes(",")) {
    return { kind: "list", items: splitList(value) };
  }
  return { kind: "string", value };
}

/**
 * Parse the interior lines of a front-matter block.
 *
 * A key with an empty value followed by `- item` lines collects those items
 * into a list. Lines without a colon and `#` comments are ignored.
 */
export function parseFields(block: string): FrontMatter {
  const fields: FrontMatter = {};
  let listKey: string | null = null;

  for (const line of block.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#")) continue;

    const item = BLOCK_LIST_ITEM_REGEX.exec(line);
    if (item) {
      if (listKey === null) continue;
      const value = unquote(item[1].trim());
      if (value === "") continue;
      const current = fields[listKey];
      fields[listKey] =
        current.kind === "list"
          ? { kind: "list", items: [...current.items, value] }
          : { kind: "list", items: [value] };
      continue;
    }

    const colon = line.indexOf(":");
    if (colon === -1) {
      listKey = null;
      continue;
    }

    const key = line.slice(0, colon).trim();
    const raw = line.slice(colon + 1).trim();
    if (key === "" || key === "__proto__") {
      listKey = null;
      continue;
    }

    fields[key] = parseValue(raw);
    listKey = raw === "" ? key : null;
  }

  return fields;
}

function closingLine(lines: string[]): number {
  if (lines[0].trimEnd() !== FRONT_MATTER_MARKER) return -1;

  for (let i = 1; i < lines.length; i++) {
    if (lines[i].trim() === FRONT_MATTER_MARKER) return i;
  }
  return 0;
}

/**
 * Classify the block at the top of the content. The opening marker must be
 * the whole first line; the block closes at the next line that is exactly
 * the marker, surrounding whitespace aside. `----` does not close it.
 */
export function detectBlock(content: string): FrontMatterBlock {
  const close = closingLine(content.split(/\r?\n/));
  if (close < 0) return "missing";
  return close === 0 ? "unterminated" : "closed";
}

/**
 * Split raw file text into front-matter and body.
 *
 * Never throws: a missing or unterminated block yields empty front-matter
 * with the whole file as body.
 */
export function parseFrontMatter(content: string): ParsedContent {
  const text = content.replace(/^\uFEFF/, "");
  const rawLines = text.split(/(?<=\n)/);
  const lines = rawLines.map((line) => line.replace(/\r?\n$/, ""));
  const close = closingLine(lines);

  if (close <= 0) {
    return {
      frontmatter: {},
      body: text,
      block: close < 0 ? "missing" : "unterminated",
    };
  }

  // gray-matter closes on any line starting with the marker, so hand it
  // only the lines up to the exact closing marker.
  const header = [
    FRONT_MATTER_MARKER,
    ...lines
      .slice(1, close)
      .filter((line) => !line.startsWith(FRONT_MATTER_MARKER)),
    FRONT_MATTER_MARKER,
    "",
  ].join("\n");
  const file = matter(header, { engines: { yaml: parseFields } });
  const frontmatter: FrontMatter = file.data;

  const body = rawLines.slice(close + 1).join("");
  return { frontmatter, body, block: "closed" };
}

/**
 * Read and parse a note file.
 */
export function readNote(filePath: string): Note {
  const absolute = path.resolve(filePath);
  let content: string;

  try {
    content = fs.readFileSync(absolute, "utf-8");
  } catch (err) {
    throw new NoteReadError(absolute, errorMessage(err));
  }

  return { path: absolute, ...parseFrontMatter(content) };
}
