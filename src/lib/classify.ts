/**
 * Note classification from parsed front-matter.
 */

import { FrontMatter, FrontMatterValue } from "./models.js";

/** Tag that marks a note for the "now" feed */
export const NOW_TAG = "now";

function asList(value: FrontMatterValue | undefined): string[] {
  if (!value) return [];
  if (value.kind === "list") return value.items;
  return value.value === "" ? [] : [value.value];
}

function normalizeTag(tag: string): string {
  return tag.trim().replace(/^#/, "").toLowerCase();
}

/**
 * True iff `public` is the string "true", in any casing.
 */
export function isPublic(frontmatter: FrontMatter): boolean {
  const value = frontmatter.public;
  return value?.kind === "string" && value.value.toLowerCase() === "true";
}

/**
 * True iff `tags` contains "now" as a whole element. Matching ignores case
 * and a leading `#`, so `#Now` matches and `nowhere` does not.
 */
export function isNow(frontmatter: FrontMatter): boolean {
  return asList(frontmatter.tags).some((tag) => normalizeTag(tag) === NOW_TAG);
}

/**
 * The note's `date` field, if it holds a non-empty string.
 */
export function noteDate(frontmatter: FrontMatter): string | undefined {
  const value = frontmatter.date;
  if (value?.kind !== "string" || value.value === "") return undefined;
  return value.value;
}
