/**
 * Tests for note classification.
 */

import { describe, it, expect } from "vitest";
import { isPublic, isNow, noteDate } from "./classify.js";
import { parseFields } from "./frontmatter.js";

describe("isPublic", () => {
  it("should accept true in any casing", () => {
    expect(isPublic(parseFields("public: true"))).toBe(true);
    expect(isPublic(parseFields("public: True"))).toBe(true);
    expect(isPublic(parseFields("public: TRUE"))).toBe(true);
  });

  it("should reject false-ish and missing values", () => {
    expect(isPublic(parseFields("public: false"))).toBe(false);
    expect(isPublic(parseFields("public: yes"))).toBe(false);
    expect(isPublic(parseFields("public:"))).toBe(false);
    expect(isPublic(parseFields("title: Draft"))).toBe(false);
    expect(isPublic({})).toBe(false);
  });

  it("should reject list values", () => {
    expect(isPublic(parseFields("public: [true]"))).toBe(false);
  });
});

describe("isNow", () => {
  it("should match now as an exact element", () => {
    expect(isNow(parseFields("tags: [now, blog]"))).toBe(true);
    expect(isNow(parseFields("tags: blog, now"))).toBe(true);
    expect(isNow(parseFields("tags: now"))).toBe(true);
    expect(isNow(parseFields("tags:\n  - journal\n  - now"))).toBe(true);
  });

  it("should ignore case and a leading hash", () => {
    expect(isNow(parseFields("tags: [#Now]"))).toBe(true);
  });

  it("should not match substrings", () => {
    expect(isNow(parseFields("tags: nowhere"))).toBe(false);
    expect(isNow(parseFields("tags: [snow, known]"))).toBe(false);
  });

  it("should be false without tags", () => {
    expect(isNow({})).toBe(false);
    expect(isNow(parseFields("tags:"))).toBe(false);
    expect(isNow(parseFields("category: now"))).toBe(false);
  });
});

describe("noteDate", () => {
  it("should return the date string", () => {
    expect(noteDate(parseFields("date: 2024-05-01"))).toBe("2024-05-01");
  });

  it("should return undefined when absent or empty", () => {
    expect(noteDate({})).toBeUndefined();
    expect(noteDate(parseFields("date:"))).toBeUndefined();
  });
});
