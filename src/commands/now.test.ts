/**
 * Tests for now-post link naming.
 */

import { describe, it, expect } from "vitest";
import { nowPostFilename } from "./now.js";

describe("nowPostFilename", () => {
  it("should keep names that already start with a date", () => {
    expect(nowPostFilename("2024-03-09-weekly.md", "2024-03-10")).toBe(
      "2024-03-09-weekly.md",
    );
    expect(nowPostFilename("1999-12-31.md")).toBe("1999-12-31.md");
  });

  it("should prefix the front-matter date", () => {
    expect(nowPostFilename("weekly.md", "2024-03-10")).toBe(
      "2024-03-10_weekly.md",
    );
  });

  it("should keep the name when there is no date", () => {
    expect(nowPostFilename("weekly.md")).toBe("weekly.md");
  });

  it("should not treat other number prefixes as dates", () => {
    expect(nowPostFilename("2100-01-01.md", "2024-01-01")).toBe(
      "2024-01-01_2100-01-01.md",
    );
  });

  it("should replace path separators in the date", () => {
    expect(nowPostFilename("weekly.md", "2024/03/10")).toBe(
      "2024-03-10_weekly.md",
    );
  });
});
