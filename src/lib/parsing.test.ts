/**
 * Tests for link extraction.
 */

import { describe, it, expect } from "vitest";
import {
  extractLinks,
  extractAssetLinks,
  assetRelativePath,
} from "./parsing.js";

describe("Link Extraction", () => {
  describe("extractLinks", () => {
    it("should extract text, target and offset", () => {
      const body = "See [photo](assets/x.png) and [site](https://example.com).";
      const links = [...extractLinks(body)];

      expect(links).toEqual([
        { text: "photo", target: "assets/x.png", offset: 4 },
        { text: "site", target: "https://example.com", offset: 30 },
      ]);
    });

    it("should match image syntax", () => {
      const links = [...extractLinks("![diagram](assets/d.svg)")];

      expect(links).toHaveLength(1);
      expect(links[0].target).toBe("assets/d.svg");
    });

    it("should accept empty link text", () => {
      const links = [...extractLinks("[](assets/empty.png)")];
      expect(links[0].text).toBe("");
      expect(links[0].target).toBe("assets/empty.png");
    });

    it("should not match links broken across lines", () => {
      const body = "[split\ntext](assets/a.png) and [ok](assets/\nb.png)";
      expect([...extractLinks(body)]).toHaveLength(0);
    });

    it("should yield nothing for a body without links", () => {
      expect([...extractLinks("Just some prose.\n\nNo links here.")]).toEqual(
        [],
      );
    });

    it("should be restartable", () => {
      const body = "[a](assets/a.png) [b](assets/b.png)";
      const first = [...extractLinks(body)];
      const second = [...extractLinks(body)];

      expect(second).toEqual(first);
    });
  });

  describe("extractAssetLinks", () => {
    it("should keep only targets containing the marker, in order", () => {
      const body = [
        "Intro [img](assets/x.png).",
        "A [note](other-note.md) and ![pic](../assets/sub/y.jpg)",
        "Again [img](assets/x.png)",
      ].join("\n");

      expect([...extractAssetLinks(body, "assets")]).toEqual([
        "assets/x.png",
        "../assets/sub/y.jpg",
        "assets/x.png",
      ]);
    });

    it("should return an empty sequence when no links match", () => {
      const body = "[home](index.md)";
      expect([...extractAssetLinks(body, "assets")]).toEqual([]);
    });

    it("should honour a custom marker", () => {
      const body = "[a](media/a.png) [b](assets/b.png)";
      expect([...extractAssetLinks(body, "media")]).toEqual(["media/a.png"]);
    });
  });

  describe("assetRelativePath", () => {
    it("should drop everything up to the marker directory", () => {
      expect(assetRelativePath("assets/x.png", "assets")).toBe("x.png");
      expect(assetRelativePath("../assets/img/y.png", "assets")).toBe(
        "img/y.png",
      );
    });

    it("should keep links without a marker directory as they are", () => {
      expect(assetRelativePath("my-assets.png", "assets")).toBe(
        "my-assets.png",
      );
    });

    it("should decode percent escapes", () => {
      expect(assetRelativePath("assets/my%20photo.png", "assets")).toBe(
        "my photo.png",
      );
    });

    it("should leave malformed escapes untouched", () => {
      expect(assetRelativePath("assets/100%.png", "assets")).toBe("100%.png");
    });
  });
});
