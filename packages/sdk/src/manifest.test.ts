/**
 * Tests for manifest loading
 */

import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { withTempDir, writeFixture } from "@treeorder/testkit";
import { loadManifest, parseManifest, detectManifestFormat } from "./manifest.js";
import { ManifestNotFoundError, ManifestParseError, ManifestReadError } from "./errors.js";

function includes(manifest: { items: { evaluatedInclude: string }[] }): string[] {
  return manifest.items.map((item) => item.evaluatedInclude);
}

describe("manifest", () => {
  describe("detectManifestFormat", () => {
    it("should read .json files as JSON", () => {
      expect(detectManifestFormat("order.json")).toBe("json");
      expect(detectManifestFormat("/a/ORDER.JSON")).toBe("json");
    });

    it("should read other files as lines", () => {
      expect(detectManifestFormat("order.txt")).toBe("lines");
      expect(detectManifestFormat("order")).toBe("lines");
    });
  });

  describe("parseManifest", () => {
    it("should parse an array of includes", () => {
      const manifest = parseManifest('["a/b.cs", {"evaluatedInclude": "c\\\\d.cs"}]', "json", "/base");
      expect(includes(manifest)).toEqual(["a/b.cs", "c\\d.cs"]);
      expect(manifest.projectDir).toBe(path.resolve("/base"));
    });

    it("should resolve projectDir against the base directory", () => {
      const manifest = parseManifest(
        JSON.stringify({ projectDir: "src/App", items: ["Program.cs"] }),
        "json",
        "/base"
      );
      expect(manifest.projectDir).toBe(path.resolve("/base", "src/App"));
      expect(includes(manifest)).toEqual(["Program.cs"]);
    });

    it("should keep an absolute projectDir", () => {
      const manifest = parseManifest(JSON.stringify({ projectDir: "/abs", items: [] }), "json", "/base");
      expect(manifest.projectDir).toBe(path.resolve("/abs"));
    });

    it("should parse line manifests, skipping blanks and comments", () => {
      const manifest = parseManifest("# order\r\n  a/b.cs  \n\n#c.cs\nd.cs\n", "lines", "/base");
      expect(includes(manifest)).toEqual(["a/b.cs", "d.cs"]);
    });

    it("should strip a BOM", () => {
      const manifest = parseManifest("\uFEFF" + '["a.cs"]', "json", "/base");
      expect(includes(manifest)).toEqual(["a.cs"]);
    });

    it("should report invalid JSON", () => {
      expect(() => parseManifest("{", "json", "/base", "order.json")).toThrow(ManifestParseError);
      expect(() => parseManifest("{", "json", "/base", "order.json")).toThrow(
        "Invalid manifest order.json: invalid JSON"
      );
    });

    it("should report schema issues with their path", () => {
      let caught: unknown;
      try {
        parseManifest(JSON.stringify({ items: "a.cs" }), "json", "/base");
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ManifestParseError);
      if (caught instanceof ManifestParseError) {
        expect(caught.issues).toEqual(["items: Expected array, received string"]);
        expect(caught.code).toBe("E_MANIFEST");
        expect(caught.source).toBe("<inline>");
      }
    });

    it("should reject unknown top-level keys", () => {
      expect(() =>
        parseManifest(JSON.stringify({ items: [], order: [] }), "json", "/base")
      ).toThrow(ManifestParseError);
    });

    it("should reject entries that are not includes", () => {
      expect(() => parseManifest("[1]", "json", "/base")).toThrow(ManifestParseError);
    });
  });

  describe("loadManifest", () => {
    it("should load a JSON manifest relative to its directory", async () => {
      await withTempDir(async (dir) => {
        const file = await writeFixture(dir, "conf/order.json", { projectDir: "..", items: ["a.cs"] });
        const manifest = await loadManifest(file);

        expect(manifest.projectDir).toBe(path.resolve(dir));
        expect(includes(manifest)).toEqual(["a.cs"]);
      });
    });

    it("should load a line manifest with its directory as projectDir", async () => {
      await withTempDir(async (dir) => {
        const file = await writeFixture(dir, "order.txt", "x/y.cs\nz.cs\n");
        const manifest = await loadManifest(file);

        expect(manifest.projectDir).toBe(path.resolve(dir));
        expect(includes(manifest)).toEqual(["x/y.cs", "z.cs"]);
      });
    });

    it("should throw ManifestNotFoundError for a missing file", async () => {
      await withTempDir(async (dir) => {
        await expect(loadManifest(path.join(dir, "missing.json"))).rejects.toThrow(ManifestNotFoundError);
      });
    });

    it("should throw ManifestReadError when the path is a directory", async () => {
      await withTempDir(async (dir) => {
        await expect(loadManifest(dir)).rejects.toThrow(ManifestReadError);
      });
    });
  });
});
