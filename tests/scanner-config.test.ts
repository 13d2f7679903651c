import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, test } from "vitest";
import { ZodError } from "zod";
import { parseSourceDefinitions, readSourceDefinitions } from "../src/services/scanner-config.js";

describe("source definitions", () => {
  test("applies defaults", () => {
    const sources = parseSourceDefinitions({
      sources: [{ id: "fb", kind: "facebook-marketplace", url: "https://www.facebook.com/marketplace/" }],
    });
    expect(sources).toEqual([
      { id: "fb", kind: "facebook-marketplace", url: "https://www.facebook.com/marketplace/", enabled: true },
    ]);
  });

  test("rejects unknown kinds and duplicate ids", () => {
    expect(() =>
      parseSourceDefinitions({ sources: [{ id: "x", kind: "craigslist", url: "https://example.com" }] }),
    ).toThrow(ZodError);
    expect(() =>
      parseSourceDefinitions({
        sources: [
          { id: "a", kind: "rss", url: "https://example.com/1.xml" },
          { id: "a", kind: "rss", url: "https://example.com/2.xml" },
        ],
      }),
    ).toThrow("Duplicate source id: a");
  });

  test("reads the shipped configuration", async () => {
    const sources = await readSourceDefinitions(fileURLToPath(new URL("../config/sources.json", import.meta.url)));
    expect(sources.map((source) => source.kind)).toEqual(["gumtree", "facebook-marketplace"]);
  });

  test("reads a file relative to the working directory", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "sources-"));
    const file = path.join(dir, "sources.json");
    await fs.writeFile(
      file,
      JSON.stringify({ version: 1, sources: [{ id: "feed", kind: "rss", url: "https://example.com/feed.xml", enabled: false }] }),
      "utf8",
    );
    try {
      const sources = await readSourceDefinitions(path.relative(process.cwd(), file));
      expect(sources).toEqual([{ id: "feed", kind: "rss", url: "https://example.com/feed.xml", enabled: false }]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
