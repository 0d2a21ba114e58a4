import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { hasExtension, listInputFiles, normalizeExtensions, parseExtensionList } from "../utilities.js";

describe("extension helpers", () => {
  it("normalizes extension lists", () => {
    expect(normalizeExtensions(["TXT", ".txt", " .md ", "", "."])).toEqual([".txt", ".md"]);
    expect(parseExtensionList(".txt,text")).toEqual([".txt", ".text"]);
  });

  it("matches extensions case-insensitively", () => {
    expect(hasExtension("Chapter1.TXT", [".txt"])).toBe(true);
    expect(hasExtension("chapter1.txt.bak", [".txt"])).toBe(false);
    expect(hasExtension("README", [".txt"])).toBe(false);
  });
});

describe("listInputFiles", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "book-sanitizer-utils-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  it("lists matching regular files in name order", async () => {
    await writeFile(join(tempDir, "b.txt"), "");
    await writeFile(join(tempDir, "a.txt"), "");
    await writeFile(join(tempDir, "a.md"), "");
    await mkdir(join(tempDir, "c.txt"));

    await expect(listInputFiles(tempDir, [".txt"])).resolves.toEqual(["a.txt", "b.txt"]);
  });
});
