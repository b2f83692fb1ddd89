import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createTempRoot, removeDir } from "@tablemat/testkit";
import { DirectoryError, PartitionReadError } from "./errors.js";
import { atomicWrite, ensureDirectory, listFiles, readFileIfExists, removeFile } from "./io.js";

describe("io operations", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempRoot();
  });

  afterEach(async () => {
    await removeDir(testDir);
  });

  async function tempFiles(): Promise<string[]> {
    return (await readdir(testDir)).filter((f) => f.endsWith(".tmp"));
  }

  describe("atomicWrite and readFileIfExists", () => {
    it("should write and read file successfully", async () => {
      const filePath = join(testDir, "test.json");

      await atomicWrite(filePath, '{"test": "data"}');

      expect(await readFileIfExists(filePath)).toBe('{"test": "data"}');
      expect(await tempFiles()).toEqual([]);
    });

    it("should overwrite existing file", async () => {
      const filePath = join(testDir, "test.json");

      await atomicWrite(filePath, "first");
      await atomicWrite(filePath, "second");

      expect(await readFileIfExists(filePath)).toBe("second");
    });

    it("should leave one complete write after concurrent writers", async () => {
      const filePath = join(testDir, "concurrent.json");

      await Promise.all(Array.from({ length: 20 }, (_, i) => atomicWrite(filePath, `write-${i}`)));

      expect(await readFileIfExists(filePath)).toMatch(/^write-\d+$/);
      expect(await tempFiles()).toEqual([]);
    });

    it("should create missing parent directories", async () => {
      const deepPath = join(testDir, "a", "b", "c", "deep.json");

      await atomicWrite(deepPath, "deep");

      expect(await readFileIfExists(deepPath)).toBe("deep");
    });

    it("should write empty content", async () => {
      const filePath = join(testDir, "empty.json");

      await atomicWrite(filePath, "");

      expect(await readFileIfExists(filePath)).toBe("");
    });
  });

  describe("readFileIfExists errors", () => {
    it("should resolve to null for a missing file", async () => {
      expect(await readFileIfExists(join(testDir, "missing.json"))).toBeNull();
    });

    it("should wrap other failures with the file path", async () => {
      const dirPath = join(testDir, "is-a-directory");
      await mkdir(dirPath);

      const failure = readFileIfExists(dirPath);

      await expect(failure).rejects.toThrow(PartitionReadError);
      await expect(failure).rejects.toThrow(dirPath);
    });
  });

  describe("ensureDirectory", () => {
    it("should create nested directories", async () => {
      const dirPath = join(testDir, "level1", "level2");

      await ensureDirectory(dirPath);
      await ensureDirectory(dirPath);

      expect(await readdir(join(testDir, "level1"))).toEqual(["level2"]);
    });

    it("should reject an empty path", async () => {
      await expect(ensureDirectory("")).rejects.toThrow(DirectoryError);
    });
  });

  describe("removeFile", () => {
    it("should remove a file and ignore a missing one", async () => {
      const filePath = join(testDir, "gone.json");
      await writeFile(filePath, "x");

      await removeFile(filePath);
      await removeFile(filePath);

      expect(await readFileIfExists(filePath)).toBeNull();
    });
  });

  describe("listFiles", () => {
    it("should list sorted files filtered by extension", async () => {
      await writeFile(join(testDir, "b.json"), "{}");
      await writeFile(join(testDir, "a.json"), "{}");
      await writeFile(join(testDir, "notes.txt"), "");
      await mkdir(join(testDir, "sub.json"));

      expect(await listFiles(testDir, ".json")).toEqual(["a.json", "b.json"]);
      expect(await listFiles(testDir, "txt")).toEqual(["notes.txt"]);
      expect(await listFiles(testDir)).toEqual(["a.json", "b.json", "notes.txt"]);
    });

    it("should list a missing directory as empty", async () => {
      expect(await listFiles(join(testDir, "nope"))).toEqual([]);
    });
  });
});
