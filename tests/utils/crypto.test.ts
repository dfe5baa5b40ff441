import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import {
  CHUNK_SIZE,
  computeFileChecksum,
  computeStringHash,
  computeTreeChecksum,
  computeTreeSize,
  generateShortId,
  generateUUID,
  listTreeFiles,
} from "../../src/utils/crypto";

const HELLO_WORLD_SHA256 = "b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9";
const EMPTY_SHA256 = "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855";

async function writeTree(root: string, files: Array<[string, string]>): Promise<void> {
  for (const [relativePath, content] of files) {
    const filePath = path.join(root, relativePath);
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content);
  }
}

describe("crypto utilities", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "txdeploy-crypto-test-"));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("computeFileChecksum", () => {
    test("computes SHA256 checksum of a file", async () => {
      const testFile = path.join(tempDir, "test.txt");
      await writeFile(testFile, "hello world");

      expect(await computeFileChecksum(testFile)).toBe(HELLO_WORLD_SHA256);
    });

    test("handles empty file", async () => {
      const testFile = path.join(tempDir, "empty.txt");
      await writeFile(testFile, "");

      expect(await computeFileChecksum(testFile)).toBe(EMPTY_SHA256);
    });

    test("hashes files spanning several chunks", async () => {
      const content = Buffer.alloc(CHUNK_SIZE * 2 + 17, 7);
      const testFile = path.join(tempDir, "large.bin");
      await writeFile(testFile, content);

      expect(await computeFileChecksum(testFile)).toBe(computeStringHash(content));
    });

    test("rejects for a missing file", async () => {
      await expect(computeFileChecksum(path.join(tempDir, "missing.txt"))).rejects.toThrow();
    });
  });

  describe("computeStringHash", () => {
    test("matches the file checksum of the same bytes", () => {
      expect(computeStringHash("hello world")).toBe(HELLO_WORLD_SHA256);
    });
  });

  describe("listTreeFiles", () => {
    test("returns slash-separated paths in byte order", async () => {
      const root = path.join(tempDir, "listing");
      await writeTree(root, [
        ["b.txt", "b"],
        ["a/z.txt", "z"],
        ["A.txt", "A"],
      ]);

      const files = await listTreeFiles(root);

      expect(files.map((f) => f.relativePath)).toEqual(["A.txt", "a/z.txt", "b.txt"]);
      expect(files[1]?.absolutePath).toBe(path.join(root, "a", "z.txt"));
    });

    test("skips excluded files", async () => {
      const root = path.join(tempDir, "listing-exclude");
      await writeTree(root, [
        ["keep.txt", "k"],
        ["skip.txt", "s"],
      ]);

      const files = await listTreeFiles(root, { exclude: (p) => p === "skip.txt" });

      expect(files.map((f) => f.relativePath)).toEqual(["keep.txt"]);
    });
  });

  describe("computeTreeChecksum", () => {
    test("feeds each path followed by its content", async () => {
      const root = path.join(tempDir, "tree-manual");
      await writeTree(root, [
        ["b.txt", "2"],
        ["a.txt", "1"],
      ]);

      expect(await computeTreeChecksum(root)).toBe(computeStringHash("a.txt1b.txt2"));
    });

    test("does not depend on creation order", async () => {
      const first = path.join(tempDir, "tree-first");
      const second = path.join(tempDir, "tree-second");
      await writeTree(first, [
        ["src/index.ts", "export {};"],
        ["README.md", "# readme"],
        ["src/lib/util.ts", "export const x = 1;"],
      ]);
      await writeTree(second, [
        ["src/lib/util.ts", "export const x = 1;"],
        ["README.md", "# readme"],
        ["src/index.ts", "export {};"],
      ]);

      expect(await computeTreeChecksum(first)).toBe(await computeTreeChecksum(second));
    });

    test("changes when a file moves with the same content", async () => {
      const first = path.join(tempDir, "tree-move-a");
      const second = path.join(tempDir, "tree-move-b");
      await writeTree(first, [["one.txt", "same"]]);
      await writeTree(second, [["two.txt", "same"]]);

      expect(await computeTreeChecksum(first)).not.toBe(await computeTreeChecksum(second));
    });

    test("ignores excluded files", async () => {
      const root = path.join(tempDir, "tree-exclude");
      await writeTree(root, [
        ["a.txt", "1"],
        [".meta.json", "{}"],
      ]);

      const checksum = await computeTreeChecksum(root, { exclude: (p) => p === ".meta.json" });

      expect(checksum).toBe(computeStringHash("a.txt1"));
    });
  });

  describe("computeTreeSize", () => {
    test("sums file sizes", async () => {
      const root = path.join(tempDir, "tree-size");
      await writeTree(root, [
        ["a.txt", "12345"],
        ["nested/b.txt", "123"],
      ]);

      expect(await computeTreeSize(root)).toBe(8);
    });
  });

  describe("generateShortId", () => {
    test("generates 6 character lowercase alphanumeric ids", () => {
      expect(generateShortId()).toMatch(/^[a-z0-9]{6}$/);
    });
  });

  describe("generateUUID", () => {
    test("generates v4 UUIDs", () => {
      expect(generateUUID()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    });
  });
});
