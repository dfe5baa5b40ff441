/**
 * Content hashing for single files and whole directory trees.
 *
 * The tree checksum is independent of the order the filesystem yields entries:
 * files are sorted by their `/`-separated path relative to the root (byte
 * order) and each contributes its relative path bytes followed by its content.
 */

import { createHash, randomBytes, randomUUID, type Hash } from "node:crypto";
import { createReadStream } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import * as path from "node:path";

const HASH_ALGORITHM = "sha256";
export const CHUNK_SIZE = 64 * 1024;

export interface TreeFile {
  absolutePath: string;
  /** Relative to the tree root, always `/`-separated */
  relativePath: string;
}

export interface TreeOptions {
  /** Skip files whose relative path matches */
  exclude?: (relativePath: string) => boolean;
}

async function hashFileInto(hash: Hash, filePath: string): Promise<void> {
  const stream = createReadStream(filePath, { highWaterMark: CHUNK_SIZE });
  for await (const chunk of stream) {
    hash.update(chunk);
  }
}

export async function computeFileChecksum(filePath: string): Promise<string> {
  const hash = createHash(HASH_ALGORITHM);
  await hashFileInto(hash, filePath);
  return hash.digest("hex");
}

export function computeStringHash(content: string | Uint8Array): string {
  return createHash(HASH_ALGORITHM).update(content).digest("hex");
}

function compareBytes(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"));
}

/**
 * List every regular file below `root`, sorted by relative path.
 */
export async function listTreeFiles(root: string, options: TreeOptions = {}): Promise<TreeFile[]> {
  const files: TreeFile[] = [];

  async function walk(dir: string, prefix: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const absolutePath = path.join(dir, entry.name);
      const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        await walk(absolutePath, relativePath);
      } else if (entry.isFile()) {
        if (options.exclude?.(relativePath)) continue;
        files.push({ absolutePath, relativePath });
      }
    }
  }

  await walk(root, "");
  return files.sort((a, b) => compareBytes(a.relativePath, b.relativePath));
}

export async function computeTreeChecksum(root: string, options: TreeOptions = {}): Promise<string> {
  const hash = createHash(HASH_ALGORITHM);
  for (const file of await listTreeFiles(root, options)) {
    hash.update(Buffer.from(file.relativePath, "utf8"));
    await hashFileInto(hash, file.absolutePath);
  }
  return hash.digest("hex");
}

export async function computeTreeSize(root: string, options: TreeOptions = {}): Promise<number> {
  let total = 0;
  for (const file of await listTreeFiles(root, options)) {
    total += (await stat(file.absolutePath)).size;
  }
  return total;
}

export function generateShortId(): string {
  const chars = "abcdefghijklmnopqrstuvwxyz0123456789";
  let result = "";
  for (const byte of randomBytes(6)) {
    result += chars.charAt(byte % chars.length);
  }
  return result;
}

export function generateUUID(): string {
  return randomUUID();
}
