/**
 * Convenience functions that work against any Fs
 */

import { fromBuffer, toBuffer } from "./encoding.js";
import { errorCode, FsError } from "./errors.js";
import {
  type BufferEncoding,
  type File,
  type FileContent,
  type FileInfo,
  type Fs,
  OpenFlag,
} from "./interface.js";
import { lstatIfPossible } from "./link.js";
import { dirname, joinPath, normalizePath } from "./path.js";

const READ_CHUNK = 64 * 1024;

export async function readFileBuffer(fs: Fs, path: string): Promise<Uint8Array> {
  const file = await fs.open(path);
  try {
    const chunks: Uint8Array[] = [];
    let total = 0;
    for (;;) {
      const chunk = new Uint8Array(READ_CHUNK);
      const count = await file.read(chunk);
      if (count === 0) break;
      chunks.push(chunk.subarray(0, count));
      total += count;
    }
    const result = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
      result.set(chunk, offset);
      offset += chunk.length;
    }
    return result;
  } finally {
    await file.close();
  }
}

export async function readFile(
  fs: Fs,
  path: string,
  encoding: BufferEncoding = "utf8",
): Promise<string> {
  return fromBuffer(await readFileBuffer(fs, path), encoding);
}

/**
 * Create or replace a file with the given content.
 */
export async function writeFile(
  fs: Fs,
  path: string,
  content: FileContent,
  mode = 0o644,
): Promise<void> {
  const file = await fs.openFile(
    path,
    OpenFlag.WRITE_ONLY | OpenFlag.CREATE | OpenFlag.TRUNCATE,
    mode,
  );
  try {
    await file.write(toBuffer(content));
  } finally {
    await file.close();
  }
}

/**
 * Create or replace path with everything source yields, creating missing
 * parent directories first.
 */
export async function writeReader(
  fs: Fs,
  path: string,
  source: AsyncIterable<FileContent>,
): Promise<void> {
  const parent = dirname(path);
  if (parent !== "/") await fs.mkdirAll(parent, 0o777);
  await copyInto(await fs.create(path), source);
}

/**
 * Like writeReader, but fails with EEXIST instead of replacing a file.
 */
export async function safeWriteReader(
  fs: Fs,
  path: string,
  source: AsyncIterable<FileContent>,
): Promise<void> {
  const parent = dirname(path);
  if (parent !== "/") await fs.mkdirAll(parent, 0o777);
  if (await exists(fs, path)) throw new FsError("EEXIST", "open", path);
  await copyInto(await fs.create(path), source);
}

async function copyInto(
  file: File,
  source: AsyncIterable<FileContent>,
): Promise<void> {
  try {
    for await (const chunk of source) {
      await file.write(toBuffer(chunk));
    }
  } finally {
    await file.close();
  }
}

/**
 * Whether the file holds needle anywhere. An empty needle never matches.
 * The file is scanned in chunks, so needles spanning a chunk boundary are
 * found too.
 */
export async function fileContainsBytes(
  fs: Fs,
  path: string,
  needle: FileContent,
): Promise<boolean> {
  const pattern = toBuffer(needle);
  if (pattern.length === 0) return false;

  const file = await fs.open(path);
  try {
    const chunk = new Uint8Array(Math.max(READ_CHUNK, pattern.length * 4));
    let carry = Buffer.alloc(0);
    for (;;) {
      const count = await file.read(chunk);
      if (count === 0) return false;
      const window = Buffer.concat([carry, chunk.subarray(0, count)]);
      if (window.indexOf(pattern) !== -1) return true;
      carry = window.subarray(Math.max(0, window.length - pattern.length + 1));
    }
  } finally {
    await file.close();
  }
}

/**
 * Directory entries sorted by name.
 */
export async function readDir(fs: Fs, path: string): Promise<FileInfo[]> {
  const dir = await fs.open(path);
  try {
    const entries = (await dir.readDir(0)) ?? [];
    return entries.sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
    );
  } finally {
    await dir.close();
  }
}

export async function readDirNames(fs: Fs, path: string): Promise<string[]> {
  const dir = await fs.open(path);
  try {
    return ((await dir.readDirNames(0)) ?? []).sort();
  } finally {
    await dir.close();
  }
}

/**
 * False when the path (or one of its parents) does not exist.
 */
export async function exists(fs: Fs, path: string): Promise<boolean> {
  try {
    await fs.stat(path);
    return true;
  } catch (err) {
    const code = errorCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") return false;
    throw err;
  }
}

/**
 * Whether path exists and is a directory. False when it does not exist.
 */
export async function dirExists(fs: Fs, path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isDirectory;
  } catch (err) {
    const code = errorCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") return false;
    throw err;
  }
}

/**
 * Whether path is a directory. Throws when it does not exist.
 */
export async function isDir(fs: Fs, path: string): Promise<boolean> {
  return (await fs.stat(path)).isDirectory;
}

/**
 * True for an empty directory or a zero-length file.
 */
export async function isEmpty(fs: Fs, path: string): Promise<boolean> {
  const info = await fs.stat(path);
  if (!info.isDirectory) return info.size === 0;
  const dir = await fs.open(path);
  try {
    return (await dir.readDirNames(1)) === null;
  } finally {
    await dir.close();
  }
}

export const SKIP_DIR = Symbol("skipDir");

export type WalkFn = (
  path: string,
  info: FileInfo,
) => void | typeof SKIP_DIR | Promise<void | typeof SKIP_DIR>;

/**
 * Visit root and everything below it depth-first in name order.
 * Symlinks are reported but not followed. Returning SKIP_DIR from the
 * visitor for a directory skips its contents.
 */
export async function walk(fs: Fs, root: string, visit: WalkFn): Promise<void> {
  const start = normalizePath(root);
  const { info } = await lstatIfPossible(fs, start);
  await walkEntry(fs, start, info, visit);
}

async function walkEntry(
  fs: Fs,
  path: string,
  info: FileInfo,
  visit: WalkFn,
): Promise<void> {
  const result = await visit(path, info);
  if (!info.isDirectory || result === SKIP_DIR) return;

  for (const name of await readDirNames(fs, path)) {
    const child = joinPath(path, name);
    const { info: childInfo } = await lstatIfPossible(fs, child);
    await walkEntry(fs, child, childInfo, visit);
  }
}
