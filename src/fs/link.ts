import { FsError } from "./errors.js";
import {
  type Fs,
  isLstater,
  isReadlinker,
  isSymlinker,
  type LstatResult,
} from "./interface.js";

/**
 * lstat when the backend supports it, stat otherwise.
 */
export async function lstatIfPossible(
  fs: Fs,
  path: string,
): Promise<LstatResult> {
  if (isLstater(fs)) return fs.lstatIfPossible(path);
  return { info: await fs.stat(path), lstatCalled: false };
}

/**
 * Create a symlink when the backend supports it; ENOTSUP otherwise.
 */
export async function symlinkIfPossible(
  fs: Fs,
  target: string,
  linkPath: string,
): Promise<void> {
  if (!isSymlinker(fs)) throw new FsError("ENOTSUP", "symlink", linkPath);
  await fs.symlinkIfPossible(target, linkPath);
}

export async function readlinkIfPossible(
  fs: Fs,
  path: string,
): Promise<string> {
  if (!isReadlinker(fs)) throw new FsError("ENOTSUP", "readlink", path);
  return fs.readlinkIfPossible(path);
}
