import { errorCode, FsError, isNotExist } from "../errors.js";
import {
  type File,
  type FileInfo,
  type Fs,
  isWriteOpen,
  type Lstater,
  type LstatResult,
  OpenFlag,
  type Readlinker,
  type Symlinker,
} from "../interface.js";
import { lstatIfPossible, readlinkIfPossible, symlinkIfPossible } from "../link.js";
import type { VfsLogger } from "../logger.js";
import { dirname } from "../path.js";
import { exists } from "../utils.js";
import { UnionFile } from "./union-file.js";

const COPY_CHUNK = 64 * 1024;

export interface OverlayFsOptions {
  /** Read-only lower filesystem; never modified */
  base: Fs;
  /** Writable upper filesystem receiving every change */
  layer: Fs;
  /** Optional logger for copy-up tracing */
  logger?: VfsLogger;
}

function isAbsent(err: unknown): boolean {
  const code = errorCode(err);
  return code === "ENOENT" || code === "ENOTDIR";
}

async function statOrNull(fs: Fs, path: string): Promise<FileInfo | null> {
  try {
    return await fs.stat(path);
  } catch (err) {
    if (isAbsent(err)) return null;
    throw err;
  }
}

/**
 * Copy-on-write overlay of a writable layer over a read-only base.
 *
 * Reads see the layer where it has an entry and the base elsewhere. The first
 * mutation of a base-only file copies it (content, mode and mtime) into the
 * layer. There are no whiteouts: base-only entries cannot be removed or
 * renamed, and removing a copied-up entry uncovers the base version again.
 *
 * @example
 * ```typescript
 * const fs = new OverlayFs({ base: readOnlyFs, layer: new InMemoryFs() });
 * await writeFile(fs, "/config.json", "{}"); // lands in the layer
 * ```
 */
export class OverlayFs implements Fs, Lstater, Symlinker, Readlinker {
  readonly name = "OverlayFs";

  private readonly base: Fs;
  private readonly layer: Fs;
  private readonly logger?: VfsLogger;

  constructor(options: OverlayFsOptions) {
    this.base = options.base;
    this.layer = options.layer;
    this.logger = options.logger;
  }

  /**
   * True when name exists in base and not in the layer. Missing from both is
   * not a base file.
   */
  async isBaseFile(name: string): Promise<boolean> {
    if (await statOrNull(this.layer, name)) return false;
    return (await statOrNull(this.base, name)) !== null;
  }

  create(path: string): Promise<File> {
    return this.openFile(
      path,
      OpenFlag.CREATE | OpenFlag.TRUNCATE | OpenFlag.READ_WRITE,
      0o666,
    );
  }

  async open(path: string): Promise<File> {
    if (await this.isBaseFile(path)) return this.base.open(path);

    // Missing from both: the layer reports it
    const layerInfo = await this.layer.stat(path);
    if (!layerInfo.isDirectory) return this.layer.open(path);

    let baseDir: File | null = null;
    try {
      baseDir = await this.base.open(path);
    } catch (err) {
      if (!isAbsent(err)) throw err;
    }
    if (baseDir && !(await baseDir.stat()).isDirectory) {
      await baseDir.close();
      baseDir = null;
    }
    const layerDir = await this.layer.open(path);
    return new UnionFile(path, baseDir, layerDir);
  }

  async openFile(path: string, flags: number, mode?: number): Promise<File> {
    if (!isWriteOpen(flags)) {
      return this.open(path);
    }

    if (await this.isBaseFile(path)) {
      await this.copyToLayer(path);
      return this.layer.openFile(path, flags, mode);
    }

    const parent = dirname(path);
    const baseParent = await statOrNull(this.base, parent);
    if (baseParent?.isDirectory) {
      if (!(await exists(this.layer, parent))) {
        await this.layer.mkdirAll(parent, baseParent.mode);
      }
      return this.layer.openFile(path, flags, mode);
    }

    // Reports the layer's own error when the parent is missing there too
    const layerParent = await this.layer.stat(parent);
    if (layerParent.isDirectory) {
      return this.layer.openFile(path, flags, mode);
    }
    throw new FsError("ENOTDIR", "open", path);
  }

  async mkdir(path: string, mode = 0o777): Promise<void> {
    const baseInfo = await statOrNull(this.base, path);
    if (baseInfo?.isDirectory) throw new FsError("EEXIST", "mkdir", path);
    await this.layer.mkdirAll(path, mode);
  }

  async mkdirAll(path: string, mode = 0o777): Promise<void> {
    const baseInfo = await statOrNull(this.base, path);
    if (baseInfo?.isDirectory) return;
    await this.layer.mkdirAll(path, mode);
  }

  async remove(path: string): Promise<void> {
    try {
      await this.layer.remove(path);
    } catch (err) {
      if (isNotExist(err) && (await statOrNull(this.base, path))) {
        throw new FsError("EPERM", "remove", path);
      }
      throw err;
    }
  }

  async removeAll(path: string): Promise<void> {
    if (!(await statOrNull(this.layer, path))) {
      if (await statOrNull(this.base, path)) {
        throw new FsError("EPERM", "removeall", path);
      }
      return;
    }
    await this.layer.removeAll(path);
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    if (await this.isBaseFile(oldPath)) {
      throw new FsError("EPERM", "rename", oldPath);
    }
    await this.layer.rename(oldPath, newPath);
  }

  async stat(path: string): Promise<FileInfo> {
    try {
      return await this.layer.stat(path);
    } catch (err) {
      if (!isNotExist(err)) throw err;
      return this.base.stat(path);
    }
  }

  async lstatIfPossible(path: string): Promise<LstatResult> {
    try {
      return await lstatIfPossible(this.layer, path);
    } catch (err) {
      if (!isNotExist(err)) throw err;
      return lstatIfPossible(this.base, path);
    }
  }

  async chmod(path: string, mode: number): Promise<void> {
    if (await this.isBaseFile(path)) await this.copyToLayer(path);
    await this.layer.chmod(path, mode);
  }

  async chtimes(path: string, atime: Date, mtime: Date): Promise<void> {
    if (await this.isBaseFile(path)) await this.copyToLayer(path);
    await this.layer.chtimes(path, atime, mtime);
  }

  symlinkIfPossible(target: string, linkPath: string): Promise<void> {
    return symlinkIfPossible(this.layer, target, linkPath);
  }

  async readlinkIfPossible(path: string): Promise<string> {
    if (await this.isBaseFile(path)) {
      return readlinkIfPossible(this.base, path);
    }
    return readlinkIfPossible(this.layer, path);
  }

  /**
   * Copy a base entry into the layer with its mode and mtime. A partial copy
   * is removed again when anything fails.
   */
  async copyToLayer(path: string): Promise<void> {
    const info = await this.base.stat(path);
    const parent = dirname(path);

    if (!(await exists(this.layer, parent))) {
      const parentInfo = await statOrNull(this.base, parent);
      await this.layer.mkdirAll(parent, parentInfo?.mode ?? 0o777);
    }

    if (info.isDirectory) {
      await this.layer.mkdirAll(path, info.mode);
    } else {
      const source = await this.base.open(path);
      try {
        const target = await this.layer.create(path);
        try {
          const copied = await copyContent(source, target);
          if (copied !== info.size) {
            throw new FsError("EIO", "copy", path, {
              detail: `short copy (${copied} of ${info.size} bytes)`,
            });
          }
        } catch (err) {
          await target.close();
          await this.layer.remove(path);
          throw err;
        }
        await target.close();
      } finally {
        await source.close();
      }
      await this.layer.chmod(path, info.mode);
    }

    await this.layer.chtimes(path, info.mtime, info.mtime);
    this.logger?.debug("copy-up", { path, size: info.size });
  }
}

async function copyContent(source: File, target: File): Promise<number> {
  const chunk = new Uint8Array(COPY_CHUNK);
  let total = 0;
  for (;;) {
    const count = await source.read(chunk);
    if (count === 0) return total;
    await target.write(chunk.subarray(0, count));
    total += count;
  }
}
