/**
 * OsFs - passthrough to the host filesystem
 *
 * Paths are host paths and go straight to node:fs. There is no confinement:
 * wrap it in a BasePathFs (or open a RootFs on it) before handing it to
 * untrusted callers. A MountableFs refuses to mount it unwrapped.
 */

import * as fs from "node:fs";
import type { FileHandle } from "node:fs/promises";
import * as nodePath from "node:path";
import { toBuffer } from "../encoding.js";
import { errorCode, FsError, type FsErrorCode } from "../errors.js";
import {
  ACCESS_MODE_MASK,
  type File,
  type FileContent,
  type FileInfo,
  type Fs,
  type Lstater,
  type LstatResult,
  OpenFlag,
  type Readlinker,
  SeekWhence,
  type Symlinker,
} from "../interface.js";

const KNOWN_CODES: ReadonlySet<string> = new Set<FsErrorCode>([
  "ENOENT",
  "EEXIST",
  "EPERM",
  "ENOTDIR",
  "EISDIR",
  "EINVAL",
  "ENOTEMPTY",
  "EBADF",
  "ELOOP",
  "EIO",
  "ENOTSUP",
  "EXDEV",
  "EBUSY",
]);

function isKnownCode(code: string): code is FsErrorCode {
  return KNOWN_CODES.has(code);
}

/**
 * Map a Node errno error onto the shared taxonomy, keeping it as the cause.
 */
function toFsError(err: unknown, op: string, path: string): FsError {
  if (err instanceof FsError) return err;
  const code = errorCode(err);
  if (code === "EACCES") {
    return new FsError("EPERM", op, path, {
      detail: "permission denied",
      cause: err,
    });
  }
  return new FsError(code && isKnownCode(code) ? code : "EIO", op, path, {
    cause: err,
  });
}

async function attempt<T>(
  op: string,
  path: string,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw toFsError(err, op, path);
  }
}

function toFileInfo(name: string, stats: fs.Stats): FileInfo {
  return {
    name,
    size: stats.size,
    mode: stats.mode & 0o7777,
    mtime: stats.mtime,
    isFile: stats.isFile(),
    isDirectory: stats.isDirectory(),
    isSymbolicLink: stats.isSymbolicLink(),
  };
}

function toNodeFlags(flags: number): number {
  const c = fs.constants;
  const access = flags & ACCESS_MODE_MASK;
  let result =
    access === OpenFlag.WRITE_ONLY
      ? c.O_WRONLY
      : access === OpenFlag.READ_WRITE
        ? c.O_RDWR
        : c.O_RDONLY;
  if (flags & OpenFlag.CREATE) result |= c.O_CREAT;
  if (flags & OpenFlag.EXCLUSIVE) result |= c.O_EXCL;
  if (flags & OpenFlag.TRUNCATE) result |= c.O_TRUNC;
  if (flags & OpenFlag.APPEND) result |= c.O_APPEND;
  return result;
}

/**
 * Handle over a node:fs FileHandle. The cursor is tracked here and every
 * transfer passes an explicit position.
 */
export class OsFile implements File {
  private offset = 0;
  private listing: FileInfo[] | null = null;
  private listingOffset = 0;

  constructor(
    private readonly handle: FileHandle,
    readonly name: string,
    private readonly append: boolean,
  ) {}

  async read(buffer: Uint8Array): Promise<number> {
    const count = await this.readAt(buffer, this.offset);
    this.offset += count;
    return count;
  }

  readAt(buffer: Uint8Array, offset: number): Promise<number> {
    return attempt("read", this.name, async () => {
      const { bytesRead } = await this.handle.read(
        buffer,
        0,
        buffer.length,
        offset,
      );
      return bytesRead;
    });
  }

  write(data: FileContent): Promise<number> {
    return attempt("write", this.name, async () => {
      const bytes = toBuffer(data);
      if (this.append) {
        const { bytesWritten } = await this.handle.write(bytes);
        this.offset = (await this.handle.stat()).size;
        return bytesWritten;
      }
      const { bytesWritten } = await this.handle.write(
        bytes,
        0,
        bytes.length,
        this.offset,
      );
      this.offset += bytesWritten;
      return bytesWritten;
    });
  }

  writeAt(data: FileContent, offset: number): Promise<number> {
    return attempt("writeAt", this.name, async () => {
      if (this.append) {
        throw new FsError("EINVAL", "writeAt", this.name, {
          detail: "positional write on a handle opened for append",
        });
      }
      const bytes = toBuffer(data);
      const { bytesWritten } = await this.handle.write(
        bytes,
        0,
        bytes.length,
        offset,
      );
      return bytesWritten;
    });
  }

  seek(offset: number, whence: SeekWhence): Promise<number> {
    return attempt("seek", this.name, async () => {
      let base = 0;
      if (whence === SeekWhence.CURRENT) {
        base = this.offset;
      } else if (whence === SeekWhence.END) {
        base = (await this.handle.stat()).size;
      } else if (whence !== SeekWhence.START) {
        throw new FsError("EINVAL", "seek", this.name, {
          detail: `invalid whence ${whence}`,
        });
      }
      if (base + offset < 0) throw new FsError("EINVAL", "seek", this.name);
      this.offset = base + offset;
      return this.offset;
    });
  }

  truncate(size: number): Promise<void> {
    return attempt("truncate", this.name, () => this.handle.truncate(size));
  }

  sync(): Promise<void> {
    return attempt("sync", this.name, () => this.handle.sync());
  }

  close(): Promise<void> {
    return attempt("close", this.name, () => this.handle.close());
  }

  stat(): Promise<FileInfo> {
    return attempt("stat", this.name, async () =>
      toFileInfo(nodePath.basename(this.name), await this.handle.stat()),
    );
  }

  readDir(count = 0): Promise<FileInfo[] | null> {
    return attempt("readdir", this.name, async () => {
      if (!this.listing) {
        const names = (await fs.promises.readdir(this.name)).sort();
        const listing: FileInfo[] = [];
        for (const name of names) {
          const stats = await fs.promises.lstat(nodePath.join(this.name, name));
          listing.push(toFileInfo(name, stats));
        }
        this.listing = listing;
      }
      const remaining = this.listing.length - this.listingOffset;
      if (count > 0 && remaining === 0) return null;
      const take = count > 0 ? Math.min(count, remaining) : remaining;
      const batch = this.listing.slice(
        this.listingOffset,
        this.listingOffset + take,
      );
      this.listingOffset += take;
      return batch;
    });
  }

  async readDirNames(count = 0): Promise<string[] | null> {
    const batch = await this.readDir(count);
    return batch && batch.map((info) => info.name);
  }
}

export class OsFs implements Fs, Lstater, Symlinker, Readlinker {
  readonly name = "OsFs";

  create(path: string): Promise<File> {
    return this.openFile(
      path,
      OpenFlag.READ_WRITE | OpenFlag.CREATE | OpenFlag.TRUNCATE,
      0o666,
    );
  }

  open(path: string): Promise<File> {
    return this.openFile(path, OpenFlag.READ_ONLY);
  }

  openFile(path: string, flags: number, mode = 0o666): Promise<File> {
    return attempt("open", path, async () => {
      const handle = await fs.promises.open(path, toNodeFlags(flags), mode);
      return new OsFile(handle, path, (flags & OpenFlag.APPEND) !== 0);
    });
  }

  mkdir(path: string, mode = 0o777): Promise<void> {
    return attempt("mkdir", path, () => fs.promises.mkdir(path, { mode }));
  }

  async mkdirAll(path: string, mode = 0o777): Promise<void> {
    await attempt("mkdir", path, () =>
      fs.promises.mkdir(path, { mode, recursive: true }),
    );
  }

  async remove(path: string): Promise<void> {
    await attempt("remove", path, async () => {
      const stats = await fs.promises.lstat(path);
      if (stats.isDirectory()) {
        await fs.promises.rmdir(path);
      } else {
        await fs.promises.unlink(path);
      }
    });
  }

  removeAll(path: string): Promise<void> {
    return attempt("removeall", path, () =>
      fs.promises.rm(path, { recursive: true, force: true }),
    );
  }

  rename(oldPath: string, newPath: string): Promise<void> {
    return attempt("rename", oldPath, () =>
      fs.promises.rename(oldPath, newPath),
    );
  }

  stat(path: string): Promise<FileInfo> {
    return attempt("stat", path, async () =>
      toFileInfo(nodePath.basename(path), await fs.promises.stat(path)),
    );
  }

  lstatIfPossible(path: string): Promise<LstatResult> {
    return attempt("lstat", path, async () => ({
      info: toFileInfo(nodePath.basename(path), await fs.promises.lstat(path)),
      lstatCalled: true,
    }));
  }

  chmod(path: string, mode: number): Promise<void> {
    return attempt("chmod", path, () => fs.promises.chmod(path, mode));
  }

  chtimes(path: string, atime: Date, mtime: Date): Promise<void> {
    return attempt("chtimes", path, () =>
      fs.promises.utimes(path, atime, mtime),
    );
  }

  symlinkIfPossible(target: string, linkPath: string): Promise<void> {
    return attempt("symlink", linkPath, () =>
      fs.promises.symlink(target, linkPath),
    );
  }

  readlinkIfPossible(path: string): Promise<string> {
    return attempt("readlink", path, () => fs.promises.readlink(path));
  }
}
