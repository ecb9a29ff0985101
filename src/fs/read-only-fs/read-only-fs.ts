import { FsError } from "../errors.js";
import {
  type File,
  type FileInfo,
  type Fs,
  isWriteOpen,
  type Lstater,
  type LstatResult,
  type Readlinker,
  type Symlinker,
} from "../interface.js";
import { lstatIfPossible, readlinkIfPossible } from "../link.js";

/**
 * Read-only view of another filesystem.
 *
 * Reads go straight to the source. Every mutation, including an open with
 * any write, append, create or truncate flag, fails with EPERM before the
 * source is consulted.
 */
export class ReadOnlyFs implements Fs, Lstater, Symlinker, Readlinker {
  readonly name = "ReadOnlyFs";

  constructor(private readonly source: Fs) {}

  private denied(operation: string, path: string): FsError {
    return new FsError("EPERM", operation, path, {
      detail: "read-only file system",
    });
  }

  async create(path: string): Promise<File> {
    throw this.denied("open", path);
  }

  open(path: string): Promise<File> {
    return this.source.open(path);
  }

  async openFile(path: string, flags: number, mode?: number): Promise<File> {
    if (isWriteOpen(flags)) throw this.denied("open", path);
    return this.source.openFile(path, flags, mode);
  }

  async mkdir(path: string): Promise<void> {
    throw this.denied("mkdir", path);
  }

  async mkdirAll(path: string): Promise<void> {
    throw this.denied("mkdir", path);
  }

  async remove(path: string): Promise<void> {
    throw this.denied("remove", path);
  }

  async removeAll(path: string): Promise<void> {
    throw this.denied("removeall", path);
  }

  async rename(oldPath: string, _newPath: string): Promise<void> {
    throw this.denied("rename", oldPath);
  }

  stat(path: string): Promise<FileInfo> {
    return this.source.stat(path);
  }

  lstatIfPossible(path: string): Promise<LstatResult> {
    return lstatIfPossible(this.source, path);
  }

  async chmod(path: string, _mode: number): Promise<void> {
    throw this.denied("chmod", path);
  }

  async chtimes(path: string, _atime: Date, _mtime: Date): Promise<void> {
    throw this.denied("chtimes", path);
  }

  async symlinkIfPossible(_target: string, linkPath: string): Promise<void> {
    throw this.denied("symlink", linkPath);
  }

  readlinkIfPossible(path: string): Promise<string> {
    return readlinkIfPossible(this.source, path);
  }
}
