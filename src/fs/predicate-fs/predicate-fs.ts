import { errorCode, FsError } from "../errors.js";
import type {
  File,
  FileInfo,
  Fs,
  Lstater,
  LstatResult,
  Readlinker,
  Symlinker,
} from "../interface.js";
import { lstatIfPossible, readlinkIfPossible, symlinkIfPossible } from "../link.js";
import { PredicateFile } from "./predicate-file.js";

/** Decides from a path whether a file is visible */
export type PathPredicate = (path: string) => boolean;

/**
 * Filters the files of another filesystem by path. Directories are never
 * filtered.
 *
 * A rejected file behaves as if it did not exist: operations on it fail with
 * ENOENT before the source sees them, and directory listings leave it out.
 * Creating a file under a rejected name fails the same way.
 *
 * @example
 * ```typescript
 * const docs = new PredicateFs(source, (path) => path.endsWith(".md"));
 * await readDirNames(docs, "/"); // directories and *.md files only
 * ```
 */
export class PredicateFs implements Fs, Lstater, Symlinker, Readlinker {
  readonly name: string = "PredicateFs";

  constructor(
    private readonly source: Fs,
    private readonly predicate: PathPredicate,
  ) {}

  async create(path: string): Promise<File> {
    this.validate("open", path);
    return this.source.create(path);
  }

  async open(path: string): Promise<File> {
    await this.check("open", path);
    return new PredicateFile(await this.source.open(path), this.predicate);
  }

  async openFile(path: string, flags: number, mode?: number): Promise<File> {
    await this.check("open", path);
    return new PredicateFile(
      await this.source.openFile(path, flags, mode),
      this.predicate,
    );
  }

  mkdir(path: string, mode?: number): Promise<void> {
    return this.source.mkdir(path, mode);
  }

  mkdirAll(path: string, mode?: number): Promise<void> {
    return this.source.mkdirAll(path, mode);
  }

  async remove(path: string): Promise<void> {
    await this.check("remove", path);
    return this.source.remove(path);
  }

  async removeAll(path: string): Promise<void> {
    await this.check("removeall", path);
    return this.source.removeAll(path);
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    const info = await this.statOrNull(oldPath);
    if (!info?.isDirectory) {
      this.validate("rename", oldPath);
      this.validate("rename", newPath);
    }
    return this.source.rename(oldPath, newPath);
  }

  async stat(path: string): Promise<FileInfo> {
    await this.check("stat", path);
    return this.source.stat(path);
  }

  async lstatIfPossible(path: string): Promise<LstatResult> {
    await this.check("lstat", path);
    return lstatIfPossible(this.source, path);
  }

  async chmod(path: string, mode: number): Promise<void> {
    await this.check("chmod", path);
    return this.source.chmod(path, mode);
  }

  async chtimes(path: string, atime: Date, mtime: Date): Promise<void> {
    await this.check("chtimes", path);
    return this.source.chtimes(path, atime, mtime);
  }

  async symlinkIfPossible(target: string, linkPath: string): Promise<void> {
    this.validate("symlink", linkPath);
    return symlinkIfPossible(this.source, target, linkPath);
  }

  async readlinkIfPossible(path: string): Promise<string> {
    await this.check("readlink", path);
    return readlinkIfPossible(this.source, path);
  }

  private validate(op: string, path: string): void {
    if (!this.predicate(path)) throw new FsError("ENOENT", op, path);
  }

  /** Directories pass; anything else, present or not, must satisfy the predicate */
  private async check(op: string, path: string): Promise<void> {
    const info = await this.statOrNull(path);
    if (info?.isDirectory) return;
    this.validate(op, path);
  }

  private async statOrNull(path: string): Promise<FileInfo | null> {
    try {
      return await this.source.stat(path);
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOENT" || code === "ENOTDIR") return null;
      throw err;
    }
  }
}
