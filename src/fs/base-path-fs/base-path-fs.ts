import { FsError, relabel } from "../errors.js";
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
import { NamedFile } from "../named-file.js";
import {
  dirname,
  isPathWithinRoot,
  joinUnder,
  normalizePath,
  stripRoot,
} from "../path.js";

/**
 * Restricts every operation to paths under a base directory of the source.
 *
 * Each name is joined to the base and cleaned; a result outside the base is
 * reported as not found and never reaches the source. Errors from the source
 * carry the caller's path, not the real one.
 *
 * @example
 * ```typescript
 * const jail = new BasePathFs(new OsFs(), "/srv/data");
 * await jail.open("/reports/q1.csv"); // opens /srv/data/reports/q1.csv
 * await jail.open("/../etc/passwd"); // ENOENT
 * ```
 */
export class BasePathFs implements Fs, Lstater, Symlinker, Readlinker {
  readonly name = "BasePathFs";
  private readonly base: string;

  constructor(
    private readonly source: Fs,
    base: string,
  ) {
    this.base = normalizePath(base);
  }

  /**
   * Real path of name in the source. Throws ENOENT when it escapes the base.
   */
  realPath(name: string, op = "realpath"): string {
    if (name.includes("\0")) {
      throw new FsError("ENOENT", op, name, {
        detail: "path contains null byte",
      });
    }
    const real = joinUnder(this.base, name);
    if (!isPathWithinRoot(real, this.base)) {
      throw new FsError("ENOENT", op, name);
    }
    return real;
  }

  async create(path: string): Promise<File> {
    const file = await this.forward(path, "open", (real) =>
      this.source.create(real),
    );
    return new NamedFile(file, this.virtualName(path));
  }

  async open(path: string): Promise<File> {
    const file = await this.forward(path, "open", (real) =>
      this.source.open(real),
    );
    return new NamedFile(file, this.virtualName(path));
  }

  async openFile(path: string, flags: number, mode?: number): Promise<File> {
    const file = await this.forward(path, "open", (real) =>
      this.source.openFile(real, flags, mode),
    );
    return new NamedFile(file, this.virtualName(path));
  }

  mkdir(path: string, mode?: number): Promise<void> {
    return this.forward(path, "mkdir", (real) => this.source.mkdir(real, mode));
  }

  mkdirAll(path: string, mode?: number): Promise<void> {
    return this.forward(path, "mkdir", (real) =>
      this.source.mkdirAll(real, mode),
    );
  }

  remove(path: string): Promise<void> {
    return this.forward(path, "remove", (real) => this.source.remove(real));
  }

  removeAll(path: string): Promise<void> {
    return this.forward(path, "removeall", (real) =>
      this.source.removeAll(real),
    );
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    const from = this.realPath(oldPath, "rename");
    const to = this.realPath(newPath, "rename");
    try {
      await this.source.rename(from, to);
    } catch (err) {
      if (err instanceof FsError && err.path === to) {
        throw err.withPath(newPath);
      }
      throw relabel(err, oldPath);
    }
  }

  stat(path: string): Promise<FileInfo> {
    return this.forward(path, "stat", (real) => this.source.stat(real));
  }

  chmod(path: string, mode: number): Promise<void> {
    return this.forward(path, "chmod", (real) => this.source.chmod(real, mode));
  }

  chtimes(path: string, atime: Date, mtime: Date): Promise<void> {
    return this.forward(path, "chtimes", (real) =>
      this.source.chtimes(real, atime, mtime),
    );
  }

  lstatIfPossible(path: string): Promise<LstatResult> {
    return this.forward(path, "lstat", (real) =>
      lstatIfPossible(this.source, real),
    );
  }

  /**
   * Absolute targets are remapped into the jail; relative ones stay relative
   * but must not climb out of it.
   */
  async symlinkIfPossible(target: string, linkPath: string): Promise<void> {
    const realLink = this.realPath(linkPath, "symlink");
    let realTarget = target;
    if (target.startsWith("/")) {
      realTarget = this.realPath(target, "symlink");
    } else if (
      !isPathWithinRoot(joinUnder(dirname(realLink), target), this.base)
    ) {
      throw new FsError("EPERM", "symlink", linkPath, {
        detail: "link target escapes the base directory",
      });
    }
    return this.forward(linkPath, "symlink", (real) =>
      symlinkIfPossible(this.source, realTarget, real),
    );
  }

  async readlinkIfPossible(path: string): Promise<string> {
    const target = await this.forward(path, "readlink", (real) =>
      readlinkIfPossible(this.source, real),
    );
    if (target.startsWith("/") && isPathWithinRoot(target, this.base)) {
      return stripRoot(target, this.base);
    }
    return target;
  }

  private virtualName(path: string): string {
    return stripRoot(this.realPath(path), this.base);
  }

  private async forward<T>(
    path: string,
    op: string,
    fn: (real: string) => Promise<T>,
  ): Promise<T> {
    const real = this.realPath(path, op);
    try {
      return await fn(real);
    } catch (err) {
      throw relabel(err, path);
    }
  }
}
