import { FsError } from "../errors.js";
import type {
  File,
  FileInfo,
  Fs,
  Lstater,
  LstatResult,
  Readlinker,
  Symlinker,
} from "../interface.js";
import type { VfsLogger } from "../logger.js";
import { isLocalPath, joinUnder, normalizePath } from "../path.js";
import { BasePathFs } from "./base-path-fs.js";

export interface RootFsOptions {
  /** Optional logger for root open and close */
  logger?: VfsLogger;
}

type ActiveJail = (op: string, path: string) => BasePathFs;

/**
 * The root as a plain Fs. Names are joined under the root directory the way
 * BasePathFs joins them, so wrappers can hand it absolute paths; only the
 * closed check applies.
 */
class RootView implements Fs, Lstater, Symlinker, Readlinker {
  readonly name = "RootFs";

  constructor(private readonly active: ActiveJail) {}

  create(path: string): Promise<File> {
    return this.run("open", path, (jail) => jail.create(path));
  }

  open(path: string): Promise<File> {
    return this.run("open", path, (jail) => jail.open(path));
  }

  openFile(path: string, flags: number, mode?: number): Promise<File> {
    return this.run("open", path, (jail) => jail.openFile(path, flags, mode));
  }

  mkdir(path: string, mode?: number): Promise<void> {
    return this.run("mkdir", path, (jail) => jail.mkdir(path, mode));
  }

  mkdirAll(path: string, mode?: number): Promise<void> {
    return this.run("mkdir", path, (jail) => jail.mkdirAll(path, mode));
  }

  remove(path: string): Promise<void> {
    return this.run("remove", path, (jail) => jail.remove(path));
  }

  removeAll(path: string): Promise<void> {
    return this.run("removeall", path, (jail) => jail.removeAll(path));
  }

  rename(oldPath: string, newPath: string): Promise<void> {
    return this.run("rename", oldPath, (jail) => jail.rename(oldPath, newPath));
  }

  stat(path: string): Promise<FileInfo> {
    return this.run("stat", path, (jail) => jail.stat(path));
  }

  lstatIfPossible(path: string): Promise<LstatResult> {
    return this.run("lstat", path, (jail) => jail.lstatIfPossible(path));
  }

  chmod(path: string, mode: number): Promise<void> {
    return this.run("chmod", path, (jail) => jail.chmod(path, mode));
  }

  chtimes(path: string, atime: Date, mtime: Date): Promise<void> {
    return this.run("chtimes", path, (jail) =>
      jail.chtimes(path, atime, mtime),
    );
  }

  symlinkIfPossible(target: string, linkPath: string): Promise<void> {
    return this.run("symlink", linkPath, (jail) =>
      jail.symlinkIfPossible(target, linkPath),
    );
  }

  readlinkIfPossible(path: string): Promise<string> {
    return this.run("readlink", path, (jail) => jail.readlinkIfPossible(path));
  }

  private async run<T>(
    op: string,
    path: string,
    fn: (jail: BasePathFs) => Promise<T>,
  ): Promise<T> {
    return fn(this.active(op, path));
  }
}

/**
 * A confined view of one directory with an explicit lifecycle.
 *
 * The root's own entry points (create, open, openFile, mkdir, lstat and
 * openRoot) take local paths only: relative, non-empty and not climbing out
 * with "..". The rest of the Fs surface, and the view returned by fs(),
 * accept any path and confine it like BasePathFs. Once closed, every
 * operation fails.
 *
 * @example
 * ```typescript
 * const root = await RootFs.open(fs, "/srv/app");
 * const config = await root.open("etc/config.json");
 * await namespace.mount("/app", root.fs());
 * root.close();
 * ```
 */
export class RootFs implements Fs, Lstater, Symlinker, Readlinker {
  private jail: BasePathFs | null;
  private readonly view: RootView;

  private constructor(
    private readonly source: Fs,
    private readonly dir: string,
    private readonly options: RootFsOptions,
  ) {
    this.jail = new BasePathFs(source, dir);
    this.view = new RootView((op, path) => this.active(op, path));
  }

  /**
   * Open a root at dir, which must exist in fs and be a directory.
   */
  static async open(
    fs: Fs,
    dir: string,
    options: RootFsOptions = {},
  ): Promise<RootFs> {
    const normalized = normalizePath(dir);
    let info: FileInfo;
    try {
      info = await fs.stat(normalized);
    } catch (err) {
      throw new FsError("EINVAL", "openroot", dir, {
        detail: "invalid root",
        cause: err,
      });
    }
    if (!info.isDirectory) {
      throw new FsError("EINVAL", "openroot", dir, {
        detail: "invalid root: not a directory",
      });
    }
    options.logger?.info("root open", { dir: normalized });
    return new RootFs(fs, normalized, options);
  }

  /** Directory of the root, or an empty string once closed */
  get name(): string {
    return this.jail ? this.dir : "";
  }

  get closed(): boolean {
    return this.jail === null;
  }

  /**
   * The root as a plain Fs for nesting under other wrappers. It stays tied
   * to this root and fails once the root is closed.
   */
  fs(): Fs {
    this.active("fs", ".");
    return this.view;
  }

  /**
   * Open a sub-root one level deeper. The two roots close independently.
   */
  async openRoot(path: string): Promise<RootFs> {
    this.entry("openroot", path);
    return RootFs.open(this.source, joinUnder(this.dir, path), this.options);
  }

  close(): void {
    this.active("close", this.dir);
    this.jail = null;
    this.options.logger?.info("root close", { dir: this.dir });
  }

  async create(path: string): Promise<File> {
    this.entry("open", path);
    return this.view.create(path);
  }

  async open(path: string): Promise<File> {
    this.entry("open", path);
    return this.view.open(path);
  }

  async openFile(path: string, flags: number, mode?: number): Promise<File> {
    this.entry("open", path);
    return this.view.openFile(path, flags, mode);
  }

  async mkdir(path: string, mode?: number): Promise<void> {
    this.entry("mkdir", path);
    return this.view.mkdir(path, mode);
  }

  /** lstat through the root; falls back to stat when the backend has none */
  async lstat(path: string): Promise<FileInfo> {
    this.entry("lstat", path);
    return (await this.view.lstatIfPossible(path)).info;
  }

  mkdirAll(path: string, mode?: number): Promise<void> {
    return this.view.mkdirAll(path, mode);
  }

  remove(path: string): Promise<void> {
    return this.view.remove(path);
  }

  removeAll(path: string): Promise<void> {
    return this.view.removeAll(path);
  }

  rename(oldPath: string, newPath: string): Promise<void> {
    return this.view.rename(oldPath, newPath);
  }

  stat(path: string): Promise<FileInfo> {
    return this.view.stat(path);
  }

  lstatIfPossible(path: string): Promise<LstatResult> {
    return this.view.lstatIfPossible(path);
  }

  chmod(path: string, mode: number): Promise<void> {
    return this.view.chmod(path, mode);
  }

  chtimes(path: string, atime: Date, mtime: Date): Promise<void> {
    return this.view.chtimes(path, atime, mtime);
  }

  symlinkIfPossible(target: string, linkPath: string): Promise<void> {
    return this.view.symlinkIfPossible(target, linkPath);
  }

  readlinkIfPossible(path: string): Promise<string> {
    return this.view.readlinkIfPossible(path);
  }

  private active(op: string, path: string): BasePathFs {
    if (!this.jail) {
      throw new FsError("EINVAL", op, path, {
        detail: "root already closed",
      });
    }
    return this.jail;
  }

  private entry(op: string, path: string): void {
    this.active(op, path);
    if (!isLocalPath(path)) {
      throw new FsError("EINVAL", op, path, {
        detail: "path escapes from parent",
      });
    }
  }
}
