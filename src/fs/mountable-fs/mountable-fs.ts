import {
  AlreadyMountedError,
  CrossFsRenameError,
  FsError,
  isExist,
  isNotExist,
  NotMountedError,
  OsFsMountError,
  RecursiveMountError,
  relabel,
} from "../errors.js";
import { InMemoryFs } from "../in-memory-fs/in-memory-fs.js";
import {
  type File,
  type FileInfo,
  type Fs,
  type Lstater,
  type LstatResult,
  OpenFlag,
  type Readlinker,
  type Symlinker,
} from "../interface.js";
import {
  lstatIfPossible,
  readlinkIfPossible,
  symlinkIfPossible,
} from "../link.js";
import type { VfsLogger } from "../logger.js";
import { NamedFile } from "../named-file.js";
import { OsFs } from "../os-fs/os-fs.js";
import { joinPath, normalizePath, splitPath, stripRoot } from "../path.js";
import { MountableFile } from "./mountable-file.js";
import { MountTree, ROOT } from "./mount-tree.js";

const DEFAULT_NODE_MODE = 0o777;

/**
 * Configuration for a mount point
 */
export interface MountConfig {
  /** Virtual path where the filesystem is mounted */
  mountPoint: string;
  /** The filesystem to mount at this path */
  filesystem: Fs;
}

/**
 * Options for creating a MountableFs
 */
export interface MountableFsOptions {
  /** Filesystem for paths outside every mount (defaults to InMemoryFs) */
  base?: Fs;
  /**
   * Mounts applied at construction. These skip the masking check since the
   * base cannot be inspected synchronously.
   */
  mounts?: MountConfig[];
  /** Allow mounting over existing files and directories (default false) */
  allowMasking?: boolean;
  /** Allow the same Fs along one mount path (default false) */
  allowRecursiveMount?: boolean;
  /** Clock for namespace node times (defaults to the system clock) */
  now?: () => Date;
  /** Optional logger for mount and unmount */
  logger?: VfsLogger;
}

/**
 * Directory info synthesized for a namespace node.
 */
export class MountedDirInfo implements FileInfo {
  readonly size = 0;
  readonly isFile = false;
  readonly isDirectory = true;
  readonly isSymbolicLink = false;

  constructor(
    readonly name: string,
    readonly mode: number,
    readonly mtime: Date,
  ) {}
}

export function isMountNode(info: FileInfo): info is MountedDirInfo {
  return info instanceof MountedDirInfo;
}

function validateMountPath(path: string): void {
  if (!path.startsWith("/")) {
    throw new FsError("EINVAL", "mount", path, {
      detail: "mount point must be an absolute path",
    });
  }
  for (const segment of path.split("/")) {
    if (segment === "." || segment === "..") {
      throw new FsError("EINVAL", "mount", path, {
        detail: "mount point contains '.' or '..' segments",
      });
    }
  }
}

/**
 * A filesystem that supports mounting other filesystems at specific paths.
 *
 * Each path is served by the deepest mount point that encloses it. Directories
 * on the way to a mount point exist as namespace nodes even when no backing
 * directory does, and listings merge them with the real directory entries.
 *
 * Mounting and unmounting are setup-time operations and are not synchronized
 * with filesystem calls; callers serialize them.
 *
 * @example
 * ```typescript
 * const fs = new MountableFs({ base: new InMemoryFs() });
 * await fs.mount("/mnt/knowledge", new ReadOnlyFs(knowledgeFs));
 * await fs.mount("/home/agent", new BasePathFs(new OsFs(), "/srv/workspace"));
 * ```
 */
export class MountableFs implements Fs, Lstater, Symlinker, Readlinker {
  readonly name = "MountableFs";

  private readonly tree: MountTree;
  private readonly allowMasking: boolean;
  private readonly allowRecursiveMount: boolean;
  private readonly now: () => Date;
  private readonly logger?: VfsLogger;

  constructor(options: MountableFsOptions = {}) {
    this.allowMasking = options.allowMasking ?? false;
    this.allowRecursiveMount = options.allowRecursiveMount ?? false;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger;
    this.tree = new MountTree(options.base ?? new InMemoryFs(), this.now());

    for (const { mountPoint, filesystem } of options.mounts ?? []) {
      this.attach(mountPoint, filesystem);
    }
  }

  /**
   * Mount a filesystem at the specified virtual path.
   *
   * Fails when fs is an unwrapped OsFs, when something other than a namespace
   * node exists at path (unless masking is allowed), when the same Fs already
   * sits on the path (unless recursive mounts are allowed), or when path is
   * already a mount point.
   */
  async mount(path: string, fs: Fs): Promise<void> {
    if (fs instanceof OsFs) throw new OsFsMountError(path);
    validateMountPath(path);
    if (splitPath(path).length === 0) throw new AlreadyMountedError(path);

    if (!this.allowMasking) {
      let info: FileInfo | null = null;
      try {
        info = await this.stat(path);
      } catch (err) {
        if (!isNotExist(err)) throw err;
      }
      if (info && !isMountNode(info)) {
        throw new FsError("EEXIST", "mount", path);
      }
    }

    this.attach(path, fs);
  }

  /**
   * Detach the filesystem mounted at path. Namespace nodes left without a
   * mount below them disappear.
   */
  unmount(path: string): void {
    const index = this.tree.find(splitPath(path));
    if (index === undefined || index === ROOT || !this.tree.get(index).fs) {
      throw new NotMountedError(path);
    }
    this.tree.detach(index);
    this.logger?.info("unmount", { path: normalizePath(path) });
  }

  /**
   * Replace the filesystem mounted at path.
   */
  async remount(path: string, fs: Fs): Promise<void> {
    this.unmount(path);
    await this.mount(path, fs);
  }

  getMounts(): MountConfig[] {
    return this.tree
      .mountPoints()
      .map(({ path, fs }) => ({ mountPoint: path, filesystem: fs }));
  }

  isMountPoint(path: string): boolean {
    const index = this.tree.find(splitPath(path));
    return index !== undefined && index !== ROOT && !!this.tree.get(index).fs;
  }

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

  async openFile(path: string, flags: number, mode = 0o666): Promise<File> {
    const parts = splitPath(path);
    const found = this.tree.resolve(parts);
    const index = this.tree.find(parts);

    if (index !== undefined) {
      const backing = await this.statOrNull(found.fs, found.rel, path);
      if (!backing || backing.isDirectory) {
        const file = backing
          ? await this.forward(path, () =>
              found.fs.openFile(found.rel, flags, mode),
            )
          : null;
        return new MountableFile(
          normalizePath(path),
          file && new NamedFile(file, normalizePath(path)),
          () => this.childInfos(index),
          () => this.describe(index, path),
        );
      }
    }

    if (flags & OpenFlag.CREATE) {
      await this.materializeParents(parts.slice(0, -1), mode);
    }
    const file = await this.forward(path, () =>
      found.fs.openFile(found.rel, flags, mode),
    );
    return new NamedFile(file, normalizePath(path));
  }

  /**
   * On a namespace node the directory is created in the nearest enclosing
   * mounted filesystem, underneath the node.
   */
  async mkdir(path: string, mode = 0o777): Promise<void> {
    const parts = splitPath(path);
    const index = this.tree.find(parts);
    if (index === ROOT) return;
    if (index !== undefined) {
      const owner = this.tree.parentWithFs(index);
      const fs = this.ownerFs(owner);
      const rel = stripRoot(
        this.tree.fullPath(index),
        this.tree.fullPath(owner),
      );
      return this.forward(path, () => fs.mkdir(rel, mode));
    }
    const found = this.tree.resolve(parts);
    return this.forward(path, () => found.fs.mkdir(found.rel, mode));
  }

  async mkdirAll(path: string, mode = 0o777): Promise<void> {
    const parts = splitPath(path);
    for (let i = 1; i <= parts.length; i++) {
      try {
        await this.mkdir(`/${parts.slice(0, i).join("/")}`, mode);
      } catch (err) {
        if (!isExist(err)) throw err;
      }
    }
  }

  remove(path: string): Promise<void> {
    const found = this.tree.resolve(splitPath(path));
    return this.forward(path, () => found.fs.remove(found.rel));
  }

  /**
   * Remove content depth-first. Namespace nodes and the directories that back
   * them are kept, so no mount is ever detached.
   */
  async removeAll(path: string): Promise<void> {
    let info: FileInfo;
    try {
      info = (await this.lstatIfPossible(path)).info;
    } catch (err) {
      if (isNotExist(err)) return;
      throw err;
    }
    await this.removeTree(normalizePath(path), info);
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    const from = this.tree.resolve(splitPath(oldPath));
    const to = this.tree.resolve(splitPath(newPath));
    if (from.fs !== to.fs) throw new CrossFsRenameError(oldPath);
    try {
      await from.fs.rename(from.rel, to.rel);
    } catch (err) {
      if (err instanceof FsError && err.path === to.rel && to.rel !== from.rel) {
        throw err.withPath(newPath);
      }
      throw relabel(err, oldPath);
    }
  }

  async stat(path: string): Promise<FileInfo> {
    const parts = splitPath(path);
    const index = this.tree.find(parts);
    if (index !== undefined && index !== ROOT) {
      return this.mountedDirInfo(index);
    }
    const found = this.tree.resolve(parts);
    return this.forward(path, () => found.fs.stat(found.rel));
  }

  async lstatIfPossible(path: string): Promise<LstatResult> {
    const parts = splitPath(path);
    const index = this.tree.find(parts);
    if (index !== undefined && index !== ROOT) {
      return { info: await this.mountedDirInfo(index), lstatCalled: true };
    }
    const found = this.tree.resolve(parts);
    return this.forward(path, () => lstatIfPossible(found.fs, found.rel));
  }

  chmod(path: string, mode: number): Promise<void> {
    const found = this.tree.resolve(splitPath(path));
    return this.forward(path, () => found.fs.chmod(found.rel, mode));
  }

  /**
   * A namespace node with nothing behind it keeps its own mtime.
   */
  async chtimes(path: string, atime: Date, mtime: Date): Promise<void> {
    const parts = splitPath(path);
    const found = this.tree.resolve(parts);
    const backing = await this.statOrNull(found.fs, found.rel, path);
    if (backing) {
      return this.forward(path, () =>
        found.fs.chtimes(found.rel, atime, mtime),
      );
    }
    const index = this.tree.find(parts);
    if (index === undefined) throw new FsError("ENOENT", "chtimes", path);
    this.tree.get(index).mtime = new Date(mtime.getTime());
  }

  /**
   * The target is stored verbatim in the filesystem that owns linkPath.
   */
  symlinkIfPossible(target: string, linkPath: string): Promise<void> {
    const found = this.tree.resolve(splitPath(linkPath));
    return this.forward(linkPath, () =>
      symlinkIfPossible(found.fs, target, found.rel),
    );
  }

  readlinkIfPossible(path: string): Promise<string> {
    const found = this.tree.resolve(splitPath(path));
    return this.forward(path, () => readlinkIfPossible(found.fs, found.rel));
  }

  private attach(path: string, fs: Fs): void {
    if (fs instanceof OsFs) throw new OsFsMountError(path);
    validateMountPath(path);
    const parts = splitPath(path);
    if (!this.allowRecursiveMount && this.tree.get(ROOT).fs === fs) {
      throw new RecursiveMountError(path);
    }

    let current = ROOT;
    let depth = 0;
    for (; depth < parts.length; depth++) {
      const next = this.tree.child(current, parts[depth]);
      if (next === undefined) break;
      if (!this.allowRecursiveMount && this.tree.get(next).fs === fs) {
        throw new RecursiveMountError(path);
      }
      current = next;
    }
    if (depth === parts.length && this.tree.get(current).fs) {
      throw new AlreadyMountedError(path);
    }

    for (; depth < parts.length; depth++) {
      current = this.tree.add(current, parts[depth], this.now());
    }
    this.tree.attach(current, fs);
    this.logger?.info("mount", { path: normalizePath(path), fs: fs.name });
  }

  /**
   * Creating under a pure namespace node: make the missing directories in the
   * nearest enclosing mounted filesystem first.
   */
  private async materializeParents(
    parentParts: readonly string[],
    mode: number,
  ): Promise<void> {
    const parent = this.tree.find(parentParts);
    if (parent === undefined || this.tree.get(parent).fs) return;

    const owner = this.tree.parentWithFs(parent);
    const fs = this.ownerFs(owner);
    const ownerDepth = this.tree.get(owner).depth;
    for (let i = ownerDepth + 1; i <= parentParts.length; i++) {
      const rel = `/${parentParts.slice(ownerDepth, i).join("/")}`;
      try {
        await fs.mkdir(rel, mode | 0o111);
      } catch (err) {
        if (!isExist(err)) throw relabel(err, `/${parentParts.join("/")}`);
      }
    }
  }

  private async removeTree(path: string, info: FileInfo): Promise<void> {
    if (info.isDirectory) {
      const dir = await this.open(path);
      let names: string[];
      try {
        names = (await dir.readDirNames(0)) ?? [];
      } finally {
        await dir.close();
      }
      for (const name of names) {
        const child = joinPath(path, name);
        const { info: childInfo } = await this.lstatIfPossible(child);
        await this.removeTree(child, childInfo);
      }
    }

    if (isMountNode(info)) return;
    if (info.isDirectory && this.tree.find(splitPath(path)) !== undefined) {
      return;
    }
    await this.remove(path);
  }

  private async childInfos(index: number): Promise<FileInfo[]> {
    const infos: FileInfo[] = [];
    for (const child of this.tree.get(index).children.values()) {
      infos.push(await this.mountedDirInfo(child));
    }
    return infos;
  }

  private async describe(index: number, path: string): Promise<FileInfo> {
    if (index !== ROOT) return this.mountedDirInfo(index);
    const fs = this.ownerFs(ROOT);
    return this.forward(path, () => fs.stat("/"));
  }

  /**
   * Mode and mtime come from the mounted root when the node is a mount point.
   */
  private async mountedDirInfo(index: number): Promise<MountedDirInfo> {
    const node = this.tree.get(index);
    if (node.fs) {
      const root = await this.statOrNull(node.fs, "/", this.tree.fullPath(index));
      if (root) return new MountedDirInfo(node.name, root.mode, root.mtime);
    }
    return new MountedDirInfo(node.name, DEFAULT_NODE_MODE, node.mtime);
  }

  private ownerFs(index: number): Fs {
    const fs = this.tree.get(index).fs;
    if (!fs) throw new RangeError("mount owner has no filesystem");
    return fs;
  }

  private async statOrNull(
    fs: Fs,
    rel: string,
    path: string,
  ): Promise<FileInfo | null> {
    try {
      return await fs.stat(rel);
    } catch (err) {
      if (isNotExist(err)) return null;
      throw relabel(err, path);
    }
  }

  private async forward<T>(path: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw relabel(err, path);
    }
  }
}
