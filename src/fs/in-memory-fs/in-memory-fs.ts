import { toBuffer } from "../encoding.js";
import { FsError } from "../errors.js";
import {
  ACCESS_MODE_MASK,
  type File,
  type FileContent,
  type FileInfo,
  type FileInit,
  type Fs,
  type InitialFiles,
  type Lstater,
  type LstatResult,
  OpenFlag,
  type Readlinker,
  type Symlinker,
} from "../interface.js";
import type { VfsLogger } from "../logger.js";
import {
  basename,
  dirname,
  joinPath,
  normalizePath,
  splitPath,
} from "../path.js";
import { RwLock } from "../rw-lock.js";
import { ByteBuffer } from "./byte-buffer.js";
import { MemFile } from "./mem-file.js";
import {
  DEFAULT_DIR_MODE,
  DEFAULT_FILE_MODE,
  DEFAULT_SYMLINK_MODE,
  DirIndex,
  type DirectoryNode,
  type FileNode,
  MODE_MASK,
  type MemNode,
  nodeInfo,
} from "./nodes.js";

const MAX_SYMLINK_HOPS = 40;

export interface InMemoryFsOptions {
  /** Files created at construction time */
  files?: InitialFiles;
  /** Optional logger for structural changes */
  logger?: VfsLogger;
}

function isFileInit(value: FileContent | FileInit): value is FileInit {
  return (
    typeof value === "object" &&
    value !== null &&
    !(value instanceof Uint8Array) &&
    "content" in value
  );
}

/**
 * Null bytes in paths can be used to truncate filenames or bypass filters.
 */
function validatePath(path: string, operation: string): void {
  if (path.includes("\0")) {
    throw new FsError("ENOENT", operation, path, {
      detail: "path contains null byte",
    });
  }
}

function newDirectory(name: string, mode: number): DirectoryNode {
  return {
    type: "directory",
    name,
    mode: mode & MODE_MASK,
    mtime: new Date(),
    children: new DirIndex(),
  };
}

/**
 * Concurrent in-memory store.
 *
 * One flat map from normalized path to node owns every node; each directory
 * also indexes its children by name. Reads take the shared lock, structural
 * changes and handle writes take the exclusive lock.
 */
export class InMemoryFs implements Fs, Lstater, Symlinker, Readlinker {
  readonly name = "InMemoryFs";

  private readonly data = new Map<string, MemNode>();
  private readonly lock = new RwLock();
  private readonly logger?: VfsLogger;

  constructor(options?: InMemoryFsOptions) {
    this.logger = options?.logger;
    this.data.set("/", newDirectory("/", DEFAULT_DIR_MODE));

    for (const [path, value] of Object.entries(options?.files ?? {})) {
      validatePath(path, "write");
      const init = isFileInit(value) ? value : { content: value };
      const node = this.createFileLocked(
        normalizePath(path),
        init.mode ?? DEFAULT_FILE_MODE,
        "write",
      );
      node.content.writeAt(toBuffer(init.content), 0);
      if (init.mtime) node.mtime = init.mtime;
    }
  }

  create(path: string): Promise<File> {
    return this.openFile(
      path,
      OpenFlag.READ_WRITE | OpenFlag.CREATE | OpenFlag.TRUNCATE,
      DEFAULT_FILE_MODE,
    );
  }

  open(path: string): Promise<File> {
    return this.openFile(path, OpenFlag.READ_ONLY);
  }

  async openFile(
    path: string,
    flags: number,
    mode: number = DEFAULT_FILE_MODE,
  ): Promise<File> {
    validatePath(path, "open");
    const access = flags & ACCESS_MODE_MASK;
    const writable =
      access === OpenFlag.WRITE_ONLY || access === OpenFlag.READ_WRITE;
    const mutates =
      writable || (flags & (OpenFlag.CREATE | OpenFlag.TRUNCATE)) !== 0;

    const run = (): MemFile => {
      const resolved = this.resolve(path, true, "open");
      let node = this.data.get(resolved);

      if (node && flags & OpenFlag.CREATE && flags & OpenFlag.EXCLUSIVE) {
        throw new FsError("EEXIST", "open", path);
      }
      if (!node) {
        if (!(flags & OpenFlag.CREATE)) {
          throw new FsError("ENOENT", "open", path);
        }
        node = this.createFileLocked(resolved, mode, "open");
      }
      if (node.type === "directory" && writable) {
        throw new FsError("EISDIR", "open", path);
      }
      if (node.type === "file" && writable && flags & OpenFlag.TRUNCATE) {
        node.content.truncate(0);
        node.mtime = new Date();
      }

      return new MemFile(node, path, this.lock, {
        readable: access !== OpenFlag.WRITE_ONLY,
        writable,
        append: (flags & OpenFlag.APPEND) !== 0,
      });
    };

    return mutates ? this.lock.write(run) : this.lock.read(run);
  }

  mkdir(path: string, mode: number = DEFAULT_DIR_MODE): Promise<void> {
    return this.mkdirAll(path, mode);
  }

  /**
   * Create path and any missing parents. Existing directories keep their mode.
   */
  async mkdirAll(path: string, mode: number = DEFAULT_DIR_MODE): Promise<void> {
    validatePath(path, "mkdir");
    await this.lock.write(() => {
      let resolved = this.resolve(path, false, "mkdir");
      let existing = this.data.get(resolved);
      if (existing?.type === "symlink") {
        // A link to a directory already satisfies the request
        resolved = this.resolve(path, true, "mkdir");
        existing = this.data.get(resolved);
        if (existing?.type !== "directory") {
          throw new FsError("EEXIST", "mkdir", path);
        }
      }
      if (existing && existing.type !== "directory") {
        throw new FsError("EEXIST", "mkdir", path);
      }
      this.ensureDirectoryLocked(resolved, mode, path, "mkdir");
    });
  }

  async remove(path: string): Promise<void> {
    validatePath(path, "remove");
    await this.lock.write(() => {
      const resolved = this.resolve(path, false, "remove");
      if (resolved === "/") throw new FsError("EPERM", "remove", path);
      const node = this.data.get(resolved);
      if (!node) throw new FsError("ENOENT", "remove", path);
      if (node.type === "directory" && node.children.size > 0) {
        throw new FsError("ENOTEMPTY", "remove", path);
      }
      this.unlinkLocked(resolved, node);
    });
  }

  async removeAll(path: string): Promise<void> {
    validatePath(path, "removeall");
    const removed = await this.lock.write(() => {
      const resolved = this.resolve(path, false, "removeall");
      if (resolved === "/") {
        const count = this.data.size - 1;
        for (const key of [...this.data.keys()]) {
          if (key !== "/") this.data.delete(key);
        }
        const root = this.data.get("/");
        if (root?.type === "directory") root.children.clear();
        return count;
      }

      const node = this.data.get(resolved);
      if (!node) return 0;
      this.unlinkLocked(resolved, node);
      let count = 1;
      const prefix = `${resolved}/`;
      for (const key of [...this.data.keys()]) {
        if (key.startsWith(prefix)) {
          this.data.delete(key);
          count++;
        }
      }
      return count;
    });
    this.logger?.debug("removeAll", { path, removed });
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    validatePath(oldPath, "rename");
    validatePath(newPath, "rename");
    await this.lock.write(() => {
      const from = this.resolve(oldPath, false, "rename");
      const to = this.resolve(newPath, false, "rename");
      if (from === "/") throw new FsError("EPERM", "rename", oldPath);
      const node = this.data.get(from);
      if (!node) throw new FsError("ENOENT", "rename", oldPath);
      if (from === to) return;
      if (this.data.has(to)) throw new FsError("EEXIST", "rename", newPath);
      if (to.startsWith(`${from}/`)) {
        throw new FsError("EINVAL", "rename", newPath, {
          detail: "cannot move a directory into itself",
        });
      }

      const parent = this.ensureDirectoryLocked(
        dirname(to),
        DEFAULT_DIR_MODE,
        newPath,
        "rename",
      );
      this.unlinkLocked(from, node);

      const prefix = `${from}/`;
      const moved = [...this.data.entries()].filter(([key]) =>
        key.startsWith(prefix),
      );
      for (const [key] of moved) this.data.delete(key);
      for (const [key, child] of moved) {
        this.data.set(to + key.slice(from.length), child);
      }

      node.name = basename(to);
      this.data.set(to, node);
      parent.children.add(node);
    });
    this.logger?.debug("rename", { from: oldPath, to: newPath });
  }

  async stat(path: string): Promise<FileInfo> {
    validatePath(path, "stat");
    return this.lock.read(() => nodeInfo(this.lookup(path, true, "stat")));
  }

  async lstatIfPossible(path: string): Promise<LstatResult> {
    validatePath(path, "lstat");
    const info = await this.lock.read(() =>
      nodeInfo(this.lookup(path, false, "lstat")),
    );
    return { info, lstatCalled: true };
  }

  async chmod(path: string, mode: number): Promise<void> {
    validatePath(path, "chmod");
    await this.lock.write(() => {
      this.lookup(path, true, "chmod").mode = mode & MODE_MASK;
    });
  }

  async chtimes(path: string, _atime: Date, mtime: Date): Promise<void> {
    validatePath(path, "chtimes");
    await this.lock.write(() => {
      this.lookup(path, true, "chtimes").mtime = new Date(mtime.getTime());
    });
  }

  async symlinkIfPossible(target: string, linkPath: string): Promise<void> {
    validatePath(linkPath, "symlink");
    await this.lock.write(() => {
      const resolved = this.resolve(linkPath, false, "symlink");
      if (this.data.has(resolved)) {
        throw new FsError("EEXIST", "symlink", linkPath);
      }
      const parent = this.ensureDirectoryLocked(
        dirname(resolved),
        DEFAULT_DIR_MODE,
        linkPath,
        "symlink",
      );
      const node: MemNode = {
        type: "symlink",
        name: basename(resolved),
        target,
        mode: DEFAULT_SYMLINK_MODE,
        mtime: new Date(),
      };
      this.data.set(resolved, node);
      parent.children.add(node);
    });
  }

  async readlinkIfPossible(path: string): Promise<string> {
    validatePath(path, "readlink");
    return this.lock.read(() => {
      const node = this.lookup(path, false, "readlink");
      if (node.type !== "symlink") {
        throw new FsError("EINVAL", "readlink", path);
      }
      return node.target;
    });
  }

  /**
   * All stored paths in sorted order.
   */
  getAllPaths(): string[] {
    return [...this.data.keys()].sort();
  }

  // Helpers below run with the lock already held.

  private lookup(path: string, followFinal: boolean, op: string): MemNode {
    const node = this.data.get(this.resolve(path, followFinal, op));
    if (!node) throw new FsError("ENOENT", op, path);
    return node;
  }

  /**
   * Normalize and resolve symlinks in every intermediate component, and in
   * the final one when followFinal is set.
   */
  private resolve(
    path: string,
    followFinal: boolean,
    op: string,
    hops = 0,
  ): string {
    const parts = splitPath(path);
    let current = "/";
    for (let i = 0; i < parts.length; i++) {
      current = joinPath(current, parts[i]);
      if (i === parts.length - 1 && !followFinal) break;

      const node = this.data.get(current);
      if (node?.type === "symlink") {
        if (hops >= MAX_SYMLINK_HOPS) throw new FsError("ELOOP", op, path);
        const target = node.target.startsWith("/")
          ? node.target
          : `${dirname(current)}/${node.target}`;
        current = this.resolve(target, true, op, hops + 1);
      }
    }
    return current;
  }

  private ensureDirectoryLocked(
    path: string,
    mode: number,
    reported: string,
    op: string,
  ): DirectoryNode {
    const existing = this.data.get(path);
    if (existing?.type === "directory") return existing;
    if (existing) throw new FsError("ENOTDIR", op, reported);

    const parent = this.ensureDirectoryLocked(
      dirname(path),
      DEFAULT_DIR_MODE,
      reported,
      op,
    );
    const dir = newDirectory(basename(path), mode);
    this.data.set(path, dir);
    parent.children.add(dir);
    return dir;
  }

  private createFileLocked(path: string, mode: number, op: string): FileNode {
    const existing = this.data.get(path);
    if (existing?.type === "directory") throw new FsError("EISDIR", op, path);
    if (existing?.type === "file") {
      existing.content.truncate(0);
      return existing;
    }

    const parent = this.ensureDirectoryLocked(
      dirname(path),
      DEFAULT_DIR_MODE,
      path,
      op,
    );
    const node: FileNode = {
      type: "file",
      name: basename(path),
      content: new ByteBuffer(),
      mode: mode & MODE_MASK,
      mtime: new Date(),
    };
    this.data.set(path, node);
    parent.children.add(node);
    return node;
  }

  private unlinkLocked(path: string, node: MemNode): void {
    this.data.delete(path);
    const parent = this.data.get(dirname(path));
    if (parent?.type === "directory") parent.children.remove(node.name);
  }
}
