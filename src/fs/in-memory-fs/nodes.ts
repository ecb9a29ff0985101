import type { FileInfo } from "../interface.js";
import type { ByteBuffer } from "./byte-buffer.js";

export const DEFAULT_FILE_MODE = 0o644;
export const DEFAULT_DIR_MODE = 0o755;
export const DEFAULT_SYMLINK_MODE = 0o777;
export const MODE_MASK = 0o7777;

interface NodeMeta {
  /** Base name; "/" for the root */
  name: string;
  mode: number;
  mtime: Date;
}

export interface FileNode extends NodeMeta {
  type: "file";
  content: ByteBuffer;
}

export interface DirectoryNode extends NodeMeta {
  type: "directory";
  children: DirIndex;
}

export interface SymlinkNode extends NodeMeta {
  type: "symlink";
  target: string;
}

export type MemNode = FileNode | DirectoryNode | SymlinkNode;

/**
 * Secondary view of a directory's children keyed by base name.
 * The store's path map owns the nodes.
 */
export class DirIndex {
  private entries = new Map<string, MemNode>();

  get size(): number {
    return this.entries.size;
  }

  add(node: MemNode): void {
    this.entries.set(node.name, node);
  }

  remove(name: string): void {
    this.entries.delete(name);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Children ordered by name */
  sorted(): MemNode[] {
    return [...this.entries.values()].sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
    );
  }
}

export function nodeInfo(node: MemNode): FileInfo {
  return {
    name: node.name,
    size:
      node.type === "file"
        ? node.content.length
        : node.type === "symlink"
          ? node.target.length
          : 0,
    mode: node.mode,
    mtime: new Date(node.mtime.getTime()),
    isFile: node.type === "file",
    isDirectory: node.type === "directory",
    isSymbolicLink: node.type === "symlink",
  };
}
