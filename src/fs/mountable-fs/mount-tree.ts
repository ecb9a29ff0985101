import type { Fs } from "../interface.js";
import { joinPath } from "../path.js";

export const ROOT = 0;

export interface MountNode {
  /** Path segment; empty for the root */
  name: string;
  /** Parent index, -1 for the root */
  parent: number;
  depth: number;
  children: Map<string, number>;
  /** Attached filesystem; null for a pure namespace node */
  fs: Fs | null;
  /** Number of attached filesystems strictly below this node */
  mounted: number;
  mtime: Date;
}

export interface FoundPath {
  fs: Fs;
  /** Namespace path of the mount point that owns the path */
  base: string;
  /** Path inside that filesystem */
  rel: string;
  /** Index of the owning mount node */
  node: number;
}

/**
 * Mount point tree stored as an index arena. Nodes refer to their parent and
 * children by index; freed slots are reused.
 */
export class MountTree {
  private readonly nodes: Array<MountNode | undefined> = [];
  private readonly freeSlots: number[] = [];

  constructor(rootFs: Fs, now: Date) {
    this.nodes.push({
      name: "",
      parent: -1,
      depth: 0,
      children: new Map(),
      fs: rootFs,
      mounted: 0,
      mtime: now,
    });
  }

  get(index: number): MountNode {
    const node = this.nodes[index];
    if (!node) throw new RangeError(`mount node ${index} was freed`);
    return node;
  }

  child(index: number, name: string): number | undefined {
    return this.get(index).children.get(name);
  }

  /** Index of the node at the exact segment path, if any */
  find(parts: readonly string[]): number | undefined {
    let current = ROOT;
    for (const part of parts) {
      const next = this.child(current, part);
      if (next === undefined) return undefined;
      current = next;
    }
    return current;
  }

  /**
   * The deepest mounted filesystem enclosing the segment path.
   */
  resolve(parts: readonly string[]): FoundPath {
    let current = ROOT;
    let owner = ROOT;
    let ownerDepth = 0;
    for (let i = 0; i < parts.length; i++) {
      const next = this.child(current, parts[i]);
      if (next === undefined) break;
      current = next;
      if (this.get(next).fs) {
        owner = next;
        ownerDepth = i + 1;
      }
    }
    const fs = this.get(owner).fs;
    if (!fs) throw new RangeError("mount owner has no filesystem");
    return {
      fs,
      base: `/${parts.slice(0, ownerDepth).join("/")}`,
      rel: `/${parts.slice(ownerDepth).join("/")}`,
      node: owner,
    };
  }

  /** Nearest strict ancestor carrying a filesystem */
  parentWithFs(index: number): number {
    let current = this.get(index).parent;
    while (current !== -1) {
      if (this.get(current).fs) return current;
      current = this.get(current).parent;
    }
    return ROOT;
  }

  fullPath(index: number): string {
    const names: string[] = [];
    let current = index;
    while (current !== ROOT) {
      const node = this.get(current);
      names.push(node.name);
      current = node.parent;
    }
    return `/${names.reverse().join("/")}`;
  }

  /** Create a child node under parent */
  add(parent: number, name: string, now: Date): number {
    const parentNode = this.get(parent);
    const node: MountNode = {
      name,
      parent,
      depth: parentNode.depth + 1,
      children: new Map(),
      fs: null,
      mounted: 0,
      mtime: now,
    };
    const slot = this.freeSlots.pop();
    const index = slot ?? this.nodes.length;
    this.nodes[index] = node;
    parentNode.children.set(name, index);
    return index;
  }

  attach(index: number, fs: Fs): void {
    this.get(index).fs = fs;
    for (let p = this.get(index).parent; p !== -1; p = this.get(p).parent) {
      this.get(p).mounted++;
    }
  }

  /**
   * Detach the filesystem at index and prune namespace nodes that no longer
   * lead to a mount.
   */
  detach(index: number): void {
    this.get(index).fs = null;
    for (let p = this.get(index).parent; p !== -1; p = this.get(p).parent) {
      this.get(p).mounted--;
    }

    let current = index;
    while (current !== ROOT) {
      const node = this.get(current);
      if (node.fs || node.mounted > 0) break;
      this.get(node.parent).children.delete(node.name);
      this.nodes[current] = undefined;
      this.freeSlots.push(current);
      current = node.parent;
    }
  }

  /** Every mount point below the root, in path order */
  mountPoints(): Array<{ path: string; fs: Fs }> {
    const result: Array<{ path: string; fs: Fs }> = [];
    const visit = (index: number, path: string): void => {
      const node = this.get(index);
      if (index !== ROOT && node.fs) result.push({ path, fs: node.fs });
      const names = [...node.children.keys()].sort();
      for (const name of names) {
        const child = node.children.get(name);
        if (child !== undefined) visit(child, joinPath(path, name));
      }
    };
    visit(ROOT, "/");
    return result;
  }
}
