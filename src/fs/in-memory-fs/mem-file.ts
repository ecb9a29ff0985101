import { toBuffer } from "../encoding.js";
import { FsError } from "../errors.js";
import {
  type File,
  type FileContent,
  type FileInfo,
  SeekWhence,
} from "../interface.js";
import type { RwLock } from "../rw-lock.js";
import { type MemNode, nodeInfo } from "./nodes.js";

export interface MemFileAccess {
  readable: boolean;
  writable: boolean;
  append: boolean;
}

/**
 * Handle on a store node. The node is shared with every other handle on the
 * same path; the cursor and the directory listing position are private.
 */
export class MemFile implements File {
  private offset = 0;
  private listing: MemNode[] | null = null;
  private listingOffset = 0;
  private closed = false;

  constructor(
    private readonly node: MemNode,
    readonly name: string,
    private readonly lock: RwLock,
    private readonly access: MemFileAccess,
  ) {}

  async read(buffer: Uint8Array): Promise<number> {
    const count = await this.readFrom(buffer, this.offset, "read");
    this.offset += count;
    return count;
  }

  readAt(buffer: Uint8Array, offset: number): Promise<number> {
    return this.readFrom(buffer, offset, "readAt");
  }

  private async readFrom(
    buffer: Uint8Array,
    offset: number,
    op: string,
  ): Promise<number> {
    this.checkOpen(op);
    if (!this.access.readable) throw new FsError("EBADF", op, this.name);
    if (offset < 0) throw new FsError("EINVAL", op, this.name);
    const node = this.node;
    if (node.type !== "file") throw new FsError("EISDIR", op, this.name);
    return this.lock.read(() => node.content.readInto(buffer, offset));
  }

  async write(data: FileContent): Promise<number> {
    this.checkOpen("write");
    this.checkWritable("write");
    const node = this.node;
    if (node.type !== "file") throw new FsError("EISDIR", "write", this.name);
    const bytes = toBuffer(data);
    return this.lock.write(() => {
      if (this.access.append) this.offset = node.content.length;
      const count = node.content.writeAt(bytes, this.offset);
      this.offset += count;
      node.mtime = new Date();
      return count;
    });
  }

  async writeAt(data: FileContent, offset: number): Promise<number> {
    this.checkOpen("writeAt");
    this.checkWritable("writeAt");
    if (this.access.append) {
      throw new FsError("EINVAL", "writeAt", this.name, {
        detail: "positional write on a handle opened for append",
      });
    }
    if (offset < 0) throw new FsError("EINVAL", "writeAt", this.name);
    const node = this.node;
    if (node.type !== "file") {
      throw new FsError("EISDIR", "writeAt", this.name);
    }
    const bytes = toBuffer(data);
    return this.lock.write(() => {
      const count = node.content.writeAt(bytes, offset);
      node.mtime = new Date();
      return count;
    });
  }

  async seek(offset: number, whence: SeekWhence): Promise<number> {
    this.checkOpen("seek");
    const node = this.node;
    let base = 0;
    if (whence === SeekWhence.CURRENT) {
      base = this.offset;
    } else if (whence === SeekWhence.END) {
      base = await this.lock.read(() =>
        node.type === "file" ? node.content.length : 0,
      );
    } else if (whence !== SeekWhence.START) {
      throw new FsError("EINVAL", "seek", this.name, {
        detail: `invalid whence ${whence}`,
      });
    }
    const next = base + offset;
    if (next < 0) throw new FsError("EINVAL", "seek", this.name);
    this.offset = next;
    return next;
  }

  async truncate(size: number): Promise<void> {
    this.checkOpen("truncate");
    this.checkWritable("truncate");
    if (size < 0) throw new FsError("EINVAL", "truncate", this.name);
    const node = this.node;
    if (node.type !== "file") {
      throw new FsError("EISDIR", "truncate", this.name);
    }
    await this.lock.write(() => {
      node.content.truncate(size);
      node.mtime = new Date();
    });
  }

  async sync(): Promise<void> {
    this.checkOpen("sync");
  }

  async close(): Promise<void> {
    this.checkOpen("close");
    this.closed = true;
    this.listing = null;
  }

  async stat(): Promise<FileInfo> {
    this.checkOpen("stat");
    return this.lock.read(() => nodeInfo(this.node));
  }

  async readDir(count = 0): Promise<FileInfo[] | null> {
    const batch = await this.nextBatch(count, "readdir");
    return batch && batch.map(nodeInfo);
  }

  async readDirNames(count = 0): Promise<string[] | null> {
    const batch = await this.nextBatch(count, "readdir");
    return batch && batch.map((node) => node.name);
  }

  private async nextBatch(count: number, op: string): Promise<MemNode[] | null> {
    this.checkOpen(op);
    const node = this.node;
    if (node.type !== "directory") {
      throw new FsError("ENOTDIR", op, this.name);
    }
    const listing =
      this.listing ??
      (this.listing = await this.lock.read(() => node.children.sorted()));

    const remaining = listing.length - this.listingOffset;
    if (count > 0 && remaining === 0) return null;
    const take = count > 0 ? Math.min(count, remaining) : remaining;
    const batch = listing.slice(this.listingOffset, this.listingOffset + take);
    this.listingOffset += take;
    return batch;
  }

  private checkOpen(op: string): void {
    if (this.closed) {
      throw new FsError("EBADF", op, this.name, {
        detail: "file already closed",
      });
    }
  }

  private checkWritable(op: string): void {
    if (!this.access.writable) {
      throw new FsError("EBADF", op, this.name, {
        detail: "file handle is read only",
      });
    }
  }
}
