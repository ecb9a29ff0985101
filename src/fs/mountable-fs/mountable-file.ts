import { FsError } from "../errors.js";
import type { File, FileContent, FileInfo, SeekWhence } from "../interface.js";

/**
 * Directory handle for a namespace node. Listings merge the directory that
 * backs the node, if any, with the node's mounted children; children win on
 * name clashes.
 */
export class MountableFile implements File {
  private merged: FileInfo[] | null = null;
  private offset = 0;
  private closed = false;

  constructor(
    readonly name: string,
    private readonly file: File | null,
    private readonly children: () => Promise<FileInfo[]>,
    private readonly describe: () => Promise<FileInfo>,
  ) {}

  async read(buffer: Uint8Array): Promise<number> {
    return this.backing("read").read(buffer);
  }

  async readAt(buffer: Uint8Array, offset: number): Promise<number> {
    return this.backing("read").readAt(buffer, offset);
  }

  async write(data: FileContent): Promise<number> {
    return this.backing("write").write(data);
  }

  async writeAt(data: FileContent, offset: number): Promise<number> {
    return this.backing("write").writeAt(data, offset);
  }

  async seek(offset: number, whence: SeekWhence): Promise<number> {
    return this.backing("seek").seek(offset, whence);
  }

  async truncate(size: number): Promise<void> {
    return this.backing("truncate").truncate(size);
  }

  async sync(): Promise<void> {
    this.checkOpen("sync");
    await this.file?.sync();
  }

  async close(): Promise<void> {
    this.checkOpen("close");
    this.closed = true;
    this.merged = null;
    await this.file?.close();
  }

  async stat(): Promise<FileInfo> {
    this.checkOpen("stat");
    return this.describe();
  }

  async readDir(count = 0): Promise<FileInfo[] | null> {
    this.checkOpen("readdir");
    const merged = this.merged ?? (this.merged = await this.merge());
    const remaining = merged.length - this.offset;
    if (count > 0 && remaining === 0) return null;
    const take = count > 0 ? Math.min(count, remaining) : remaining;
    const batch = merged.slice(this.offset, this.offset + take);
    this.offset += take;
    return batch;
  }

  async readDirNames(count = 0): Promise<string[] | null> {
    const batch = await this.readDir(count);
    return batch && batch.map((info) => info.name);
  }

  private async merge(): Promise<FileInfo[]> {
    const entries = new Map<string, FileInfo>();
    for (const info of (await this.file?.readDir(0)) ?? []) {
      entries.set(info.name, info);
    }
    for (const info of await this.children()) {
      entries.set(info.name, info);
    }
    return [...entries.values()].sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
    );
  }

  private backing(op: string): File {
    this.checkOpen(op);
    if (!this.file) throw new FsError("EISDIR", op, this.name);
    return this.file;
  }

  private checkOpen(op: string): void {
    if (this.closed) {
      throw new FsError("EBADF", op, this.name, {
        detail: "file already closed",
      });
    }
  }
}
