import {
  type File,
  type FileContent,
  type FileInfo,
  SeekWhence,
} from "../interface.js";

function byName(a: FileInfo, b: FileInfo): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Directory handle merging a layer directory over a base directory.
 *
 * Listings are the union by name with layer entries winning. Other calls go
 * to the layer handle.
 */
export class UnionFile implements File {
  private merged: FileInfo[] | null = null;
  private offset = 0;

  constructor(
    readonly name: string,
    private readonly base: File | null,
    private readonly layer: File,
  ) {}

  read(buffer: Uint8Array): Promise<number> {
    return this.layer.read(buffer);
  }

  readAt(buffer: Uint8Array, offset: number): Promise<number> {
    return this.layer.readAt(buffer, offset);
  }

  write(data: FileContent): Promise<number> {
    return this.layer.write(data);
  }

  writeAt(data: FileContent, offset: number): Promise<number> {
    return this.layer.writeAt(data, offset);
  }

  async seek(offset: number, whence: SeekWhence): Promise<number> {
    const position = await this.layer.seek(offset, whence);
    if (this.base) await this.base.seek(position, SeekWhence.START);
    return position;
  }

  truncate(size: number): Promise<void> {
    return this.layer.truncate(size);
  }

  sync(): Promise<void> {
    return this.layer.sync();
  }

  stat(): Promise<FileInfo> {
    return this.layer.stat();
  }

  /**
   * Close both handles. The layer's failure is reported first.
   */
  async close(): Promise<void> {
    const results = await Promise.allSettled([
      this.layer.close(),
      this.base?.close(),
    ]);
    this.merged = null;
    for (const result of results) {
      if (result.status === "rejected") throw result.reason;
    }
  }

  async readDir(count = 0): Promise<FileInfo[] | null> {
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
    if (this.base) {
      for (const info of (await this.base.readDir(0)) ?? []) {
        entries.set(info.name, info);
      }
    }
    for (const info of (await this.layer.readDir(0)) ?? []) {
      entries.set(info.name, info);
    }
    return [...entries.values()].sort(byName);
  }
}
