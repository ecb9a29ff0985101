import { relabel } from "./errors.js";
import type { File, FileContent, FileInfo, SeekWhence } from "./interface.js";

/**
 * Handle that reports a caller-visible name, and relabels errors with it,
 * in place of the name the wrapped backend opened it under.
 */
export class NamedFile implements File {
  constructor(
    private readonly file: File,
    readonly name: string,
  ) {}

  read(buffer: Uint8Array): Promise<number> {
    return this.call(() => this.file.read(buffer));
  }

  readAt(buffer: Uint8Array, offset: number): Promise<number> {
    return this.call(() => this.file.readAt(buffer, offset));
  }

  write(data: FileContent): Promise<number> {
    return this.call(() => this.file.write(data));
  }

  writeAt(data: FileContent, offset: number): Promise<number> {
    return this.call(() => this.file.writeAt(data, offset));
  }

  seek(offset: number, whence: SeekWhence): Promise<number> {
    return this.call(() => this.file.seek(offset, whence));
  }

  truncate(size: number): Promise<void> {
    return this.call(() => this.file.truncate(size));
  }

  sync(): Promise<void> {
    return this.call(() => this.file.sync());
  }

  close(): Promise<void> {
    return this.call(() => this.file.close());
  }

  stat(): Promise<FileInfo> {
    return this.call(() => this.file.stat());
  }

  readDir(count?: number): Promise<FileInfo[] | null> {
    return this.call(() => this.file.readDir(count));
  }

  readDirNames(count?: number): Promise<string[] | null> {
    return this.call(() => this.file.readDirNames(count));
  }

  private async call<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw relabel(err, this.name);
    }
  }
}
