/**
 * Capability contract shared by every backend and composition layer.
 *
 * All methods are async. Sync methods are not supported and must not be added.
 */

export type FileContent = string | Uint8Array;

/**
 * Supported buffer encodings
 */
export type BufferEncoding =
  | "utf8"
  | "utf-8"
  | "ascii"
  | "binary"
  | "base64"
  | "hex"
  | "latin1";

/**
 * Open flags. Combine with bitwise OR; the access mode is the low two bits.
 */
export const OpenFlag = {
  READ_ONLY: 0,
  WRITE_ONLY: 1,
  READ_WRITE: 2,
  CREATE: 0o100,
  EXCLUSIVE: 0o200,
  TRUNCATE: 0o1000,
  APPEND: 0o2000,
} as const;

export const ACCESS_MODE_MASK = 0b11;

/**
 * Flags that make an open mutate the target.
 */
export const WRITE_FLAGS =
  OpenFlag.WRITE_ONLY |
  OpenFlag.READ_WRITE |
  OpenFlag.APPEND |
  OpenFlag.CREATE |
  OpenFlag.TRUNCATE;

export function isWriteOpen(flags: number): boolean {
  return (flags & WRITE_FLAGS) !== 0;
}

export const SeekWhence = {
  START: 0,
  CURRENT: 1,
  END: 2,
} as const;

export type SeekWhence = (typeof SeekWhence)[keyof typeof SeekWhence];

/**
 * Immutable metadata snapshot. `mode` holds permission bits only.
 */
export interface FileInfo {
  readonly name: string;
  readonly size: number;
  readonly mode: number;
  readonly mtime: Date;
  readonly isFile: boolean;
  readonly isDirectory: boolean;
  readonly isSymbolicLink: boolean;
}

/**
 * An open handle. Every handle owns its cursor; content may be shared with
 * other handles on the same path.
 */
export interface File {
  /** Path the handle was opened with, as seen by the caller */
  readonly name: string;

  /** Read into buffer at the cursor. Resolves to 0 at end of file. */
  read(buffer: Uint8Array): Promise<number>;
  /** Read at an absolute offset without moving the cursor */
  readAt(buffer: Uint8Array, offset: number): Promise<number>;
  write(data: FileContent): Promise<number>;
  /** Write at an absolute offset without moving the cursor */
  writeAt(data: FileContent, offset: number): Promise<number>;
  seek(offset: number, whence: SeekWhence): Promise<number>;
  truncate(size: number): Promise<void>;
  sync(): Promise<void>;
  close(): Promise<void>;
  stat(): Promise<FileInfo>;

  /**
   * List directory entries in name order.
   *
   * With `count > 0` at most `count` entries are returned and `null` marks an
   * exhausted listing. With `count <= 0` every remaining entry is returned.
   */
  readDir(count?: number): Promise<FileInfo[] | null>;
  readDirNames(count?: number): Promise<string[] | null>;
}

/**
 * Filesystem interface implemented by every backend and every wrapper.
 */
export interface Fs {
  readonly name: string;

  /** Create or truncate a file, opened read-write */
  create(path: string): Promise<File>;
  /** Open read-only */
  open(path: string): Promise<File>;
  openFile(path: string, flags: number, mode?: number): Promise<File>;
  mkdir(path: string, mode?: number): Promise<void>;
  mkdirAll(path: string, mode?: number): Promise<void>;
  remove(path: string): Promise<void>;
  /** Remove path and everything below it. A missing path is not an error. */
  removeAll(path: string): Promise<void>;
  rename(oldPath: string, newPath: string): Promise<void>;
  stat(path: string): Promise<FileInfo>;
  chmod(path: string, mode: number): Promise<void>;
  chtimes(path: string, atime: Date, mtime: Date): Promise<void>;
}

export interface LstatResult {
  info: FileInfo;
  /** False when the backend had to fall back to stat */
  lstatCalled: boolean;
}

export interface Lstater {
  lstatIfPossible(path: string): Promise<LstatResult>;
}

export interface Symlinker {
  symlinkIfPossible(target: string, linkPath: string): Promise<void>;
}

export interface Readlinker {
  readlinkIfPossible(path: string): Promise<string>;
}

export function isLstater(fs: object): fs is Lstater {
  return "lstatIfPossible" in fs && typeof fs.lstatIfPossible === "function";
}

export function isSymlinker(fs: object): fs is Symlinker {
  return (
    "symlinkIfPossible" in fs && typeof fs.symlinkIfPossible === "function"
  );
}

export function isReadlinker(fs: object): fs is Readlinker {
  return (
    "readlinkIfPossible" in fs && typeof fs.readlinkIfPossible === "function"
  );
}

/**
 * Extended file initialization options with optional metadata
 */
export interface FileInit {
  content: FileContent;
  mode?: number;
  mtime?: Date;
}

/**
 * Initial files for a store: simple content or content with metadata
 */
export type InitialFiles = Record<string, FileContent | FileInit>;
