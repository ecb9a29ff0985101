/**
 * Error taxonomy shared by all backends and composition layers.
 */

export type FsErrorCode =
  | "ENOENT"
  | "EEXIST"
  | "EPERM"
  | "ENOTDIR"
  | "EISDIR"
  | "EINVAL"
  | "ENOTEMPTY"
  | "EBADF"
  | "ELOOP"
  | "EIO"
  | "ENOTSUP"
  | "EXDEV"
  | "EBUSY";

const DESCRIPTIONS: Record<FsErrorCode, string> = {
  ENOENT: "no such file or directory",
  EEXIST: "file already exists",
  EPERM: "operation not permitted",
  ENOTDIR: "not a directory",
  EISDIR: "illegal operation on a directory",
  EINVAL: "invalid argument",
  ENOTEMPTY: "directory not empty",
  EBADF: "bad file descriptor",
  ELOOP: "too many levels of symbolic links",
  EIO: "i/o error",
  ENOTSUP: "operation not supported",
  EXDEV: "cross-device link not permitted",
  EBUSY: "resource busy",
};

export interface FsErrorOptions {
  /** Replaces the generic description in the message */
  detail?: string;
  cause?: unknown;
}

/**
 * A failed filesystem operation on a specific path.
 *
 * Message format: `ENOENT: no such file or directory, open '/x'`
 */
export class FsError extends Error {
  readonly code: FsErrorCode;
  readonly syscall: string;
  readonly path: string;
  readonly detail: string;

  constructor(
    code: FsErrorCode,
    syscall: string,
    path: string,
    options?: FsErrorOptions,
  ) {
    const detail = options?.detail ?? DESCRIPTIONS[code];
    super(`${code}: ${detail}, ${syscall} '${path}'`, {
      cause: options?.cause,
    });
    this.name = "FsError";
    this.code = code;
    this.syscall = syscall;
    this.path = path;
    this.detail = detail;
  }

  /**
   * Copy of this error reported against another path.
   */
  withPath(path: string): FsError {
    if (path === this.path) return this;
    return new FsError(this.code, this.syscall, path, {
      detail: this.detail,
      cause: this.cause,
    });
  }
}

export class CrossFsRenameError extends FsError {
  constructor(oldPath: string) {
    super("EXDEV", "rename", oldPath, {
      detail: "cannot rename across filesystems",
    });
    this.name = "CrossFsRenameError";
  }
}

export class AlreadyMountedError extends FsError {
  constructor(path: string) {
    super("EBUSY", "mount", path, { detail: "already mounted" });
    this.name = "AlreadyMountedError";
  }
}

export class NotMountedError extends FsError {
  constructor(path: string) {
    super("EINVAL", "unmount", path, { detail: "not mounted" });
    this.name = "NotMountedError";
  }
}

export class RecursiveMountError extends FsError {
  constructor(path: string) {
    super("EINVAL", "mount", path, {
      detail: "filesystem is already mounted on this path",
    });
    this.name = "RecursiveMountError";
  }
}

export class OsFsMountError extends FsError {
  constructor(path: string) {
    super("EINVAL", "mount", path, {
      detail: "OsFs must be wrapped in a BasePathFs before mounting",
    });
    this.name = "OsFsMountError";
  }
}

/**
 * Read the `code` property of anything thrown, FsError or Node errno.
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

export function isNotExist(err: unknown): boolean {
  return errorCode(err) === "ENOENT";
}

export function isExist(err: unknown): boolean {
  return errorCode(err) === "EEXIST";
}

export function isPermission(err: unknown): boolean {
  const code = errorCode(err);
  return code === "EPERM" || code === "EACCES";
}

/**
 * Relabel an FsError with the caller-visible path. Other errors pass through.
 */
export function relabel(err: unknown, path: string): unknown {
  return err instanceof FsError ? err.withPath(path) : err;
}
