export type {
  BufferEncoding,
  File,
  FileContent,
  FileInfo,
  FileInit,
  Fs,
  InitialFiles,
  Lstater,
  LstatResult,
  Readlinker,
  Symlinker,
} from "./fs/interface.js";
export {
  ACCESS_MODE_MASK,
  isLstater,
  isReadlinker,
  isSymlinker,
  isWriteOpen,
  OpenFlag,
  SeekWhence,
  WRITE_FLAGS,
} from "./fs/interface.js";
export type { FsErrorCode, FsErrorOptions } from "./fs/errors.js";
export {
  AlreadyMountedError,
  CrossFsRenameError,
  errorCode,
  FsError,
  isExist,
  isNotExist,
  isPermission,
  NotMountedError,
  OsFsMountError,
  RecursiveMountError,
} from "./fs/errors.js";
export type { VfsLogger } from "./fs/logger.js";
export {
  lstatIfPossible,
  readlinkIfPossible,
  symlinkIfPossible,
} from "./fs/link.js";
export type { WalkFn } from "./fs/utils.js";
export {
  dirExists,
  exists,
  fileContainsBytes,
  isDir,
  isEmpty,
  readDir,
  readDirNames,
  readFile,
  readFileBuffer,
  SKIP_DIR,
  safeWriteReader,
  walk,
  writeFile,
  writeReader,
} from "./fs/utils.js";
// Backends
export {
  InMemoryFs,
  type InMemoryFsOptions,
} from "./fs/in-memory-fs/in-memory-fs.js";
export { OsFs } from "./fs/os-fs/os-fs.js";
// Composition layers
export { BasePathFs } from "./fs/base-path-fs/base-path-fs.js";
export { RootFs, type RootFsOptions } from "./fs/base-path-fs/root.js";
export { OverlayFs, type OverlayFsOptions } from "./fs/overlay-fs/overlay-fs.js";
export { ReadOnlyFs } from "./fs/read-only-fs/read-only-fs.js";
export {
  type PathPredicate,
  PredicateFs,
} from "./fs/predicate-fs/predicate-fs.js";
export { RegexpFs } from "./fs/regexp-fs/regexp-fs.js";
export type {
  MountableFsOptions,
  MountConfig,
} from "./fs/mountable-fs/mountable-fs.js";
export {
  isMountNode,
  MountableFs,
  MountedDirInfo,
} from "./fs/mountable-fs/mountable-fs.js";
export type {
  EvalSymlinksOptions,
  EvalSymlinksResult,
} from "./fs/symlink/eval-symlinks.js";
export { evalSymlinks } from "./fs/symlink/eval-symlinks.js";
