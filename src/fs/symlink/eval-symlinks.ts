import { errorCode, FsError, relabel } from "../errors.js";
import { type Fs, isLstater, isReadlinker } from "../interface.js";

const DEFAULT_MAX_ITERATIONS = 1024;

export interface EvalSymlinksOptions {
  /** Upper bound on lstat steps before giving up (default 1024) */
  maxIterations?: number;
}

export interface EvalSymlinksResult {
  /** Path with every symlink replaced by its target; empty when unresolved */
  path: string;
  /** False when the backend cannot lstat or readlink */
  resolved: boolean;
}

const UNRESOLVED: EvalSymlinksResult = { path: "", resolved: false };

/**
 * Join a relative link target onto the directory that holds the link,
 * collapsing "//", "/./" and "/../" by hand. Backends need not share the
 * host's path rules, so node:path is not used here.
 *
 * Under an absolute directory ".." stops at the root, as it does in the
 * backends. Under a relative one, climbing above the first segment throws
 * EINVAL.
 */
export function resolveRelative(dir: string, link: string): string {
  if (dir === "") return link;

  let path = `${dir}/${link}`;
  while (path.includes("//")) path = path.replaceAll("//", "/");
  while (path.includes("/./")) path = path.replaceAll("/./", "/");
  for (let up = path.indexOf("/../"); up !== -1; up = path.indexOf("/../")) {
    if (up === 0) {
      path = path.slice(3);
      continue;
    }
    const start = path.lastIndexOf("/", up - 1);
    if (start < 0) {
      throw new FsError("EINVAL", "evalsymlinks", `${dir}/${link}`, {
        detail: "link target climbs above the first segment",
      });
    }
    path = `${path.slice(0, start)}/${path.slice(up + 4)}`;
  }
  return path;
}

function parentDir(path: string): string {
  const sep = path.lastIndexOf("/");
  if (sep === 0) return "/";
  return sep < 0 ? "" : path.slice(0, sep);
}

/**
 * Resolve every symlink along path, working from the last segment back to
 * the first. Absolute targets replace the scanned prefix; relative targets
 * are joined onto the link's directory. The scan is bounded by
 * maxIterations rather than a visited set, so a cycle and a very long
 * acyclic chain both end in EINVAL.
 */
export async function evalSymlinks(
  fs: Fs,
  path: string,
  options: EvalSymlinksOptions = {},
): Promise<EvalSymlinksResult> {
  if (!isLstater(fs) || !isReadlinker(fs)) return UNRESOLVED;
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;

  let current = path;
  let end = current.length;
  for (let i = 0; i < maxIterations; i++) {
    const prefix = current.slice(0, end);
    const { info, lstatCalled } = await fs.lstatIfPossible(prefix);
    if (!lstatCalled) return UNRESOLVED;

    if (info.isSymbolicLink) {
      let target: string;
      try {
        target = await fs.readlinkIfPossible(prefix);
      } catch (err) {
        if (errorCode(err) === "ENOTSUP") return UNRESOLVED;
        throw err;
      }
      const tail = current.slice(end);
      if (target.startsWith("/")) {
        current = target + tail;
        end = target.length;
      } else {
        let joined: string;
        try {
          joined = resolveRelative(parentDir(prefix), target);
        } catch (err) {
          throw relabel(err, path);
        }
        current = joined + tail;
        end = joined.length;
      }
      continue;
    }

    end = prefix.lastIndexOf("/");
    if (end <= 0) return { path: current, resolved: true };
  }

  throw new FsError("EINVAL", "evalsymlinks", path, {
    detail: `more than ${maxIterations} steps resolving symbolic links`,
  });
}
