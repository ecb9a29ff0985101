/**
 * POSIX path helpers for virtual paths. Virtual paths always use "/",
 * whatever the host platform.
 */

import { posix } from "node:path";

/**
 * Normalize to an absolute path: leading "/", no trailing slash,
 * "." dropped and ".." resolved (clamped at root).
 */
export function normalizePath(path: string): string {
  if (!path || path === "/") return "/";

  const resolved: string[] = [];
  for (const part of path.split("/")) {
    if (!part || part === ".") continue;
    if (part === "..") {
      resolved.pop();
    } else {
      resolved.push(part);
    }
  }

  return `/${resolved.join("/")}`;
}

export function dirname(path: string): string {
  const normalized = normalizePath(path);
  if (normalized === "/") return "/";
  const lastSlash = normalized.lastIndexOf("/");
  return lastSlash === 0 ? "/" : normalized.slice(0, lastSlash);
}

export function basename(path: string): string {
  const normalized = normalizePath(path);
  if (normalized === "/") return "/";
  return normalized.slice(normalized.lastIndexOf("/") + 1);
}

/**
 * Segments of a normalized path; the root has none.
 */
export function splitPath(path: string): string[] {
  const normalized = normalizePath(path);
  return normalized === "/" ? [] : normalized.slice(1).split("/");
}

/**
 * Append a single segment to an absolute, normalized directory path.
 */
export function joinPath(dir: string, name: string): string {
  return dir === "/" ? `/${name}` : `${dir}/${name}`;
}

/**
 * Join name under base and clean the result. Unlike normalizePath this keeps
 * the effect of ".." so the result may leave base.
 */
export function joinUnder(base: string, name: string): string {
  return normalizePath(posix.join(base, name));
}

/**
 * True when resolved is root itself or lies below it on a segment boundary.
 */
export function isPathWithinRoot(resolved: string, root: string): boolean {
  if (root === "/") return resolved.startsWith("/");
  return resolved === root || resolved.startsWith(`${root}/`);
}

/**
 * Path of target relative to root, as an absolute virtual path.
 * Requires isPathWithinRoot(target, root).
 */
export function stripRoot(target: string, root: string): string {
  if (root === "/") return target;
  return target === root ? "/" : target.slice(root.length);
}

/**
 * A local path is non-empty, relative, and does not climb out of its
 * starting directory once cleaned.
 */
export function isLocalPath(path: string): boolean {
  if (path === "" || path.startsWith("/") || path.includes("\0")) {
    return false;
  }
  const cleaned = posix.normalize(path);
  return cleaned !== ".." && !cleaned.startsWith("../");
}
