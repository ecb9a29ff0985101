import type { Fs } from "../interface.js";
import { basename } from "../path.js";
import { PredicateFs } from "../predicate-fs/predicate-fs.js";

/**
 * Shows only the files whose name matches a pattern. The pattern is tested
 * against the last path segment, so `/\.txt$/` and `/^draft-/` both work.
 * Directories are never filtered.
 *
 * @example
 * ```typescript
 * const text = new RegexpFs(source, /\.txt$/);
 * await text.create("/page.html"); // ENOENT
 * ```
 */
export class RegexpFs extends PredicateFs {
  readonly name = "RegexpFs";

  constructor(source: Fs, pattern: RegExp) {
    // Stateful flags would make test() depend on the previous call
    const matcher = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
    super(source, (path) => matcher.test(basename(path)));
  }
}
