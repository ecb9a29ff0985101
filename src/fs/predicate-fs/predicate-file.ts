import type { File, FileInfo } from "../interface.js";
import { NamedFile } from "../named-file.js";
import { joinPath } from "../path.js";
import type { PathPredicate } from "./predicate-fs.js";

/**
 * Directory handle that leaves out the files a predicate rejects.
 * Subdirectories are always listed.
 */
export class PredicateFile extends NamedFile {
  constructor(
    file: File,
    private readonly predicate: PathPredicate,
  ) {
    super(file, file.name);
  }

  async readDir(count?: number): Promise<FileInfo[] | null> {
    for (;;) {
      const batch = await super.readDir(count);
      if (batch === null) return null;
      const kept = batch.filter(
        (info) =>
          info.isDirectory || this.predicate(joinPath(this.name, info.name)),
      );
      // A batch filtered down to nothing is not the end of the listing
      if (kept.length > 0 || count === undefined || count <= 0) return kept;
    }
  }

  async readDirNames(count?: number): Promise<string[] | null> {
    const batch = await this.readDir(count);
    return batch && batch.map((info) => info.name);
  }
}
