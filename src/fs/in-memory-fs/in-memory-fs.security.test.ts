/**
 * Security tests for InMemoryFs path handling
 *
 * The store has no host to escape to, but it must terminate on symlink
 * loops, keep ".." clamped at its root and reject null bytes on every
 * entry point.
 */

import { describe, expect, it } from "vitest";
import { OpenFlag } from "../interface.js";
import { exists, readFile, writeFile } from "../utils.js";
import { InMemoryFs } from "./in-memory-fs.js";

describe("InMemoryFs Security - Path Handling", () => {
  describe("circular symlink protection", () => {
    it("should handle self-referential symlinks", async () => {
      const fs = new InMemoryFs();
      await fs.symlinkIfPossible("/self", "/self");
      await expect(readFile(fs, "/self")).rejects.toThrow(
        "ELOOP: too many levels of symbolic links, open '/self'",
      );
    });

    it("should handle mutual circular symlinks", async () => {
      const fs = new InMemoryFs();
      await fs.symlinkIfPossible("/link2", "/link1");
      await fs.symlinkIfPossible("/link1", "/link2");
      await expect(readFile(fs, "/link1")).rejects.toMatchObject({
        code: "ELOOP",
      });
      await expect(fs.stat("/link2")).rejects.toMatchObject({ code: "ELOOP" });
    });

    it("should handle three-way circular symlinks", async () => {
      const fs = new InMemoryFs();
      await fs.symlinkIfPossible("/b", "/a");
      await fs.symlinkIfPossible("/c", "/b");
      await fs.symlinkIfPossible("/a", "/c");
      await expect(readFile(fs, "/a")).rejects.toMatchObject({ code: "ELOOP" });
    });

    it("should surface loops from exists instead of reporting absence", async () => {
      const fs = new InMemoryFs();
      await fs.symlinkIfPossible("/loop", "/loop");
      await expect(exists(fs, "/loop")).rejects.toMatchObject({
        code: "ELOOP",
      });
    });

    it("should still lstat a looping link", async () => {
      const fs = new InMemoryFs();
      await fs.symlinkIfPossible("/loop", "/loop");
      const { info } = await fs.lstatIfPossible("/loop");
      expect(info.isSymbolicLink).toBe(true);
      expect(info.size).toBe(5);
    });

    it("should stop on loops through intermediate directories", async () => {
      const fs = new InMemoryFs();
      await fs.symlinkIfPossible("/d2", "/d1");
      await fs.symlinkIfPossible("/d1", "/d2");
      await expect(
        fs.openFile("/d1/file", OpenFlag.WRITE_ONLY | OpenFlag.CREATE),
      ).rejects.toMatchObject({ code: "ELOOP" });
    });
  });

  describe("path traversal", () => {
    it("should clamp '..' at the root", async () => {
      const fs = new InMemoryFs({ files: { "/etc/passwd": "root" } });
      expect(await readFile(fs, "/../../../etc/passwd")).toBe("root");
      expect(await readFile(fs, "/a/b/../../../../etc/passwd")).toBe("root");
    });

    it("should keep relative symlink targets inside the store", async () => {
      const fs = new InMemoryFs({ files: { "/secret": "s" } });
      await fs.symlinkIfPossible("../../../../secret", "/deep/dir/link");
      expect(await readFile(fs, "/deep/dir/link")).toBe("s");
    });

    it("should write through a symlinked directory into its target", async () => {
      const fs = new InMemoryFs();
      await fs.mkdir("/real");
      await fs.symlinkIfPossible("/real", "/alias");
      await writeFile(fs, "/alias/f", "x");
      expect(fs.getAllPaths()).toEqual(["/", "/alias", "/real", "/real/f"]);
    });
  });

  describe("null bytes", () => {
    const NUL_PATH = "/file\0.txt";

    it("should reject null bytes on every entry point", async () => {
      const fs = new InMemoryFs({ files: { "/file": "x" } });
      const now = new Date("2024-01-01T00:00:00Z");
      const attempts: Array<[string, () => Promise<unknown>]> = [
        ["open", () => fs.open(NUL_PATH)],
        ["open", () => fs.create(NUL_PATH)],
        ["mkdir", () => fs.mkdir(NUL_PATH)],
        ["remove", () => fs.remove(NUL_PATH)],
        ["removeall", () => fs.removeAll(NUL_PATH)],
        ["stat", () => fs.stat(NUL_PATH)],
        ["chmod", () => fs.chmod(NUL_PATH, 0o600)],
        ["chtimes", () => fs.chtimes(NUL_PATH, now, now)],
        ["readlink", () => fs.readlinkIfPossible(NUL_PATH)],
      ];
      for (const [syscall, attempt] of attempts) {
        await expect(attempt()).rejects.toMatchObject({
          code: "ENOENT",
          syscall,
          detail: "path contains null byte",
        });
      }
      expect(fs.getAllPaths()).toEqual(["/", "/file"]);
    });

    it("should reject null bytes in initial files", () => {
      expect(() => new InMemoryFs({ files: { [NUL_PATH]: "x" } })).toThrow(
        "path contains null byte",
      );
    });
  });
});
