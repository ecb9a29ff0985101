import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { BasePathFs } from "../base-path-fs/base-path-fs.js";
import { FsError } from "../errors.js";
import { OpenFlag, SeekWhence } from "../interface.js";
import { readDir, readFile, writeFile } from "../utils.js";
import { OsFs } from "./os-fs.js";

describe("OsFs", () => {
  let tempDir: string;
  const osFs = new OsFs();

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "os-fs-test-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const host = (...parts: string[]) => path.join(tempDir, ...parts);

  describe("files", () => {
    it("should write and read host files", async () => {
      await writeFile(osFs, host("a.txt"), "real content");

      expect(fs.readFileSync(host("a.txt"), "utf8")).toBe("real content");
      expect(await readFile(osFs, host("a.txt"))).toBe("real content");
    });

    it("should map missing files to ENOENT and keep the cause", async () => {
      const missing = host("missing.txt");
      const err = await osFs.open(missing).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(FsError);
      expect(err).toMatchObject({ code: "ENOENT", syscall: "open", path: missing });
      expect(err instanceof FsError && err.cause).toMatchObject({
        code: "ENOENT",
      });
    });

    it("should refuse exclusive creation of an existing file", async () => {
      fs.writeFileSync(host("f"), "x");
      await expect(
        osFs.openFile(
          host("f"),
          OpenFlag.WRITE_ONLY | OpenFlag.CREATE | OpenFlag.EXCLUSIVE,
        ),
      ).rejects.toMatchObject({ code: "EEXIST" });
    });

    it("should append at the end", async () => {
      fs.writeFileSync(host("log"), "AB");
      const file = await osFs.openFile(
        host("log"),
        OpenFlag.WRITE_ONLY | OpenFlag.APPEND,
      );
      await file.write("CD");
      await file.close();

      expect(fs.readFileSync(host("log"), "utf8")).toBe("ABCD");
    });

    it("should keep a cursor across reads, seeks and positional reads", async () => {
      fs.writeFileSync(host("f"), "0123456789");
      const file = await osFs.open(host("f"));
      const buffer = new Uint8Array(3);

      expect(await file.read(buffer)).toBe(3);
      expect(Buffer.from(buffer).toString()).toBe("012");
      expect(await file.seek(-2, SeekWhence.END)).toBe(8);
      expect(await file.read(buffer)).toBe(2);
      expect(Buffer.from(buffer.subarray(0, 2)).toString()).toBe("89");
      expect(await file.readAt(buffer, 4)).toBe(3);
      expect(Buffer.from(buffer).toString()).toBe("456");
      await expect(file.seek(-1, SeekWhence.START)).rejects.toMatchObject({
        code: "EINVAL",
      });
      await file.close();
    });

    it("should truncate through a handle", async () => {
      fs.writeFileSync(host("f"), "0123456789");
      const file = await osFs.openFile(host("f"), OpenFlag.READ_WRITE);
      await file.truncate(4);
      await file.close();

      expect(fs.readFileSync(host("f"), "utf8")).toBe("0123");
    });
  });

  describe("directories", () => {
    it("should list entries sorted with their info", async () => {
      fs.mkdirSync(host("dir"));
      fs.writeFileSync(host("dir", "b.txt"), "bb");
      fs.mkdirSync(host("dir", "a"));

      const entries = await readDir(osFs, host("dir"));
      expect(entries.map((e) => [e.name, e.isDirectory])).toEqual([
        ["a", true],
        ["b.txt", false],
      ]);
      expect(entries[1]?.size).toBe(2);
    });

    it("should page directory listings", async () => {
      fs.mkdirSync(host("dir"));
      fs.writeFileSync(host("dir", "x"), "");
      fs.writeFileSync(host("dir", "y"), "");

      const dir = await osFs.open(host("dir"));
      expect(await dir.readDirNames(1)).toEqual(["x"]);
      expect(await dir.readDirNames(1)).toEqual(["y"]);
      expect(await dir.readDirNames(1)).toBeNull();
      await dir.close();
    });

    it("should create nested directories", async () => {
      await osFs.mkdirAll(host("a", "b", "c"));
      expect(fs.statSync(host("a", "b", "c")).isDirectory()).toBe(true);
      await expect(osFs.mkdir(host("a"))).rejects.toMatchObject({
        code: "EEXIST",
      });
    });

    it("should refuse to remove a non-empty directory", async () => {
      fs.mkdirSync(host("dir"));
      fs.writeFileSync(host("dir", "f"), "x");

      await expect(osFs.remove(host("dir"))).rejects.toMatchObject({
        code: "ENOTEMPTY",
      });
      await osFs.removeAll(host("dir"));
      expect(fs.existsSync(host("dir"))).toBe(false);
      await expect(osFs.removeAll(host("dir"))).resolves.toBeUndefined();
    });
  });

  describe("metadata", () => {
    it("should rename, chmod and chtimes", async () => {
      const when = new Date("2022-02-02T02:02:02Z");
      fs.writeFileSync(host("old"), "x");

      await osFs.rename(host("old"), host("new"));
      await osFs.chmod(host("new"), 0o600);
      await osFs.chtimes(host("new"), when, when);

      const info = await osFs.stat(host("new"));
      expect(info.name).toBe("new");
      expect(info.mode).toBe(0o600);
      expect(info.mtime.getTime()).toBe(when.getTime());
    });

    it("should create and read symlinks", async () => {
      fs.writeFileSync(host("target"), "t");
      await osFs.symlinkIfPossible(host("target"), host("link"));

      expect(await osFs.readlinkIfPossible(host("link"))).toBe(host("target"));
      const { info, lstatCalled } = await osFs.lstatIfPossible(host("link"));
      expect(lstatCalled).toBe(true);
      expect(info.isSymbolicLink).toBe(true);
      expect((await osFs.stat(host("link"))).isFile).toBe(true);
    });
  });

  describe("confined", () => {
    it("should serve a host directory through a jail", async () => {
      const jail = new BasePathFs(osFs, tempDir);
      await writeFile(jail, "/notes.txt", "inside");

      expect(fs.readFileSync(host("notes.txt"), "utf8")).toBe("inside");
      await expect(jail.open("/../outside")).rejects.toMatchObject({
        code: "ENOENT",
        path: "/../outside",
      });
      await expect(readFile(jail, "/missing")).rejects.toThrow(
        "ENOENT: no such file or directory, open '/missing'",
      );
    });
  });
});
