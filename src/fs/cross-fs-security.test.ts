/**
 * Cross-backend confinement tests.
 *
 * Every escape attempt in this file runs against a BasePathFs jail over
 * both InMemoryFs and OsFs. The backends differ in how they store things,
 * but the jail must refuse the same paths and report the same jail-relative
 * names on both.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { BasePathFs } from "./base-path-fs/base-path-fs.js";
import { InMemoryFs } from "./in-memory-fs/in-memory-fs.js";
import type { Fs } from "./interface.js";
import { OsFs } from "./os-fs/os-fs.js";
import { readFile, writeFile } from "./utils.js";

const SECRET = "top secret";

interface TestContext {
  jail: BasePathFs;
  /** Content of the file that sits beside the jail */
  readSecret: () => Promise<string>;
  /** Names that exist beside the jail */
  outsideNames: () => Promise<string[]>;
}

function setupInMemory(): TestContext {
  const source = new InMemoryFs({
    files: { "/secret": SECRET, "/jail/notes.txt": "notes" },
  });
  return {
    jail: new BasePathFs(source, "/jail"),
    readSecret: () => readFile(source, "/secret"),
    outsideNames: async () =>
      source
        .getAllPaths()
        .filter((p) => p !== "/" && !p.startsWith("/jail")),
  };
}

function setupOs(tempDir: string): TestContext {
  fs.writeFileSync(path.join(tempDir, "secret"), SECRET);
  fs.mkdirSync(path.join(tempDir, "jail"));
  fs.writeFileSync(path.join(tempDir, "jail", "notes.txt"), "notes");
  return {
    jail: new BasePathFs(new OsFs(), path.join(tempDir, "jail")),
    readSecret: async () =>
      fs.readFileSync(path.join(tempDir, "secret"), "utf8"),
    outsideNames: async () =>
      fs
        .readdirSync(tempDir)
        .filter((name) => name !== "jail")
        .map((name) => `/${name}`),
  };
}

describe.each([
  ["InMemoryFs", (_tempDir: string) => setupInMemory()],
  ["OsFs", (tempDir: string) => setupOs(tempDir)],
])("BasePathFs over %s", (_name, setup) => {
  let tempDir: string;
  let ctx: TestContext;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "cross-fs-test-"));
    ctx = setup(tempDir);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should serve files inside the jail", async () => {
    expect(await readFile(ctx.jail, "/notes.txt")).toBe("notes");
  });

  it("should refuse to read above the jail", async () => {
    for (const attempt of ["/../secret", "/sub/../../secret", "/../../../secret"]) {
      await expect(readFile(ctx.jail, attempt)).rejects.toMatchObject({
        code: "ENOENT",
        path: attempt,
      });
    }
  });

  it("should refuse to write above the jail", async () => {
    await expect(writeFile(ctx.jail, "/../secret", "pwned")).rejects.toMatchObject(
      { code: "ENOENT" },
    );
    await expect(ctx.jail.mkdirAll("/../escape")).rejects.toMatchObject({
      code: "ENOENT",
    });
    await expect(
      ctx.jail.rename("/notes.txt", "/../stolen"),
    ).rejects.toMatchObject({ code: "ENOENT", path: "/../stolen" });

    expect(await ctx.readSecret()).toBe(SECRET);
    expect(await ctx.outsideNames()).toEqual(["/secret"]);
  });

  it("should refuse null bytes", async () => {
    await expect(ctx.jail.open("/notes.txt\0../../secret")).rejects.toMatchObject(
      { code: "ENOENT", detail: "path contains null byte" },
    );
  });

  it("should report errors without the base directory", async () => {
    await expect(readFile(ctx.jail, "/missing")).rejects.toThrow(
      "ENOENT: no such file or directory, open '/missing'",
    );
  });

  it("should remap absolute link targets into the jail", async () => {
    await ctx.jail.symlinkIfPossible("/secret", "/link");

    expect(await ctx.jail.readlinkIfPossible("/link")).toBe("/secret");
    await expect(readFile(ctx.jail, "/link")).rejects.toMatchObject({
      code: "ENOENT",
      path: "/link",
    });
  });

  it("should refuse relative link targets that climb out", async () => {
    await expect(
      ctx.jail.symlinkIfPossible("../secret", "/link"),
    ).rejects.toThrow(
      "EPERM: link target escapes the base directory, symlink '/link'",
    );
    await expect(
      ctx.jail.symlinkIfPossible("../../secret", "/dir/link"),
    ).rejects.toMatchObject({ code: "EPERM" });
  });

  it("should allow relative link targets that stay inside", async () => {
    await ctx.jail.symlinkIfPossible("notes.txt", "/alias");
    expect(await readFile(ctx.jail, "/alias")).toBe("notes");
  });
});
