import { describe, expect, it } from "vitest";
import { InMemoryFs } from "../in-memory-fs/in-memory-fs.js";
import { ReadOnlyFs } from "../read-only-fs/read-only-fs.js";
import { readDirNames, readFile } from "../utils.js";
import { RegexpFs } from "./regexp-fs.js";

function tree() {
  const files: Record<string, string> = {};
  for (const dir of ["/dir", "/dir/sub"]) {
    for (const name of ["afile.txt", "afile.html", "bfile.txt"]) {
      files[`${dir}/${name}`] = name;
    }
  }
  return new InMemoryFs({ files });
}

describe("RegexpFs", () => {
  it("should refuse to create names that do not match", async () => {
    const fs = new RegexpFs(new InMemoryFs(), /\.txt$/);
    expect(fs.name).toBe("RegexpFs");
    await expect(fs.create("/file.html")).rejects.toThrow(
      "ENOENT: no such file or directory, open '/file.html'",
    );
    const file = await fs.create("/file.txt");
    await file.close();
  });

  it("should apply the policy of the wrapped filter too", async () => {
    const fs = new RegexpFs(new ReadOnlyFs(new InMemoryFs()), /\.txt$/);
    await expect(fs.create("/file.txt")).rejects.toMatchObject({
      code: "EPERM",
      detail: "read-only file system",
    });
  });

  it("should combine patterns when stacked", async () => {
    const fs = new RegexpFs(new RegexpFs(tree(), /\.txt$/), /^a/);

    expect(await readDirNames(fs, "/dir")).toEqual(["afile.txt", "sub"]);
    const sub = await fs.open("/dir/sub");
    expect(await sub.readDirNames(-1)).toEqual(["afile.txt"]);
    await sub.close();
    await expect(readFile(fs, "/dir/bfile.txt")).rejects.toMatchObject({
      code: "ENOENT",
    });
  });

  it("should match the file name rather than the whole path", async () => {
    const fs = new RegexpFs(tree(), /^a/);
    expect(await readFile(fs, "/dir/sub/afile.html")).toBe("afile.html");
  });

  it("should give the same answer on every call for global patterns", async () => {
    const fs = new RegexpFs(tree(), /\.txt$/g);
    expect(await readFile(fs, "/dir/afile.txt")).toBe("afile.txt");
    expect(await readFile(fs, "/dir/afile.txt")).toBe("afile.txt");
    expect(await readDirNames(fs, "/dir")).toEqual(["afile.txt", "bfile.txt", "sub"]);
  });
});
