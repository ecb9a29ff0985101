import { describe, expect, it } from "vitest";
import { InMemoryFs } from "../in-memory-fs/in-memory-fs.js";
import { MountTree, ROOT } from "./mount-tree.js";

const NOW = new Date("2024-01-01T00:00:00Z");

function mountAt(tree: MountTree, parts: string[], fs: InMemoryFs): number {
  let current = ROOT;
  for (const part of parts) {
    current = tree.child(current, part) ?? tree.add(current, part, NOW);
  }
  tree.attach(current, fs);
  return current;
}

describe("MountTree", () => {
  it("should resolve to the root filesystem when nothing is mounted", () => {
    const root = new InMemoryFs();
    const tree = new MountTree(root, NOW);

    expect(tree.resolve(["a", "b"])).toEqual({
      fs: root,
      base: "/",
      rel: "/a/b",
      node: ROOT,
    });
  });

  it("should resolve to the deepest mount", () => {
    const tree = new MountTree(new InMemoryFs(), NOW);
    const outer = new InMemoryFs();
    const inner = new InMemoryFs();
    mountAt(tree, ["mnt"], outer);
    const deep = mountAt(tree, ["mnt", "x", "y"], inner);

    expect(tree.resolve(["mnt", "x", "file"])).toMatchObject({
      fs: outer,
      base: "/mnt",
      rel: "/x/file",
    });
    expect(tree.resolve(["mnt", "x", "y", "z"])).toEqual({
      fs: inner,
      base: "/mnt/x/y",
      rel: "/z",
      node: deep,
    });
    expect(tree.resolve(["mnt", "x", "y"]).rel).toBe("/");
  });

  it("should count mounted descendants", () => {
    const tree = new MountTree(new InMemoryFs(), NOW);
    mountAt(tree, ["a", "b"], new InMemoryFs());
    mountAt(tree, ["a", "c"], new InMemoryFs());

    const a = tree.find(["a"]);
    expect(a).toBeDefined();
    expect(a === undefined ? -1 : tree.get(a).mounted).toBe(2);
    expect(tree.get(ROOT).mounted).toBe(2);
  });

  it("should find the nearest ancestor with a filesystem", () => {
    const tree = new MountTree(new InMemoryFs(), NOW);
    const a = mountAt(tree, ["a"], new InMemoryFs());
    const d = mountAt(tree, ["a", "b", "c", "d"], new InMemoryFs());

    expect(tree.parentWithFs(d)).toBe(a);
    expect(tree.parentWithFs(a)).toBe(ROOT);
    expect(tree.fullPath(d)).toBe("/a/b/c/d");
    expect(tree.get(d).depth).toBe(4);
  });

  it("should prune empty namespace nodes on detach", () => {
    const tree = new MountTree(new InMemoryFs(), NOW);
    mountAt(tree, ["a"], new InMemoryFs());
    const deep = mountAt(tree, ["a", "b", "c"], new InMemoryFs());

    tree.detach(deep);

    expect(tree.find(["a", "b"])).toBeUndefined();
    expect(tree.find(["a"])).toBeDefined();
    expect(tree.get(ROOT).mounted).toBe(1);
    expect(() => tree.get(deep)).toThrow(RangeError);
  });

  it("should reuse freed slots", () => {
    const tree = new MountTree(new InMemoryFs(), NOW);
    const first = mountAt(tree, ["x"], new InMemoryFs());
    tree.detach(first);

    const second = mountAt(tree, ["y"], new InMemoryFs());
    expect(second).toBe(first);
    expect(tree.fullPath(second)).toBe("/y");
  });

  it("should list mount points in path order", () => {
    const tree = new MountTree(new InMemoryFs(), NOW);
    const b = new InMemoryFs();
    const a = new InMemoryFs();
    mountAt(tree, ["b"], b);
    mountAt(tree, ["a", "z"], a);

    expect(tree.mountPoints()).toEqual([
      { path: "/a/z", fs: a },
      { path: "/b", fs: b },
    ]);
  });
});
