import fc from "fast-check";
import { describe, expect, it } from "vitest";
import {
  basename,
  dirname,
  isLocalPath,
  isPathWithinRoot,
  joinUnder,
  normalizePath,
  splitPath,
  stripRoot,
} from "./path.js";

describe("path helpers", () => {
  it.each([
    ["", "/"],
    ["/", "/"],
    ["a/b", "/a/b"],
    ["/a//b/", "/a/b"],
    ["/a/./b", "/a/b"],
    ["/a/../b", "/b"],
    ["/../../x", "/x"],
  ])("should normalize %j to %j", (input, want) => {
    expect(normalizePath(input)).toBe(want);
  });

  it("should produce idempotent normal forms", () => {
    fc.assert(
      fc.property(fc.array(fc.constantFrom("a", "b", ".", "..", "")), (parts) => {
        const once = normalizePath(parts.join("/"));
        expect(normalizePath(once)).toBe(once);
        expect(once.startsWith("/")).toBe(true);
      }),
    );
  });

  it("should split and name segments", () => {
    expect(splitPath("/")).toEqual([]);
    expect(splitPath("/a/b/")).toEqual(["a", "b"]);
    expect(dirname("/a/b")).toBe("/a");
    expect(dirname("/a")).toBe("/");
    expect(basename("/a/b")).toBe("b");
    expect(basename("/")).toBe("/");
  });

  it("should keep the effect of '..' when joining under a base", () => {
    expect(joinUnder("/jail", "/x/../y")).toBe("/jail/y");
    expect(joinUnder("/jail", "/../x")).toBe("/x");
  });

  it("should check containment on segment boundaries", () => {
    expect(isPathWithinRoot("/base", "/base")).toBe(true);
    expect(isPathWithinRoot("/base/x", "/base")).toBe(true);
    expect(isPathWithinRoot("/basement", "/base")).toBe(false);
    expect(isPathWithinRoot("/anything", "/")).toBe(true);
  });

  it("should strip a root prefix", () => {
    expect(stripRoot("/base/x/y", "/base")).toBe("/x/y");
    expect(stripRoot("/base", "/base")).toBe("/");
    expect(stripRoot("/x", "/")).toBe("/x");
  });

  it.each([
    ["a", true],
    ["a/b", true],
    ["a/../b", true],
    ["", false],
    ["/abs", false],
    ["..", false],
    ["../x", false],
    ["a/../../x", false],
    ["a\0b", false],
  ])("should classify %j as local: %s", (input, want) => {
    expect(isLocalPath(input)).toBe(want);
  });
});
