import { describe, expect, it } from "vitest";
import { ByteBuffer } from "./byte-buffer.js";

describe("ByteBuffer", () => {
  it("should copy the initial content", () => {
    const source = new Uint8Array([1, 2, 3]);
    const buffer = new ByteBuffer(source);
    source[0] = 9;
    expect([...buffer.snapshot()]).toEqual([1, 2, 3]);
  });

  it("should grow past its capacity", () => {
    const buffer = new ByteBuffer();
    const big = new Uint8Array(200).fill(7);
    expect(buffer.writeAt(big, 10)).toBe(200);
    expect(buffer.length).toBe(210);
    const snapshot = buffer.snapshot();
    expect(snapshot[0]).toBe(0);
    expect(snapshot[209]).toBe(7);
  });

  it("should zero the gap left by an earlier shrink", () => {
    const buffer = new ByteBuffer(new Uint8Array([1, 2, 3, 4]));
    buffer.truncate(1);
    buffer.writeAt(new Uint8Array([5]), 3);
    expect([...buffer.snapshot()]).toEqual([1, 0, 0, 5]);
  });

  it("should read no more than is stored", () => {
    const buffer = new ByteBuffer(new Uint8Array([1, 2, 3]));
    const dst = new Uint8Array(8);
    expect(buffer.readInto(dst, 1)).toBe(2);
    expect([...dst.subarray(0, 2)]).toEqual([2, 3]);
    expect(buffer.readInto(dst, 3)).toBe(0);
  });
});
