const MIN_CAPACITY = 64;

/**
 * Growable byte storage backing a file node. Capacity grows by doubling;
 * `length` is the file size.
 */
export class ByteBuffer {
  private data: Uint8Array;
  private size: number;

  constructor(initial?: Uint8Array) {
    this.data = initial ? initial.slice() : new Uint8Array(0);
    this.size = this.data.length;
  }

  get length(): number {
    return this.size;
  }

  /** Copy bytes starting at offset into dst; returns the count copied */
  readInto(dst: Uint8Array, offset: number): number {
    if (offset >= this.size) return 0;
    const count = Math.min(dst.length, this.size - offset);
    dst.set(this.data.subarray(offset, offset + count));
    return count;
  }

  /** Write src at offset, zero-filling any gap past the current end */
  writeAt(src: Uint8Array, offset: number): number {
    const end = offset + src.length;
    this.reserve(end);
    if (offset > this.size) {
      this.data.fill(0, this.size, offset);
    }
    this.data.set(src, offset);
    this.size = Math.max(this.size, end);
    return src.length;
  }

  truncate(size: number): void {
    if (size > this.size) {
      this.reserve(size);
      this.data.fill(0, this.size, size);
    }
    this.size = size;
  }

  /** Copy of the current content */
  snapshot(): Uint8Array {
    return this.data.slice(0, this.size);
  }

  private reserve(capacity: number): void {
    if (capacity <= this.data.length) return;
    let next = Math.max(this.data.length * 2, MIN_CAPACITY);
    while (next < capacity) next *= 2;
    const grown = new Uint8Array(next);
    grown.set(this.data.subarray(0, this.size));
    this.data = grown;
  }
}
