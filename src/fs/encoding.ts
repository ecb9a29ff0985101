/**
 * Conversions between string content and bytes
 */

import type { BufferEncoding, FileContent } from "./interface.js";

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

export function toBuffer(
  content: FileContent,
  encoding?: BufferEncoding,
): Uint8Array {
  if (content instanceof Uint8Array) {
    return content;
  }

  switch (encoding) {
    case "base64":
    case "hex":
    case "binary":
    case "latin1":
    case "ascii":
      return new Uint8Array(Buffer.from(content, encoding));
    default:
      return textEncoder.encode(content);
  }
}

export function fromBuffer(
  buffer: Uint8Array,
  encoding?: BufferEncoding | null,
): string {
  switch (encoding) {
    case "base64":
    case "hex":
    case "binary":
    case "latin1":
    case "ascii":
      return Buffer.from(buffer).toString(encoding);
    default:
      return textDecoder.decode(buffer);
  }
}
