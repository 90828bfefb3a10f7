// src/s6/sawyerChunk.ts
import { BinaryReader } from "./binary.js";
import { ChecksumError, FormatError, TruncatedDataError } from "./errors.js";

export const CHUNK_ENCODING_NONE = 0;
export const CHUNK_ENCODING_RLE = 1;
export const CHUNK_ENCODING_RLE_COMPRESSED = 2;
export const CHUNK_ENCODING_ROTATE = 3;

export type ChunkEncoding =
  | typeof CHUNK_ENCODING_NONE
  | typeof CHUNK_ENCODING_RLE
  | typeof CHUNK_ENCODING_RLE_COMPRESSED
  | typeof CHUNK_ENCODING_ROTATE;

export const CHUNK_HEADER_SIZE = 5;
export const MAX_UNCOMPRESSED_CHUNK_SIZE = 16 * 1024 * 1024;

const CHECKSUM_TRAILER_SIZE = 4;

function checkDecodedSize(len: number): void {
  if (len > MAX_UNCOMPRESSED_CHUNK_SIZE) {
    throw new FormatError(
      `Chunk decodes past ${MAX_UNCOMPRESSED_CHUNK_SIZE} bytes; refusing to continue`,
    );
  }
}

function measureRle(src: Uint8Array): number {
  let len = 0;
  for (let i = 0; i < src.length; i++) {
    const code = src[i] ?? 0;
    if (code & 0x80) {
      if (i + 1 >= src.length) throw new FormatError(`Invalid RLE run at ${i}: no value byte`);
      len += 257 - code;
      i += 1;
    } else {
      const n = code + 1;
      if (i + 1 + n > src.length) {
        throw new FormatError(
          `Invalid RLE literal at ${i}: need ${n} bytes, have ${src.length - i - 1}`,
        );
      }
      len += n;
      i += n;
    }
    checkDecodedSize(len);
  }
  return len;
}

/**
 * Byte-oriented run-length decoding. A code byte with bit 7 set repeats the
 * following byte `257 - code` times; otherwise `code + 1` literal bytes follow.
 */
export function decodeRle(src: Uint8Array): Buffer {
  const out = Buffer.alloc(measureRle(src));

  let pos = 0;
  for (let i = 0; i < src.length; i++) {
    const code = src[i] ?? 0;
    if (code & 0x80) {
      const count = 257 - code;
      out.fill(src[i + 1] ?? 0, pos, pos + count);
      pos += count;
      i += 1;
    } else {
      const n = code + 1;
      out.set(src.subarray(i + 1, i + 1 + n), pos);
      pos += n;
      i += n;
    }
  }

  return out;
}

function measureRepeat(src: Uint8Array): number {
  let len = 0;
  for (let i = 0; i < src.length; i++) {
    const b = src[i] ?? 0;
    if (b === 0xff) {
      if (i + 1 >= src.length) throw new FormatError(`Invalid repeat escape at ${i}`);
      len += 1;
      i += 1;
    } else {
      len += (b & 7) + 1;
    }
    checkDecodedSize(len);
  }
  return len;
}

/**
 * Back-reference decoding applied after RLE for "RLE compressed" chunks.
 * 0xFF escapes one literal; any other byte copies `(b & 7) + 1` bytes from
 * `32 - (b >> 3)` bytes behind the write position.
 */
export function decodeRepeat(src: Uint8Array): Buffer {
  const out = Buffer.alloc(measureRepeat(src));

  let pos = 0;
  for (let i = 0; i < src.length; i++) {
    const b = src[i] ?? 0;
    if (b === 0xff) {
      out[pos++] = src[i + 1] ?? 0;
      i += 1;
      continue;
    }

    const count = (b & 7) + 1;
    const from = pos - 32 + (b >> 3);
    if (from < 0) {
      throw new FormatError(`Repeat backref before start of output: pos=${pos}, byte=0x${b.toString(16)}`);
    }
    for (let j = 0; j < count; j++) out[pos + j] = out[from + j] ?? 0;
    pos += count;
  }

  return out;
}

function ror8(x: number, shift: number): number {
  return ((x >> shift) | (x << (8 - shift))) & 0xff;
}

/** Each byte is rotated right; the shift starts at 1 and advances by 2 (mod 8). */
export function decodeRotate(src: Uint8Array): Buffer {
  const out = Buffer.alloc(src.length);
  let shift = 1;
  for (let i = 0; i < src.length; i++) {
    out[i] = ror8(src[i] ?? 0, shift);
    shift = (shift + 2) % 8;
  }
  return out;
}

export function decodeChunkPayload(encoding: number, payload: Uint8Array): Buffer {
  switch (encoding) {
    case CHUNK_ENCODING_NONE:
      return Buffer.from(payload);
    case CHUNK_ENCODING_RLE:
      return decodeRle(payload);
    case CHUNK_ENCODING_RLE_COMPRESSED:
      return decodeRepeat(decodeRle(payload));
    case CHUNK_ENCODING_ROTATE:
      return decodeRotate(payload);
    default:
      throw new FormatError(`Invalid chunk encoding: ${encoding}`);
  }
}

/** Unsigned 32-bit sum of every byte before the 4-byte trailer. */
export function computeChecksum(bytes: Uint8Array): number {
  let sum = 0;
  const end = bytes.length - CHECKSUM_TRAILER_SIZE;
  for (let i = 0; i < end; i++) sum = (sum + (bytes[i] ?? 0)) >>> 0;
  return sum;
}

export function validateChecksum(bytes: Uint8Array): void {
  if (bytes.length < 8) throw new TruncatedDataError(8, bytes.length);

  const view = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const expected = view.readUInt32LE(bytes.length - CHECKSUM_TRAILER_SIZE);
  const actual = computeChecksum(bytes);
  if (expected !== actual) throw new ChecksumError(expected, actual);
}

/**
 * Reads length-prefixed chunks (encoding u8, length u32) from a byte stream.
 * Only the stream cursor moves; callers own the destination buffers.
 */
export class SawyerChunkReader {
  public constructor(private readonly r: BinaryReader) {}

  public get position(): number {
    return this.r.position;
  }

  /** Reads and decodes the next chunk without a size expectation. */
  public readChunkBytes(): Buffer {
    const encoding = this.r.readU8();
    const length = this.r.readU32LE();
    const payload = this.r.readBytes(length);
    return decodeChunkPayload(encoding, payload);
  }

  /** Reads the next chunk into `into`; the decoded size must equal `expectedSize`. */
  public readChunk(into: Uint8Array, expectedSize: number): void {
    if (into.length < expectedSize) {
      throw new RangeError(`Destination holds ${into.length} bytes, chunk needs ${expectedSize}`);
    }

    const start = this.r.position;
    const data = this.readChunkBytes();
    if (data.length !== expectedSize) {
      throw new FormatError(
        `Chunk at offset ${start} decodes to ${data.length} bytes, expected ${expectedSize}`,
      );
    }
    into.set(data, 0);
  }
}
