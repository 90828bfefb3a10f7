import { TruncatedDataError } from "./errors.js";

/** Little-endian cursor over a byte buffer. */
export class BinaryReader {
  private offset = 0;

  public constructor(private readonly buf: Buffer) {}

  public get position(): number {
    return this.offset;
  }

  public get length(): number {
    return this.buf.length;
  }

  public remaining(): number {
    return this.buf.length - this.offset;
  }

  public seek(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.buf.length) {
      throw new RangeError(`Seek out of range: ${offset} (length ${this.buf.length})`);
    }
    this.offset = offset;
  }

  public skip(n: number): void {
    this.ensure(n);
    this.offset += n;
  }

  public readU8(): number {
    this.ensure(1);
    const v = this.buf.readUInt8(this.offset);
    this.offset += 1;
    return v;
  }

  public readI8(): number {
    this.ensure(1);
    const v = this.buf.readInt8(this.offset);
    this.offset += 1;
    return v;
  }

  public readU16LE(): number {
    this.ensure(2);
    const v = this.buf.readUInt16LE(this.offset);
    this.offset += 2;
    return v;
  }

  public readI16LE(): number {
    this.ensure(2);
    const v = this.buf.readInt16LE(this.offset);
    this.offset += 2;
    return v;
  }

  public readU32LE(): number {
    this.ensure(4);
    const v = this.buf.readUInt32LE(this.offset);
    this.offset += 4;
    return v;
  }

  public readI32LE(): number {
    this.ensure(4);
    const v = this.buf.readInt32LE(this.offset);
    this.offset += 4;
    return v;
  }

  public readBytes(n: number): Buffer {
    if (!Number.isInteger(n) || n < 0) throw new RangeError(`Invalid read length: ${n}`);
    this.ensure(n);
    const out = this.buf.subarray(this.offset, this.offset + n);
    this.offset += n;
    return out;
  }

  /** Copies `n` bytes so the result outlives the source buffer. */
  public readCopy(n: number): Uint8Array {
    return Uint8Array.from(this.readBytes(n));
  }

  public readArray<T>(count: number, read: (r: BinaryReader) => T): T[] {
    const out: T[] = [];
    for (let i = 0; i < count; i++) out.push(read(this));
    return out;
  }

  private ensure(n: number): void {
    if (this.offset + n > this.buf.length) {
      throw new TruncatedDataError(n, this.remaining());
    }
  }
}

