/**
 * Big-endian reader for binary font tables (sfnt, CFF).
 *
 * Unlike Scanner, reads past the end throw: a truncated font table is
 * a malformed font program and the caller falls back to a substitute.
 */
export class BinaryScanner {
  private pos: number;

  constructor(
    readonly bytes: Uint8Array,
    offset = 0,
  ) {
    this.pos = offset;
  }

  get position(): number {
    return this.pos;
  }

  get length(): number {
    return this.bytes.length;
  }

  seek(offset: number): void {
    if (offset < 0 || offset > this.bytes.length) {
      throw new RangeError(`Seek to ${offset} outside of ${this.bytes.length} bytes`);
    }

    this.pos = offset;
  }

  skip(count: number): void {
    this.seek(this.pos + count);
  }

  private ensure(count: number): void {
    if (this.pos + count > this.bytes.length) {
      throw new RangeError(`Read of ${count} bytes at ${this.pos} past end of data`);
    }
  }

  readUint8(): number {
    this.ensure(1);

    return this.bytes[this.pos++];
  }

  readInt8(): number {
    const value = this.readUint8();

    return value > 0x7f ? value - 0x100 : value;
  }

  readUint16(): number {
    this.ensure(2);

    const value = (this.bytes[this.pos] << 8) | this.bytes[this.pos + 1];
    this.pos += 2;

    return value;
  }

  readInt16(): number {
    const value = this.readUint16();

    return value > 0x7fff ? value - 0x10000 : value;
  }

  readUint24(): number {
    this.ensure(3);

    const value =
      (this.bytes[this.pos] << 16) | (this.bytes[this.pos + 1] << 8) | this.bytes[this.pos + 2];
    this.pos += 3;

    return value;
  }

  readUint32(): number {
    this.ensure(4);

    const value =
      this.bytes[this.pos] * 0x1000000 +
      ((this.bytes[this.pos + 1] << 16) | (this.bytes[this.pos + 2] << 8) | this.bytes[this.pos + 3]);
    this.pos += 4;

    return value;
  }

  readInt32(): number {
    const value = this.readUint32();

    return value > 0x7fffffff ? value - 0x100000000 : value;
  }

  /** Read a variable-width unsigned offset (CFF OffSize 1-4). */
  readOffset(size: number): number {
    switch (size) {
      case 1:
        return this.readUint8();
      case 2:
        return this.readUint16();
      case 3:
        return this.readUint24();
      case 4:
        return this.readUint32();
      default:
        throw new RangeError(`Invalid offset size: ${size}`);
    }
  }

  /** 16.16 fixed-point number. */
  readFixed(): number {
    return this.readInt32() / 65536;
  }

  /** 2.14 fixed-point number (composite glyph scales). */
  readF2Dot14(): number {
    return this.readInt16() / 16384;
  }

  readTag(): string {
    this.ensure(4);

    const tag = String.fromCharCode(
      this.bytes[this.pos],
      this.bytes[this.pos + 1],
      this.bytes[this.pos + 2],
      this.bytes[this.pos + 3],
    );
    this.pos += 4;

    return tag;
  }

  readBytes(count: number): Uint8Array {
    this.ensure(count);

    const result = this.bytes.subarray(this.pos, this.pos + count);
    this.pos += count;

    return result;
  }
}
