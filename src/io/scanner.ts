/**
 * Forward byte cursor over an in-memory PDF buffer.
 *
 * All parsers share one Scanner per buffer and reposition it with `moveTo`.
 * Reads past the end return -1 instead of throwing.
 */
export class Scanner {
  private pos = 0;

  constructor(readonly bytes: Uint8Array) {}

  get position(): number {
    return this.pos;
  }

  get length(): number {
    return this.bytes.length;
  }

  isAtEnd(): boolean {
    return this.pos >= this.bytes.length;
  }

  /**
   * Current byte, or -1 at end of input.
   */
  peek(): number {
    return this.pos < this.bytes.length ? this.bytes[this.pos] : -1;
  }

  /**
   * Byte at an absolute offset, or -1 when out of range.
   */
  peekAt(offset: number): number {
    return offset >= 0 && offset < this.bytes.length ? this.bytes[offset] : -1;
  }

  /**
   * Consume and return the current byte (-1 at end of input).
   */
  advance(): number {
    if (this.pos >= this.bytes.length) {
      return -1;
    }

    return this.bytes[this.pos++];
  }

  moveTo(offset: number): void {
    this.pos = Math.max(0, Math.min(offset, this.bytes.length));
  }

  /**
   * Find the next occurrence of an ASCII marker at or after `from`.
   * Returns -1 when absent.
   */
  indexOf(marker: string, from = this.pos): number {
    const first = marker.charCodeAt(0);
    const last = this.bytes.length - marker.length;

    outer: for (let i = from; i <= last; i++) {
      if (this.bytes[i] !== first) {
        continue;
      }

      for (let j = 1; j < marker.length; j++) {
        if (this.bytes[i + j] !== marker.charCodeAt(j)) {
          continue outer;
        }
      }

      return i;
    }

    return -1;
  }
}
