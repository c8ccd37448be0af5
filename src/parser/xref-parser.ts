import { bytesToLatin1 } from "#src/helpers/buffer";
import { DIGIT_0, isDigit, isWhitespace } from "#src/helpers/chars";
import type { Scanner } from "#src/io/scanner";
import type { PdfDict } from "#src/objects/pdf-dict";
import { PdfStream } from "#src/objects/pdf-stream";
import { XRefParseError } from "./errors";
import { IndirectObjectParser } from "./indirect-object-parser";
import { ObjectParser } from "./object-parser";
import { TokenReader } from "./token-reader";

export type XRefEntry =
  | { type: "free"; nextFree: number; generation: number }
  | { type: "uncompressed"; offset: number; generation: number }
  | { type: "compressed"; streamObjNum: number; indexInStream: number };

/**
 * One cross-reference section and the trailer that closes it.
 */
export interface XRefData {
  entries: Map<number, XRefEntry>;
  trailer: PdfDict;
  /** Offset of the previous section */
  prev?: number;
  /** Offset of the companion xref stream in a hybrid-reference file */
  xrefStm?: number;
}

/** `startxref` must sit within this many bytes of the end */
const TAIL_SIZE = 1024;

const SPACE = 0x20;

/**
 * Reads cross-reference sections: classic `xref` tables and, from PDF
 * 1.5, compressed xref streams. Following the /Prev chain is left to the
 * caller.
 */
export class XRefParser {
  constructor(private readonly scanner: Scanner) {}

  /**
   * Offset named by the last `startxref` in the file.
   *
   * @throws {XRefParseError} when the marker is missing or points past the end
   */
  findStartXRef(): number {
    const bytes = this.scanner.bytes;
    const tailStart = Math.max(0, bytes.length - TAIL_SIZE);
    const tail = bytesToLatin1(bytes.subarray(tailStart));
    const marker = tail.lastIndexOf("startxref");

    if (marker === -1) {
      throw new XRefParseError("Could not find startxref marker");
    }

    const match = /^\s*(\d+)/.exec(tail.slice(marker + "startxref".length));
    const offset = match?.[1] === undefined ? Number.NaN : Number(match[1]);

    if (!(offset < bytes.length)) {
      throw new XRefParseError("Invalid startxref offset");
    }

    return offset;
  }

  /**
   * Parse the section at `offset`, a table when it starts with `xref` and
   * a stream object when it starts with a digit. Leading whitespace is
   * tolerated, as writers often get the offset slightly wrong.
   *
   * @throws {XRefParseError} when the section is malformed
   */
  async parseAt(offset: number): Promise<XRefData> {
    this.scanner.moveTo(offset);
    this.skip(isWhitespace);

    if (this.lookingAt("xref")) {
      return this.parseTable();
    }

    if (isDigit(this.scanner.peek())) {
      return this.parseStream();
    }

    throw new XRefParseError(`Unknown xref format at offset ${offset}`);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Tables
  // ───────────────────────────────────────────────────────────────────────────

  private parseTable(): XRefData {
    const entries = new Map<number, XRefEntry>();

    this.scanner.moveTo(this.scanner.position + "xref".length);
    this.skip(isWhitespace);

    while (!this.lookingAt("trailer")) {
      if (this.scanner.isAtEnd()) {
        throw new XRefParseError("Missing trailer after xref table");
      }

      const first = this.integer();

      this.skip(isWhitespace);

      const count = this.integer();

      if (first === null || count === null) {
        throw new XRefParseError("Expected xref subsection header");
      }

      this.skip(isWhitespace);

      for (let i = 0; i < count; i++) {
        entries.set(first + i, this.tableEntry());
      }
    }

    this.scanner.moveTo(this.scanner.position + "trailer".length);

    const result = new ObjectParser(new TokenReader(this.scanner)).parseObject();

    if (result === null || result.object.type !== "dict") {
      throw new XRefParseError("Invalid trailer dictionary");
    }

    const trailer = result.object;

    return {
      entries,
      trailer,
      prev: trailer.getNumber("Prev")?.value,
      xrefStm: trailer.getNumber("XRefStm")?.value,
    };
  }

  /**
   * `nnnnnnnnnn ggggg n` plus its line end. Field widths are not enforced,
   * and a one-byte line end is accepted.
   */
  private tableEntry(): XRefEntry {
    const offset = this.integer();

    this.skip(byte => byte === SPACE);

    const generation = this.integer();

    this.skip(byte => byte === SPACE);

    const kind = String.fromCharCode(this.scanner.advance());

    this.skip(isWhitespace);

    if (offset === null || generation === null) {
      throw new XRefParseError("Malformed xref entry");
    }

    switch (kind) {
      case "n":
        return { type: "uncompressed", offset, generation };
      case "f":
        return { type: "free", nextFree: offset, generation };
      default:
        throw new XRefParseError(`Invalid xref entry type: ${kind}`);
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Streams
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * The stream dictionary doubles as the trailer. /W gives the byte width
   * of the three fields of every row; /Index lists `first count` runs and
   * defaults to `[0 Size]`.
   */
  private async parseStream(): Promise<XRefData> {
    const stream = new IndirectObjectParser(this.scanner).parseObject().value;

    if (!(stream instanceof PdfStream)) {
      throw new XRefParseError("Expected XRef stream object");
    }

    const type = stream.getName("Type");

    if (type !== undefined && type.value !== "XRef") {
      throw new XRefParseError(`Expected /Type /XRef, got /Type /${type.value}`);
    }

    const widths = stream.getArray("W")?.toNumbers() ?? [];

    if (widths.length < 3 || widths.some(w => !Number.isInteger(w) || w < 0)) {
      throw new XRefParseError("XRef stream missing or invalid /W array");
    }

    const size = stream.getNumber("Size")?.value;

    if (size === undefined) {
      throw new XRefParseError("XRef stream missing /Size");
    }

    const index = stream.getArray("Index")?.toNumbers() ?? [0, size];

    if (index.length % 2 !== 0 || index.some(n => !Number.isInteger(n))) {
      throw new XRefParseError("Invalid /Index array in XRef stream");
    }

    const entries = decodeStreamRows(await stream.getDecodedData(), widths, index);

    return { entries, trailer: stream, prev: stream.getNumber("Prev")?.value };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Bytes
  // ───────────────────────────────────────────────────────────────────────────

  private skip(predicate: (byte: number) => boolean): void {
    while (!this.scanner.isAtEnd() && predicate(this.scanner.peek())) {
      this.scanner.advance();
    }
  }

  private lookingAt(keyword: string): boolean {
    const at = this.scanner.position;

    return [...keyword].every((char, i) => this.scanner.peekAt(at + i) === char.charCodeAt(0));
  }

  private integer(): number | null {
    const start = this.scanner.position;
    let value = 0;

    while (isDigit(this.scanner.peek())) {
      value = value * 10 + (this.scanner.advance() - DIGIT_0);
    }

    return this.scanner.position > start ? value : null;
  }
}

/**
 * Decode the fixed-width rows of an xref stream. The first entry wins
 * when a number appears twice; rows of an unknown type are skipped.
 */
function decodeStreamRows(data: Uint8Array, widths: number[], index: number[]): Map<number, XRefEntry> {
  const [typeWidth = 0, secondWidth = 0, thirdWidth = 0] = widths;
  const rowSize = typeWidth + secondWidth + thirdWidth;
  const entries = new Map<number, XRefEntry>();
  let pos = 0;

  const field = (width: number): number => {
    let value = 0;

    for (let i = 0; i < width; i++) {
      value = value * 256 + (data[pos++] ?? 0);
    }

    return value;
  };

  for (let run = 0; run < index.length; run += 2) {
    const first = index[run] ?? 0;
    const count = index[run + 1] ?? 0;

    for (let i = 0; i < count; i++) {
      if (pos + rowSize > data.length) {
        throw new XRefParseError("XRef stream data truncated");
      }

      // Type 1 when the type field is omitted
      const type = typeWidth === 0 ? 1 : field(typeWidth);
      const second = field(secondWidth);
      const third = field(thirdWidth);
      const objNum = first + i;

      if (entries.has(objNum)) {
        continue;
      }

      if (type === 0) {
        entries.set(objNum, { type: "free", nextFree: second, generation: third });
      } else if (type === 1) {
        entries.set(objNum, { type: "uncompressed", offset: second, generation: third });
      } else if (type === 2) {
        entries.set(objNum, { type: "compressed", streamObjNum: second, indexInStream: third });
      }
    }
  }

  return entries;
}
