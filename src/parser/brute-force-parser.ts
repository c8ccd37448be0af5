import { isDelimiter, isDigit, isWhitespace } from "#src/helpers/chars";
import type { Scanner } from "#src/io/scanner";
import type { PdfDict } from "#src/objects/pdf-dict";
import { ObjectParser } from "./object-parser";
import { TokenReader } from "./token-reader";

/**
 * Location of a discovered `N G obj` marker.
 */
export interface ObjectEntry {
  objNum: number;
  genNum: number;
  offset: number;
}

/**
 * Result of a linear scan over a damaged file.
 */
export interface RecoveredLayout {
  /** Last occurrence of each object number */
  objects: Map<number, ObjectEntry>;
  /** Every parseable `trailer` dictionary, in file order */
  trailers: PdfDict[];
  warnings: string[];
}

// Maximum reasonable object number
const MAX_OBJ_NUM = 10_000_000;

// Maximum generation number per PDF spec
const MAX_GEN_NUM = 65535;

/**
 * Recovery parser for corrupted PDFs.
 *
 * Scans the entire file for object markers (`N M obj`) and `trailer`
 * keywords, rebuilding what the xref table should have said. Later
 * definitions of an object number replace earlier ones, as an
 * incremental update would.
 */
export class BruteForceParser {
  private readonly data: Uint8Array;
  private pos = 0;
  private warnings: string[] = [];

  constructor(private scanner: Scanner) {
    this.data = scanner.bytes;
  }

  /**
   * Scan the file. Returns null if no objects were found.
   */
  recover(): RecoveredLayout | null {
    const objects = new Map<number, ObjectEntry>();
    const trailers: PdfDict[] = [];

    this.pos = 0;

    while (this.pos < this.data.length) {
      const entry = this.tryReadObjectMarker();

      if (entry !== null) {
        objects.set(entry.objNum, entry);
        continue;
      }

      if (this.atKeyword("trailer")) {
        const trailer = this.parseTrailerAt(this.pos + "trailer".length);

        if (trailer) {
          trailers.push(trailer);
        }
      }

      this.pos++;
    }

    if (objects.size === 0) {
      return null;
    }

    return { objects, trailers, warnings: this.warnings };
  }

  /**
   * Try to read an object marker at current position.
   */
  private tryReadObjectMarker(): ObjectEntry | null {
    const startPos = this.pos;

    // Must be at start of file or preceded by whitespace
    if (startPos > 0 && !isWhitespace(this.data[startPos - 1])) {
      return null;
    }

    const objNum = this.tryReadInteger();
    const afterObjNum = objNum !== null && this.skipWhitespace();
    const genNum = afterObjNum ? this.tryReadInteger() : null;
    const afterGenNum = genNum !== null && this.skipWhitespace();

    const valid =
      objNum !== null &&
      genNum !== null &&
      afterGenNum &&
      this.atKeyword("obj") &&
      objNum <= MAX_OBJ_NUM &&
      genNum <= MAX_GEN_NUM &&
      this.boundaryAt(this.pos + 3);

    if (!valid) {
      this.pos = startPos;

      return null;
    }

    this.pos += 3;

    return { objNum, genNum, offset: startPos };
  }

  private boundaryAt(position: number): boolean {
    if (position >= this.data.length) {
      return true;
    }

    const next = this.data[position];

    return isWhitespace(next) || isDelimiter(next);
  }

  private tryReadInteger(): number | null {
    const start = this.pos;
    let value = 0;

    while (this.pos < this.data.length && isDigit(this.data[this.pos])) {
      value = value * 10 + (this.data[this.pos] - 0x30);
      this.pos++;
    }

    return this.pos > start ? value : null;
  }

  private skipWhitespace(): boolean {
    const start = this.pos;

    while (this.pos < this.data.length && isWhitespace(this.data[this.pos])) {
      this.pos++;
    }

    return this.pos > start;
  }

  private atKeyword(keyword: string): boolean {
    for (let i = 0; i < keyword.length; i++) {
      if (this.data[this.pos + i] !== keyword.charCodeAt(i)) {
        return false;
      }
    }

    return true;
  }

  private parseTrailerAt(offset: number): PdfDict | null {
    this.scanner.moveTo(offset);

    const parser = new ObjectParser(new TokenReader(this.scanner));

    parser.recoveryMode = true;

    try {
      const result = parser.parseObject();

      return result?.object.type === "dict" ? result.object : null;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      this.warnings.push(`Unreadable trailer at ${offset}: ${message}`);

      return null;
    }
  }
}
