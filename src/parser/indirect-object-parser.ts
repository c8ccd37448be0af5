import { CR, isWhitespace, LF } from "#src/helpers/chars";
import type { Scanner } from "#src/io/scanner";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { ObjectParseError, type WarningCallback } from "./errors";
import { ObjectParser } from "./object-parser";
import { TokenReader } from "./token-reader";

/**
 * Parsed indirect object.
 */
export interface IndirectObject {
  objNum: number;
  genNum: number;
  value: PdfObject;
}

/**
 * Callback to resolve indirect /Length references.
 * Returns the length value, or null if not resolvable.
 */
export type LengthResolver = (ref: PdfRef) => number | null;

const STREAM = "stream";
const ENDSTREAM = "endstream";

/**
 * Parser for indirect object definitions.
 *
 * Handles the `N M obj ... endobj` syntax and stream binary data.
 * Uses ObjectParser for the actual object content.
 */
export class IndirectObjectParser {
  /** Collects recoverable problems (e.g. a wrong /Length) */
  onWarning: WarningCallback | null = null;

  /** Recovery mode for the nested ObjectParser */
  recoveryMode = false;

  constructor(
    private scanner: Scanner,
    private lengthResolver?: LengthResolver,
  ) {}

  /**
   * Parse indirect object at current scanner position.
   */
  parseObject(): IndirectObject {
    const reader = new TokenReader(this.scanner);

    const objNumToken = reader.nextToken();

    if (objNumToken.type !== "number" || !objNumToken.isInteger) {
      throw new ObjectParseError("Expected integer object number");
    }

    const genNumToken = reader.nextToken();

    if (genNumToken.type !== "number" || !genNumToken.isInteger) {
      throw new ObjectParseError("Expected integer generation number");
    }

    const objKeyword = reader.nextToken();

    if (objKeyword.type !== "keyword" || objKeyword.value !== "obj") {
      throw new ObjectParseError(`Expected 'obj' keyword, got ${objKeyword.type}`);
    }

    const objectParser = new ObjectParser(reader);

    objectParser.recoveryMode = this.recoveryMode;
    objectParser.onWarning = this.onWarning;

    const result = objectParser.parseObject();

    if (result === null) {
      throw new ObjectParseError("Expected object value");
    }

    // endobj is not checked: many files omit it or get it wrong
    const value = result.hasStream
      ? this.readStream(result.object, result.streamKeywordPosition + STREAM.length)
      : result.object;

    return { objNum: objNumToken.value, genNum: genNumToken.value, value };
  }

  parseObjectAt(offset: number): IndirectObject {
    this.scanner.moveTo(offset);

    return this.parseObject();
  }

  /**
   * Read stream data that starts after the "stream" keyword.
   *
   * Trusts /Length when "endstream" follows the data it describes;
   * otherwise scans forward for "endstream".
   */
  private readStream(dict: PdfDict, afterKeyword: number): PdfStream {
    const bytes = this.scanner.bytes;
    let start = afterKeyword;

    // Single EOL after "stream" (CRLF or LF; a lone CR is tolerated)
    if (bytes[start] === CR) {
      start++;
    }

    if (bytes[start] === LF) {
      start++;
    }

    const length = this.resolveLength(dict);

    if (length !== null && start + length <= bytes.length && this.endstreamFollows(start + length)) {
      this.scanner.moveTo(start + length);

      return new PdfStream(dict, bytes.slice(start, start + length));
    }

    const end = this.scanner.indexOf(ENDSTREAM, start);

    if (end === -1) {
      throw new ObjectParseError("Stream is missing endstream");
    }

    this.onWarning?.(
      length === null
        ? "Stream /Length unresolved, scanned for endstream"
        : "Stream /Length is wrong, scanned for endstream",
      start,
    );

    // Drop the EOL that precedes endstream
    let dataEnd = end;

    if (dataEnd > start && bytes[dataEnd - 1] === LF) {
      dataEnd--;
    }

    if (dataEnd > start && bytes[dataEnd - 1] === CR) {
      dataEnd--;
    }

    this.scanner.moveTo(end + ENDSTREAM.length);

    return new PdfStream(dict, bytes.slice(start, dataEnd));
  }

  private endstreamFollows(position: number): boolean {
    let pos = position;

    while (pos < this.scanner.length && isWhitespace(this.scanner.peekAt(pos))) {
      pos++;
    }

    for (let i = 0; i < ENDSTREAM.length; i++) {
      if (this.scanner.peekAt(pos + i) !== ENDSTREAM.charCodeAt(i)) {
        return false;
      }
    }

    return true;
  }

  /**
   * Resolve /Length, direct or indirect. Null when absent or unusable.
   */
  private resolveLength(dict: PdfDict): number | null {
    const lengthObj = dict.get("Length");

    if (lengthObj?.type === "number") {
      return lengthObj.value >= 0 ? Math.floor(lengthObj.value) : null;
    }

    if (lengthObj?.type === "ref" && this.lengthResolver) {
      // The resolver may move the scanner
      const saved = this.scanner.position;
      const length = this.lengthResolver(lengthObj);

      this.scanner.moveTo(saved);

      return length;
    }

    return null;
  }
}
