import { Scanner } from "#src/io/scanner";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfStream } from "#src/objects/pdf-stream";
import { ObjectParseError, type WarningCallback } from "./errors";
import { ObjectParser } from "./object-parser";
import { TokenReader } from "./token-reader";

/**
 * Index entry for an object within an object stream.
 */
interface ObjectStreamEntry {
  objNum: number;
  /** Byte offset relative to /First */
  offset: number;
}

/**
 * Parser for PDF object streams (/Type /ObjStm).
 *
 * The decoded stream holds N pairs of integers (objNum offset) followed,
 * from byte /First, by the objects themselves without obj/endobj wrappers.
 */
export class ObjectStreamParser {
  private readonly first: number;
  private readonly n: number;

  onWarning: WarningCallback | null = null;

  constructor(private stream: PdfStream) {
    const type = stream.getName("Type");

    if (type?.value !== "ObjStm") {
      throw new ObjectParseError(`Expected /Type /ObjStm, got ${type?.value ?? "none"}`);
    }

    const n = stream.getNumber("N");
    const first = stream.getNumber("First");

    if (n === undefined || first === undefined) {
      throw new ObjectParseError("Object stream missing /N or /First");
    }

    this.n = n.value;
    this.first = first.value;
  }

  /**
   * Decode the stream and parse every object in it.
   *
   * @returns Map of object number to object, first occurrence winning
   */
  async getAllObjects(): Promise<Map<number, PdfObject>> {
    const result = new Map<number, PdfObject>();

    for (const { objNum, value } of await this.parseEntries()) {
      if (value !== null && !result.has(objNum)) {
        result.set(objNum, value);
      }
    }

    return result;
  }

  /**
   * Objects at the given positions in the stream index (as referenced by
   * xref entries), keyed by object number.
   */
  async getObjectsAt(indices: Iterable<number>): Promise<Map<number, PdfObject>> {
    const entries = await this.parseEntries();
    const result = new Map<number, PdfObject>();

    for (const index of indices) {
      const entry = entries[index];

      if (entry?.value) {
        result.set(entry.objNum, entry.value);
      }
    }

    return result;
  }

  private async parseEntries(): Promise<Array<{ objNum: number; value: PdfObject | null }>> {
    const data = await this.stream.getDecodedData();
    const section = data.subarray(this.first);

    return this.parseIndex(data).map(entry => {
      const scanner = new Scanner(section);

      scanner.moveTo(entry.offset);

      const parser = new ObjectParser(new TokenReader(scanner));

      parser.recoveryMode = true;
      parser.onWarning = this.onWarning;

      try {
        return { objNum: entry.objNum, value: parser.parseObject()?.object ?? null };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);

        this.onWarning?.(`Object ${entry.objNum} in object stream: ${message}`, entry.offset);

        return { objNum: entry.objNum, value: null };
      }
    });
  }

  private parseIndex(data: Uint8Array): ObjectStreamEntry[] {
    const reader = new TokenReader(new Scanner(data.subarray(0, this.first)));
    const result: ObjectStreamEntry[] = [];

    for (let i = 0; i < this.n; i++) {
      const objNum = reader.nextToken();
      const offset = reader.nextToken();

      if (objNum.type !== "number" || offset.type !== "number") {
        throw new ObjectParseError(`Invalid object stream index at entry ${i}`);
      }

      result.push({ objNum: objNum.value, offset: offset.value });
    }

    return result;
  }
}
