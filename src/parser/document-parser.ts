import { Scanner } from "#src/io/scanner";
import { UnsupportedEncryptionError } from "#src/document/errors";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { BruteForceParser } from "./brute-force-parser";
import {
  MalformedDocumentError,
  RecoverableParseError,
  StructureError,
  UnrecoverableParseError,
  type WarningCallback,
} from "./errors";
import { IndirectObjectParser, type LengthResolver } from "./indirect-object-parser";
import { ObjectStreamParser } from "./object-stream-parser";
import { type XRefEntry, XRefParser } from "./xref-parser";

/**
 * Options for document parsing.
 */
export interface ParseOptions {
  /** Enable lenient parsing for malformed PDFs (default: true) */
  lenient?: boolean;

  /** Observe warnings as they are recorded */
  onWarning?: WarningCallback;
}

/**
 * Parsed document result.
 *
 * Every reachable indirect object has already been parsed; object streams
 * are expanded into the table.
 */
export interface ParsedDocument {
  /** PDF version from header (e.g., "1.7", "2.0") */
  version: string;

  /** Most recent trailer dictionary */
  trailer: PdfDict;

  /** Object number to object */
  objects: Map<number, PdfObject>;

  /** Warnings encountered during parsing */
  warnings: string[];

  /** Whether document was recovered via brute-force parsing */
  recoveredViaBruteForce: boolean;
}

// PDF header signature: %PDF-
const PDF_HEADER = [0x25, 0x50, 0x44, 0x46, 0x2d];

// Version pattern: X.Y where X is 1-9 and Y is 0-9
const VERSION_PATTERN = /^[1-9]\.\d$/;

const DEFAULT_VERSION = "1.7";

// Maximum bytes to search for header
const HEADER_SEARCH_LIMIT = 1024;

function nextObjectNumber(objects: Map<number, PdfObject>): number {
  let max = 0;

  for (const objNum of objects.keys()) {
    max = Math.max(max, objNum);
  }

  return max + 1;
}

/**
 * Top-level PDF document parser.
 *
 * Orchestrates header parsing, xref loading and object materialisation.
 * Falls back to a linear scan of the file when the cross-reference data
 * cannot be used.
 *
 * @example
 * ```typescript
 * const parser = new DocumentParser(new Scanner(bytes));
 * const parsed = await parser.parse();
 *
 * const catalog = parsed.objects.get(parsed.trailer.getRef("Root")?.objectNumber ?? 0);
 * ```
 */
export class DocumentParser {
  private readonly lenient: boolean;
  private readonly onWarning: WarningCallback | undefined;
  private readonly warnings: string[] = [];

  constructor(
    private readonly scanner: Scanner,
    options: ParseOptions = {},
  ) {
    this.lenient = options.lenient ?? true;
    this.onWarning = options.onWarning;
  }

  /**
   * Parse the PDF document.
   *
   * @throws {UnsupportedEncryptionError} when the trailer carries /Encrypt
   * @throws {MalformedDocumentError} when the file cannot be read, even after recovery
   */
  async parse(): Promise<ParsedDocument> {
    try {
      return await this.parseNormal();
    } catch (error) {
      if (error instanceof UnsupportedEncryptionError || error instanceof MalformedDocumentError) {
        throw error;
      }

      if (this.lenient && error instanceof RecoverableParseError) {
        this.warn(`Normal parsing failed: ${error.message}`);

        return this.parseWithRecovery();
      }

      const message = error instanceof Error ? error.message : String(error);

      throw new MalformedDocumentError(message, { cause: error });
    }
  }

  private warn(message: string, position = -1): void {
    this.warnings.push(message);
    this.onWarning?.(message, position);
  }

  private readonly collect: WarningCallback = (message, position) => {
    this.warn(message, position);
  };

  // ─────────────────────────────────────────────────────────────────────────────
  // Normal path
  // ─────────────────────────────────────────────────────────────────────────────

  private async parseNormal(): Promise<ParsedDocument> {
    const version = this.parseHeader();
    const xrefParser = new XRefParser(this.scanner);
    const startXRef = xrefParser.findStartXRef();
    const { xref, trailer } = await this.parseXRefChain(xrefParser, startXRef);

    this.checkEncryption(trailer);

    const objects = new Map<number, PdfObject>();
    const failed = await this.materialise(xref, objects);

    if (failed.length > 0) {
      if (!this.lenient) {
        throw new MalformedDocumentError(`Could not read objects ${failed.join(", ")}`);
      }

      this.repairFromScan(failed, objects);
    }

    if (!this.isCatalog(trailer.get("Root"), objects)) {
      throw new StructureError("Trailer /Root does not point to a catalog");
    }

    return {
      version,
      trailer,
      objects,
      warnings: this.warnings,
      recoveredViaBruteForce: false,
    };
  }

  /**
   * Parse PDF header and extract version.
   *
   * Searches the first 1024 bytes for %PDF-, accepting garbage around it.
   */
  parseHeader(): string {
    const bytes = this.scanner.bytes;
    const searchLimit = Math.min(bytes.length, HEADER_SEARCH_LIMIT);

    let headerPos = -1;

    for (let i = 0; i <= searchLimit - PDF_HEADER.length; i++) {
      if (this.matchesAt(i, PDF_HEADER)) {
        headerPos = i;
        break;
      }
    }

    if (headerPos === -1) {
      if (this.lenient) {
        this.warn("PDF header not found, using default version");

        return DEFAULT_VERSION;
      }

      throw new StructureError("PDF header not found");
    }

    if (headerPos > 0) {
      this.warn(`PDF header found at offset ${headerPos} (expected 0)`, headerPos);
    }

    const versionStart = headerPos + PDF_HEADER.length;
    let version = "";

    for (let i = 0; i < 7 && versionStart + i < bytes.length; i++) {
      const byte = bytes[versionStart + i];

      if (byte <= 0x20) {
        break;
      }

      version += String.fromCharCode(byte);
    }

    if (VERSION_PATTERN.test(version)) {
      return version;
    }

    const match = version.match(/^(\d\.\d)/);

    if (match) {
      this.warn(`Version string has garbage after it: ${version}`, versionStart);

      return match[1];
    }

    if (this.lenient) {
      this.warn(`Invalid PDF version: ${version}, using default`, versionStart);

      return DEFAULT_VERSION;
    }

    throw new StructureError(`Invalid PDF version: ${version}`);
  }

  /**
   * Parse the XRef chain. Within one section a hybrid /XRefStm is read
   * before /Prev; the first definition of an object number wins.
   */
  private async parseXRefChain(
    xrefParser: XRefParser,
    startOffset: number,
  ): Promise<{ xref: Map<number, XRefEntry>; trailer: PdfDict }> {
    const combined = new Map<number, XRefEntry>();
    const visited = new Set<number>();
    const stack: number[] = [startOffset];
    let firstTrailer: PdfDict | null = null;

    while (stack.length > 0) {
      const offset = stack.pop();

      if (offset === undefined) {
        break;
      }

      if (visited.has(offset)) {
        this.warn(`Circular xref reference at offset ${offset}`, offset);
        continue;
      }

      visited.add(offset);

      try {
        const xrefData = await xrefParser.parseAt(offset);

        for (const [objNum, entry] of xrefData.entries) {
          if (!combined.has(objNum)) {
            combined.set(objNum, entry);
          }
        }

        firstTrailer ??= xrefData.trailer;

        // Popped in reverse: XRefStm before Prev
        if (xrefData.prev !== undefined) {
          stack.push(xrefData.prev);
        }

        if (xrefData.xrefStm !== undefined) {
          stack.push(xrefData.xrefStm);
        }
      } catch (error) {
        // The newest section must parse; older ones may be skipped
        if (firstTrailer === null || !this.lenient) {
          throw error;
        }

        const message = error instanceof Error ? error.message : String(error);

        this.warn(`Error parsing xref at ${offset}: ${message}`, offset);
      }
    }

    if (!firstTrailer) {
      throw new StructureError("No valid trailer found");
    }

    return { xref: combined, trailer: firstTrailer };
  }

  private checkEncryption(trailer: PdfDict): void {
    if (trailer.has("Encrypt")) {
      throw new UnsupportedEncryptionError();
    }
  }

  /**
   * Parse every in-use xref entry into `objects`.
   *
   * @returns object numbers that could not be read
   */
  private async materialise(
    xref: Map<number, XRefEntry>,
    objects: Map<number, PdfObject>,
  ): Promise<number[]> {
    const failed: number[] = [];
    const compressed = new Map<number, Map<number, number>>();
    const lengthResolver = this.createLengthResolver(objects, objNum => {
      const entry = xref.get(objNum);

      return entry?.type === "uncompressed" ? entry.offset : undefined;
    });

    for (const [objNum, entry] of xref) {
      if (entry.type === "free") {
        continue;
      }

      if (entry.type === "compressed") {
        let group = compressed.get(entry.streamObjNum);

        if (!group) {
          group = new Map();
          compressed.set(entry.streamObjNum, group);
        }

        group.set(entry.indexInStream, objNum);
        continue;
      }

      if (objects.has(objNum)) {
        continue;
      }

      const value = this.parseUncompressed(objNum, entry.offset, entry.generation, lengthResolver);

      if (value === null) {
        failed.push(objNum);
      } else {
        objects.set(objNum, value);
      }
    }

    for (const [streamObjNum, group] of compressed) {
      const found = await this.expandObjectStream(streamObjNum, objects, group.keys());

      for (const [index, objNum] of group) {
        const value = found.get(objNum);

        if (value === undefined) {
          this.warn(`Object ${objNum} missing at index ${index} of object stream ${streamObjNum}`);
          failed.push(objNum);
        } else if (!objects.has(objNum)) {
          objects.set(objNum, value);
        }
      }
    }

    return failed;
  }

  private parseUncompressed(
    objNum: number,
    offset: number,
    generation: number,
    lengthResolver?: LengthResolver,
  ): PdfObject | null {
    const parser = new IndirectObjectParser(this.scanner, lengthResolver);

    parser.onWarning = this.collect;
    parser.recoveryMode = this.lenient;

    try {
      const result = parser.parseObjectAt(offset);

      if (result.objNum !== objNum) {
        this.warn(`Xref entry for object ${objNum} points at object ${result.objNum}`, offset);

        return null;
      }

      if (result.genNum !== generation) {
        this.warn(
          `Generation mismatch for object ${objNum}: expected ${generation}, got ${result.genNum}`,
          offset,
        );
      }

      return result.value;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      this.warn(`Object ${objNum} at offset ${offset}: ${message}`, offset);

      return null;
    }
  }

  /**
   * Resolve an indirect /Length from the table, parsing its target on
   * demand with a scanner of its own.
   */
  private createLengthResolver(
    objects: Map<number, PdfObject>,
    offsetOf: (objNum: number) => number | undefined,
  ): LengthResolver {
    return (ref: PdfRef) => {
      const known = objects.get(ref.objectNumber);

      if (known?.type === "number") {
        return known.value;
      }

      const offset = offsetOf(ref.objectNumber);

      if (offset === undefined) {
        return null;
      }

      try {
        const result = new IndirectObjectParser(new Scanner(this.scanner.bytes)).parseObjectAt(offset);

        return result.value.type === "number" ? result.value.value : null;
      } catch {
        return null;
      }
    };
  }

  /**
   * Decode an object stream and return the objects found at `indices`
   * (every object when omitted).
   */
  private async expandObjectStream(
    streamObjNum: number,
    objects: Map<number, PdfObject>,
    indices?: Iterable<number>,
  ): Promise<Map<number, PdfObject>> {
    const stream = objects.get(streamObjNum);

    if (!(stream instanceof PdfStream)) {
      this.warn(`Object stream ${streamObjNum} not found or invalid`);

      return new Map();
    }

    try {
      const parser = new ObjectStreamParser(stream);

      parser.onWarning = this.collect;

      return indices === undefined ? await parser.getAllObjects() : await parser.getObjectsAt(indices);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      this.warn(`Object stream ${streamObjNum}: ${message}`);

      return new Map();
    }
  }

  /**
   * Fill in objects the xref could not deliver from a linear scan.
   */
  private repairFromScan(failed: number[], objects: Map<number, PdfObject>): void {
    const layout = new BruteForceParser(this.scanner).recover();

    if (layout === null) {
      return;
    }

    for (const objNum of failed) {
      const entry = layout.objects.get(objNum);

      if (entry === undefined) {
        continue;
      }

      const value = this.parseUncompressed(objNum, entry.offset, entry.genNum);

      if (value !== null) {
        this.warn(`Recovered object ${objNum} by scanning`, entry.offset);
        objects.set(objNum, value);
      }
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Recovery path
  // ─────────────────────────────────────────────────────────────────────────────

  private async parseWithRecovery(): Promise<ParsedDocument> {
    let version = DEFAULT_VERSION;

    try {
      version = this.parseHeader();
    } catch {
      this.warn("Could not parse header, using default version");
    }

    const layout = new BruteForceParser(this.scanner).recover();

    if (layout === null) {
      throw new UnrecoverableParseError("Could not recover PDF structure: no objects found");
    }

    for (const warning of layout.warnings) {
      this.warn(warning);
    }

    const objects = new Map<number, PdfObject>();
    const lengthResolver = this.createLengthResolver(
      objects,
      objNum => layout.objects.get(objNum)?.offset,
    );

    for (const entry of layout.objects.values()) {
      const value = this.parseUncompressed(entry.objNum, entry.offset, entry.genNum, lengthResolver);

      if (value !== null) {
        objects.set(entry.objNum, value);
      }
    }

    for (const [objNum, value] of [...objects]) {
      if (value instanceof PdfStream && value.getName("Type")?.value === "ObjStm") {
        for (const [inner, innerValue] of await this.expandObjectStream(objNum, objects)) {
          if (!objects.has(inner)) {
            objects.set(inner, innerValue);
          }
        }
      }
    }

    // The trailer written last describes the newest revision
    const foundTrailer = layout.trailers.at(-1);

    if (foundTrailer?.has("Encrypt")) {
      throw new UnsupportedEncryptionError();
    }

    const root = this.findRoot(foundTrailer, objects);
    const trailer = new PdfDict([
      ["Root", root],
      ["Size", PdfNumber.of(nextObjectNumber(objects))],
    ]);
    const info = foundTrailer?.get("Info");

    if (info !== undefined) {
      trailer.set("Info", info);
    }

    return {
      version,
      trailer,
      objects,
      warnings: this.warnings,
      recoveredViaBruteForce: true,
    };
  }

  /**
   * Pick the document root: the trailer's /Root when it names a catalog,
   * else any catalog, else a catalog synthesised around a /Pages node.
   */
  private findRoot(trailer: PdfDict | undefined, objects: Map<number, PdfObject>): PdfRef {
    const trailerRoot = trailer?.getRef("Root");

    if (trailerRoot && this.isCatalog(trailerRoot, objects)) {
      return trailerRoot;
    }

    for (const [objNum, value] of objects) {
      if (value instanceof PdfDict && value.getName("Type")?.value === "Catalog") {
        return PdfRef.of(objNum, 0);
      }
    }

    for (const [objNum, value] of objects) {
      if (
        value instanceof PdfDict &&
        value.getName("Type")?.value === "Pages" &&
        !value.has("Parent")
      ) {
        const catalogNum = nextObjectNumber(objects);

        objects.set(
          catalogNum,
          new PdfDict([
            ["Type", PdfName.Catalog],
            ["Pages", PdfRef.of(objNum, 0)],
          ]),
        );
        this.warn(`Synthesised catalog around page tree ${objNum}`);

        return PdfRef.of(catalogNum, 0);
      }
    }

    throw new UnrecoverableParseError("Could not recover PDF structure: no catalog or page tree");
  }

  private isCatalog(root: PdfObject | undefined, objects: Map<number, PdfObject>): boolean {
    const target = root instanceof PdfRef ? objects.get(root.objectNumber) : root;

    return target instanceof PdfDict && (target.getName("Type")?.value === "Catalog" || target.has("Pages"));
  }

  private matchesAt(pos: number, pattern: number[]): boolean {
    const bytes = this.scanner.bytes;

    for (let i = 0; i < pattern.length; i++) {
      if (pos + i >= bytes.length || bytes[pos + i] !== pattern[i]) {
        return false;
      }
    }

    return true;
  }
}
