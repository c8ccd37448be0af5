import { sha256 } from "@noble/hashes/sha2.js";
import { bytesToHex } from "@noble/hashes/utils.js";
import { Scanner } from "#src/io/scanner";
import { PdfDict } from "#src/objects/pdf-dict";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef, type RefResolver } from "#src/objects/pdf-ref";
import type { PdfStream } from "#src/objects/pdf-stream";
import { DocumentParser, type ParseOptions } from "#src/parser/document-parser";
import { CyclicPageTreeError, DanglingReferenceError, PageIndexOutOfRangeError } from "./errors";
import { PdfPage } from "./pdf-page";

/**
 * Document information from the trailer's /Info dictionary.
 */
export interface DocumentInfo {
  title?: string;
  author?: string;
  subject?: string;
}

// Longest chain of references followed by deref()
const MAX_DEREF_DEPTH = 32;

/**
 * Location of one leaf in the page tree.
 */
interface PageEntry {
  dict: PdfDict;
  /** Intermediate nodes from the leaf's parent up to the root */
  ancestors: PdfDict[];
}

/**
 * A parsed PDF document.
 *
 * The object table is complete and immutable once constructed, so every
 * lookup is synchronous and the instance may be shared by concurrent
 * renders.
 */
export class PdfDocument {
  readonly version: string;
  readonly trailer: PdfDict;
  readonly catalog: PdfDict;
  readonly warnings: readonly string[];
  readonly recoveredViaBruteForce: boolean;

  /** SHA-256 of the file bytes, hex encoded */
  readonly fingerprint: string;

  private readonly objects: ReadonlyMap<number, PdfObject>;
  private readonly entries: PageEntry[];
  private readonly pages = new Map<number, PdfPage>();

  /**
   * Resolver for the typed dictionary getters; dangling references resolve
   * to null.
   */
  readonly resolver: RefResolver = ref => this.objects.get(ref.objectNumber) ?? null;

  private constructor(
    parsed: {
      version: string;
      trailer: PdfDict;
      objects: Map<number, PdfObject>;
      warnings: string[];
      recoveredViaBruteForce: boolean;
    },
    fingerprint: string,
  ) {
    this.version = parsed.version;
    this.trailer = parsed.trailer;
    this.objects = parsed.objects;
    this.warnings = parsed.warnings;
    this.recoveredViaBruteForce = parsed.recoveredViaBruteForce;
    this.fingerprint = fingerprint;

    const catalog = this.trailer.getDict("Root", this.resolver);

    this.catalog = catalog ?? new PdfDict();
    this.entries = this.collectPages(parsed.warnings);
  }

  /**
   * Parse a document from its bytes.
   *
   * @throws {MalformedDocumentError} when the structure cannot be recovered
   * @throws {UnsupportedEncryptionError} for encrypted files
   * @throws {CyclicPageTreeError} when the page tree loops
   */
  static async load(bytes: Uint8Array, options: ParseOptions = {}): Promise<PdfDocument> {
    const parsed = await new DocumentParser(new Scanner(bytes), options).parse();

    return new PdfDocument(parsed, bytesToHex(sha256(bytes)));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Object access
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Follow one indirection.
   *
   * @throws {DanglingReferenceError} when the target is absent
   */
  resolve(ref: PdfRef): PdfObject {
    const value = this.objects.get(ref.objectNumber);

    if (value === undefined) {
      throw new DanglingReferenceError(ref.objectNumber, ref.generation);
    }

    return value;
  }

  /**
   * Follow references until a direct object. Null for a dangling or
   * circular chain.
   */
  deref(obj: PdfObject | undefined): PdfObject | null {
    let current: PdfObject | undefined = obj;

    for (let depth = 0; depth < MAX_DEREF_DEPTH; depth++) {
      if (current === undefined) {
        return null;
      }

      if (!(current instanceof PdfRef)) {
        return current;
      }

      current = this.objects.get(current.objectNumber);
    }

    return null;
  }

  /**
   * Decoded data of a stream from this document.
   */
  decodeStream(stream: PdfStream): Promise<Uint8Array> {
    return stream.getDecodedData(this.resolver);
  }

  get objectCount(): number {
    return this.objects.size;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Pages
  // ─────────────────────────────────────────────────────────────────────────────

  get pageCount(): number {
    return this.entries.length;
  }

  /**
   * @throws {PageIndexOutOfRangeError} when `index` is outside `[0, pageCount)`
   */
  page(index: number): PdfPage {
    const entry = Number.isInteger(index) ? this.entries[index] : undefined;

    if (entry === undefined) {
      throw new PageIndexOutOfRangeError(index, this.entries.length);
    }

    let page = this.pages.get(index);

    if (!page) {
      page = new PdfPage(index, entry.dict, entry.ancestors, this);
      this.pages.set(index, page);
    }

    return page;
  }

  get info(): DocumentInfo {
    const dict = this.trailer.getDict("Info", this.resolver);
    const result: DocumentInfo = {};

    if (!dict) {
      return result;
    }

    const title = dict.getString("Title", this.resolver)?.asText();
    const author = dict.getString("Author", this.resolver)?.asText();
    const subject = dict.getString("Subject", this.resolver)?.asText();

    if (title !== undefined) {
      result.title = title;
    }

    if (author !== undefined) {
      result.author = author;
    }

    if (subject !== undefined) {
      result.subject = subject;
    }

    return result;
  }

  /**
   * Walk /Pages depth-first. Kids may be references or direct
   * dictionaries; a node without /Type is an intermediate node when it
   * has /Kids.
   */
  private collectPages(warnings: string[]): PageEntry[] {
    const result: PageEntry[] = [];
    const root = this.catalog.get("Pages");

    if (root === undefined) {
      warnings.push("Catalog has no /Pages");

      return result;
    }

    // Object numbers on the current path from the root
    const path = new Set<number>();

    const walk = (node: PdfObject, ancestors: PdfDict[]): void => {
      let objectNumber: number | null = null;
      let value: PdfObject | null = node;

      if (node instanceof PdfRef) {
        objectNumber = node.objectNumber;

        if (path.has(objectNumber)) {
          throw new CyclicPageTreeError(objectNumber);
        }

        value = this.objects.get(objectNumber) ?? null;
      }

      if (!(value instanceof PdfDict)) {
        warnings.push(`Skipping page tree node of type ${value?.type ?? "missing"}`);

        return;
      }

      const type = value.getName("Type", this.resolver)?.value;
      const kids = value.getArray("Kids", this.resolver);
      const isNode = type === "Pages" || (type !== "Page" && kids !== undefined);

      if (!isNode) {
        result.push({ dict: value, ancestors });

        return;
      }

      if (objectNumber !== null) {
        path.add(objectNumber);
      }

      const childAncestors = [value, ...ancestors];

      for (const kid of kids ?? []) {
        walk(kid, childAncestors);
      }

      if (objectNumber !== null) {
        path.delete(objectNumber);
      }
    };

    walk(root, []);

    return result;
  }
}

/**
 * Parse a PDF file.
 */
export function parsePdf(bytes: Uint8Array, options?: ParseOptions): Promise<PdfDocument> {
  return PdfDocument.load(bytes, options);
}
