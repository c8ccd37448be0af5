import { normalizeRect, type Rect } from "#src/helpers/matrix";

import type { PdfArray } from "./pdf-array";
import type { PdfBool } from "./pdf-bool";
import { PdfName } from "./pdf-name";
import type { PdfNumber } from "./pdf-number";
import { isDictLike, isPdfStream, type PdfObject } from "./pdf-object";
import type { PdfRef, RefResolver } from "./pdf-ref";
import type { PdfStream } from "./pdf-stream";
import type { PdfString } from "./pdf-string";

type Key = PdfName | string;

type ScalarType = "name" | "number" | "string" | "array" | "bool" | "ref";

type ObjectOfType<T extends ScalarType> = Extract<PdfObject, { type: T }>;

function hasType<T extends ScalarType>(
  value: PdfObject | undefined,
  type: T,
): value is ObjectOfType<T> {
  return value?.type === type;
}

function toName(key: Key): PdfName {
  return typeof key === "string" ? PdfName.of(key) : key;
}

/**
 * Dictionary such as `<< /Type /Page /MediaBox [0 0 612 792] >>`.
 *
 * The parser fills dictionaries through `set`; the document model and
 * interpreter only read them. Every getter takes an optional resolver and,
 * when given one, follows an indirect reference before checking the type.
 * A getter returns undefined for a missing entry and for one of the
 * wrong type alike.
 */
export class PdfDict {
  static of(entries: Record<string, PdfObject>): PdfDict {
    return new PdfDict(Object.entries(entries));
  }

  private readonly entries = new Map<PdfName, PdfObject>();

  constructor(entries?: Iterable<[Key, PdfObject]>) {
    for (const [key, value] of entries ?? []) {
      this.entries.set(toName(key), value);
    }
  }

  get type(): "dict" | "stream" {
    return "dict";
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: Key, resolver?: RefResolver): PdfObject | undefined {
    const value = this.entries.get(toName(key));

    if (resolver && value?.type === "ref") {
      return resolver(value) ?? undefined;
    }

    return value;
  }

  set(key: Key, value: PdfObject): void {
    this.entries.set(toName(key), value);
  }

  has(key: Key): boolean {
    return this.entries.has(toName(key));
  }

  keys(): Iterable<PdfName> {
    return this.entries.keys();
  }

  [Symbol.iterator](): Iterator<[PdfName, PdfObject]> {
    return this.entries[Symbol.iterator]();
  }

  getName(key: string, resolver?: RefResolver): PdfName | undefined {
    const value = this.get(key, resolver);

    return hasType(value, "name") ? value : undefined;
  }

  getNumber(key: string, resolver?: RefResolver): PdfNumber | undefined {
    const value = this.get(key, resolver);

    return hasType(value, "number") ? value : undefined;
  }

  getString(key: string, resolver?: RefResolver): PdfString | undefined {
    const value = this.get(key, resolver);

    return hasType(value, "string") ? value : undefined;
  }

  getArray(key: string, resolver?: RefResolver): PdfArray | undefined {
    const value = this.get(key, resolver);

    return hasType(value, "array") ? value : undefined;
  }

  getBool(key: string, resolver?: RefResolver): PdfBool | undefined {
    const value = this.get(key, resolver);

    return hasType(value, "bool") ? value : undefined;
  }

  /**
   * The reference itself, never what it points at.
   */
  getRef(key: string): PdfRef | undefined {
    const value = this.get(key);

    return hasType(value, "ref") ? value : undefined;
  }

  /**
   * Streams count: a font descriptor or form is usually wanted for its
   * dictionary.
   */
  getDict(key: string, resolver?: RefResolver): PdfDict | undefined {
    const value = this.get(key, resolver);

    return isDictLike(value) ? value : undefined;
  }

  getStream(key: string, resolver?: RefResolver): PdfStream | undefined {
    const value = this.get(key, resolver);

    return isPdfStream(value) ? value : undefined;
  }

  numberOr(key: string, fallback: number, resolver?: RefResolver): number {
    return this.getNumber(key, resolver)?.value ?? fallback;
  }

  /**
   * Four-number rectangle with its corners ordered, or undefined unless
   * all four are finite numbers.
   */
  getRect(key: string, resolver?: RefResolver): Rect | undefined {
    const array = this.getArray(key, resolver);

    if (array?.length !== 4) {
      return undefined;
    }

    const finite = array.toNumbers(resolver).filter(n => Number.isFinite(n));

    if (finite.length !== 4) {
      return undefined;
    }

    const [x0 = 0, y0 = 0, x1 = 0, y1 = 0] = finite;

    return normalizeRect(x0, y0, x1, y1);
  }

  /**
   * A name, or the first element of an array of names, as /Filter and
   * /ColorSpace allow either.
   */
  getNameOrFirst(key: string, resolver?: RefResolver): PdfName | undefined {
    const value = this.get(key, resolver);

    if (hasType(value, "array")) {
      const first = value.at(0, resolver);

      return hasType(first, "name") ? first : undefined;
    }

    return hasType(value, "name") ? value : undefined;
  }
}
