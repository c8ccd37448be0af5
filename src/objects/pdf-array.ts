import type { RefResolver } from "#src/objects/pdf-ref";
import type { PdfObject } from "./pdf-object";

/**
 * PDF array object.
 *
 * In PDF: `[1 2 3]`, `[/Name (string) 42]`
 *
 * Arrays are built once by the parser and then read-only.
 */
export class PdfArray {
  get type(): "array" {
    return "array";
  }

  private readonly items: PdfObject[];

  constructor(items?: PdfObject[]) {
    this.items = items ? [...items] : [];
  }

  get length(): number {
    return this.items.length;
  }

  /**
   * Get item at index. Returns undefined if out of bounds.
   * When a resolver is given, references are followed.
   */
  at(index: number, resolver?: RefResolver): PdfObject | undefined {
    const value = this.items.at(index);

    if (resolver && value?.type === "ref") {
      return resolver(value) ?? undefined;
    }

    return value;
  }

  /**
   * Numeric value at index, or undefined when the item is not a number.
   */
  numberAt(index: number, resolver?: RefResolver): number | undefined {
    const value = this.at(index, resolver);

    return value?.type === "number" ? value.value : undefined;
  }

  /**
   * All items as numbers. Non-numeric items are returned as NaN so
   * callers can reject the whole array.
   */
  toNumbers(resolver?: RefResolver): number[] {
    const numbers: number[] = [];

    for (let i = 0; i < this.items.length; i++) {
      numbers.push(this.numberAt(i, resolver) ?? Number.NaN);
    }

    return numbers;
  }

  *[Symbol.iterator](): Iterator<PdfObject> {
    yield* this.items;
  }

  toArray(): PdfObject[] {
    return [...this.items];
  }

  static of(...items: PdfObject[]): PdfArray {
    return new PdfArray(items);
  }
}
