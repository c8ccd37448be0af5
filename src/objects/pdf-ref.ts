import type { PdfObject } from "./pdf-object";

/**
 * Looks up the object an indirect reference points at, or null when the
 * cross-reference table has no entry for it.
 */
export type RefResolver = (ref: PdfRef) => PdfObject | null;

/**
 * Indirect reference such as `12 0 R`.
 *
 * Instances are interned per object and generation number, so two
 * references to the same object are `===`.
 */
export class PdfRef {
  private static readonly interned = new Map<string, PdfRef>();

  static of(objectNumber: number, generation = 0): PdfRef {
    const key = `${objectNumber}/${generation}`;
    const existing = PdfRef.interned.get(key);

    if (existing) {
      return existing;
    }

    const ref = new PdfRef(objectNumber, generation);

    PdfRef.interned.set(key, ref);

    return ref;
  }

  private constructor(
    readonly objectNumber: number,
    readonly generation: number,
  ) {}

  get type(): "ref" {
    return "ref";
  }

  toString(): string {
    return `${this.objectNumber} ${this.generation} R`;
  }
}
