import { describe, expect, it } from "vitest";
import { PdfArray } from "./pdf-array";
import { PdfName } from "./pdf-name";
import { PdfNumber } from "./pdf-number";
import type { PdfObject } from "./pdf-object";
import { PdfRef } from "./pdf-ref";

describe("PdfArray", () => {
  it("has type 'array'", () => {
    expect(new PdfArray().type).toBe("array");
  });

  it("copies its input", () => {
    const items: PdfObject[] = [PdfNumber.of(1)];
    const arr = new PdfArray(items);

    items.push(PdfNumber.of(2));

    expect(arr.length).toBe(1);
  });

  describe("at()", () => {
    it("returns undefined for out of bounds", () => {
      const arr = PdfArray.of(PdfNumber.of(1));

      expect(arr.at(5)).toBeUndefined();
    });

    it("supports negative indices", () => {
      const arr = PdfArray.of(PdfNumber.of(1), PdfNumber.of(2), PdfNumber.of(3));

      expect(arr.at(-1)).toEqual(PdfNumber.of(3));
    });

    it("follows references through a resolver", () => {
      const target = PdfNumber.of(99);
      const arr = PdfArray.of(PdfRef.of(4, 0));

      expect(arr.at(0, () => target)).toBe(target);
    });

    it("returns the reference itself without a resolver", () => {
      const arr = PdfArray.of(PdfRef.of(4, 0));

      expect(arr.at(0)).toBe(PdfRef.of(4, 0));
    });
  });

  describe("toNumbers()", () => {
    it("reads numeric arrays", () => {
      const arr = PdfArray.of(PdfNumber.of(0), PdfNumber.of(0), PdfNumber.of(612), PdfNumber.of(792));

      expect(arr.toNumbers()).toEqual([0, 0, 612, 792]);
    });

    it("marks non-numbers as NaN", () => {
      const arr = PdfArray.of(PdfNumber.of(1), PdfName.of("X"));

      expect(arr.toNumbers()).toEqual([1, Number.NaN]);
    });
  });

  it("is iterable", () => {
    const arr = PdfArray.of(PdfNumber.of(1), PdfNumber.of(2));

    expect([...arr].map(item => (item.type === "number" ? item.value : -1))).toEqual([1, 2]);
  });
});
