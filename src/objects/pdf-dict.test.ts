import { describe, expect, it } from "vitest";
import { PdfArray } from "./pdf-array";
import { PdfDict } from "./pdf-dict";
import { PdfName } from "./pdf-name";
import { PdfNumber } from "./pdf-number";
import { PdfRef } from "./pdf-ref";
import { PdfStream } from "./pdf-stream";
import { PdfString } from "./pdf-string";

describe("PdfDict", () => {
  it("has type 'dict'", () => {
    expect(new PdfDict().type).toBe("dict");
  });

  it("can be constructed with entries", () => {
    const dict = new PdfDict([
      ["Type", PdfName.Page],
      [PdfName.of("Rotate"), PdfNumber.of(90)],
    ]);

    expect(dict.size).toBe(2);
  });

  it("treats string and PdfName keys as equivalent", () => {
    const dict = new PdfDict();

    dict.set("Type", PdfName.Page);

    expect(dict.get(PdfName.Type)).toBe(PdfName.Page);
  });

  describe("typed getters", () => {
    const dict = PdfDict.of({
      Name: PdfName.of("Foo"),
      Count: PdfNumber.of(3),
      Title: PdfString.fromString("Doc"),
      Kids: new PdfArray(),
    });

    it("return the value when the type matches", () => {
      expect(dict.getName("Name")?.value).toBe("Foo");
      expect(dict.getNumber("Count")?.value).toBe(3);
      expect(dict.getString("Title")?.asText()).toBe("Doc");
      expect(dict.getArray("Kids")?.length).toBe(0);
    });

    it("return undefined when the type does not match", () => {
      expect(dict.getNumber("Name")).toBeUndefined();
      expect(dict.getDict("Count")).toBeUndefined();
    });

    it("resolve references when given a resolver", () => {
      const target = PdfDict.of({ Type: PdfName.Pages });
      const withRef = PdfDict.of({ Parent: PdfRef.of(2, 0) });

      expect(withRef.getDict("Parent", () => target)).toBe(target);
      expect(withRef.getDict("Parent")).toBeUndefined();
    });

    it("getDict accepts streams", () => {
      const stream = new PdfStream();
      const holder = PdfDict.of({ FontFile2: stream });

      expect(holder.getDict("FontFile2")).toBe(stream);
      expect(holder.getStream("FontFile2")).toBe(stream);
    });
  });

  describe("numberOr()", () => {
    it("returns the fallback for missing entries", () => {
      expect(new PdfDict().numberOr("Rotate", 0)).toBe(0);
    });
  });

  describe("getRect()", () => {
    it("normalizes reversed corners", () => {
      const dict = PdfDict.of({
        MediaBox: PdfArray.of(PdfNumber.of(612), PdfNumber.of(792), PdfNumber.of(0), PdfNumber.of(0)),
      });

      expect(dict.getRect("MediaBox")).toEqual({ x0: 0, y0: 0, x1: 612, y1: 792 });
    });

    it("rejects arrays of the wrong length", () => {
      const dict = PdfDict.of({ MediaBox: PdfArray.of(PdfNumber.of(0), PdfNumber.of(0)) });

      expect(dict.getRect("MediaBox")).toBeUndefined();
    });

    it("rejects non-numeric members", () => {
      const dict = PdfDict.of({
        MediaBox: PdfArray.of(PdfNumber.of(0), PdfNumber.of(0), PdfName.of("A"), PdfNumber.of(1)),
      });

      expect(dict.getRect("MediaBox")).toBeUndefined();
    });
  });

  describe("getNameOrFirst()", () => {
    it("reads a bare name", () => {
      expect(PdfDict.of({ Filter: PdfName.of("FlateDecode") }).getNameOrFirst("Filter")?.value).toBe(
        "FlateDecode",
      );
    });

    it("reads the first element of an array", () => {
      const dict = PdfDict.of({ Filter: PdfArray.of(PdfName.of("ASCIIHexDecode"), PdfName.of("FlateDecode")) });

      expect(dict.getNameOrFirst("Filter")?.value).toBe("ASCIIHexDecode");
    });
  });
});
