import { describe, expect, it } from "vitest";
import { PdfArray } from "./pdf-array";
import { PdfDict } from "./pdf-dict";
import { PdfName } from "./pdf-name";
import { PdfNull } from "./pdf-null";
import { isDictLike, isPdfStream } from "./pdf-object";
import { PdfStream } from "./pdf-stream";

describe("isPdfStream", () => {
  it("accepts streams only", () => {
    expect(isPdfStream(new PdfStream())).toBe(true);
    expect(isPdfStream(new PdfDict())).toBe(false);
    expect(isPdfStream(undefined)).toBe(false);
  });
});

describe("isDictLike", () => {
  it("accepts dictionaries and streams", () => {
    expect(isDictLike(new PdfDict())).toBe(true);
    expect(isDictLike(new PdfStream())).toBe(true);
  });

  it("rejects everything else", () => {
    expect(isDictLike(PdfName.of("Type"))).toBe(false);
    expect(isDictLike(new PdfArray())).toBe(false);
    expect(isDictLike(PdfNull.instance)).toBe(false);
    expect(isDictLike(null)).toBe(false);
  });
});
