import { deflate } from "pako";
import { describe, expect, it } from "vitest";
import { PdfArray } from "./pdf-array";
import { PdfDict } from "./pdf-dict";
import { PdfName } from "./pdf-name";
import { PdfNull } from "./pdf-null";
import { PdfNumber } from "./pdf-number";
import { PdfStream } from "./pdf-stream";

const encoder = new TextEncoder();

describe("PdfStream", () => {
  it("has type 'stream'", () => {
    expect(new PdfStream().type).toBe("stream");
  });

  it("copies the entries of a dictionary", () => {
    const dict = PdfDict.of({ Length: PdfNumber.of(100) });
    const stream = new PdfStream(dict, new Uint8Array(100));

    expect(stream.getNumber("Length")?.value).toBe(100);
    expect(stream.data.length).toBe(100);
  });

  describe("getDecodedData()", () => {
    it("returns the stored bytes when there is no filter", async () => {
      const data = new Uint8Array([1, 2, 3]);
      const stream = new PdfStream(undefined, data);

      expect(await stream.getDecodedData()).toBe(data);
    });

    it("applies a chain of filters in order", async () => {
      // hex encoding of "4869>", which is itself hex for "Hi"
      const hexOfHex = encoder.encode("343836393E>");
      const stream = PdfStream.fromDict(
        { Filter: PdfArray.of(PdfName.of("ASCIIHexDecode"), PdfName.of("ASCIIHexDecode")) },
        hexOfHex,
      );

      expect(new TextDecoder().decode(await stream.getDecodedData())).toBe("Hi");
    });

    it("decodes once", async () => {
      const stream = PdfStream.fromDict({ Filter: PdfName.of("ASCIIHexDecode") }, encoder.encode("4869>"));

      const first = await stream.getDecodedData();
      const second = await stream.getDecodedData();

      expect(second).toBe(first);
    });

    it("pairs filters with their parameters by position", async () => {
      // Two PNG "Up" rows: [1 2] and [1+3 2+4]
      const compressed = deflate(new Uint8Array([2, 1, 2, 2, 3, 4]));
      const hex = Array.from(compressed, byte => byte.toString(16).padStart(2, "0")).join("");
      const stream = PdfStream.fromDict(
        {
          Filter: PdfArray.of(PdfName.of("AHx"), PdfName.of("Fl")),
          DecodeParms: PdfArray.of(
            PdfNull.instance,
            PdfDict.of({ Predictor: PdfNumber.of(12), Columns: PdfNumber.of(2) }),
          ),
        },
        encoder.encode(`${hex}>`),
      );

      expect([...(await stream.getDecodedData())]).toEqual([1, 2, 4, 6]);
    });

    it("rejects unsupported filters", async () => {
      const stream = PdfStream.fromDict({ Filter: PdfName.of("JBIG2Decode") }, new Uint8Array(4));

      await expect(stream.getDecodedData()).rejects.toThrow("Unsupported filter: JBIG2Decode");
    });
  });
});
