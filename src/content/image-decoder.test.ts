import { describe, expect, it } from "vitest";
import type { PdfObject } from "#src/objects/pdf-object";
import { makeStream, parseObject, testLoadContext } from "#src/test-utils";
import { loadColorSpace } from "./color-space";
import { ContentError, UnsupportedFeatureError } from "./errors";
import { decodeImage, type ImageDecodeContext } from "./image-decoder";

const BLACK = { red: 0, green: 0, blue: 0 };

function context(objects: Record<number, PdfObject> = {}): ImageDecodeContext {
  const base = testLoadContext(objects);

  return { ...base, loadColorSpace: obj => loadColorSpace(obj, base) };
}

async function decode(dict: string, bytes: number[], objects: Record<number, PdfObject> = {}) {
  const stream = makeStream(dict, new Uint8Array(bytes));

  return decodeImage(stream, context(objects), { fillColor: BLACK });
}

/** Image dictionary source */
function image(width: number, height: number, space: string, bits: number, extra = ""): string {
  const size = `/Width ${width} /Height ${height}`;

  return `<< ${size} /ColorSpace ${space} /BitsPerComponent ${bits} ${extra}>>`;
}

function alphas(data: Uint8ClampedArray): number[] {
  return [...data].filter((_, i) => i % 4 === 3);
}

describe("decodeImage", () => {
  it("decodes 8-bit RGB samples", async () => {
    const decoded = await decode(image(2, 1, "/DeviceRGB", 8), [255, 0, 0, 0, 0, 255]);

    expect(decoded.width).toBe(2);
    expect(decoded.height).toBe(1);
    expect([...decoded.data]).toEqual([255, 0, 0, 255, 0, 0, 255, 255]);
  });

  it("starts each row of packed samples on a byte boundary", async () => {
    const decoded = await decode(image(3, 2, "/DeviceGray", 1), [0b10100000, 0b01000000]);
    const gray = [...decoded.data].filter((_, i) => i % 4 === 0);

    expect(gray).toEqual([255, 0, 255, 0, 255, 0]);
  });

  it("applies the decode array", async () => {
    const decoded = await decode(image(1, 1, "/DeviceGray", 8, "/Decode [1 0] "), [0]);

    expect([...decoded.data]).toEqual([255, 255, 255, 255]);
  });

  it("reads 16-bit samples", async () => {
    const decoded = await decode(image(1, 1, "/DeviceGray", 16), [0x80, 0x00]);

    expect([...decoded.data]).toEqual([128, 128, 128, 255]);
  });

  it("looks up indexed samples without scaling them", async () => {
    const space = "[/Indexed /DeviceRGB 1 <FF0000 0000FF>]";
    const decoded = await decode(image(2, 1, space, 1), [0b01000000]);

    expect([...decoded.data]).toEqual([255, 0, 0, 255, 0, 0, 255, 255]);
  });

  it("reads missing data as zero", async () => {
    const decoded = await decode("<< /Width 1 /Height 1 /ColorSpace /DeviceRGB >>", []);

    expect([...decoded.data]).toEqual([0, 0, 0, 255]);
  });

  it("takes inline image data from the caller", async () => {
    const dict = parseObject(image(1, 1, "/DeviceGray", 8));

    if (dict.type !== "dict") {
      throw new Error("expected a dictionary");
    }

    const data = new Uint8Array([51]);
    const decoded = await decodeImage(dict, context(), { fillColor: BLACK, data });

    expect([...decoded.data]).toEqual([51, 51, 51, 255]);
  });

  describe("stencil masks", () => {
    const fillColor = { red: 0, green: 0.5, blue: 1 };

    const stencil = (extra: string) =>
      makeStream(`<< /Width 2 /Height 1 /ImageMask true ${extra}>>`, new Uint8Array([0b01000000]));

    it("paints zero samples in the fill colour", async () => {
      const decoded = await decodeImage(stencil(""), context(), { fillColor });

      expect([...decoded.data]).toEqual([0, 128, 255, 255, 0, 128, 255, 0]);
    });

    it("paints one samples under an inverted decode", async () => {
      const decoded = await decodeImage(stencil("/Decode [1 0] "), context(), { fillColor });

      expect(alphas(decoded.data)).toEqual([0, 255]);
    });
  });

  describe("masking", () => {
    it("hides samples inside the colour key ranges", async () => {
      const decoded = await decode(image(2, 1, "/DeviceGray", 8, "/Mask [0 10] "), [5, 200]);

      expect(alphas(decoded.data)).toEqual([0, 255]);
    });

    it("takes alpha from a soft mask resampled to the image size", async () => {
      const smask = makeStream(image(1, 1, "/DeviceGray", 8), new Uint8Array([128]));
      const dict = image(2, 1, "/DeviceGray", 8, "/SMask 9 0 R ");
      const decoded = await decode(dict, [0, 0], { 9: smask });

      expect(alphas(decoded.data)).toEqual([128, 128]);
    });

    it("treats an explicit mask as a stencil", async () => {
      const mask = makeStream("<< /Width 2 /Height 1 /ImageMask true >>", new Uint8Array([0x40]));
      const dict = image(2, 1, "/DeviceGray", 8, "/Mask 9 0 R ");
      const decoded = await decode(dict, [0, 0], { 9: mask });

      expect(alphas(decoded.data)).toEqual([255, 0]);
    });
  });

  it("refuses images behind a codec filter", async () => {
    const jpeg = decode(image(1, 1, "/DeviceGray", 8, "/Filter /DCTDecode "), [0]);
    const chained = decode(image(1, 1, "/DeviceGray", 8, "/Filter [/AHx /CCF] "), [0]);

    await expect(jpeg).rejects.toThrow(UnsupportedFeatureError);
    await expect(chained).rejects.toThrow("Image codec /CCITTFaxDecode is not supported");
  });

  it("rejects malformed images", async () => {
    await expect(decode("<< /Width 1 /Height 1 >>", [0])).rejects.toThrow("no /ColorSpace");
    await expect(decode(image(0, 1, "/DeviceGray", 8), [0])).rejects.toThrow("invalid /Width");
    await expect(decode(image(1, 1, "/DeviceGray", 3), [0])).rejects.toThrow(ContentError);
    await expect(decode(image(1, 1, "/Pattern", 8), [0])).rejects.toThrow(
      "Images cannot use a /Pattern colour space",
    );
  });
});
