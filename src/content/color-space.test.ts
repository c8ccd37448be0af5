import { describe, expect, it } from "vitest";
import { PdfRef } from "#src/objects/pdf-ref";
import { makeStream, parseObject, testLoadContext } from "#src/test-utils";
import {
  DEVICE_CMYK,
  DEVICE_GRAY,
  DEVICE_RGB,
  loadColorSpace,
  namedColorSpace,
} from "./color-space";
import { ContentError } from "./errors";

const ctx = testLoadContext();

/** Type 2 function from one tint to a CMYK colour */
function cmykTint(c1: string): string {
  return `<< /FunctionType 2 /Domain [0 1] /C0 [0 0 0 0] /C1 [${c1}] /N 1 >>`;
}

function load(source: string) {
  return loadColorSpace(parseObject(source), ctx);
}

describe("namedColorSpace", () => {
  it("maps device families and their abbreviations", () => {
    expect(namedColorSpace("DeviceRGB")).toBe(DEVICE_RGB);
    expect(namedColorSpace("G")).toBe(DEVICE_GRAY);
    expect(namedColorSpace("CMYK")).toBe(DEVICE_CMYK);
  });

  it("treats calibrated spaces as device spaces", () => {
    expect(namedColorSpace("CalGray")).toBe(DEVICE_GRAY);
    expect(namedColorSpace("CalRGB")).toBe(DEVICE_RGB);
  });

  it("does not know resource names", () => {
    expect(namedColorSpace("CS0")).toBeUndefined();
  });
});

describe("device spaces", () => {
  it("convert to RGB", () => {
    expect(DEVICE_GRAY.toRgb([0.5])).toEqual({ red: 0.5, green: 0.5, blue: 0.5 });
    expect(DEVICE_CMYK.toRgb([0, 1, 0, 0])).toEqual({ red: 1, green: 0, blue: 1 });
  });

  it("start black", () => {
    expect(DEVICE_RGB.initialColor()).toEqual([0, 0, 0]);
    expect(DEVICE_CMYK.initialColor()).toEqual([0, 0, 0, 1]);
  });
});

describe("loadColorSpace", () => {
  it("looks up indexed colours", async () => {
    const space = await load("[/Indexed /DeviceRGB 1 <FF000000FF00>]");

    expect(space.family).toBe("Indexed");
    expect(space.components).toBe(1);
    expect(space.toRgb([0])).toEqual({ red: 1, green: 0, blue: 0 });
    expect(space.toRgb([1])).toEqual({ red: 0, green: 1, blue: 0 });
    // Out-of-range indexes clamp to hival
    expect(space.toRgb([5])).toEqual({ red: 0, green: 1, blue: 0 });
    expect(space.defaultDecode(8)).toEqual([0, 255]);
  });

  it("reads an indexed lookup table from a stream", async () => {
    const table = makeStream("<< >>", new Uint8Array([0, 255]));
    const space = await loadColorSpace(
      parseObject("[/Indexed /DeviceGray 1 7 0 R]"),
      testLoadContext({ 7: table }),
    );

    expect(space.toRgb([1])).toEqual({ red: 1, green: 1, blue: 1 });
  });

  it("runs separation tints through the tint transform", async () => {
    const space = await load(`[/Separation /Spot /DeviceCMYK ${cmykTint("1 0 0 0")}]`);

    expect(space.family).toBe("Separation");
    expect(space.initialColor()).toEqual([1]);
    expect(space.toRgb([1])).toEqual({ red: 0, green: 1, blue: 1 });
    expect(space.toRgb([0.5])).toEqual({ red: 0.5, green: 1, blue: 1 });
  });

  it("takes DeviceN component counts from the colorant names", async () => {
    const space = await load(`[/DeviceN [/Black /Spot] /DeviceCMYK ${cmykTint("0 0 0 1")}]`);

    expect(space.components).toBe(2);
    expect(space.toRgb([0.25, 0])).toEqual({ red: 0.75, green: 0.75, blue: 0.75 });
  });

  it("uses the alternate or component count of ICC profiles", async () => {
    const withN = makeStream("<< /N 3 >>", "");
    const withAlternate = makeStream("<< /N 1 /Alternate /DeviceGray >>", "");
    const resolve = testLoadContext({ 1: withN, 2: withAlternate });

    expect(await loadColorSpace(parseObject("[/ICCBased 1 0 R]"), resolve)).toBe(DEVICE_RGB);
    expect(await loadColorSpace(parseObject("[/ICCBased 2 0 R]"), resolve)).toBe(DEVICE_GRAY);
  });

  it("converts Lab through the white point", async () => {
    const space = await load("[/Lab << /WhitePoint [0.9505 1 1.089] >>]");
    const white = space.toRgb([100, 0, 0]);
    const black = space.toRgb([0, 0, 0]);

    expect(white.red).toBeCloseTo(1, 2);
    expect(white.green).toBeCloseTo(1, 2);
    expect(white.blue).toBeCloseTo(1, 2);
    expect(black.red).toBeCloseTo(0, 5);
    expect(space.initialColor()).toEqual([0, 0, 0]);
  });

  it("gives uncoloured patterns an underlying space", async () => {
    const coloured = await load("/Pattern");
    const uncoloured = await load("[/Pattern /DeviceRGB]");

    expect(coloured.components).toBe(0);
    expect(uncoloured.components).toBe(3);
    expect(uncoloured.toRgb([0, 0, 1])).toEqual({ red: 0, green: 0, blue: 1 });
  });

  it("resolves references", async () => {
    const resolve = testLoadContext({ 3: parseObject("/DeviceCMYK") });

    expect(await loadColorSpace(PdfRef.of(3), resolve)).toBe(DEVICE_CMYK);
  });

  it("rejects unknown and malformed spaces", async () => {
    await expect(load("/Foo")).rejects.toThrow(ContentError);
    await expect(load("[/Bogus 1]")).rejects.toThrow("Unknown colour space /Bogus");
    await expect(load("[/Indexed /DeviceRGB]")).rejects.toThrow("missing parameters");
    await expect(load("[/Indexed /DeviceRGB 1 2]")).rejects.toThrow("lookup table");
  });
});
