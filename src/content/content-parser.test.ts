import { describe, expect, it } from "vitest";
import { stringToBytes } from "#src/test-utils";
import { parseContent } from "./content-parser";
import type { ContentOp } from "./operators";

function parse(source: string): ContentOp[] {
  return parseContent(stringToBytes(source));
}

function kinds(source: string): string[] {
  return parse(source).map(op => op.kind);
}

function inlineImage(op: ContentOp | undefined) {
  if (op?.kind !== "inlineImage") {
    throw new Error(`expected an inline image, got ${op?.kind}`);
  }

  return op;
}

describe("parseContent", () => {
  it("records operators with their positions", () => {
    const ops = parse("q 1 0 0 1 10 20 cm Q");

    expect(ops).toEqual([
      { kind: "save", operator: "q", position: 0 },
      { kind: "transform", matrix: [1, 0, 0, 1, 10, 20], operator: "cm", position: 16 },
      { kind: "restore", operator: "Q", position: 19 },
    ]);
  });

  it("decodes path painting operators", () => {
    const ops = parse("f* B b* n S s F");

    expect(ops.map(op => (op.kind === "paint" ? [op.close, op.fill, op.stroke] : null))).toEqual([
      [false, "evenodd", false],
      [false, "nonzero", true],
      [true, "evenodd", true],
      [false, null, false],
      [false, null, true],
      [true, null, true],
      [false, "nonzero", false],
    ]);
  });

  it("decodes clip, path and dash operators", () => {
    expect(parse("10 20 m 1 2 3 4 v 5 6 7 8 y W* [3 2] 1 d")).toMatchObject([
      { kind: "moveTo", x: 10, y: 20 },
      { kind: "curveToInitial", x2: 1, y2: 2, x3: 3, y3: 4 },
      { kind: "curveToFinal", x1: 5, y1: 6, x3: 7, y3: 8 },
      { kind: "clip", rule: "evenodd" },
      { kind: "dash", array: [3, 2], phase: 1 },
    ]);
  });

  it("turns bad operands into invalid ops and carries on", () => {
    expect(parse("1 l 3 4 l /A 2 m")).toMatchObject([
      { kind: "invalid", operator: "l", message: "expected 2 operands, got 1" },
      { kind: "lineTo", x: 3, y: 4 },
      { kind: "invalid", operator: "m", message: "operand 1 is not a number" },
    ]);
  });

  it("reports unknown operators and drops their operands", () => {
    expect(parse("1 2 xyz 0 0 m")).toMatchObject([
      { kind: "unknown", operator: "xyz" },
      { kind: "moveTo", x: 0, y: 0 },
    ]);
  });

  it("reports operands left at the end", () => {
    expect(parse("q 1 2")).toEqual([
      { kind: "save", operator: "q", position: 0 },
      {
        kind: "invalid",
        message: "Operands without an operator at end of stream",
        operator: "",
        position: 2,
      },
    ]);
  });

  it("reports stray delimiters", () => {
    expect(kinds("] q")).toEqual(["invalid", "save"]);
  });

  describe("text", () => {
    it("splits TJ arrays into strings and adjustments", () => {
      expect(parse("[(AB) -120 (C)] TJ")).toMatchObject([
        { kind: "showTextArray", items: [stringToBytes("AB"), -120, stringToBytes("C")] },
      ]);
    });

    it("rejects TJ arrays holding other objects", () => {
      expect(parse("[(A) /B] TJ")).toMatchObject([
        { kind: "invalid", message: "TJ array holds a name" },
      ]);
    });

    it("reads the spacing operands of the quote operators", () => {
      expect(parse(`(a) ' 2 1 (b) "`)).toMatchObject([
        { kind: "nextLineShowText", text: stringToBytes("a") },
        { kind: "nextLineShowText", text: stringToBytes("b"), wordSpacing: 2, charSpacing: 1 },
      ]);
    });

    it("reads font selection and positioning", () => {
      expect(parse("BT /F1 12 Tf 5 6 TD T* ET")).toMatchObject([
        { kind: "beginText" },
        { kind: "font", name: "F1", size: 12 },
        { kind: "moveText", tx: 5, ty: 6, setLeading: true },
        { kind: "nextLine" },
        { kind: "endText" },
      ]);
    });
  });

  describe("colour", () => {
    it("separates pattern names from components", () => {
      expect(parse("0.5 /P0 scn /P1 SCN 0.2 0.4 sc")).toMatchObject([
        { kind: "color", target: "fill", components: [0.5], pattern: "P0" },
        { kind: "color", target: "stroke", components: [], pattern: "P1" },
        { kind: "color", target: "fill", components: [0.2, 0.4] },
      ]);
    });

    it("checks device colour component counts", () => {
      expect(parse("1 0 0 rg 1 0 RG 0 0 0 1 k")).toMatchObject([
        { kind: "deviceColor", target: "fill", space: "DeviceRGB", components: [1, 0, 0] },
        { kind: "invalid", operator: "RG", message: "expected 3 operands, got 2" },
        { kind: "deviceColor", target: "fill", space: "DeviceCMYK", components: [0, 0, 0, 1] },
      ]);
    });

    it("needs components for sc", () => {
      expect(parse("sc")).toMatchObject([
        { kind: "invalid", message: "expected colour components" },
      ]);
    });
  });

  it("accepts marked content with property dictionaries", () => {
    expect(parse("/Span << /MCID 3 >> BDC /Tag BMC EMC EMC BX EX")).toMatchObject([
      { kind: "markedContent", tag: "Span" },
      { kind: "markedContent", tag: "Tag" },
      { kind: "markedContent", tag: "" },
      { kind: "markedContent", tag: "" },
      { kind: "compatibility", begin: true },
      { kind: "compatibility", begin: false },
    ]);
  });

  describe("inline images", () => {
    it("reads the dictionary with abbreviations expanded", () => {
      const ops = parse("BI /W 2 /H 1 /CS /G /BPC 8 ID \x00\xff EI Q");
      const image = inlineImage(ops[0]);

      expect(image.dict.getNumber("Width")?.value).toBe(2);
      expect(image.dict.getNumber("Height")?.value).toBe(1);
      expect(image.dict.getName("ColorSpace")?.value).toBe("DeviceGray");
      expect([...image.data]).toEqual([0, 255]);
      expect(ops[1]).toMatchObject({ kind: "restore" });
    });

    it("uses the known size of unfiltered data", () => {
      const ops = parse("BI /W 2 /H 1 /CS /G ID EI EI n");

      expect([...inlineImage(ops[0]).data]).toEqual([0x45, 0x49]);
      expect(ops[1]).toMatchObject({ kind: "paint" });
    });

    it("scans filtered data up to EI", () => {
      const ops = parse("BI /W 1 /H 1 /F /AHx ID 00> EI Q");

      expect(inlineImage(ops[0]).dict.getName("Filter")?.value).toBe("AHx");
      expect(inlineImage(ops[0]).data).toEqual(stringToBytes("00>"));
      expect(ops[1]).toMatchObject({ kind: "restore" });
    });

    it("reports data without EI", () => {
      expect(parse("BI /W 1 /H 1 /F /AHx ID 00")).toMatchObject([
        { kind: "invalid", operator: "BI", message: "Inline image without EI" },
      ]);
    });
  });
});
