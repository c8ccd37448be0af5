import { describe, expect, it } from "vitest";
import { parsePdf } from "#src/document/pdf-document";
import { FontCache } from "#src/fonts/font-cache";
import { GlyphCache } from "#src/fonts/glyph-cache";
import type { SceneItem } from "#src/scene/scene";
import { buildSinglePagePdf, buildTrueTypeFont, type SinglePageOptions, type TestPoint } from "#src/test-utils";
import type { Diagnostic } from "./diagnostics";
import { type InterpreterOptions, interpretPage } from "./interpreter";

const BASE = [1, 0, 0, -1, 0, 200];
const BLACK = { red: 0, green: 0, blue: 0, alpha: 1 };
const BLUE = { red: 0, green: 0, blue: 1, alpha: 1 };

async function run(
  content: string,
  options: SinglePageOptions = {},
  extra: Partial<InterpreterOptions> = {},
) {
  const document = await parsePdf(buildSinglePagePdf(content, options));

  return interpretPage(document.page(0), {
    fontCache: new FontCache(),
    glyphCache: new GlyphCache(),
    ...extra,
  });
}

function kinds(items: readonly SceneItem[]): string[] {
  return items.map(item => item.kind);
}

function fillOf(item: SceneItem | undefined) {
  if (item?.kind !== "fill") {
    throw new Error(`expected a fill, got ${item?.kind}`);
  }

  return item;
}

describe("interpretPage", () => {
  describe("paths", () => {
    it("fills a red square in page space", async () => {
      const { scene, diagnostics } = await run("1 0 0 rg 10 10 100 100 re f");
      const fill = fillOf(scene.items[0]);

      expect(scene.items).toHaveLength(1);
      expect(fill.color).toEqual({ red: 1, green: 0, blue: 0, alpha: 1 });
      expect(fill.transform).toEqual(BASE);
      expect(fill.fillRule).toBe("nonzero");
      expect(fill.path.bounds()).toEqual({ x0: 10, y0: 10, x1: 110, y1: 110 });
      expect(diagnostics).toEqual([]);
    });

    it("leaves the fill colour alone when RG sets the stroke colour", async () => {
      const { scene, diagnostics } = await run("1 0 0 RG 10 10 100 100 re f");

      expect(kinds(scene.items)).toEqual(["fill"]);
      expect(fillOf(scene.items[0]).color).toEqual(BLACK);
      expect(diagnostics).toEqual([]);
    });

    it("records the page size on the scene", async () => {
      const { scene } = await run("", { width: 300, height: 150 });

      expect(scene.width).toBe(300);
      expect(scene.height).toBe(150);
    });

    it("applies cm to the current transform", async () => {
      const { scene } = await run("q 2 0 0 2 0 0 cm 0 0 1 1 re f Q");

      expect(fillOf(scene.items[0]).transform).toEqual([2, 0, 0, -2, 0, 200]);
    });

    it("strokes and fills with separate colours", async () => {
      const { scene } = await run("0 0 1 RG 1 0 0 rg 3 w 0 0 10 10 re B");
      const stroke = scene.items[1];

      expect(kinds(scene.items)).toEqual(["fill", "stroke"]);
      expect(stroke.kind === "stroke" && stroke.color).toEqual(BLUE);
      expect(stroke.kind === "stroke" && stroke.style.lineWidth).toBe(3);
    });

    it("uses the even-odd rule for f*", async () => {
      const { scene } = await run("0 0 10 10 re f*");

      expect(fillOf(scene.items[0]).fillRule).toBe("evenodd");
    });

    it("reports path operators without a current point", async () => {
      const { diagnostics } = await run("10 10 l");

      expect(diagnostics).toEqual([
        { kind: "syntax", message: "No current point", operator: "l", position: 6 },
      ]);
    });
  });

  describe("graphics state", () => {
    it("scopes colour changes to q/Q", async () => {
      const { scene } = await run("q 1 0 0 rg Q 0 0 10 10 re f");

      expect(fillOf(scene.items[0]).color).toEqual(BLACK);
    });

    it("ignores an unmatched Q and keeps going", async () => {
      const { scene, diagnostics } = await run("Q 0 0 10 10 re f");

      expect(kinds(scene.items)).toEqual(["fill"]);
      expect(diagnostics).toEqual([
        { kind: "state", message: "Q without matching q ignored", operator: "Q", position: 0 },
      ]);
    });

    it("returns to the initial state after an excess Q", async () => {
      const { scene, diagnostics } = await run("q 0 1 0 rg 0 0 1 RG 5 w 2 0 0 2 0 0 cm Q Q 0 0 10 10 re B");
      const fill = fillOf(scene.items[0]);
      const stroke = scene.items[1];

      expect(fill.color).toEqual(BLACK);
      expect(fill.transform).toEqual(BASE);
      expect(stroke.kind === "stroke" && stroke.color).toEqual(BLACK);
      expect(stroke.kind === "stroke" && stroke.style.lineWidth).toBe(1);
      expect(diagnostics.map(d => d.message)).toEqual(["Q without matching q ignored"]);
    });

    it("applies fill alpha from an ExtGState", async () => {
      const { scene } = await run("/GS1 gs 0 0 10 10 re f", {
        resources: "<< /ExtGState << /GS1 << /ca 0.5 >> >> >>",
      });

      expect(fillOf(scene.items[0]).color.alpha).toBe(0.5);
    });

    it("reports blend modes it draws as Normal", async () => {
      const { diagnostics } = await run("/GS1 gs", {
        resources: "<< /ExtGState << /GS1 << /BM /Multiply >> >> >>",
      });

      expect(diagnostics.map(d => d.message)).toEqual(["Blend mode /Multiply drawn as Normal"]);
    });

    it("reports undefined resources", async () => {
      const { diagnostics } = await run("/GS9 gs");

      expect(diagnostics).toEqual([
        {
          kind: "resource",
          message: "Undefined ExtGState resource /GS9",
          operator: "gs",
          position: 5,
        },
      ]);
    });

    it("rejects a colour with too few components", async () => {
      const { scene, diagnostics } = await run("/DeviceRGB cs 0.5 sc 0 0 10 10 re f");

      expect(fillOf(scene.items[0]).color).toEqual(BLACK);
      expect(diagnostics.map(d => d.message)).toEqual([
        "/DeviceRGB colour needs 3 components, got 1",
      ]);
    });
  });

  describe("clipping", () => {
    it("keeps a clip until the page ends", async () => {
      const { scene } = await run("0 0 50 50 re W n 0 0 100 100 re f");

      expect(kinds(scene.items)).toEqual(["pushClip", "fill", "popClip"]);
    });

    it("pops the clip on Q", async () => {
      const { scene } = await run("q 0 0 50 50 re W n Q 0 0 10 10 re f");

      expect(kinds(scene.items)).toEqual(["pushClip", "popClip", "fill"]);
    });

    it("pops clips left inside an unbalanced q", async () => {
      const { scene } = await run("q q 0 0 50 50 re W n");

      expect(kinds(scene.items)).toEqual(["pushClip", "popClip"]);
    });
  });

  describe("operators", () => {
    it("reports unknown operators outside BX/EX only", async () => {
      const { diagnostics } = await run("foo BX bar EX");

      expect(diagnostics).toEqual([
        { kind: "unknown-operator", message: "Unknown operator foo", operator: "foo", position: 0 },
      ]);
    });

    it("forwards each diagnostic to the listener", async () => {
      const seen: Diagnostic[] = [];
      const { diagnostics } = await run("foo Q", {}, { onDiagnostic: d => seen.push(d) });

      expect(seen).toEqual(diagnostics);
      expect(seen).toHaveLength(2);
    });

    it("stops when the signal is aborted", async () => {
      const controller = new AbortController();

      controller.abort();

      await expect(run("0 0 1 1 re f", {}, { signal: controller.signal })).rejects.toThrow();
    });
  });

  describe("text", () => {
    const FONT = "<< /Font << /F1 << /Type /Font /Subtype /Type1 /BaseFont /Helvetica >> >> >>";

    it("places glyphs along the baseline", async () => {
      const { scene, diagnostics } = await run("BT /F1 10 Tf 20 30 Td (AB) Tj ET", {
        resources: FONT,
      });
      const item = scene.items[0];

      if (item?.kind !== "glyphs") {
        throw new Error("expected glyphs");
      }

      const [first, second] = item.glyphs;

      expect(item.glyphs).toHaveLength(2);
      expect(item.transform).toEqual(BASE);
      expect(item.color).toEqual(BLACK);
      expect(first.matrix[0]).toBeCloseTo(0.01);
      expect(first.matrix[4]).toBeCloseTo(20);
      expect(first.matrix[5]).toBeCloseTo(30);
      expect(second.matrix[4]).toBeCloseTo(26.67);
      expect(diagnostics).toEqual([]);
    });

    it("advances past a CID the embedded font lacks", async () => {
      const square: TestPoint[] = [
        [0, 0, true],
        [500, 0, true],
        [500, 500, true],
        [0, 500, true],
      ];
      const program = buildTrueTypeFont({
        glyphs: [
          { advance: 1000, name: ".notdef" },
          { advance: 1000, name: "g1", contours: [square] },
          { advance: 1000, name: "g2", contours: [square] },
        ],
      });
      const { scene, diagnostics } = await run("BT /F1 10 Tf 20 30 Td <000100990002> Tj ET", {
        resources: "<< /Font << /F1 5 0 R >> >>",
        extraObjects: [
          "<< /Type /Font /Subtype /Type0 /BaseFont /TestCID /Encoding /Identity-H /DescendantFonts [6 0 R] >>",
          "<< /Type /Font /Subtype /CIDFontType2 /BaseFont /TestCID /DW 1000 /FontDescriptor 7 0 R >>",
          "<< /Type /FontDescriptor /FontName /TestCID /Flags 4 /FontFile2 8 0 R >>",
          { stream: program },
        ],
      });
      const item = scene.items[0];

      if (item?.kind !== "glyphs") {
        throw new Error("expected glyphs");
      }

      expect(item.glyphs.map(placed => placed.glyph.glyphId)).toEqual([1, 2]);
      const [first, second] = item.glyphs;

      expect(first.matrix[4]).toBeCloseTo(20);
      expect(second.matrix[4]).toBeCloseTo(40);
      expect(diagnostics.map(d => [d.kind, d.message])).toEqual([["glyph", "No glyph for code 153 in font TestCID"]]);
    });

    it("reports an embedded program that fails to parse", async () => {
      const { diagnostics } = await run("BT /F1 10 Tf (A) Tj ET", {
        resources: "<< /Font << /F1 5 0 R >> >>",
        extraObjects: [
          "<< /Type /Font /Subtype /TrueType /BaseFont /Broken /FontDescriptor 6 0 R >>",
          "<< /Type /FontDescriptor /FontName /Broken /Flags 32 /FontFile2 7 0 R >>",
          { stream: new Uint8Array([0x6a, 0x75, 0x6e, 0x6b]) },
        ],
      });

      expect(diagnostics.filter(d => d.kind === "font")).toEqual([
        { kind: "font", message: "Failed to parse FontFile2 (TrueType): Invalid font: unknown version 0x6a756e6b" },
      ]);
    });

    it("draws nothing in invisible mode", async () => {
      const { scene } = await run("BT /F1 10 Tf 3 Tr (A) Tj ET", { resources: FONT });

      expect(scene.items).toEqual([]);
    });

    it("turns clipping text into a clip at ET", async () => {
      const content = "BT /F1 10 Tf 7 Tr (A) Tj ET 0 0 10 10 re f";
      const { scene } = await run(content, { resources: FONT });

      expect(kinds(scene.items)).toEqual(["pushClip", "fill", "popClip"]);
    });

    it("reports a missing font and text without one", async () => {
      const { scene, diagnostics } = await run("BT /F1 12 Tf (A) Tj ET");

      expect(scene.items).toEqual([]);
      expect(diagnostics.map(d => [d.kind, d.message])).toEqual([
        ["font", "Undefined Font resource /F1"],
        ["font", "Text shown without a font"],
      ]);
    });

    it("reports text operators outside BT/ET", async () => {
      const { diagnostics } = await run("(A) Tj");

      expect(diagnostics.map(d => d.message)).toEqual(["Tj outside a text object"]);
    });

    it("closes a text object left open", async () => {
      const { diagnostics } = await run("BT");

      expect(diagnostics).toEqual([{ kind: "state", message: "Text object not closed with ET" }]);
    });
  });

  describe("XObjects", () => {
    const FORM = "<< /Type /XObject /Subtype /Form /BBox [0 0 50 50] /Matrix [1 0 0 1 10 10] >>";

    it("runs a form inside its bounding box and restores state after it", async () => {
      const { scene } = await run("/Fm1 Do 0 0 1 1 re f", {
        resources: "<< /XObject << /Fm1 5 0 R >> >>",
        extraObjects: [{ dict: FORM, stream: "0 0 1 rg 0 0 5 5 re f" }],
      });

      expect(kinds(scene.items)).toEqual(["pushClip", "fill", "popClip", "fill"]);
      expect(fillOf(scene.items[1]).transform).toEqual([1, 0, 0, -1, 10, 190]);
      expect(fillOf(scene.items[1]).color).toEqual(BLUE);
      expect(fillOf(scene.items[3]).color).toEqual(BLACK);
    });

    it("skips a form that draws itself", async () => {
      const form = FORM.replace(">>", "/Resources << /XObject << /Fm1 5 0 R >> >> >>");
      const { diagnostics } = await run("/Fm1 Do", {
        resources: "<< /XObject << /Fm1 5 0 R >> >>",
        extraObjects: [{ dict: form, stream: "/Fm1 Do" }],
      });

      expect(diagnostics.map(d => [d.kind, d.message])).toEqual([
        ["recursion", "Form XObject draws itself; skipped"],
      ]);
    });

    it("draws an image over the unit square", async () => {
      const image =
        "<< /Subtype /Image /Width 1 /Height 1 /ColorSpace /DeviceRGB /BitsPerComponent 8 >>";
      const { scene } = await run("q 10 0 0 10 0 0 cm /Im1 Do Q", {
        resources: "<< /XObject << /Im1 5 0 R >> >>",
        extraObjects: [{ dict: image, stream: new Uint8Array([255, 0, 0]) }],
      });
      const item = scene.items[0];

      if (item?.kind !== "image") {
        throw new Error("expected an image");
      }

      expect([...item.image.data]).toEqual([255, 0, 0, 255]);
      expect(item.transform).toEqual([10, 0, 0, -10, 0, 200]);
      expect(item.alpha).toBe(1);
    });

    it("fills the clip with a shading", async () => {
      const shading =
        "<< /ShadingType 2 /ColorSpace /DeviceGray /Coords [0 0 20 0] " +
        "/Function << /FunctionType 2 /Domain [0 1] /C0 [0] /C1 [1] /N 1 >> >>";
      const { scene } = await run("/Sh1 sh", {
        width: 20,
        height: 10,
        resources: `<< /Shading << /Sh1 ${shading} >> >>`,
      });
      const item = scene.items[0];

      if (item?.kind !== "image") {
        throw new Error("expected an image");
      }

      expect(item.image.width).toBe(20);
      expect(item.image.height).toBe(10);
      expect(item.transform).toEqual([20, 0, 0, -10, 0, 10]);
      expect([...item.image.data.subarray(0, 4)]).toEqual([6, 6, 6, 255]);
    });
  });
});
