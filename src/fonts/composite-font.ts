import type { Path } from "#src/scene/path";
import type { CharCode, CMap } from "./cmap";
import type { FontProgram } from "./font-program";
import { OutlineFont, type VerticalMetrics } from "./pdf-font";
import { boxGlyph, isBlank } from "./substitute";
import type { ToUnicodeMap } from "./to-unicode";

export interface CompositeFontData {
  baseFontName: string;
  cmap: CMap;
  cidFontType: "CIDFontType0" | "CIDFontType2";
  /** CID → w0 from /W */
  widths: Map<number, number>;
  /** /DW */
  defaultWidth: number;
  /** CID → vertical metrics from /W2 */
  verticalMetrics: Map<number, VerticalMetrics>;
  /** /DW2 as [originY, advance] */
  defaultVertical: readonly [number, number];
  /** /CIDToGIDMap stream contents; null for Identity */
  cidToGid: Uint16Array | null;
  program: FontProgram | null;
  substitute: FontProgram | null;
  toUnicode?: ToUnicodeMap;
}

/**
 * Type0 font with its CIDFont descendant.
 */
export class CompositeFont extends OutlineFont {
  readonly subtype = "Type0";

  private readonly data: CompositeFontData;

  constructor(id: number, data: CompositeFontData) {
    super(id, data.baseFontName);
    this.data = data;
  }

  override get vertical(): boolean {
    return this.data.cmap.vertical;
  }

  decode(bytes: Uint8Array): CharCode[] {
    return this.data.cmap.decode(bytes);
  }

  /**
   * CID for a code; codes the CMap does not map select CID 0.
   */
  cid(code: CharCode): number {
    return this.data.cmap.lookup(code) ?? 0;
  }

  width(code: CharCode): number {
    return this.data.widths.get(this.cid(code)) ?? this.data.defaultWidth;
  }

  override verticalMetrics(code: CharCode): VerticalMetrics {
    const explicit = this.data.verticalMetrics.get(this.cid(code));

    if (explicit) {
      return explicit;
    }

    const [originY, advance] = this.data.defaultVertical;

    return { advance, originX: this.width(code) / 2, originY };
  }

  glyphId(code: CharCode): number | undefined {
    const { program, substitute, cidToGid, toUnicode } = this.data;
    const cid = this.cid(code);

    if (program) {
      if (this.data.cidFontType === "CIDFontType0") {
        return program.glyphIdForCid(cid);
      }

      const glyphId = cidToGid ? cidToGid[cid] : cid;

      return glyphId !== undefined && glyphId < program.numGlyphs ? glyphId : undefined;
    }

    if (substitute) {
      const unicode = toUnicode?.codePoint(code.code);

      return unicode === undefined ? undefined : substitute.glyphIdForUnicode(unicode);
    }

    return cid;
  }

  glyphPath(glyphId: number, code: CharCode): Path | undefined {
    const program = this.data.program ?? this.data.substitute;

    if (program) {
      return program.glyphPath(glyphId);
    }

    return boxGlyph(this.width(code), isBlank(this.data.toUnicode?.codePoint(code.code)));
  }
}
