import type { CFFFont } from "#src/fontbox/cff/cff-font";
import type { TrueTypeFont } from "#src/fontbox/ttf/truetype-font";
import { scale } from "#src/helpers/matrix";
import type { Path } from "#src/scene/path";
import { glyphNameToUnicode } from "../encodings";
import { type FontProgram, nonZero } from "./base";

/** Private-use offsets symbolic fonts place their (3,0) cmap at */
const SYMBOL_OFFSETS = [0, 0xf000, 0xf100, 0xf200];

/**
 * TrueType program, or an OpenType font with a `CFF ` table whose
 * outlines come from the CFF data.
 */
export class TrueTypeFontProgram implements FontProgram {
  readonly format: "TrueType" | "OpenType";

  constructor(
    readonly font: TrueTypeFont,
    private readonly cff: CFFFont | null = null,
  ) {
    this.format = cff ? "OpenType" : "TrueType";
  }

  get numGlyphs(): number {
    return this.font.numGlyphs;
  }

  private get toGlyphSpace() {
    return scale(1000 / this.font.unitsPerEm);
  }

  glyphPath(glyphId: number): Path | undefined {
    if (glyphId < 0 || glyphId >= this.numGlyphs) {
      return undefined;
    }

    if (this.cff) {
      return this.cff.glyph(glyphId)?.path;
    }

    return this.font.glyphPath(glyphId).transform(this.toGlyphSpace);
  }

  advanceWidth(glyphId: number): number | undefined {
    if (glyphId < 0 || glyphId >= this.numGlyphs) {
      return undefined;
    }

    return (this.font.advanceWidth(glyphId) * 1000) / this.font.unitsPerEm;
  }

  glyphIdForName(name: string): number | undefined {
    const byName = nonZero(this.font.glyphIdForName(name));

    if (byName !== undefined) {
      return byName;
    }

    const unicode = glyphNameToUnicode(name);

    return unicode === undefined ? undefined : this.glyphIdForUnicode(unicode);
  }

  glyphIdForCode(code: number): number | undefined {
    const symbol = this.font.findCmap(3, 0);

    if (symbol) {
      for (const offset of SYMBOL_OFFSETS) {
        const glyphId = nonZero(symbol.lookup(offset + code));

        if (glyphId !== undefined) {
          return glyphId;
        }
      }
    }

    const mac = this.font.findCmap(1, 0);

    return mac ? nonZero(mac.lookup(code)) : undefined;
  }

  glyphIdForUnicode(codePoint: number): number | undefined {
    const cmap =
      this.font.findCmap(3, 10) ??
      this.font.findCmap(3, 1) ??
      this.font.cmaps.find(c => c.platformId === 0);

    return cmap ? nonZero(cmap.lookup(codePoint)) : undefined;
  }

  glyphIdForCid(cid: number): number | undefined {
    return cid < this.numGlyphs ? cid : undefined;
  }
}
