import type { CFFFont } from "#src/fontbox/cff/cff-font";
import type { Path } from "#src/scene/path";
import { glyphNameToUnicode } from "../encodings";
import { type FontProgram, nonZero } from "./base";

abstract class CFFFontProgram implements FontProgram {
  readonly format = "CFF";

  constructor(readonly font: CFFFont) {}

  get numGlyphs(): number {
    return this.font.numGlyphs;
  }

  glyphPath(glyphId: number): Path | undefined {
    return this.font.glyph(glyphId)?.path;
  }

  advanceWidth(glyphId: number): number | undefined {
    return this.font.glyph(glyphId)?.width;
  }

  abstract glyphIdForName(name: string): number | undefined;
  abstract glyphIdForCode(code: number): number | undefined;
  abstract glyphIdForUnicode(codePoint: number): number | undefined;
  abstract glyphIdForCid(cid: number): number | undefined;
}

/**
 * Name-keyed CFF (FontFile3 /Type1C).
 */
export class CFFType1FontProgram extends CFFFontProgram {
  private unicodeToGid?: Map<number, number>;

  glyphIdForName(name: string): number | undefined {
    return nonZero(this.font.glyphIdForName(name));
  }

  glyphIdForCode(code: number): number | undefined {
    return nonZero(this.font.glyphIdForCode(code));
  }

  glyphIdForUnicode(codePoint: number): number | undefined {
    if (!this.unicodeToGid) {
      this.unicodeToGid = new Map();

      for (let gid = 1; gid < this.numGlyphs; gid++) {
        const name = this.font.glyphName(gid);
        const unicode = name === undefined ? undefined : glyphNameToUnicode(name);

        if (unicode !== undefined && !this.unicodeToGid.has(unicode)) {
          this.unicodeToGid.set(unicode, gid);
        }
      }
    }

    return this.unicodeToGid.get(codePoint);
  }

  glyphIdForCid(cid: number): number | undefined {
    return cid < this.numGlyphs ? cid : undefined;
  }
}

/**
 * CID-keyed CFF (FontFile3 /CIDFontType0C). Only CID lookups apply.
 */
export class CFFCIDFontProgram extends CFFFontProgram {
  glyphIdForName(): number | undefined {
    return undefined;
  }

  glyphIdForCode(code: number): number | undefined {
    return this.glyphIdForCid(code);
  }

  glyphIdForUnicode(): number | undefined {
    return undefined;
  }

  glyphIdForCid(cid: number): number | undefined {
    return this.font.glyphIdForCid(cid);
  }
}
