import type { Type1Font } from "#src/fontbox/type1/type1-font";
import type { Path } from "#src/scene/path";
import { glyphNameToUnicode } from "../encodings";
import { type FontProgram, nonZero } from "./base";

/**
 * Type 1 program (FontFile). Glyph ids follow the CharStrings order.
 */
export class Type1FontProgram implements FontProgram {
  readonly format = "Type1";

  constructor(readonly font: Type1Font) {}

  get numGlyphs(): number {
    return this.font.numGlyphs;
  }

  glyphPath(glyphId: number): Path | undefined {
    return this.font.glyph(glyphId)?.path;
  }

  advanceWidth(glyphId: number): number | undefined {
    return this.font.glyph(glyphId)?.width;
  }

  glyphIdForName(name: string): number | undefined {
    const glyphId = this.font.glyphIdForName(name);

    // .notdef is not always the first charstring
    return glyphId === undefined || name === ".notdef" ? undefined : glyphId;
  }

  glyphIdForCode(code: number): number | undefined {
    const name = this.font.encodedName(code);

    return name === undefined ? undefined : this.glyphIdForName(name);
  }

  glyphIdForUnicode(codePoint: number): number | undefined {
    for (let gid = 0; gid < this.numGlyphs; gid++) {
      const name = this.font.glyphName(gid);

      if (name !== undefined && name !== ".notdef" && glyphNameToUnicode(name) === codePoint) {
        return gid;
      }
    }

    return undefined;
  }

  glyphIdForCid(cid: number): number | undefined {
    return nonZero(cid < this.numGlyphs ? cid : undefined);
  }
}
