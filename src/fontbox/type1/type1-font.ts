/**
 * A parsed Type 1 font program.
 */

import encodings from "#src/fonts/data/encodings.json";
import { type Matrix, multiply, scale } from "#src/helpers/matrix";
import type { Path } from "#src/scene/path";
import { interpretType1 } from "./type1-charstring";

export interface Type1FontData {
  fontName: string;
  fontMatrix: Matrix;
  /** "standard" when the font uses StandardEncoding */
  encoding: Map<number, string> | "standard";
  subrs: Uint8Array[];
  charStrings: Map<string, Uint8Array>;
}

export interface Type1Glyph {
  /** Outline in glyph space (1000 units per em) */
  path: Path;
  width: number;
}

export class Type1Font {
  readonly fontName: string;
  readonly fontMatrix: Matrix;

  private readonly data: Type1FontData;
  /** Glyph ids are positions in CharStrings order */
  private readonly names: string[];
  private readonly nameToGid = new Map<string, number>();

  constructor(data: Type1FontData) {
    this.data = data;
    this.fontName = data.fontName;
    this.fontMatrix = data.fontMatrix;
    this.names = [...data.charStrings.keys()];
    this.names.forEach((name, gid) => this.nameToGid.set(name, gid));
  }

  get numGlyphs(): number {
    return this.names.length;
  }

  glyphName(glyphId: number): string | undefined {
    return this.names[glyphId];
  }

  glyphIdForName(name: string): number | undefined {
    return this.nameToGid.get(name);
  }

  /**
   * Glyph name for a code under the font's built-in encoding.
   */
  encodedName(code: number): string | undefined {
    const encoding = this.data.encoding;
    const name = encoding === "standard" ? encodings.StandardEncoding[code] : encoding.get(code);

    return name ?? undefined;
  }

  glyph(glyphId: number): Type1Glyph | undefined {
    const name = this.names[glyphId];
    const charString = name === undefined ? undefined : this.data.charStrings.get(name);

    if (!charString) {
      return undefined;
    }

    const result = interpretType1(charString, {
      subrs: this.data.subrs,
      seacCharString: code => {
        const component = encodings.StandardEncoding[code];

        return component ? this.data.charStrings.get(component) : undefined;
      },
    });

    const toGlyphSpace = multiply(this.fontMatrix, scale(1000));

    return {
      path: result.path.transform(toGlyphSpace),
      width: result.width * toGlyphSpace[0],
    };
  }
}
