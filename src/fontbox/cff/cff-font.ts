/**
 * A parsed CFF font: name-keyed (Type1C) or CID-keyed (CIDFontType0C).
 */

import encodings from "#src/fonts/data/encodings.json";
import { type Matrix, multiply, scale } from "#src/helpers/matrix";
import type { Path } from "#src/scene/path";
import standardStrings from "./standard-strings.json";
import { interpretType2 } from "./type2-charstring";

export interface CFFPrivate {
  subrs: Uint8Array[];
  defaultWidthX: number;
  nominalWidthX: number;
}

export interface CFFFontData {
  name: string;
  isCIDFont: boolean;
  fontMatrix: Matrix;
  charStrings: Uint8Array[];
  globalSubrs: Uint8Array[];
  privateDict: CFFPrivate;
  /** Glyph id → SID, or CID for CID-keyed fonts */
  charset: number[];
  /** Custom built-in encoding (code → glyph id); null means StandardEncoding */
  encoding: Map<number, number> | null;
  strings: string[];
  fdPrivates: CFFPrivate[];
  fdMatrices: Array<Matrix | null>;
  fdSelect: number[];
}

export interface CFFGlyph {
  /** Outline in glyph space (1000 units per em) */
  path: Path;
  /** Advance in glyph space */
  width: number;
}

export class CFFFont {
  readonly name: string;
  readonly isCIDFont: boolean;
  readonly fontMatrix: Matrix;

  private readonly data: CFFFontData;
  private nameToGid?: Map<string, number>;
  private cidToGid?: Map<number, number>;

  constructor(data: CFFFontData) {
    this.data = data;
    this.name = data.name;
    this.isCIDFont = data.isCIDFont;
    this.fontMatrix = data.fontMatrix;
  }

  get numGlyphs(): number {
    return this.data.charStrings.length;
  }

  /**
   * Resolve a string id against the standard strings and the font's
   * String INDEX.
   */
  getString(sid: number): string | undefined {
    if (sid < standardStrings.length) {
      return standardStrings[sid];
    }

    return this.data.strings[sid - standardStrings.length];
  }

  glyphName(glyphId: number): string | undefined {
    if (this.isCIDFont) {
      return undefined;
    }

    const sid = this.data.charset[glyphId];

    return sid === undefined ? undefined : this.getString(sid);
  }

  glyphIdForName(name: string): number | undefined {
    if (!this.nameToGid) {
      this.nameToGid = new Map();

      for (let gid = 0; gid < this.numGlyphs; gid++) {
        const glyphName = this.glyphName(gid);

        if (glyphName !== undefined && !this.nameToGid.has(glyphName)) {
          this.nameToGid.set(glyphName, gid);
        }
      }
    }

    return this.nameToGid.get(name);
  }

  glyphIdForCid(cid: number): number | undefined {
    if (!this.isCIDFont) {
      return cid < this.numGlyphs ? cid : undefined;
    }

    if (!this.cidToGid) {
      this.cidToGid = new Map();

      this.data.charset.forEach((value, gid) => {
        if (!this.cidToGid?.has(value)) {
          this.cidToGid?.set(value, gid);
        }
      });
    }

    return this.cidToGid.get(cid);
  }

  /**
   * Glyph id for a code under the font's built-in encoding.
   */
  glyphIdForCode(code: number): number | undefined {
    if (this.data.encoding) {
      return this.data.encoding.get(code);
    }

    const name = encodings.StandardEncoding[code];

    return name ? this.glyphIdForName(name) : undefined;
  }

  /**
   * Outline and advance of a glyph, normalised to 1000 units per em.
   */
  glyph(glyphId: number): CFFGlyph | undefined {
    const charString = this.data.charStrings[glyphId];

    if (!charString) {
      return undefined;
    }

    const fd = this.isCIDFont ? (this.data.fdSelect[glyphId] ?? 0) : -1;
    const privateDict = fd >= 0 ? (this.data.fdPrivates[fd] ?? this.data.privateDict) : this.data.privateDict;
    const fdMatrix = fd >= 0 ? this.data.fdMatrices[fd] : null;
    const matrix = fdMatrix ? multiply(fdMatrix, this.fontMatrix) : this.fontMatrix;

    const result = interpretType2(charString, {
      globalSubrs: this.data.globalSubrs,
      localSubrs: privateDict.subrs,
      defaultWidthX: privateDict.defaultWidthX,
      nominalWidthX: privateDict.nominalWidthX,
      seacCharString: code => {
        const name = encodings.StandardEncoding[code];
        const gid = name ? this.glyphIdForName(name) : undefined;

        return gid === undefined ? undefined : this.data.charStrings[gid];
      },
    });

    const toGlyphSpace = multiply(matrix, scale(1000));

    return {
      path: result.path.transform(toGlyphSpace),
      width: result.width * toGlyphSpace[0],
    };
  }
}
