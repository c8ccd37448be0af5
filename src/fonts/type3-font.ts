import type { Matrix } from "#src/helpers/matrix";
import type { RefResolver } from "#src/objects/pdf-ref";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { PdfStream } from "#src/objects/pdf-stream";
import type { CharCode } from "./cmap";
import { PdfFont, singleByteCodes } from "./pdf-font";

export interface Type3FontData {
  baseFontName: string;
  fontMatrix: Matrix;
  charProcs: PdfDict;
  encoding: readonly (string | null)[];
  firstChar: number;
  /** Glyph-space widths */
  widths: readonly number[];
  resources?: PdfDict;
  resolver: RefResolver;
}

/**
 * Type 3 font: each glyph is a content stream run with the font matrix.
 */
export class Type3Font extends PdfFont {
  readonly subtype = "Type3";

  private readonly data: Type3FontData;

  constructor(id: number, data: Type3FontData) {
    super(id, data.baseFontName);
    this.data = data;
  }

  override get fontMatrix(): Matrix {
    return this.data.fontMatrix;
  }

  get resources(): PdfDict | undefined {
    return this.data.resources;
  }

  decode(bytes: Uint8Array): CharCode[] {
    return singleByteCodes(bytes);
  }

  /**
   * Glyph-space width mapped through the font matrix.
   */
  width(code: CharCode): number {
    const width = this.data.widths[code.code - this.data.firstChar];

    return width !== undefined && Number.isFinite(width) ? width * this.data.fontMatrix[0] * 1000 : 0;
  }

  /**
   * The glyph procedure for a code, if the encoding names one.
   */
  charProc(code: CharCode): PdfStream | undefined {
    const name = this.data.encoding[code.code];

    return name ? this.data.charProcs.getStream(name, this.data.resolver) : undefined;
  }
}
