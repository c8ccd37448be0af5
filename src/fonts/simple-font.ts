import type { Path } from "#src/scene/path";
import type { CharCode } from "./cmap";
import { glyphNameToUnicode } from "./encodings";
import type { FontProgram } from "./font-program";
import { OutlineFont, singleByteCodes } from "./pdf-font";
import type { StandardMetrics } from "./standard-14";
import { boxGlyph, isBlank } from "./substitute";
import type { ToUnicodeMap } from "./to-unicode";

export interface SimpleFontData {
  subtype: string;
  baseFontName: string;
  /** Glyph names by code; null entries (or a null table) use the program's built-in encoding */
  encoding: readonly (string | null)[] | null;
  firstChar: number;
  widths: readonly number[];
  missingWidth: number;
  metrics?: StandardMetrics;
  /** Embedded program */
  program: FontProgram | null;
  /** Program standing in for a font that is not embedded */
  substitute: FontProgram | null;
  toUnicode?: ToUnicodeMap;
}

/**
 * Type1, MMType1 and TrueType fonts: one byte per code, glyphs chosen by
 * glyph name, then by code under the program's own encoding.
 */
export class SimpleFont extends OutlineFont {
  readonly subtype: string;

  private readonly data: SimpleFontData;

  constructor(id: number, data: SimpleFontData) {
    super(id, data.baseFontName);
    this.data = data;
    this.subtype = data.subtype;
  }

  get isEmbedded(): boolean {
    return this.data.program !== null;
  }

  /** Program that draws the glyphs, null for the box substitute */
  private get program(): FontProgram | null {
    return this.data.program ?? this.data.substitute;
  }

  decode(bytes: Uint8Array): CharCode[] {
    return singleByteCodes(bytes);
  }

  glyphName(code: CharCode): string | undefined {
    return this.data.encoding?.[code.code] ?? undefined;
  }

  /**
   * /Widths, then the embedded program, then standard-14 metrics, then a
   * substitute program, then /MissingWidth.
   */
  width(code: CharCode): number {
    const { firstChar, widths, program, metrics, substitute, missingWidth } = this.data;
    const fromTable = widths[code.code - firstChar];

    if (fromTable !== undefined && Number.isFinite(fromTable)) {
      return fromTable;
    }

    const embedded = program ? this.programAdvance(program, code) : undefined;

    if (embedded !== undefined) {
      return embedded;
    }

    const name = this.glyphName(code);

    if (metrics) {
      return name === undefined ? metrics.missingWidth : metrics.width(name);
    }

    return (substitute ? this.programAdvance(substitute, code) : undefined) ?? missingWidth;
  }

  private programAdvance(program: FontProgram, code: CharCode): number | undefined {
    const glyphId = this.lookup(program, code);

    return glyphId === undefined ? undefined : program.advanceWidth(glyphId);
  }

  glyphId(code: CharCode): number | undefined {
    const program = this.program;

    // The box substitute has a glyph for every code
    return program ? this.lookup(program, code) : code.code;
  }

  private lookup(program: FontProgram, code: CharCode): number | undefined {
    const name = this.glyphName(code);
    const byName = name === undefined ? undefined : program.glyphIdForName(name);

    if (byName !== undefined) {
      return byName;
    }

    const byCode = program.glyphIdForCode(code.code);

    if (byCode !== undefined || program === this.data.program) {
      return byCode;
    }

    // Substitutes fall back to the character the code stands for
    const unicode = this.data.toUnicode?.codePoint(code.code);

    return unicode === undefined ? undefined : program.glyphIdForUnicode(unicode);
  }

  glyphPath(glyphId: number, code: CharCode): Path | undefined {
    const program = this.program;

    if (program) {
      return program.glyphPath(glyphId);
    }

    const name = this.glyphName(code);
    const unicode = this.data.toUnicode?.codePoint(code.code) ?? (name ? glyphNameToUnicode(name) : undefined);

    return boxGlyph(this.width(code), isBlank(unicode) || code.code === 0x20);
  }
}
