import type { Path } from "#src/scene/path";

/**
 * A parsed font program behind a format-independent interface.
 *
 * Outlines and advances are in glyph space, 1000 units per em. Lookups
 * return undefined when the program has no such glyph; glyph 0 (.notdef)
 * counts as missing for lookups by code, name or Unicode.
 */
export interface FontProgram {
  readonly format: "TrueType" | "OpenType" | "CFF" | "Type1";
  readonly numGlyphs: number;

  glyphPath(glyphId: number): Path | undefined;
  advanceWidth(glyphId: number): number | undefined;

  glyphIdForName(name: string): number | undefined;
  /** Glyph for a code under the program's built-in encoding */
  glyphIdForCode(code: number): number | undefined;
  glyphIdForUnicode(codePoint: number): number | undefined;
  /** Glyph for a CID; for fonts that are not CID-keyed, CIDs are glyph ids */
  glyphIdForCid(cid: number): number | undefined;
}

export function nonZero(glyphId: number | undefined): number | undefined {
  return glyphId === undefined || glyphId === 0 ? undefined : glyphId;
}
