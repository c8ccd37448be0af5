/**
 * Per-document cache of glyph outlines, keyed by (font id, glyph id).
 */

import type { CharCode } from "./cmap";
import { UndefinedGlyphError } from "./errors";
import type { Glyph, OutlineFont } from "./pdf-font";

export class GlyphCache {
  private readonly glyphs = new Map<string, Glyph>();

  get size(): number {
    return this.glyphs.size;
  }

  /**
   * The glyph a code selects. Building a glyph twice is harmless; the
   * first one stored is kept.
   *
   * @throws {UndefinedGlyphError} when the font has no glyph for the code
   */
  glyphForCode(font: OutlineFont, code: CharCode): Glyph {
    const glyphId = font.glyphId(code);

    if (glyphId === undefined) {
      throw new UndefinedGlyphError(font.baseFontName, code.code);
    }

    const key = `${font.id}:${glyphId}`;
    const cached = this.glyphs.get(key);

    if (cached) {
      return cached;
    }

    const path = font.glyphPath(glyphId, code);

    if (!path) {
      throw new UndefinedGlyphError(font.baseFontName, code.code);
    }

    const glyph: Glyph = { glyphId, path, advance: font.width(code) };

    if (!this.glyphs.has(key)) {
      this.glyphs.set(key, glyph);
    }

    return this.glyphs.get(key) ?? glyph;
  }

  clear(): void {
    this.glyphs.clear();
  }
}

