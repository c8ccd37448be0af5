/**
 * Errors raised while loading fonts and resolving glyphs.
 */

export class FontError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FontError";
  }
}

/**
 * A character code has no glyph in the font. The interpreter skips the
 * glyph and keeps the advance.
 */
export class UndefinedGlyphError extends FontError {
  constructor(
    readonly fontName: string,
    readonly code: number,
  ) {
    super(`No glyph for code ${code} in font ${fontName}`);
    this.name = "UndefinedGlyphError";
  }
}
