import { bytesToLatin1 } from "#src/helpers/buffer";
import { decodeTextString } from "#src/helpers/strings";

/**
 * PDF string object.
 *
 * In PDF: `(Hello World)` (literal) or `<48656C6C6F>` (hex)
 *
 * Stores raw bytes. Show-text operators feed the bytes to the font's
 * encoding; `asText()` is for metadata and other text strings.
 */
export class PdfString {
  get type(): "string" {
    return "string";
  }

  constructor(
    readonly bytes: Uint8Array,
    readonly format: "literal" | "hex" = "literal",
  ) {}

  /**
   * Decode as a PDF text string (UTF-16BE with BOM, or PDFDocEncoding).
   */
  asText(): string {
    return decodeTextString(this.bytes);
  }

  /**
   * Bytes as a Latin-1 string, one char per byte.
   */
  asLatin1(): string {
    return bytesToLatin1(this.bytes);
  }

  /**
   * Create a PdfString from a JavaScript string (encodes as UTF-8).
   */
  static fromString(str: string): PdfString {
    return new PdfString(new TextEncoder().encode(str), "literal");
  }

  /**
   * Create a PdfString from a hex string (e.g., "48656C6C6F").
   * Whitespace is ignored. Odd-length strings are padded with 0.
   */
  static fromHex(hex: string): PdfString {
    const clean = hex.replace(/\s/g, "");
    const padded = clean.length % 2 === 1 ? `${clean}0` : clean;

    const bytes = new Uint8Array(padded.length / 2);

    for (let i = 0; i < bytes.length; i++) {
      bytes[i] = parseInt(padded.slice(i * 2, i * 2 + 2), 16);
    }

    return new PdfString(bytes, "hex");
  }
}
