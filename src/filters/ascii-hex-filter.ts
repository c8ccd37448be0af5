import { hexValue, isWhitespace } from "#src/helpers/chars";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { Filter } from "./filter";

const END_MARKER = 0x3e; // >

/**
 * ASCIIHexDecode filter.
 *
 * Pairs of hex digits, whitespace ignored, terminated by '>'.
 * An odd final digit is padded with 0.
 */
export class ASCIIHexFilter implements Filter {
  readonly name = "ASCIIHexDecode";

  async decode(data: Uint8Array, _params?: PdfDict): Promise<Uint8Array> {
    const result = new Uint8Array(Math.ceil(data.length / 2));
    let length = 0;
    let high = -1;

    for (const byte of data) {
      if (byte === END_MARKER) {
        break;
      }

      if (isWhitespace(byte)) {
        continue;
      }

      const nibble = hexValue(byte);

      // Invalid character - skip (lenient parsing)
      if (nibble === -1) {
        continue;
      }

      if (high === -1) {
        high = nibble;
      } else {
        result[length++] = (high << 4) | nibble;
        high = -1;
      }
    }

    if (high !== -1) {
      result[length++] = high << 4;
    }

    return result.slice(0, length);
  }
}
