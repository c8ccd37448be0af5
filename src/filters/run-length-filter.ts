import type { PdfDict } from "#src/objects/pdf-dict";
import type { Filter } from "./filter";

const EOD = 128;

/**
 * RunLengthDecode filter.
 *
 * A length byte n in 0..127 copies the next n + 1 bytes literally;
 * 129..255 repeats the next byte 257 - n times; 128 ends the data.
 */
export class RunLengthFilter implements Filter {
  readonly name = "RunLengthDecode";

  async decode(data: Uint8Array, _params?: PdfDict): Promise<Uint8Array> {
    const out: number[] = [];
    let i = 0;

    while (i < data.length) {
      const length = data[i++];

      if (length === EOD) {
        break;
      }

      if (length < EOD) {
        const end = Math.min(i + length + 1, data.length);

        for (; i < end; i++) {
          out.push(data[i]);
        }
      } else {
        if (i >= data.length) {
          break;
        }

        const value = data[i++];

        for (let n = 0; n < 257 - length; n++) {
          out.push(value);
        }
      }
    }

    return new Uint8Array(out);
  }
}
