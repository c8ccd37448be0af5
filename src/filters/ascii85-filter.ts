import { isWhitespace } from "#src/helpers/chars";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { Filter } from "./filter";

const TILDE = 0x7e;
const ZERO_GROUP = 0x7a; // z
const FIRST_DIGIT = 0x21; // !
const LAST_DIGIT = 0x75; // u

/**
 * ASCII85Decode filter.
 *
 * Five characters in '!'..'u' encode four bytes; 'z' stands for four zero
 * bytes; '~>' ends the data. A final partial group of n characters yields
 * n - 1 bytes.
 *
 * Example: "87cURD]i,\"Ebo80~>" decodes to "Hello World!"
 */
export class ASCII85Filter implements Filter {
  readonly name = "ASCII85Decode";

  async decode(data: Uint8Array, _params?: PdfDict): Promise<Uint8Array> {
    const out: number[] = [];
    const group: number[] = [];

    // Optional "<~" prefix
    let start = 0;

    if (data[0] === 0x3c && data[1] === TILDE) {
      start = 2;
    }

    for (let i = start; i < data.length; i++) {
      const byte = data[i];

      if (byte === TILDE) {
        break;
      }

      if (isWhitespace(byte)) {
        continue;
      }

      if (byte === ZERO_GROUP && group.length === 0) {
        out.push(0, 0, 0, 0);
        continue;
      }

      if (byte < FIRST_DIGIT || byte > LAST_DIGIT) {
        continue;
      }

      group.push(byte - FIRST_DIGIT);

      if (group.length === 5) {
        pushGroup(out, group, 4);
        group.length = 0;
      }
    }

    if (group.length > 1) {
      const count = group.length - 1;

      while (group.length < 5) {
        group.push(LAST_DIGIT - FIRST_DIGIT);
      }

      pushGroup(out, group, count);
    }

    return new Uint8Array(out);
  }
}

function pushGroup(out: number[], digits: number[], count: number): void {
  let value = 0;

  for (const digit of digits) {
    value = value * 85 + digit;
  }

  // Values above 2^32 - 1 only occur in malformed input; wrap like a uint32
  value >>>= 0;

  const bytes = [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff];

  out.push(...bytes.slice(0, count));
}
