import type { PdfDict } from "#src/objects/pdf-dict";
import type { Filter } from "./filter";
import { applyPredictor } from "./predictor";

const CLEAR_CODE = 256;
const EOD_CODE = 257;
const FIRST_FREE = 258;
const MAX_CODES = 4096;

/**
 * LZWDecode filter.
 *
 * Variable-length codes from 9 to 12 bits, MSB first. With /EarlyChange 1
 * (the default) the code width grows one code early, as TIFF writers did.
 */
export class LZWFilter implements Filter {
  readonly name = "LZWDecode";

  async decode(data: Uint8Array, params?: PdfDict): Promise<Uint8Array> {
    const earlyChange = params?.numberOr("EarlyChange", 1) ?? 1;
    const result = lzwDecode(data, earlyChange);

    if (params && params.numberOr("Predictor", 1) > 1) {
      return applyPredictor(result, params);
    }

    return result;
  }
}

function lzwDecode(data: Uint8Array, earlyChange: number): Uint8Array {
  const output: number[] = [];
  const table: number[][] = [];

  for (let i = 0; i < 256; i++) {
    table.push([i]);
  }

  // Placeholders for the clear and EOD codes
  table.push([], []);

  let bitBuffer = 0;
  let bitCount = 0;
  let offset = 0;
  let codeLength = 9;
  let previous: number[] | null = null;

  const readCode = (): number => {
    while (bitCount < codeLength) {
      if (offset >= data.length) {
        return EOD_CODE;
      }

      bitBuffer = ((bitBuffer << 8) | data[offset++]) & 0xffffff;
      bitCount += 8;
    }

    bitCount -= codeLength;

    return (bitBuffer >>> bitCount) & ((1 << codeLength) - 1);
  };

  for (;;) {
    const code = readCode();

    if (code === EOD_CODE) {
      break;
    }

    if (code === CLEAR_CODE) {
      table.length = FIRST_FREE;
      codeLength = 9;
      previous = null;
      continue;
    }

    let entry: number[];

    if (code < table.length) {
      entry = table[code];
    } else if (code === table.length && previous) {
      entry = [...previous, previous[0]];
    } else {
      // Corrupt code: keep what was decoded so far
      break;
    }

    output.push(...entry);

    if (previous && table.length < MAX_CODES) {
      table.push([...previous, entry[0]]);
    }

    previous = entry;

    if (table.length + earlyChange >= 1 << codeLength && codeLength < 12) {
      codeLength++;
    }
  }

  return new Uint8Array(output);
}
