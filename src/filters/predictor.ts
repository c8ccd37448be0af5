import type { PdfDict } from "#src/objects/pdf-dict";

/**
 * Reverse a predictor applied before compression (PDF 1.7 spec 7.4.4.4).
 *
 * Predictor values:
 * - 1: No prediction (passthrough)
 * - 2: TIFF Predictor 2 (horizontal differencing)
 * - 10-15: PNG predictors (per-row filter byte)
 */
export function applyPredictor(data: Uint8Array, params: PdfDict): Uint8Array {
  const predictor = params.numberOr("Predictor", 1);

  if (predictor === 1) {
    return data;
  }

  const columns = params.numberOr("Columns", 1);
  const colors = params.numberOr("Colors", 1);
  const bpc = params.numberOr("BitsPerComponent", 8);

  const bytesPerPixel = Math.max(1, Math.ceil((colors * bpc) / 8));
  const bytesPerRow = Math.ceil((columns * colors * bpc) / 8);

  if (predictor === 2) {
    return decodeTiff(data, bytesPerRow, columns, colors, bpc);
  }

  if (predictor >= 10 && predictor <= 15) {
    return decodePng(data, bytesPerRow, bytesPerPixel);
  }

  throw new Error(`Unknown predictor value: ${predictor}`);
}

/**
 * TIFF Predictor 2: each sample is a difference from the same component of
 * the previous pixel in the row. Works on unpacked samples so that 1, 2, 4
 * and 16-bit components wrap at their own width.
 */
function decodeTiff(
  data: Uint8Array,
  bytesPerRow: number,
  columns: number,
  colors: number,
  bpc: number,
): Uint8Array {
  const output = new Uint8Array(data.length);
  const rows = Math.floor(data.length / bytesPerRow);
  const max = 2 ** bpc;
  const samplesPerRow = columns * colors;

  for (let row = 0; row < rows; row++) {
    const offset = row * bytesPerRow;
    const samples = new Array<number>(samplesPerRow);

    for (let s = 0; s < samplesPerRow; s++) {
      const delta = readSample(data, offset, s, bpc);
      const left = s >= colors ? (samples[s - colors] ?? 0) : 0;

      samples[s] = (delta + left) % max;
    }

    for (let s = 0; s < samplesPerRow; s++) {
      writeSample(output, offset, s, bpc, samples[s] ?? 0);
    }
  }

  // Trailing partial row is copied through
  output.set(data.subarray(rows * bytesPerRow), rows * bytesPerRow);

  return output;
}

function readSample(data: Uint8Array, rowOffset: number, index: number, bpc: number): number {
  if (bpc === 8) {
    return data[rowOffset + index];
  }

  if (bpc === 16) {
    return (data[rowOffset + index * 2] << 8) | data[rowOffset + index * 2 + 1];
  }

  const bit = index * bpc;
  const byte = data[rowOffset + (bit >> 3)];
  const shift = 8 - bpc - (bit & 7);

  return (byte >> shift) & ((1 << bpc) - 1);
}

function writeSample(out: Uint8Array, rowOffset: number, index: number, bpc: number, value: number): void {
  if (bpc === 8) {
    out[rowOffset + index] = value;
    return;
  }

  if (bpc === 16) {
    out[rowOffset + index * 2] = value >> 8;
    out[rowOffset + index * 2 + 1] = value & 0xff;
    return;
  }

  const bit = index * bpc;
  const shift = 8 - bpc - (bit & 7);

  out[rowOffset + (bit >> 3)] |= value << shift;
}

/**
 * PNG predictors. Every row starts with its own filter-type byte
 * (None, Sub, Up, Average, Paeth); the predictor number only announces
 * that PNG prediction is in use.
 */
function decodePng(data: Uint8Array, bytesPerRow: number, bytesPerPixel: number): Uint8Array {
  const inputRowSize = bytesPerRow + 1;
  const rows = Math.floor(data.length / inputRowSize);
  const output = new Uint8Array(rows * bytesPerRow);

  for (let row = 0; row < rows; row++) {
    const filterType = data[row * inputRowSize];
    const input = data.subarray(row * inputRowSize + 1, (row + 1) * inputRowSize);
    const out = output.subarray(row * bytesPerRow, (row + 1) * bytesPerRow);
    const prev = row > 0 ? output.subarray((row - 1) * bytesPerRow, row * bytesPerRow) : null;

    for (let i = 0; i < bytesPerRow; i++) {
      const left = i >= bytesPerPixel ? out[i - bytesPerPixel] : 0;
      const up = prev ? prev[i] : 0;
      const upLeft = prev && i >= bytesPerPixel ? prev[i - bytesPerPixel] : 0;

      let predicted: number;

      switch (filterType) {
        case 1:
          predicted = left;
          break;
        case 2:
          predicted = up;
          break;
        case 3:
          predicted = (left + up) >> 1;
          break;
        case 4:
          predicted = paeth(left, up, upLeft);
          break;
        default:
          // 0, and unknown types treated as None (lenient)
          predicted = 0;
      }

      out[i] = (input[i] + predicted) & 0xff;
    }
  }

  return output;
}

/**
 * Returns whichever of a, b, c is closest to a + b - c, preferring a then b.
 */
function paeth(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);

  if (pa <= pb && pa <= pc) {
    return a;
  }

  return pb <= pc ? b : c;
}
