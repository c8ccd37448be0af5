/**
 * PDF functions: sampled (type 0), exponential (type 2), stitching
 * (type 3) and PostScript calculator (type 4).
 *
 * A loaded function is a plain closure from inputs to outputs. Inputs are
 * clipped to /Domain and outputs to /Range.
 */

import type { PdfDict } from "#src/objects/pdf-dict";
import { isDictLike, isPdfStream, type PdfObject } from "#src/objects/pdf-object";
import { ContentError } from "./errors";
import type { LoadContext } from "./load-context";
import { parsePsProgram, runPsProgram } from "./ps-calculator";

export type PdfFunction = (input: readonly number[]) => number[];

const MAX_DEPTH = 16;
const MAX_SAMPLES = 1 << 24;
const VALID_BITS = new Set([1, 2, 4, 8, 12, 16, 24, 32]);

export function interpolate(x: number, xMin: number, xMax: number, yMin: number, yMax: number): number {
  if (xMax === xMin) {
    return yMin;
  }

  return yMin + ((x - xMin) * (yMax - yMin)) / (xMax - xMin);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Clip each value to its [min, max] pair in `bounds`. Values without a
 * pair pass through.
 */
function clipTo(values: readonly number[], bounds: readonly number[] | undefined): number[] {
  if (!bounds) {
    return [...values];
  }

  return values.map((value, i) => {
    const min = bounds[2 * i];
    const max = bounds[2 * i + 1];

    return min === undefined || max === undefined ? value : clamp(value, min, max);
  });
}

function numbers(dict: PdfDict, key: string, ctx: LoadContext): number[] | undefined {
  const array = dict.getArray(key, ctx.resolver);

  if (!array) {
    return undefined;
  }

  const values = array.toNumbers(ctx.resolver);

  if (values.some(n => !Number.isFinite(n))) {
    throw new ContentError(`Function /${key} contains non-numbers`);
  }

  return values;
}

function requireNumbers(dict: PdfDict, key: string, ctx: LoadContext): number[] {
  const values = numbers(dict, key, ctx);

  if (!values || values.length === 0 || values.length % 2 !== 0) {
    throw new ContentError(`Function has no valid /${key}`);
  }

  return values;
}

/**
 * Load a function object, or an array of single-output functions whose
 * results are concatenated.
 *
 * @throws {ContentError} if the function is malformed or its type unknown
 */
export async function loadFunction(obj: PdfObject, ctx: LoadContext, depth = 0): Promise<PdfFunction> {
  if (depth > MAX_DEPTH) {
    throw new ContentError("Functions nested too deeply");
  }

  const value = obj.type === "ref" ? ctx.resolver(obj) : obj;

  if (value?.type === "array") {
    const parts = await Promise.all(
      value.toArray().map(item => loadFunction(item, ctx, depth + 1)),
    );

    return input => parts.flatMap(part => part(input));
  }

  if (!isDictLike(value)) {
    throw new ContentError("Function is not a dictionary or stream");
  }

  const domain = requireNumbers(value, "Domain", ctx);
  const range = numbers(value, "Range", ctx);
  const type = value.getNumber("FunctionType", ctx.resolver)?.value;

  let evaluate: PdfFunction;

  switch (type) {
    case 0: {
      if (!isPdfStream(value)) {
        throw new ContentError("Sampled function is not a stream");
      }

      const data = await ctx.decodeStream(value);

      evaluate = sampledFunction(value, data, domain, ctx);
      break;
    }
    case 2:
      evaluate = exponentialFunction(value, ctx);
      break;
    case 3:
      evaluate = await stitchingFunction(value, domain, ctx, depth);
      break;
    case 4: {
      if (!isPdfStream(value)) {
        throw new ContentError("PostScript function is not a stream");
      }

      if (!range) {
        throw new ContentError("PostScript function has no /Range");
      }

      const program = parsePsProgram(await ctx.decodeStream(value));
      const outputs = range.length / 2;

      evaluate = input => runPsProgram(program, input, outputs);
      break;
    }
    default:
      throw new ContentError(`Unknown function type ${type ?? "(missing)"}`);
  }

  const inputs = domain.length / 2;

  return input => {
    const clipped = clipTo(input.slice(0, inputs), domain);

    while (clipped.length < inputs) {
      clipped.push(domain[2 * clipped.length] ?? 0);
    }

    return clipTo(evaluate(clipped), range);
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Type 0
// ─────────────────────────────────────────────────────────────────────────────

function readSamples(data: Uint8Array, count: number, bits: number): Float64Array {
  const samples = new Float64Array(count);
  let bitPos = 0;

  for (let i = 0; i < count; i++) {
    let value = 0;

    for (let b = 0; b < bits; b++) {
      const byte = data[bitPos >> 3] ?? 0;

      value = value * 2 + ((byte >> (7 - (bitPos & 7))) & 1);
      bitPos++;
    }

    samples[i] = value;
  }

  return samples;
}

function sampledFunction(dict: PdfDict, data: Uint8Array, domain: number[], ctx: LoadContext): PdfFunction {
  const size = numbers(dict, "Size", ctx)?.map(Math.trunc);
  const bits = dict.getNumber("BitsPerSample", ctx.resolver)?.value ?? 0;
  const range = requireNumbers(dict, "Range", ctx);
  const m = domain.length / 2;
  const n = range.length / 2;

  if (!size || size.length !== m || size.some(s => s < 1)) {
    throw new ContentError("Sampled function has no valid /Size");
  }

  if (!VALID_BITS.has(bits)) {
    throw new ContentError(`Sampled function has invalid /BitsPerSample ${bits}`);
  }

  const total = size.reduce((product, s) => product * s, n);

  if (total > MAX_SAMPLES) {
    throw new ContentError("Sampled function is too large");
  }

  const encode = numbers(dict, "Encode", ctx) ?? size.flatMap(s => [0, s - 1]);
  const decode = numbers(dict, "Decode", ctx) ?? range;
  const samples = readSamples(data, total, bits);
  const maxSample = 2 ** bits - 1;

  const strides: number[] = [];
  let stride = n;

  for (const s of size) {
    strides.push(stride);
    stride *= s;
  }

  return input => {
    const base: number[] = [];
    const fractions: number[] = [];

    for (let i = 0; i < m; i++) {
      const s = size[i] ?? 1;
      const x = input[i] ?? 0;
      const encoded = interpolate(
        x,
        domain[2 * i] ?? 0,
        domain[2 * i + 1] ?? 0,
        encode[2 * i] ?? 0,
        encode[2 * i + 1] ?? 0,
      );
      const e = clamp(encoded, 0, s - 1);
      const index = Math.min(Math.floor(e), Math.max(s - 2, 0));

      base.push(index);
      fractions.push(s === 1 ? 0 : e - index);
    }

    const output = new Array<number>(n).fill(0);

    // Multilinear interpolation over the 2^m surrounding samples
    for (let corner = 0; corner < 1 << m; corner++) {
      let weight = 1;
      let offset = 0;

      for (let i = 0; i < m; i++) {
        const high = (corner >> i) & 1;
        const fraction = fractions[i] ?? 0;

        weight *= high ? fraction : 1 - fraction;
        offset += ((base[i] ?? 0) + high) * (strides[i] ?? 0);
      }

      if (weight === 0) {
        continue;
      }

      for (let j = 0; j < n; j++) {
        output[j] = (output[j] ?? 0) + weight * (samples[offset + j] ?? 0);
      }
    }

    return output.map((sample, j) =>
      interpolate(sample, 0, maxSample, decode[2 * j] ?? 0, decode[2 * j + 1] ?? 0),
    );
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Type 2
// ─────────────────────────────────────────────────────────────────────────────

function exponentialFunction(dict: PdfDict, ctx: LoadContext): PdfFunction {
  const c0 = numbers(dict, "C0", ctx) ?? [0];
  const c1 = numbers(dict, "C1", ctx) ?? [1];
  const exponent = dict.getNumber("N", ctx.resolver)?.value;

  if (exponent === undefined) {
    throw new ContentError("Exponential function has no /N");
  }

  if (c0.length !== c1.length) {
    throw new ContentError("Exponential function /C0 and /C1 differ in length");
  }

  return input => {
    const t = (input[0] ?? 0) ** exponent;

    return c0.map((start, j) => start + t * ((c1[j] ?? 0) - start));
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Type 3
// ─────────────────────────────────────────────────────────────────────────────

async function stitchingFunction(
  dict: PdfDict,
  domain: number[],
  ctx: LoadContext,
  depth: number,
): Promise<PdfFunction> {
  const list = dict.getArray("Functions", ctx.resolver);

  if (!list || list.length === 0) {
    throw new ContentError("Stitching function has no /Functions");
  }

  const functions = await Promise.all(list.toArray().map(item => loadFunction(item, ctx, depth + 1)));
  const k = functions.length;
  const bounds = numbers(dict, "Bounds", ctx) ?? [];
  const encode = numbers(dict, "Encode", ctx);

  if (bounds.length !== k - 1) {
    throw new ContentError("Stitching function /Bounds does not match /Functions");
  }

  if (!encode || encode.length !== 2 * k) {
    throw new ContentError("Stitching function /Encode does not match /Functions");
  }

  const [d0 = 0, d1 = 1] = domain;

  return input => {
    const x = input[0] ?? 0;
    let i = bounds.findIndex(bound => x < bound);

    if (i < 0) {
      i = k - 1;
    }

    const low = i === 0 ? d0 : (bounds[i - 1] ?? d0);
    const high = i === k - 1 ? d1 : (bounds[i] ?? d1);
    const fn = functions[i];

    if (!fn) {
      return [];
    }

    return fn([interpolate(x, low, high, encode[2 * i] ?? 0, encode[2 * i + 1] ?? 0)]);
  };
}
