/**
 * Build a {@link PdfFont} from a font dictionary.
 */

import type { Matrix } from "#src/helpers/matrix";
import type { RefResolver } from "#src/objects/pdf-ref";
import type { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { isDictLike, isPdfStream } from "#src/objects/pdf-object";
import type { PdfStream } from "#src/objects/pdf-stream";
import { CMap, parseCMap, predefinedCMap } from "./cmap";
import { CompositeFont } from "./composite-font";
import { parseEmbeddedProgram } from "./embedded-parser";
import { applyDifferences, type Encoding, getEncoding } from "./encodings";
import { FontError } from "./errors";
import type { FontDirectory } from "./font-directory";
import type { FontProgram } from "./font-program";
import type { PdfFont, VerticalMetrics } from "./pdf-font";
import { SimpleFont } from "./simple-font";
import { standardMetrics } from "./standard-14";
import { parseToUnicode, type ToUnicodeMap } from "./to-unicode";
import { Type3Font } from "./type3-font";

/** FontDescriptor /Flags bit: the font uses symbols outside the standard Latin set */
const FLAG_SYMBOLIC = 1 << 2;

const EMPTY_ENCODING: Encoding = new Array<string | null>(256).fill(null);

export interface FontLoadContext {
  resolver: RefResolver;
  decodeStream: (stream: PdfStream) => Promise<Uint8Array>;
  /** Substitutes for fonts that are not embedded */
  fontDirectory?: FontDirectory | null;
  onWarning?: (message: string) => void;
}

/**
 * Load a font dictionary.
 *
 * Problems with embedded programs, CMaps and ToUnicode maps are reported
 * through `onWarning` and the font falls back to a substitute; only a
 * font dictionary that cannot describe any font raises.
 *
 * @param id - Identifier for glyph cache keys, unique per document
 * @throws {FontError} for a Type0 font without a descendant CIDFont
 */
export async function loadFont(dict: PdfDict, id: number, ctx: FontLoadContext): Promise<PdfFont> {
  const subtype = dict.getName("Subtype", ctx.resolver)?.value;

  switch (subtype) {
    case "Type0":
      return loadCompositeFont(dict, id, ctx);
    case "Type3":
      return loadType3Font(dict, id, ctx);
    case "Type1":
    case "MMType1":
    case "TrueType":
      return loadSimpleFont(dict, subtype, id, ctx);
    default:
      ctx.onWarning?.(`Unknown font subtype ${subtype ?? "(none)"}; treating it as Type1`);

      return loadSimpleFont(dict, "Type1", id, ctx);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Simple fonts
// ─────────────────────────────────────────────────────────────────────────────

async function loadSimpleFont(
  dict: PdfDict,
  subtype: string,
  id: number,
  ctx: FontLoadContext,
): Promise<SimpleFont> {
  const { resolver } = ctx;
  const baseFontName = dict.getName("BaseFont", resolver)?.value ?? "";
  const descriptor = dict.getDict("FontDescriptor", resolver);
  const flags = descriptor?.numberOr("Flags", 0, resolver) ?? 0;
  const program = descriptor ? await parseEmbeddedProgram(descriptor, ctx) : null;
  const substitute = program ? null : await findSubstitute(baseFontName, ctx);
  const metrics = standardMetrics(baseFontName);

  return new SimpleFont(id, {
    subtype,
    baseFontName,
    encoding: simpleEncoding(dict, program, metrics?.name, (flags & FLAG_SYMBOLIC) !== 0, ctx),
    firstChar: dict.numberOr("FirstChar", 0, resolver),
    widths: dict.getArray("Widths", resolver)?.toNumbers(resolver) ?? [],
    missingWidth: descriptor?.numberOr("MissingWidth", 0, resolver) ?? 0,
    metrics,
    program,
    substitute,
    toUnicode: await readToUnicode(dict, ctx),
  });
}

/**
 * Glyph names by code. Null means the program's built-in encoding
 * applies throughout.
 */
function simpleEncoding(
  dict: PdfDict,
  program: FontProgram | null,
  standardName: string | undefined,
  symbolic: boolean,
  ctx: FontLoadContext,
): (string | null)[] | null {
  const value = dict.get("Encoding", ctx.resolver);
  let base: Encoding | null | undefined;
  let differences: PdfArray | undefined;

  if (value?.type === "name") {
    base = getEncoding(value.value);

    if (!base) {
      ctx.onWarning?.(`Unknown encoding /${value.value}`);
    }
  } else if (isDictLike(value)) {
    const baseName = value.getName("BaseEncoding", ctx.resolver)?.value;

    base = baseName === undefined ? undefined : getEncoding(baseName);
    differences = value.getArray("Differences", ctx.resolver);
  }

  base ??= defaultEncoding(program, standardName, symbolic);

  if (differences) {
    return applyDifferences(base ?? EMPTY_ENCODING, differences, ctx.resolver);
  }

  return base ? [...base] : null;
}

/**
 * Encoding of a font dictionary without a base encoding: the program's
 * own for embedded Type 1 and CFF programs and for symbolic fonts,
 * otherwise StandardEncoding (SymbolEncoding for Symbol).
 */
function defaultEncoding(
  program: FontProgram | null,
  standardName: string | undefined,
  symbolic: boolean,
): Encoding | null {
  if (program && (program.format === "Type1" || program.format === "CFF" || symbolic)) {
    return null;
  }

  if (!program && standardName === "Symbol") {
    return getEncoding("SymbolEncoding") ?? null;
  }

  if (!program && standardName === "ZapfDingbats") {
    return null;
  }

  return getEncoding("StandardEncoding") ?? null;
}

async function findSubstitute(baseFontName: string, ctx: FontLoadContext): Promise<FontProgram | null> {
  if (!ctx.fontDirectory) {
    return null;
  }

  const substitute = await ctx.fontDirectory.substitute(baseFontName);

  if (!substitute) {
    ctx.onWarning?.(`No substitute font for ${baseFontName || "(unnamed font)"}`);
  }

  return substitute;
}

async function readToUnicode(dict: PdfDict, ctx: FontLoadContext): Promise<ToUnicodeMap | undefined> {
  const stream = dict.getStream("ToUnicode", ctx.resolver);

  if (!stream) {
    return undefined;
  }

  try {
    return parseToUnicode(await ctx.decodeStream(stream));
  } catch (error) {
    ctx.onWarning?.(`Unreadable ToUnicode map: ${messageOf(error)}`);

    return undefined;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Type 3 fonts
// ─────────────────────────────────────────────────────────────────────────────

const DEFAULT_TYPE3_MATRIX: Matrix = [0.001, 0, 0, 0.001, 0, 0];

function loadType3Font(dict: PdfDict, id: number, ctx: FontLoadContext): Type3Font {
  const { resolver } = ctx;
  const matrixValues = dict.getArray("FontMatrix", resolver)?.toNumbers(resolver) ?? [];
  const fontMatrix: Matrix =
    matrixValues.length === 6 && matrixValues.every(Number.isFinite)
      ? [matrixValues[0], matrixValues[1], matrixValues[2], matrixValues[3], matrixValues[4], matrixValues[5]]
      : DEFAULT_TYPE3_MATRIX;
  const encodingDict = dict.getDict("Encoding", resolver);
  const differences = encodingDict?.getArray("Differences", resolver);

  return new Type3Font(id, {
    baseFontName: dict.getName("Name", resolver)?.value ?? dict.getName("BaseFont", resolver)?.value ?? "",
    fontMatrix,
    charProcs: dict.getDict("CharProcs", resolver) ?? new PdfDict(),
    encoding: differences ? applyDifferences(EMPTY_ENCODING, differences, resolver) : EMPTY_ENCODING,
    firstChar: dict.numberOr("FirstChar", 0, resolver),
    widths: dict.getArray("Widths", resolver)?.toNumbers(resolver) ?? [],
    resources: dict.getDict("Resources", resolver),
    resolver,
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Composite fonts
// ─────────────────────────────────────────────────────────────────────────────

async function loadCompositeFont(dict: PdfDict, id: number, ctx: FontLoadContext): Promise<CompositeFont> {
  const { resolver } = ctx;
  const baseFontName = dict.getName("BaseFont", resolver)?.value ?? "";
  const descendant = dict.getArray("DescendantFonts", resolver)?.at(0, resolver);

  if (!isDictLike(descendant)) {
    throw new FontError(`Type0 font ${baseFontName} has no descendant CIDFont`);
  }

  const descriptor = descendant.getDict("FontDescriptor", resolver);
  const program = descriptor ? await parseEmbeddedProgram(descriptor, ctx) : null;
  const substitute = program ? null : await findSubstitute(baseFontName, ctx);
  const dw2 = descendant.getArray("DW2", resolver)?.toNumbers(resolver) ?? [];

  return new CompositeFont(id, {
    baseFontName,
    cmap: await readCMap(dict, ctx),
    cidFontType:
      descendant.getName("Subtype", resolver)?.value === "CIDFontType0" ? "CIDFontType0" : "CIDFontType2",
    widths: parseWidths(descendant.getArray("W", resolver), resolver),
    defaultWidth: descendant.numberOr("DW", 1000, resolver),
    verticalMetrics: parseVerticalWidths(descendant.getArray("W2", resolver), resolver),
    defaultVertical: dw2.length === 2 && dw2.every(Number.isFinite) ? [dw2[0], dw2[1]] : [880, -1000],
    cidToGid: await readCidToGid(descendant, ctx),
    program,
    substitute,
    toUnicode: await readToUnicode(dict, ctx),
  });
}

/**
 * The Type0 /Encoding: a predefined CMap name or an embedded CMap stream.
 * Unknown names fall back to Identity in the writing direction the name's
 * suffix gives.
 */
async function readCMap(dict: PdfDict, ctx: FontLoadContext): Promise<CMap> {
  const value = dict.get("Encoding", ctx.resolver);

  if (value?.type === "name") {
    const predefined = predefinedCMap(value.value);

    if (predefined) {
      return predefined;
    }

    ctx.onWarning?.(`Unsupported CMap /${value.value}; using Identity`);

    return CMap.identity(value.value.endsWith("-V"));
  }

  if (isPdfStream(value)) {
    try {
      const cmap = parseCMap(await ctx.decodeStream(value), { useCMap: predefinedCMap });
      const wMode = value.getNumber("WMode", ctx.resolver)?.value;

      if (wMode !== undefined) {
        cmap.vertical = wMode === 1;
      }

      return cmap;
    } catch (error) {
      ctx.onWarning?.(`Unreadable CMap: ${messageOf(error)}`);
    }
  } else {
    ctx.onWarning?.("Type0 font without a CMap; using Identity-H");
  }

  return CMap.identity(false);
}

/**
 * /W: `c [w1 w2 ...]` gives consecutive CIDs from c; `cFirst cLast w`
 * gives one width to a range.
 */
export function parseWidths(array: PdfArray | undefined, resolver?: RefResolver): Map<number, number> {
  const widths = new Map<number, number>();

  if (!array) {
    return widths;
  }

  let i = 0;

  while (i < array.length) {
    const first = array.numberAt(i, resolver);
    const next = array.at(i + 1, resolver);

    if (first === undefined) {
      break;
    }

    if (next?.type === "array") {
      next.toNumbers(resolver).forEach((width, offset) => {
        if (Number.isFinite(width)) {
          widths.set(first + offset, width);
        }
      });
      i += 2;
    } else {
      const last = array.numberAt(i + 1, resolver);
      const width = array.numberAt(i + 2, resolver);

      if (last === undefined || width === undefined) {
        break;
      }

      for (let cid = first; cid <= last && cid - first <= 0xffff; cid++) {
        widths.set(cid, width);
      }

      i += 3;
    }
  }

  return widths;
}

/**
 * /W2: like /W with triples `w1y vx vy` per CID.
 */
function parseVerticalWidths(
  array: PdfArray | undefined,
  resolver: RefResolver,
): Map<number, VerticalMetrics> {
  const metrics = new Map<number, VerticalMetrics>();

  if (!array) {
    return metrics;
  }

  let i = 0;

  while (i < array.length) {
    const first = array.numberAt(i, resolver);
    const next = array.at(i + 1, resolver);

    if (first === undefined) {
      break;
    }

    if (next?.type === "array") {
      const values = next.toNumbers(resolver);

      for (let j = 0; j + 2 < values.length; j += 3) {
        metrics.set(first + j / 3, { advance: values[j], originX: values[j + 1], originY: values[j + 2] });
      }

      i += 2;
    } else {
      const last = array.numberAt(i + 1, resolver);
      const values = [2, 3, 4].map(offset => array.numberAt(i + offset, resolver));
      const [advance, originX, originY] = values;

      if (last === undefined || advance === undefined || originX === undefined || originY === undefined) {
        break;
      }

      for (let cid = first; cid <= last && cid - first <= 0xffff; cid++) {
        metrics.set(cid, { advance, originX, originY });
      }

      i += 5;
    }
  }

  return metrics;
}

async function readCidToGid(descendant: PdfDict, ctx: FontLoadContext): Promise<Uint16Array | null> {
  const stream = descendant.getStream("CIDToGIDMap", ctx.resolver);

  if (!stream) {
    return null;
  }

  try {
    const data = await ctx.decodeStream(stream);
    const map = new Uint16Array(data.length >> 1);

    for (let i = 0; i < map.length; i++) {
      map[i] = (data[i * 2] << 8) | data[i * 2 + 1];
    }

    return map;
  } catch (error) {
    ctx.onWarning?.(`Unreadable CIDToGIDMap: ${messageOf(error)}`);

    return null;
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
