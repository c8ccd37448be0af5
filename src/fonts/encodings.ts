/**
 * Simple-font encodings and glyph names.
 */

import type { RefResolver } from "#src/objects/pdf-ref";
import type { PdfArray } from "#src/objects/pdf-array";
import encodings from "./data/encodings.json";
import glyphList from "./data/glyph-list.json";

/** 256 glyph names indexed by code; null where the encoding has no entry */
export type Encoding = readonly (string | null)[];

export type EncodingName = "StandardEncoding" | "WinAnsiEncoding" | "MacRomanEncoding" | "SymbolEncoding";

const ENCODINGS: Record<EncodingName, Encoding> = encodings;
const GLYPH_LIST: Record<string, number> = glyphList;

function isEncodingName(name: string): name is EncodingName {
  return name in ENCODINGS;
}

/**
 * Named base encoding. `MacExpertEncoding` and unknown names give undefined.
 */
export function getEncoding(name: string): Encoding | undefined {
  return isEncodingName(name) ? ENCODINGS[name] : undefined;
}

/**
 * Overlay a /Differences array (`[code /name /name code /name ...]`) on a
 * base encoding.
 */
export function applyDifferences(
  base: Encoding,
  differences: PdfArray,
  resolver?: RefResolver,
): (string | null)[] {
  const result = [...base];
  let code = 0;

  for (let i = 0; i < differences.length; i++) {
    const item = differences.at(i, resolver);

    if (item?.type === "number") {
      code = Math.trunc(item.value);
    } else if (item?.type === "name") {
      if (code >= 0 && code < 256) {
        result[code] = item.value;
      }

      code++;
    }
  }

  return result;
}

/**
 * Unicode code point for a glyph name: the glyph list, then the
 * `uniXXXX` and `uXXXX[XX]` forms. Suffixes after a period are ignored.
 */
export function glyphNameToUnicode(name: string): number | undefined {
  const base = name.split(".")[0];

  if (base in GLYPH_LIST) {
    return GLYPH_LIST[base];
  }

  const uni = /^uni([0-9A-F]{4})/.exec(base);

  if (uni) {
    return Number.parseInt(uni[1], 16);
  }

  const u = /^u([0-9A-F]{4,6})$/.exec(base);

  if (u) {
    const value = Number.parseInt(u[1], 16);

    return value <= 0x10ffff ? value : undefined;
  }

  return undefined;
}
