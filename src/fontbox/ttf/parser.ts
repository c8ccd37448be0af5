/**
 * sfnt container reader for TrueType and OpenType font files.
 */

import { BinaryScanner } from "#src/io/binary-scanner";
import { TrueTypeFont } from "./truetype-font";
import type { TableRecord } from "./types";

export type SfntFlavor = "truetype" | "opentype" | "collection";

const SIGNATURES: ReadonlyMap<number, SfntFlavor> = new Map([
  [0x00010000, "truetype"],
  // 'true', used by older Apple fonts
  [0x74727565, "truetype"],
  // 'OTTO'
  [0x4f54544f, "opentype"],
  // 'ttcf'
  [0x74746366, "collection"],
]);

/**
 * Tables a font needs before any glyph can be drawn. `standalone` tables
 * may be missing from embedded subsets, whose widths and encoding come
 * from the PDF font dictionary. `outline` tables are needed only when the
 * outlines are TrueType quadratics rather than CFF charstrings.
 */
const REQUIRED_TABLES: ReadonlyArray<{ tag: string; when: "always" | "standalone" | "outline" }> = [
  { tag: "head", when: "always" },
  { tag: "maxp", when: "always" },
  { tag: "hhea", when: "standalone" },
  { tag: "hmtx", when: "standalone" },
  { tag: "post", when: "standalone" },
  { tag: "cmap", when: "standalone" },
  { tag: "loca", when: "outline" },
  { tag: "glyf", when: "outline" },
];

export interface ParseOptions {
  /** Font comes from a PDF FontFile2/FontFile3 stream; default false */
  isEmbedded?: boolean;
}

/**
 * Classify font bytes by their sfnt signature, or null when they are not
 * an sfnt file at all.
 */
export function sfntFlavor(data: Uint8Array): SfntFlavor | null {
  if (data.length < 4) {
    return null;
  }

  return SIGNATURES.get(new BinaryScanner(data).readUint32()) ?? null;
}

/**
 * Read the table directory of a TrueType or OpenType font.
 *
 * Tables that run past the end of the data are dropped with a warning,
 * as truncated embedded subsets are common.
 *
 * @throws {Error} for collections, unknown signatures and missing tables
 */
export function parseTTF(data: Uint8Array, options: ParseOptions = {}): TrueTypeFont {
  const scanner = new BinaryScanner(data);
  const version = scanner.readUint32();
  const flavor = SIGNATURES.get(version);

  if (flavor === "collection") {
    throw new Error("TrueType collections (.ttc) are not supported");
  }

  if (flavor === undefined) {
    throw new Error(`Invalid font: unknown version 0x${version.toString(16)}`);
  }

  const numTables = scanner.readUint16();
  // searchRange, entrySelector, rangeShift
  scanner.skip(6);

  const tables = new Map<string, TableRecord>();

  for (let i = 0; i < numTables; i++) {
    const record: TableRecord = {
      tag: scanner.readTag(),
      checksum: scanner.readUint32(),
      offset: scanner.readUint32(),
      length: scanner.readUint32(),
    };

    // An empty glyf is legal: every glyph is blank
    if (record.length === 0 && record.tag !== "glyf") {
      continue;
    }

    if (record.offset + record.length > data.length) {
      console.warn(
        `Dropping sfnt table '${record.tag}' (offset ${record.offset}, length ${record.length}) ` +
          `beyond end of ${data.length}-byte font`,
      );
      continue;
    }

    tables.set(record.tag, record);
  }

  const cffOutlines = flavor === "opentype" && (tables.has("CFF ") || tables.has("CFF2"));

  for (const { tag, when } of REQUIRED_TABLES) {
    const needed =
      when === "always" ||
      (when === "standalone" && !options.isEmbedded) ||
      (when === "outline" && !cffOutlines);

    if (needed && !tables.has(tag)) {
      throw new Error(`Font has no '${tag}' table`);
    }
  }

  return new TrueTypeFont(data, version, tables);
}
