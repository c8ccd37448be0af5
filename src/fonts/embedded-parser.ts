/**
 * Parse embedded font programs from a PDF FontDescriptor.
 *
 * PDFs embed font programs in three places:
 * - /FontFile: Type 1 font program (cleartext + eexec, or PFB)
 * - /FontFile2: TrueType font program
 * - /FontFile3: CFF or OpenType font program (with /Subtype)
 */

import { parseCFF } from "#src/fontbox/cff/parser";
import { parseTTF, sfntFlavor } from "#src/fontbox/ttf/parser";
import { parseType1 } from "#src/fontbox/type1/parser";
import type { RefResolver } from "#src/objects/pdf-ref";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { PdfStream } from "#src/objects/pdf-stream";
import {
  CFFCIDFontProgram,
  CFFType1FontProgram,
  type FontProgram,
  TrueTypeFontProgram,
  Type1FontProgram,
} from "./font-program";

export interface EmbeddedParserOptions {
  resolver: RefResolver;

  /**
   * Decode a stream to its raw bytes, all filters applied.
   */
  decodeStream: (stream: PdfStream) => Promise<Uint8Array>;

  /**
   * Receives a message for each program that fails to decode or parse.
   * Without it the failure is logged with `console.warn`.
   */
  onWarning?: (message: string) => void;
}

/**
 * Parse the embedded font program of a FontDescriptor.
 *
 * Tries FontFile2 (TrueType), FontFile3 (CFF/OpenType), then FontFile
 * (Type 1), returning the first program that parses. A malformed program
 * is reported and skipped, so the caller falls back to a substitute.
 *
 * @returns The parsed program, or null if none is embedded or none parses
 */
export async function parseEmbeddedProgram(
  descriptor: PdfDict,
  options: EmbeddedParserOptions,
): Promise<FontProgram | null> {
  return (
    (await tryParseFontFile2(descriptor, options)) ??
    (await tryParseFontFile3(descriptor, options)) ??
    (await tryParseFontFile(descriptor, options))
  );
}

function skipped(options: EmbeddedParserOptions, message: string, error: unknown): void {
  if (!options.onWarning) {
    console.warn(`${message}:`, error);

    return;
  }

  const reason = error instanceof Error ? error.message : String(error);

  options.onWarning(`${message}: ${reason}`);
}

async function readFontFile(
  descriptor: PdfDict,
  key: string,
  options: EmbeddedParserOptions,
): Promise<{ stream: PdfStream; data: Uint8Array } | null> {
  const stream = descriptor.getStream(key, options.resolver);

  if (!stream) {
    return null;
  }

  try {
    const data = await options.decodeStream(stream);

    return data.length > 0 ? { stream, data } : null;
  } catch (e) {
    skipped(options, `Failed to decode ${key}`, e);

    return null;
  }
}

async function tryParseFontFile2(
  descriptor: PdfDict,
  options: EmbeddedParserOptions,
): Promise<FontProgram | null> {
  const file = await readFontFile(descriptor, "FontFile2", options);

  if (!file) {
    return null;
  }

  try {
    return openTypeProgram(file.data, true);
  } catch (e) {
    skipped(options, "Failed to parse FontFile2 (TrueType)", e);

    return null;
  }
}

async function tryParseFontFile3(
  descriptor: PdfDict,
  options: EmbeddedParserOptions,
): Promise<FontProgram | null> {
  const file = await readFontFile(descriptor, "FontFile3", options);

  if (!file) {
    return null;
  }

  const subtype = file.stream.getName("Subtype", options.resolver)?.value;

  try {
    if (subtype === "OpenType") {
      return openTypeProgram(file.data, true);
    }

    if (subtype === "CIDFontType0C" || subtype === "Type1C") {
      return cffProgram(file.data);
    }

    // Unknown subtype - detect from the data
    return parseFontProgram(file.data);
  } catch (e) {
    skipped(options, `Failed to parse FontFile3 (${subtype ?? "no subtype"})`, e);

    return null;
  }
}

async function tryParseFontFile(
  descriptor: PdfDict,
  options: EmbeddedParserOptions,
): Promise<FontProgram | null> {
  const file = await readFontFile(descriptor, "FontFile", options);

  if (!file) {
    return null;
  }

  try {
    const type1 = parseType1(file.data, {
      length1: file.stream.getNumber("Length1", options.resolver)?.value,
      length2: file.stream.getNumber("Length2", options.resolver)?.value,
    });

    return new Type1FontProgram(type1);
  } catch (e) {
    skipped(options, "Failed to parse FontFile (Type1)", e);

    return null;
  }
}

function cffProgram(data: Uint8Array): FontProgram {
  const [cff] = parseCFF(data);

  if (!cff) {
    throw new Error("CFF font contains no fonts");
  }

  return cff.isCIDFont ? new CFFCIDFontProgram(cff) : new CFFType1FontProgram(cff);
}

/**
 * TrueType, or OpenType with outlines in a `CFF ` table.
 */
function openTypeProgram(data: Uint8Array, isEmbedded: boolean): FontProgram {
  const ttf = parseTTF(data, { isEmbedded });
  const cffTable = ttf.getTableBytes("CFF ");

  if (!cffTable) {
    return new TrueTypeFontProgram(ttf);
  }

  const [cff] = parseCFF(cffTable);

  if (!cff) {
    throw new Error("OpenType CFF table contains no fonts");
  }

  return new TrueTypeFontProgram(ttf, cff);
}

/**
 * Parse a font program directly from bytes, detecting the format from
 * its signature. Used for substitute font files.
 *
 * @param data - Raw font data (TTF, OTF, CFF, PFB or PFA)
 * @throws {Error} if the font format is not recognized
 */
export function parseFontProgram(data: Uint8Array): FontProgram {
  if (data.length < 4) {
    throw new Error("Font data too short");
  }

  const flavor = sfntFlavor(data);

  if (flavor === "collection") {
    throw new Error("TrueType Collection (.ttc) files are not supported");
  }

  if (flavor) {
    return openTypeProgram(data, false);
  }

  // PFB segment header, or PFA text ('%!')
  if ((data[0] === 0x80 && data[1] === 0x01) || (data[0] === 0x25 && data[1] === 0x21)) {
    return new Type1FontProgram(parseType1(data));
  }

  // CFF (major version 1)
  if (data[0] === 1 && data[1] === 0) {
    return cffProgram(data);
  }

  throw new Error("Unrecognized font format");
}
