import { StreamDecodeError } from "#src/parser/errors";
import { ASCIIHexFilter } from "./ascii-hex-filter";
import { ASCII85Filter } from "./ascii85-filter";
import type { Filter, FilterSpec } from "./filter";
import { FlateFilter } from "./flate-filter";
import { LZWFilter } from "./lzw-filter";
import { RunLengthFilter } from "./run-length-filter";

/**
 * Short names inline images may use in place of the full filter names.
 */
const ABBREVIATIONS: Readonly<Record<string, string>> = {
  AHx: "ASCIIHexDecode",
  A85: "ASCII85Decode",
  LZW: "LZWDecode",
  Fl: "FlateDecode",
  RL: "RunLengthDecode",
  CCF: "CCITTFaxDecode",
  DCT: "DCTDecode",
};

/**
 * Image codecs that are recognised but not decoded.
 */
export const IMAGE_CODECS: ReadonlySet<string> = new Set([
  "DCTDecode",
  "JPXDecode",
  "JBIG2Decode",
  "CCITTFaxDecode",
]);

const FILTERS: ReadonlyMap<string, Filter> = new Map(
  [new FlateFilter(), new LZWFilter(), new ASCIIHexFilter(), new ASCII85Filter(), new RunLengthFilter()].map(
    filter => [filter.name, filter],
  ),
);

export function canonicalFilterName(name: string): string {
  return ABBREVIATIONS[name] ?? name;
}

/**
 * The filter for a full or abbreviated name, or undefined for codecs and
 * names this library does not decode.
 */
export function filterFor(name: string): Filter | undefined {
  return FILTERS.get(canonicalFilterName(name));
}

/**
 * Run data through a filter chain. `[/ASCII85Decode /FlateDecode]` undoes
 * ASCII85 first, then inflates.
 *
 * @throws {StreamDecodeError} naming the first unsupported or failing filter
 */
export async function decodeFilters(data: Uint8Array, chain: readonly FilterSpec[]): Promise<Uint8Array> {
  let current = data;

  for (const { name, params } of chain) {
    const filter = filterFor(name);

    if (!filter) {
      throw new StreamDecodeError(`Unsupported filter: ${canonicalFilterName(name)}`);
    }

    try {
      current = await filter.decode(current, params);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      throw new StreamDecodeError(`${filter.name} failed: ${message}`);
    }
  }

  return current;
}
