/**
 * `cmap` table parsing (formats 0, 4, 6 and 12).
 */

import { BinaryScanner } from "#src/io/binary-scanner";
import type { CmapSubtable } from "./types";

export function parseCmapTable(data: Uint8Array): CmapSubtable[] {
  const scanner = new BinaryScanner(data);

  scanner.readUint16(); // version
  const count = scanner.readUint16();
  const subtables: CmapSubtable[] = [];

  for (let i = 0; i < count; i++) {
    scanner.seek(4 + i * 8);

    const platformId = scanner.readUint16();
    const encodingId = scanner.readUint16();
    const offset = scanner.readUint32();

    if (offset >= data.length) {
      continue;
    }

    try {
      const subtable = parseSubtable(data, offset, platformId, encodingId);

      if (subtable) {
        subtables.push(subtable);
      }
    } catch (e) {
      console.warn(`Skipping malformed cmap subtable (${platformId}, ${encodingId}):`, e);
    }
  }

  return subtables;
}

function parseSubtable(
  data: Uint8Array,
  offset: number,
  platformId: number,
  encodingId: number,
): CmapSubtable | null {
  const scanner = new BinaryScanner(data, offset);
  const format = scanner.readUint16();

  switch (format) {
    case 0: {
      scanner.skip(4);
      const glyphs = scanner.readBytes(256);

      return {
        platformId,
        encodingId,
        format,
        lookup: code => (code >= 0 && code < 256 ? glyphs[code] : 0),
      };
    }

    case 4:
      return parseFormat4(scanner, platformId, encodingId);

    case 6: {
      scanner.skip(4);
      const firstCode = scanner.readUint16();
      const entryCount = scanner.readUint16();
      const glyphs: number[] = [];

      for (let i = 0; i < entryCount; i++) {
        glyphs.push(scanner.readUint16());
      }

      return {
        platformId,
        encodingId,
        format,
        lookup: code => glyphs[code - firstCode] ?? 0,
      };
    }

    case 12: {
      scanner.skip(10);
      const groupCount = scanner.readUint32();
      const groups: Array<[number, number, number]> = [];

      for (let i = 0; i < groupCount; i++) {
        groups.push([scanner.readUint32(), scanner.readUint32(), scanner.readUint32()]);
      }

      return {
        platformId,
        encodingId,
        format,
        lookup: code => {
          for (const [start, end, glyph] of groups) {
            if (code >= start && code <= end) {
              return glyph + (code - start);
            }
          }

          return 0;
        },
      };
    }

    default:
      return null;
  }
}

function parseFormat4(scanner: BinaryScanner, platformId: number, encodingId: number): CmapSubtable {
  const base = scanner.position - 2;

  scanner.skip(4); // length, language
  const segCount = scanner.readUint16() / 2;
  scanner.skip(6); // searchRange, entrySelector, rangeShift

  const read = (count: number, signed = false) => {
    const values: number[] = [];

    for (let i = 0; i < count; i++) {
      values.push(signed ? scanner.readInt16() : scanner.readUint16());
    }

    return values;
  };

  const endCodes = read(segCount);
  scanner.skip(2); // reservedPad
  const startCodes = read(segCount);
  const deltas = read(segCount, true);
  const rangeOffsetsStart = scanner.position;
  const rangeOffsets = read(segCount);
  const bytes = scanner.bytes;

  return {
    platformId,
    encodingId,
    format: 4,
    lookup: code => {
      for (let i = 0; i < segCount; i++) {
        if (code > endCodes[i]) {
          continue;
        }

        if (code < startCodes[i]) {
          return 0;
        }

        if (rangeOffsets[i] === 0) {
          return (code + deltas[i]) & 0xffff;
        }

        const address = rangeOffsetsStart + i * 2 + rangeOffsets[i] + (code - startCodes[i]) * 2;

        if (address + 1 >= bytes.length || address < base) {
          return 0;
        }

        const glyph = (bytes[address] << 8) | bytes[address + 1];

        return glyph === 0 ? 0 : (glyph + deltas[i]) & 0xffff;
      }

      return 0;
    },
  };
}
