/**
 * `post` table glyph names (formats 1 and 2).
 */

import { BinaryScanner } from "#src/io/binary-scanner";
import macGlyphNames from "./mac-glyph-names.json";

/**
 * Glyph names indexed by glyph id, or null when the table carries none
 * (format 3 and unknown formats).
 */
export function parsePostNames(data: Uint8Array, numGlyphs: number): string[] | null {
  const scanner = new BinaryScanner(data);
  const version = scanner.readUint32();

  if (version === 0x00010000) {
    return macGlyphNames.slice(0, numGlyphs);
  }

  if (version !== 0x00020000) {
    return null;
  }

  scanner.seek(32);

  const count = scanner.readUint16();
  const indices: number[] = [];

  for (let i = 0; i < count; i++) {
    indices.push(scanner.readUint16());
  }

  const custom: string[] = [];

  while (scanner.position < data.length) {
    const length = scanner.readUint8();

    if (scanner.position + length > data.length) {
      break;
    }

    custom.push(String.fromCharCode(...scanner.readBytes(length)));
  }

  return indices.map(index =>
    index < macGlyphNames.length ? macGlyphNames[index] : (custom[index - macGlyphNames.length] ?? ".notdef"),
  );
}
