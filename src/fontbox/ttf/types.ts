/**
 * Entry of the sfnt table directory.
 */
export interface TableRecord {
  tag: string;
  checksum: number;
  offset: number;
  length: number;
}

/**
 * One subtable of the `cmap` table.
 */
export interface CmapSubtable {
  platformId: number;
  encodingId: number;
  format: number;
  /** Glyph id for a character code, 0 when unmapped */
  lookup(code: number): number;
}
