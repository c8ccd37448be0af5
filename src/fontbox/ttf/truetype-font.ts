/**
 * Parsed sfnt font (TrueType or OpenType).
 *
 * Tables are located at construction; the ones needed for rendering
 * (`head`, `hhea`, `hmtx`, `cmap`, `post`, `loca`/`glyf`) are decoded on
 * first use.
 */

import { BinaryScanner } from "#src/io/binary-scanner";
import { Path } from "#src/scene/path";
import { parseCmapTable } from "./cmap-table";
import { GlyfTable, parseLoca } from "./glyf";
import { parsePostNames } from "./post-table";
import type { CmapSubtable, TableRecord } from "./types";

export class TrueTypeFont {
  private _unitsPerEm?: number;
  private _numGlyphs?: number;
  private _advances?: number[];
  private _cmaps?: CmapSubtable[];
  private _glyphNames?: Map<string, number> | null;
  private _glyf?: GlyfTable | null;

  constructor(
    readonly data: Uint8Array,
    readonly version: number,
    private readonly tables: Map<string, TableRecord>,
  ) {}

  hasTable(tag: string): boolean {
    return this.tables.has(tag);
  }

  /**
   * Raw bytes of a table, or null when absent.
   */
  getTableBytes(tag: string): Uint8Array | null {
    const record = this.tables.get(tag);

    if (!record) {
      return null;
    }

    return this.data.subarray(record.offset, record.offset + record.length);
  }

  get tableTags(): string[] {
    return [...this.tables.keys()];
  }

  get unitsPerEm(): number {
    if (this._unitsPerEm === undefined) {
      const head = this.getTableBytes("head");
      const value = head && head.length >= 20 ? new BinaryScanner(head, 18).readUint16() : 0;

      // 0 is invalid; 1000 matches the PDF glyph space
      this._unitsPerEm = value >= 16 ? value : 1000;
    }

    return this._unitsPerEm;
  }

  get numGlyphs(): number {
    if (this._numGlyphs === undefined) {
      const maxp = this.getTableBytes("maxp");

      this._numGlyphs = maxp && maxp.length >= 6 ? new BinaryScanner(maxp, 4).readUint16() : 0;
    }

    return this._numGlyphs;
  }

  /**
   * Advance width in font units. Glyphs past `numberOfHMetrics` repeat
   * the last advance.
   */
  advanceWidth(glyphId: number): number {
    if (!this._advances) {
      this._advances = this.readAdvances();
    }

    if (this._advances.length === 0) {
      return 0;
    }

    return this._advances[Math.min(glyphId, this._advances.length - 1)] ?? 0;
  }

  private readAdvances(): number[] {
    const hhea = this.getTableBytes("hhea");
    const hmtx = this.getTableBytes("hmtx");

    if (!hhea || !hmtx || hhea.length < 36) {
      return [];
    }

    const count = Math.min(new BinaryScanner(hhea, 34).readUint16(), Math.floor(hmtx.length / 4));
    const scanner = new BinaryScanner(hmtx);
    const advances: number[] = [];

    for (let i = 0; i < count; i++) {
      advances.push(scanner.readUint16());
      scanner.skip(2);
    }

    return advances;
  }

  get cmaps(): CmapSubtable[] {
    if (!this._cmaps) {
      const cmap = this.getTableBytes("cmap");

      this._cmaps = cmap ? parseCmapTable(cmap) : [];
    }

    return this._cmaps;
  }

  findCmap(platformId: number, encodingId: number): CmapSubtable | undefined {
    return this.cmaps.find(c => c.platformId === platformId && c.encodingId === encodingId);
  }

  /**
   * Glyph id for a `post` glyph name, or undefined.
   */
  glyphIdForName(name: string): number | undefined {
    if (this._glyphNames === undefined) {
      const post = this.getTableBytes("post");
      const names = post && post.length >= 32 ? parsePostNames(post, this.numGlyphs) : null;

      this._glyphNames = names ? new Map() : null;

      names?.forEach((glyphName, gid) => {
        if (!this._glyphNames?.has(glyphName)) {
          this._glyphNames?.set(glyphName, gid);
        }
      });
    }

    return this._glyphNames?.get(name);
  }

  /**
   * Outline of a glyph in font units.
   */
  glyphPath(glyphId: number): Path {
    if (this._glyf === undefined) {
      this._glyf = this.loadGlyf();
    }

    return this._glyf ? this._glyf.outline(glyphId) : Path.EMPTY;
  }

  private loadGlyf(): GlyfTable | null {
    const head = this.getTableBytes("head");
    const loca = this.getTableBytes("loca");
    const glyf = this.getTableBytes("glyf");

    if (!head || !loca || !glyf || head.length < 52) {
      return null;
    }

    const longFormat = new BinaryScanner(head, 50).readInt16() === 1;

    return new GlyfTable(glyf, parseLoca(loca, this.numGlyphs, longFormat));
  }
}
