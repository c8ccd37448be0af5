/**
 * Per-document cache of loaded fonts, keyed by font dictionary.
 */

import type { PdfDict } from "#src/objects/pdf-dict";
import { type FontLoadContext, loadFont } from "./font-loader";
import type { PdfFont } from "./pdf-font";

export type FontLoader = (dict: PdfDict, id: number, ctx: FontLoadContext) => Promise<PdfFont>;

/**
 * Concurrent first requests for one font share a single load; the first
 * load stored is the one every later request sees. A failed load is
 * dropped so a later request retries it.
 */
export class FontCache {
  private readonly fonts = new Map<PdfDict, Promise<PdfFont>>();
  private nextId = 1;

  constructor(private readonly loader: FontLoader = loadFont) {}

  get size(): number {
    return this.fonts.size;
  }

  get(dict: PdfDict, ctx: FontLoadContext): Promise<PdfFont> {
    const cached = this.fonts.get(dict);

    if (cached) {
      return cached;
    }

    const loading = this.loader(dict, this.nextId++, ctx);

    this.fonts.set(dict, loading);
    void loading.catch(() => {
      if (this.fonts.get(dict) === loading) {
        this.fonts.delete(dict);
      }
    });

    return loading;
  }

  clear(): void {
    this.fonts.clear();
  }
}
