import { describe, expect, it } from "vitest";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { FontCache, type FontLoader } from "./font-cache";
import { type FontLoadContext, loadFont } from "./font-loader";
import { GlyphCache } from "./glyph-cache";
import { SimpleFont } from "./simple-font";

const ctx: FontLoadContext = {
  resolver: () => null,
  decodeStream: stream => stream.getDecodedData(),
};

function helvetica(): PdfDict {
  return PdfDict.of({ Subtype: PdfName.of("Type1"), BaseFont: PdfName.of("Helvetica") });
}

function countingLoader(): { loader: FontLoader; calls: () => number } {
  let calls = 0;

  return {
    loader: (dict, id, context) => {
      calls++;

      return loadFont(dict, id, context);
    },
    calls: () => calls,
  };
}

describe("FontCache", () => {
  it("shares one load between concurrent requests", async () => {
    const { loader, calls } = countingLoader();
    const cache = new FontCache(loader);
    const dict = helvetica();

    const [a, b] = await Promise.all([cache.get(dict, ctx), cache.get(dict, ctx)]);

    expect(a).toBe(b);
    expect(calls()).toBe(1);
    expect(cache.size).toBe(1);
  });

  it("gives each font dictionary its own id", async () => {
    const cache = new FontCache();

    const first = await cache.get(helvetica(), ctx);
    const second = await cache.get(helvetica(), ctx);

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
  });

  it("retries a load that failed", async () => {
    let attempts = 0;
    const cache = new FontCache((dict, id, context) => {
      attempts++;

      return attempts === 1 ? Promise.reject(new Error("boom")) : loadFont(dict, id, context);
    });
    const dict = helvetica();

    await expect(cache.get(dict, ctx)).rejects.toThrow("boom");
    expect(cache.size).toBe(0);

    const font = await cache.get(dict, ctx);

    expect(font.baseFontName).toBe("Helvetica");
    expect(attempts).toBe(2);
  });

  it("forgets everything on clear", async () => {
    const cache = new FontCache();

    await cache.get(helvetica(), ctx);
    cache.clear();

    expect(cache.size).toBe(0);
  });
});

describe("GlyphCache", () => {
  async function font(): Promise<SimpleFont> {
    const loaded = await loadFont(helvetica(), 7, ctx);

    if (!(loaded instanceof SimpleFont)) {
      throw new Error("expected a simple font");
    }

    return loaded;
  }

  it("returns the stored glyph on repeat lookups", async () => {
    const helv = await font();
    const cache = new GlyphCache();
    const first = cache.glyphForCode(helv, { code: 65, length: 1 });
    const second = cache.glyphForCode(helv, { code: 65, length: 1 });

    expect(second).toBe(first);
    expect(first.advance).toBe(667);
    expect(cache.size).toBe(1);
  });

  it("keys glyphs by font and glyph id", async () => {
    const helv = await font();
    const cache = new GlyphCache();

    cache.glyphForCode(helv, { code: 65, length: 1 });
    cache.glyphForCode(helv, { code: 66, length: 1 });

    expect(cache.size).toBe(2);

    cache.clear();

    expect(cache.size).toBe(0);
  });
});
