import { deflate } from "pako";
import { describe, expect, it } from "vitest";
import { StreamDecodeError } from "#src/parser/errors";
import { canonicalFilterName, decodeFilters, filterFor } from "./filter-pipeline";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

describe("filterFor", () => {
  it("finds the built-in filters", () => {
    expect(filterFor("FlateDecode")?.name).toBe("FlateDecode");
    expect(filterFor("LZWDecode")?.name).toBe("LZWDecode");
    expect(filterFor("RunLengthDecode")?.name).toBe("RunLengthDecode");
  });

  it("resolves inline-image abbreviations", () => {
    expect(filterFor("AHx")?.name).toBe("ASCIIHexDecode");
    expect(filterFor("Fl")?.name).toBe("FlateDecode");
  });

  it("has nothing for image codecs", () => {
    expect(filterFor("DCTDecode")).toBeUndefined();
    expect(canonicalFilterName("CCF")).toBe("CCITTFaxDecode");
  });
});

describe("decodeFilters", () => {
  it("passes data through an empty chain", async () => {
    const data = new Uint8Array([1, 2, 3]);

    expect(await decodeFilters(data, [])).toBe(data);
  });

  it("applies filters in order", async () => {
    const compressed = deflate(encoder.encode("0 0 m 10 10 l S"));
    const hex = Array.from(compressed, byte => byte.toString(16).padStart(2, "0")).join("");

    const result = await decodeFilters(encoder.encode(`${hex}>`), [
      { name: "ASCIIHexDecode" },
      { name: "FlateDecode" },
    ]);

    expect(decoder.decode(result)).toBe("0 0 m 10 10 l S");
  });

  it("reports image codecs as unsupported", async () => {
    const error: unknown = await decodeFilters(new Uint8Array(2), [{ name: "DCT" }]).catch(e => e);

    expect(error).toBeInstanceOf(StreamDecodeError);
    expect(error instanceof Error && error.message).toBe("Unsupported filter: DCTDecode");
  });

  it("wraps filter failures", async () => {
    const error: unknown = await decodeFilters(encoder.encode("not zlib"), [{ name: "FlateDecode" }]).catch(
      e => e,
    );

    expect(error).toBeInstanceOf(StreamDecodeError);
    expect(error instanceof Error && error.message).toMatch(/^FlateDecode failed: /);
  });
});
