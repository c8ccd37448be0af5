import { describe, expect, it } from "vitest";
import { stringToBytes } from "#src/test-utils";
import { CMap, parseCMap, predefinedCMap } from "./cmap";

const MIXED_CMAP = `%!PS-Adobe-3.0 Resource-CMap
/CIDInit /ProcSet findresource begin
12 dict begin
begincmap
/CIDSystemInfo << /Registry (Test) /Ordering (Mixed) /Supplement 0 >> def
/CMapName /Test-Mixed-H def
2 begincodespacerange
<00> <80>
<8140> <9FFC>
endcodespacerange
2 begincidrange
<20> <7E> 1
<8140> <817E> 633
endcidrange
1 begincidchar
<8145> 5000
endcidchar
endcmap
CMapName currentdict /CMap defineresource pop
end
end
`;

describe("parseCMap", () => {
  it("splits codes of mixed lengths by codespace", () => {
    const cmap = parseCMap(stringToBytes(MIXED_CMAP));

    expect(cmap.decode(new Uint8Array([0x41, 0x81, 0x40, 0x81, 0x45]))).toEqual([
      { code: 0x41, length: 1 },
      { code: 0x8140, length: 2 },
      { code: 0x8145, length: 2 },
    ]);
  });

  it("maps codes through ranges and single chars", () => {
    const cmap = parseCMap(stringToBytes(MIXED_CMAP));

    expect(cmap.lookup({ code: 0x41, length: 1 })).toBe(34);
    expect(cmap.lookup({ code: 0x8140, length: 2 })).toBe(633);
    expect(cmap.lookup({ code: 0x8145, length: 2 })).toBe(5000);
  });

  it("distinguishes codes of different lengths", () => {
    const cmap = parseCMap(stringToBytes(MIXED_CMAP));

    expect(cmap.lookup({ code: 0x41, length: 2 })).toBeUndefined();
  });

  it("reads the name", () => {
    expect(parseCMap(stringToBytes(MIXED_CMAP)).name).toBe("Test-Mixed-H");
  });

  it("consumes bytes outside every codespace as a shortest-length code", () => {
    const cmap = parseCMap(stringToBytes(MIXED_CMAP));

    expect(cmap.decode(new Uint8Array([0xa0, 0x41]))).toEqual([
      { code: 0xa0, length: 1 },
      { code: 0x41, length: 1 },
    ]);
    expect(cmap.lookup({ code: 0xa0, length: 1 })).toBeUndefined();
  });

  it("inherits a predefined CMap through usecmap", () => {
    const cmap = parseCMap(
      stringToBytes("/Identity-H usecmap\n1 begincidchar\n<0041> 7\nendcidchar\n"),
      { useCMap: predefinedCMap },
    );

    expect(cmap.decode(new Uint8Array([0x00, 0x41, 0x00, 0x42])).map(code => cmap.lookup(code))).toEqual([
      7, 0x42,
    ]);
  });

  it("reads the writing mode", () => {
    expect(parseCMap(stringToBytes("/WMode 1 def")).vertical).toBe(true);
    expect(parseCMap(stringToBytes(MIXED_CMAP)).vertical).toBe(false);
  });
});

describe("CMap.identity", () => {
  it("maps two-byte codes to equal CIDs", () => {
    const cmap = CMap.identity(false);
    const [code] = cmap.decode(new Uint8Array([0x12, 0x34]));

    expect(code).toEqual({ code: 0x1234, length: 2 });
    expect(cmap.lookup(code)).toBe(0x1234);
  });

  it("reads a trailing odd byte as a one-byte code with no CID", () => {
    const cmap = CMap.identity(false);
    const codes = cmap.decode(new Uint8Array([0x00, 0x41, 0x12]));

    expect(codes).toEqual([
      { code: 0x41, length: 2 },
      { code: 0x12, length: 1 },
    ]);
    expect(cmap.lookup(codes[1])).toBeUndefined();
  });

  it("is vertical for Identity-V", () => {
    expect(predefinedCMap("Identity-V")?.vertical).toBe(true);
    expect(predefinedCMap("Identity-H")?.vertical).toBe(false);
    expect(predefinedCMap("UniJIS-UCS2-H")).toBeUndefined();
  });
});
