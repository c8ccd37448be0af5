import { describe, expect, it } from "vitest";
import { Scanner } from "#src/io/scanner";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNull } from "#src/objects/pdf-null";
import { PdfRef } from "#src/objects/pdf-ref";
import { PdfString } from "#src/objects/pdf-string";
import { stringToBytes } from "#src/test-utils";
import { ObjectParseError } from "./errors";
import { ObjectParser } from "./object-parser";
import { TokenReader } from "./token-reader";

function parser(input: string, recoveryMode = false): ObjectParser {
  const result = new ObjectParser(new TokenReader(new Scanner(stringToBytes(input))));

  result.recoveryMode = recoveryMode;

  return result;
}

function parse(input: string, recoveryMode = false) {
  const result = parser(input, recoveryMode).parseObject();

  if (result === null) {
    throw new Error("expected an object");
  }

  return result.object;
}

describe("ObjectParser", () => {
  it("returns null at end of input", () => {
    expect(parser("  % nothing").parseObject()).toBeNull();
  });

  it("parses keywords", () => {
    expect(parse("true")).toMatchObject({ type: "bool", value: true });
    expect(parse("null")).toBe(PdfNull.instance);
  });

  it("parses references", () => {
    expect(parse("12 0 R")).toBe(PdfRef.of(12, 0));
  });

  it("keeps consecutive numbers apart", () => {
    const p = parser("1 2 3");

    expect(p.parseObject()?.object).toMatchObject({ value: 1 });
    expect(p.parseObject()?.object).toMatchObject({ value: 2 });
    expect(p.parseObject()?.object).toMatchObject({ value: 3 });
  });

  it("parses arrays with mixed content", () => {
    const value = parse("[1 0 R /N (s) [2]]");

    expect(value).toBeInstanceOf(PdfArray);

    if (!(value instanceof PdfArray)) {
      return;
    }

    expect(value.length).toBe(4);
    expect(value.at(0)).toBe(PdfRef.of(1, 0));
    expect(value.at(1)).toBe(PdfName.of("N"));
    expect(value.at(2)).toBeInstanceOf(PdfString);
    expect(value.at(3)).toBeInstanceOf(PdfArray);
  });

  it("parses nested dictionaries and drops null values", () => {
    const value = parse("<< /Type /Page /Res << /Font 3 0 R >> /Gone null >>");

    expect(value).toBeInstanceOf(PdfDict);

    if (!(value instanceof PdfDict)) {
      return;
    }

    expect(value.getName("Type")?.value).toBe("Page");
    expect(value.getDict("Res")?.get("Font")).toBe(PdfRef.of(3, 0));
    expect(value.has("Gone")).toBe(false);
  });

  it("reports a following stream keyword", () => {
    const input = "<< /Length 3 >>\nstream\nabc";
    const result = parser(input).parseObject();

    expect(result?.hasStream).toBe(true);

    if (result?.hasStream) {
      expect(result.streamKeywordPosition).toBe(input.indexOf("stream"));
    }
  });

  describe("strict mode", () => {
    it("throws on unknown keywords", () => {
      expect(() => parse("[1 foo]")).toThrow(ObjectParseError);
    });

    it("throws on unterminated arrays", () => {
      expect(() => parse("[1 2")).toThrow("Unterminated array at EOF");
    });
  });

  describe("recovery mode", () => {
    it("turns unknown keywords into null", () => {
      const value = parse("[1 foo 2]", true);

      expect(value instanceof PdfArray ? value.toNumbers() : []).toEqual([1, Number.NaN, 2]);
    });

    it("closes an array at '>>'", () => {
      const value = parse("<< /A [1 2 >>", true);

      expect(value instanceof PdfDict ? value.getArray("A")?.toNumbers() : []).toEqual([1, 2]);
    });

    it("skips non-name keys", () => {
      const value = parse("<< 5 6 /B 7 >>", true);

      expect(value instanceof PdfDict ? value.getNumber("B")?.value : undefined).toBe(7);
    });

    it("reports warnings through onWarning", () => {
      const messages: string[] = [];
      const p = parser("[1 bogus]", true);

      p.onWarning = message => messages.push(message);
      p.parseObject();

      expect(messages).toEqual(["Unexpected keyword: bogus"]);
    });
  });
});
