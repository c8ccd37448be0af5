import { describe, expect, it } from "vitest";
import { Scanner } from "#src/io/scanner";
import { stringToBytes } from "#src/test-utils";
import { TokenReader } from "./token-reader";

/**
 * Helper to create a TokenReader from a string.
 */
function reader(input: string): TokenReader {
  return new TokenReader(new Scanner(stringToBytes(input)));
}

function values(input: string): unknown[] {
  const r = reader(input);
  const result: unknown[] = [];

  for (;;) {
    const token = r.nextToken();

    if (token.type === "eof") {
      return result;
    }

    result.push(token.type === "string" ? Array.from(token.value) : token.value);
  }
}

describe("TokenReader", () => {
  describe("whitespace and comments", () => {
    it("skips whitespace including NUL and form feed", () => {
      expect(values("\x00\t\x0c\r\n 42")).toEqual([42]);
    });

    it("skips comments up to the end of the line", () => {
      expect(values("% a comment\r1 %another\n2")).toEqual([1, 2]);
    });
  });

  describe("number parsing", () => {
    it("reads integers and reals", () => {
      const r = reader("17 -3 +4 0.5 .25 -.5 4.");
      const tokens = [r.nextToken(), r.nextToken(), r.nextToken(), r.nextToken()];

      expect(tokens.map(t => (t.type === "number" ? [t.value, t.isInteger] : null))).toEqual([
        [17, true],
        [-3, true],
        [4, true],
        [0.5, false],
      ]);
      expect(values(".25 -.5 4.")).toEqual([0.25, -0.5, 4]);
    });

    it("cancels a doubled minus sign", () => {
      expect(values("--5")).toEqual([5]);
    });

    it("ignores a minus sign inside a number", () => {
      expect(values("1-2")).toEqual([12]);
    });

    it("reads a lone period as zero", () => {
      expect(values(". 1")).toEqual([0, 1]);
    });

    it("reads a sign without digits as a keyword", () => {
      const token = reader("- 1").nextToken();

      expect(token).toMatchObject({ type: "keyword", value: "-" });
    });
  });

  describe("name parsing", () => {
    it("reads names without the slash", () => {
      expect(values("/Type/Page")).toEqual(["Type", "Page"]);
    });

    it("decodes #xx escapes", () => {
      expect(values("/A#20B /C#2")).toEqual(["A B", "C#2"]);
    });

    it("reads the empty name", () => {
      expect(values("/ 1")).toEqual(["", 1]);
    });
  });

  describe("literal string parsing", () => {
    it("balances nested parentheses", () => {
      expect(values("(a(b)c)")).toEqual([[0x61, 0x28, 0x62, 0x29, 0x63]]);
    });

    it("decodes escapes", () => {
      expect(values("(\\n\\)\\\\\\101\\7)")).toEqual([[0x0a, 0x29, 0x5c, 0x41, 0x07]]);
    });

    it("joins continued lines and normalizes CRLF", () => {
      expect(values("(a\\\r\nb\r\nc)")).toEqual([[0x61, 0x62, 0x0a, 0x63]]);
    });

    it("returns what it has for an unterminated string", () => {
      expect(values("(abc")).toEqual([[0x61, 0x62, 0x63]]);
    });
  });

  describe("hex string parsing", () => {
    it("skips whitespace and pads an odd digit count", () => {
      const token = reader("<48 6 >").nextToken();

      expect(token).toMatchObject({ type: "string", format: "hex" });
      expect(values("<48 6 >")).toEqual([[0x48, 0x60]]);
    });
  });

  describe("delimiters and keywords", () => {
    it("reads dictionary and array delimiters", () => {
      expect(values("<< /K [1] >>")).toEqual(["<<", "K", "[", 1, "]", ">>"]);
    });

    it("reads braces for calculator functions", () => {
      expect(values("{ 2 mul }")).toEqual(["{", 2, "mul", "}"]);
    });

    it("reads operators separated by delimiters", () => {
      expect(values("BT/F1 12 Tf(x)Tj ET")).toEqual(["BT", "F1", 12, "Tf", [0x78], "Tj", "ET"]);
    });

    it("turns a stray closing parenthesis into a keyword", () => {
      expect(values(") q")).toEqual([")", "q"]);
    });

    it("reads a lone '>' as '>>'", () => {
      expect(values(">")).toEqual([">>"]);
    });
  });

  describe("peek and position", () => {
    it("peeks without consuming", () => {
      const r = reader("1 2");

      expect(r.peekToken()).toMatchObject({ value: 1 });
      expect(r.nextToken()).toMatchObject({ value: 1 });
      expect(r.nextToken()).toMatchObject({ value: 2 });
    });

    it("reports the peeked token's position", () => {
      const r = reader("  abc");

      r.peekToken();

      expect(r.position).toBe(2);
    });

    it("moveTo drops the peeked token", () => {
      const r = reader("1 2 3");

      r.peekToken();
      r.moveTo(4);

      expect(r.nextToken()).toMatchObject({ value: 3 });
    });

    it("returns eof repeatedly at the end", () => {
      const r = reader("x");

      r.nextToken();

      expect(r.nextToken().type).toBe("eof");
      expect(r.nextToken().type).toBe("eof");
    });
  });
});
