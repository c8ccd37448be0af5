import { PdfArray } from "#src/objects/pdf-array";
import { PdfBool } from "#src/objects/pdf-bool";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNull } from "#src/objects/pdf-null";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { PdfString } from "#src/objects/pdf-string";
import { ObjectParseError, type WarningCallback } from "./errors";
import type { DelimiterToken, NumberToken, Token } from "./token";
import type { TokenReader } from "./token-reader";

/**
 * A parsed object. A dictionary directly followed by the `stream`
 * keyword comes back with the keyword's offset; the caller reads the
 * stream body from the raw bytes.
 */
export type ParseResult =
  | { object: PdfObject; hasStream: false }
  | { object: PdfDict; hasStream: true; streamKeywordPosition: number };

const MAX_DEPTH = 500;

const KEYWORDS: ReadonlyMap<string, PdfObject> = new Map<string, PdfObject>([
  ["null", PdfNull.instance],
  ["true", PdfBool.TRUE],
  ["false", PdfBool.FALSE],
]);

function plain(object: PdfObject): ParseResult {
  return { object, hasStream: false };
}

function isDelimiter(token: Token, value: DelimiterToken["value"]): boolean {
  return token.type === "delimiter" && token.value === value;
}

function isInteger(token: Token | undefined): token is NumberToken {
  return token?.type === "number" && token.isInteger;
}

/**
 * Recursive descent over the token stream.
 *
 * Tokens are read ahead only as far as a decision needs: up to two past
 * an integer to tell `12 0 R` from two numbers, and never past the token
 * that follows a dictionary, so stream bodies are not tokenized.
 *
 * In recovery mode malformed input is reported through `onWarning` and
 * parsing carries on with what was read; otherwise it throws.
 */
export class ObjectParser {
  recoveryMode = false;

  onWarning: WarningCallback | null = null;

  private readonly lookahead: Token[] = [];
  private depth = 0;

  constructor(private readonly reader: TokenReader) {}

  /**
   * Parse the next object, or return null at end of input.
   *
   * @throws {ObjectParseError} on malformed input outside recovery mode,
   * and on nesting deeper than 500 levels in either mode
   */
  parseObject(): ParseResult | null {
    if (this.depth >= MAX_DEPTH) {
      throw new ObjectParseError("Maximum nesting depth exceeded");
    }

    this.depth++;

    try {
      const token = this.peek(0);

      return token.type === "eof" ? null : this.parseValue(token);
    } finally {
      this.depth--;
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lookahead
  // ───────────────────────────────────────────────────────────────────────────

  private peek(index: number): Token {
    while (this.lookahead.length <= index) {
      this.lookahead.push(this.reader.nextToken());
    }

    return this.lookahead[index] ?? { type: "eof", position: this.reader.position };
  }

  private take(): Token {
    const token = this.peek(0);

    this.lookahead.shift();

    return token;
  }

  private problem(message: string): void {
    if (!this.recoveryMode) {
      throw new ObjectParseError(message);
    }

    this.onWarning?.(message, this.reader.position);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Grammar
  // ───────────────────────────────────────────────────────────────────────────

  private parseValue(token: Token): ParseResult {
    switch (token.type) {
      case "number":
        return plain(this.parseNumberOrRef(token));

      case "name":
        this.take();

        return plain(PdfName.of(token.value));

      case "string":
        this.take();

        return plain(new PdfString(token.value, token.format));

      case "keyword":
        this.take();

        return plain(this.keyword(token.value));

      case "delimiter":
        if (token.value === "[") {
          return plain(this.parseArray());
        }

        if (token.value === "<<") {
          return this.parseDict();
        }

        throw new ObjectParseError(`Unexpected delimiter: ${token.value}`);

      case "eof":
        throw new ObjectParseError("Unexpected end of input");
    }
  }

  private keyword(value: string): PdfObject {
    const known = KEYWORDS.get(value);

    if (known) {
      return known;
    }

    this.problem(`Unexpected keyword: ${value}`);

    return PdfNull.instance;
  }

  private parseNumberOrRef(first: NumberToken): PdfObject {
    this.take();

    const second = isInteger(first) ? this.peek(0) : undefined;

    if (!isInteger(second)) {
      return PdfNumber.of(first.value);
    }

    const marker = this.peek(1);

    if (marker.type !== "keyword" || marker.value !== "R") {
      return PdfNumber.of(first.value);
    }

    if (first.value < 0 || second.value < 0 || second.value > 65535) {
      this.problem(`Invalid reference values: ${first.value} ${second.value} R`);
    }

    this.take();
    this.take();

    return PdfRef.of(first.value, second.value);
  }

  private parseArray(): PdfArray {
    this.take();

    const items: PdfObject[] = [];

    for (;;) {
      const token = this.peek(0);

      if (token.type === "eof") {
        this.problem("Unterminated array at EOF");
        break;
      }

      if (isDelimiter(token, "]")) {
        this.take();
        break;
      }

      // A stray '>>' ends the array; the enclosing dictionary closes on it
      if (isDelimiter(token, ">>")) {
        this.problem("Unterminated array");
        break;
      }

      const item = this.parseObject();

      if (item === null) {
        this.problem("Unexpected end of array");
        break;
      }

      items.push(item.object);
    }

    return new PdfArray(items);
  }

  private parseDict(): ParseResult {
    this.take();

    const dict = new PdfDict();

    for (;;) {
      const token = this.peek(0);

      if (token.type === "eof") {
        this.problem("Unterminated dictionary at EOF");

        return plain(dict);
      }

      if (isDelimiter(token, ">>")) {
        this.take();
        break;
      }

      if (token.type !== "name") {
        this.problem(`Invalid dictionary key: expected name, got ${token.type}`);
        this.skipInvalidPair();
        continue;
      }

      this.take();

      const value = isDelimiter(this.peek(0), ">>") ? null : this.parseObject();

      if (value === null) {
        this.problem(`Missing value for key ${token.value}`);
        continue;
      }

      // A null value is equivalent to an absent entry
      if (value.object.type !== "null") {
        dict.set(token.value, value.object);
      }
    }

    const next = this.peek(0);

    if (next.type === "keyword" && next.value === "stream") {
      this.take();

      return { object: dict, hasStream: true, streamKeywordPosition: next.position };
    }

    return plain(dict);
  }

  private skipInvalidPair(): void {
    this.take();

    const value = this.peek(0);

    if (value.type !== "eof" && !isDelimiter(value, ">>")) {
      this.take();
    }
  }
}
