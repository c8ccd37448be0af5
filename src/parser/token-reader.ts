import { bytesToLatin1 } from "#src/helpers/buffer";
import {
  BACKSLASH,
  CR,
  hexValue,
  isDigit,
  isRegularChar,
  isWhitespace,
  LF,
  PARENTHESIS_CLOSE,
  PARENTHESIS_OPEN,
  PERCENT,
} from "#src/helpers/chars";
import type { Scanner } from "#src/io/scanner";
import type { DelimiterToken, KeywordToken, NameToken, NumberToken, StringToken, Token } from "./token";

const SIMPLE_DELIMITERS: Record<number, DelimiterToken["value"]> = {
  0x5b: "[",
  0x5d: "]",
  0x7b: "{",
  0x7d: "}",
};

const ESCAPES: Record<number, number> = {
  0x6e: 0x0a, // \n
  0x72: 0x0d, // \r
  0x74: 0x09, // \t
  0x62: 0x08, // \b
  0x66: 0x0c, // \f
};

/**
 * On-demand tokenizer for PDF syntax.
 *
 * Reads tokens one at a time from a Scanner, handling whitespace,
 * comments, and lenient parsing of malformed input. Used for both the
 * file structure and page content streams.
 */
export class TokenReader {
  private cachedToken: Token | null = null;

  constructor(private scanner: Scanner) {}

  get position(): number {
    return this.cachedToken?.position ?? this.scanner.position;
  }

  get bytes(): Uint8Array {
    return this.scanner.bytes;
  }

  /**
   * Peek at the next token without consuming it.
   */
  peekToken(): Token {
    if (this.cachedToken === null) {
      this.cachedToken = this.readToken();
    }

    return this.cachedToken;
  }

  /**
   * Read and consume the next token.
   */
  nextToken(): Token {
    if (this.cachedToken !== null) {
      const token = this.cachedToken;

      this.cachedToken = null;

      return token;
    }

    return this.readToken();
  }

  /**
   * Reposition the underlying scanner, dropping any peeked token.
   * Content-stream parsing uses this to read inline image data.
   */
  moveTo(position: number): void {
    this.cachedToken = null;
    this.scanner.moveTo(position);
  }

  skipWhitespaceAndComments(): void {
    for (;;) {
      const byte = this.scanner.peek();

      if (byte === -1) {
        return;
      }

      if (isWhitespace(byte)) {
        this.scanner.advance();
        continue;
      }

      if (byte === PERCENT) {
        while (this.scanner.peek() !== -1 && this.scanner.peek() !== LF && this.scanner.peek() !== CR) {
          this.scanner.advance();
        }

        continue;
      }

      return;
    }
  }

  private readToken(): Token {
    this.skipWhitespaceAndComments();

    const position = this.scanner.position;
    const byte = this.scanner.peek();

    if (byte === -1) {
      return { type: "eof", position };
    }

    const simple = SIMPLE_DELIMITERS[byte];

    if (simple) {
      this.scanner.advance();

      return { type: "delimiter", value: simple, position };
    }

    switch (byte) {
      case 0x2f: // /
        return this.readName(position);
      case PARENTHESIS_OPEN:
        return this.readLiteralString(position);
      case 0x3c: // <
        return this.readAngleBracket(position);
      case 0x3e: // >
        this.scanner.advance();

        if (this.scanner.peek() === 0x3e) {
          this.scanner.advance();
        }

        // A lone '>' is treated as '>>'
        return { type: "delimiter", value: ">>", position };
      case PARENTHESIS_CLOSE:
        // Stray ')': surface it as a keyword so callers can skip it
        this.scanner.advance();

        return { type: "keyword", value: ")", position };
    }

    if (isDigit(byte) || byte === 0x2b || byte === 0x2d || byte === 0x2e) {
      return this.readNumber(position);
    }

    return this.readKeyword(position);
  }

  private readNumber(position: number): NumberToken | KeywordToken {
    let sign = 1;
    let text = "";
    let hasDigit = false;
    let hasDecimal = false;

    // Leading signs; repeated minus signs cancel out (--5 reads as 5)
    let minusCount = 0;

    while (this.scanner.peek() === 0x2b || this.scanner.peek() === 0x2d) {
      if (this.scanner.advance() === 0x2d) {
        minusCount++;
      }
    }

    if (minusCount === 1) {
      sign = -1;
    }

    for (;;) {
      const byte = this.scanner.peek();

      if (isDigit(byte)) {
        hasDigit = true;
      } else if (byte === 0x2e && !hasDecimal) {
        hasDecimal = true;
      } else if (byte === 0x2d && hasDigit) {
        // Embedded minus ("1-2") is junk; skip it
        this.scanner.advance();
        continue;
      } else {
        break;
      }

      text += String.fromCharCode(byte);
      this.scanner.advance();
    }

    if (!hasDigit) {
      // "+", "-" or "." on their own, or a keyword such as ".notdef"
      while (isRegularChar(this.scanner.peek())) {
        this.scanner.advance();
      }

      if (text === "." && this.scanner.position === position + 1) {
        return { type: "number", value: 0, isInteger: false, position };
      }

      return { type: "keyword", value: this.extractText(position), position };
    }

    const value = sign * Number.parseFloat(text);

    return { type: "number", value, isInteger: !hasDecimal, position };
  }

  private readName(position: number): NameToken {
    this.scanner.advance();

    const bytes: number[] = [];

    while (isRegularChar(this.scanner.peek())) {
      const byte = this.scanner.advance();

      if (byte === 0x23) {
        const high = hexValue(this.scanner.peek());
        const low = hexValue(this.scanner.peekAt(this.scanner.position + 1));

        if (high !== -1 && low !== -1) {
          this.scanner.advance();
          this.scanner.advance();
          bytes.push((high << 4) | low);
          continue;
        }
      }

      bytes.push(byte);
    }

    return { type: "name", value: bytesToLatin1(new Uint8Array(bytes)), position };
  }

  private readLiteralString(position: number): StringToken {
    this.scanner.advance();

    const bytes: number[] = [];
    let depth = 1;

    for (;;) {
      const byte = this.scanner.advance();

      // Unterminated string - return what we have
      if (byte === -1) {
        break;
      }

      if (byte === PARENTHESIS_OPEN) {
        depth++;
      } else if (byte === PARENTHESIS_CLOSE) {
        depth--;

        if (depth === 0) {
          break;
        }
      } else if (byte === BACKSLASH) {
        this.readEscape(bytes);
        continue;
      } else if (byte === CR) {
        // Normalize CR and CRLF to LF
        if (this.scanner.peek() === LF) {
          this.scanner.advance();
        }

        bytes.push(LF);
        continue;
      }

      bytes.push(byte);
    }

    return { type: "string", value: new Uint8Array(bytes), format: "literal", position };
  }

  private readEscape(out: number[]): void {
    const byte = this.scanner.advance();

    if (byte === -1) {
      return;
    }

    const mapped = ESCAPES[byte];

    if (mapped !== undefined) {
      out.push(mapped);
      return;
    }

    // Line continuation
    if (byte === CR) {
      if (this.scanner.peek() === LF) {
        this.scanner.advance();
      }

      return;
    }

    if (byte === LF) {
      return;
    }

    if (byte >= 0x30 && byte <= 0x37) {
      let value = byte - 0x30;

      for (let i = 0; i < 2; i++) {
        const next = this.scanner.peek();

        if (next < 0x30 || next > 0x37) {
          break;
        }

        value = (value << 3) | (next - 0x30);
        this.scanner.advance();
      }

      out.push(value & 0xff);
      return;
    }

    // \( \) \\ and unknown escapes yield the character itself
    out.push(byte);
  }

  private readAngleBracket(position: number): StringToken | DelimiterToken {
    this.scanner.advance();

    if (this.scanner.peek() === 0x3c) {
      this.scanner.advance();

      return { type: "delimiter", value: "<<", position };
    }

    const bytes: number[] = [];
    let high = -1;

    for (;;) {
      const byte = this.scanner.advance();

      if (byte === -1 || byte === 0x3e) {
        break;
      }

      const nibble = hexValue(byte);

      // Whitespace and junk inside hex strings are skipped
      if (nibble === -1) {
        continue;
      }

      if (high === -1) {
        high = nibble;
      } else {
        bytes.push((high << 4) | nibble);
        high = -1;
      }
    }

    if (high !== -1) {
      bytes.push(high << 4);
    }

    return { type: "string", value: new Uint8Array(bytes), format: "hex", position };
  }

  private readKeyword(position: number): KeywordToken {
    while (isRegularChar(this.scanner.peek())) {
      this.scanner.advance();
    }

    // Always make progress
    if (this.scanner.position === position) {
      this.scanner.advance();
    }

    return { type: "keyword", value: this.extractText(position), position };
  }

  private extractText(start: number): string {
    return bytesToLatin1(this.scanner.bytes.subarray(start, this.scanner.position));
  }
}
