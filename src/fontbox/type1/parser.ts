/**
 * Type 1 font program parser.
 *
 * Accepts PFB (segmented) data or the raw cleartext + eexec form found in
 * a PDF `/FontFile` stream (`/Length1` and `/Length2`).
 */

import { bytesToLatin1, concatBytes } from "#src/helpers/buffer";
import { Type1Font } from "./type1-font";

const EEXEC_KEY = 55665;
const CHARSTRING_KEY = 4330;

export interface Type1Lengths {
  /** Length of the cleartext portion */
  length1?: number;
  /** Length of the encrypted portion */
  length2?: number;
}

/**
 * Parse a Type 1 font program.
 *
 * @throws {Error} if the font has no eexec section or no CharStrings
 */
export function parseType1(data: Uint8Array, lengths: Type1Lengths = {}): Type1Font {
  const { cleartext, encrypted } = splitSections(data, lengths);
  const header = bytesToLatin1(cleartext);
  const binary = isHexEncoded(encrypted) ? hexToBytes(encrypted) : encrypted;
  const privatePart = decrypt(binary, EEXEC_KEY, 4);

  const fontMatrix = parseFontMatrix(header);
  const encoding = parseEncoding(header);
  const lenIV = readInteger(bytesToLatin1(privatePart), /\/lenIV\s+(-?\d+)/) ?? 4;
  const reader = new PrivateReader(privatePart);
  const subrs = reader.readSubrs(lenIV);
  const charStrings = reader.readCharStrings(lenIV);

  if (charStrings.size === 0) {
    throw new Error("Type 1 font has no CharStrings");
  }

  const fontName = /\/FontName\s*\/(\S+)/.exec(header)?.[1] ?? "";

  return new Type1Font({ fontName, fontMatrix, encoding, subrs, charStrings });
}

function splitSections(
  data: Uint8Array,
  lengths: Type1Lengths,
): { cleartext: Uint8Array; encrypted: Uint8Array } {
  if (data[0] === 0x80) {
    return splitPfb(data);
  }

  const { length1, length2 } = lengths;

  if (length1 && length1 < data.length && endsWithEexec(data, length1)) {
    const end = length2 ? Math.min(data.length, length1 + length2) : data.length;

    return { cleartext: data.subarray(0, length1), encrypted: data.subarray(length1, end) };
  }

  const text = bytesToLatin1(data.subarray(0, Math.min(data.length, 65536)));
  const marker = text.indexOf("eexec");

  if (marker < 0) {
    throw new Error("Type 1 font has no eexec section");
  }

  let start = marker + 5;

  while (start < data.length && isWhitespace(data[start])) {
    start++;
  }

  return { cleartext: data.subarray(0, start), encrypted: data.subarray(start) };
}

function endsWithEexec(data: Uint8Array, length1: number): boolean {
  const tail = bytesToLatin1(data.subarray(Math.max(0, length1 - 32), length1));

  return tail.includes("eexec");
}

/**
 * PFB: segments of `0x80 type length(LE32) data`; type 1 is ASCII,
 * 2 is binary and 3 ends the file.
 */
function splitPfb(data: Uint8Array): { cleartext: Uint8Array; encrypted: Uint8Array } {
  const ascii: Uint8Array[] = [];
  const binary: Uint8Array[] = [];
  let pos = 0;

  while (pos + 6 <= data.length && data[pos] === 0x80) {
    const type = data[pos + 1];

    if (type === 3) {
      break;
    }

    const length =
      data[pos + 2] | (data[pos + 3] << 8) | (data[pos + 4] << 16) | (data[pos + 5] * 0x1000000);
    const segment = data.subarray(pos + 6, pos + 6 + length);

    if (type === 1 && binary.length === 0) {
      ascii.push(segment);
    } else if (type === 2) {
      binary.push(segment);
    }

    pos += 6 + length;
  }

  return { cleartext: concatBytes(ascii), encrypted: concatBytes(binary) };
}

function isWhitespace(byte: number): boolean {
  return byte === 0x20 || byte === 0x0a || byte === 0x0d || byte === 0x09;
}

function isHexDigit(byte: number): boolean {
  return (byte >= 0x30 && byte <= 0x39) || (byte >= 0x41 && byte <= 0x46) || (byte >= 0x61 && byte <= 0x66);
}

function isHexEncoded(data: Uint8Array): boolean {
  if (data.length < 4) {
    return false;
  }

  for (let i = 0; i < 4; i++) {
    if (!isHexDigit(data[i])) {
      return false;
    }
  }

  return true;
}

function hexToBytes(data: Uint8Array): Uint8Array {
  const digits: number[] = [];

  for (const byte of data) {
    if (isHexDigit(byte)) {
      digits.push(Number.parseInt(String.fromCharCode(byte), 16));
    }
  }

  const result = new Uint8Array(digits.length >> 1);

  for (let i = 0; i < result.length; i++) {
    result[i] = (digits[i * 2] << 4) | digits[i * 2 + 1];
  }

  return result;
}

/**
 * Type 1 encryption (eexec and charstring), dropping `skip` leading
 * random bytes.
 */
export function decrypt(data: Uint8Array, key: number, skip: number): Uint8Array {
  let r = key;
  const out = new Uint8Array(data.length);

  for (let i = 0; i < data.length; i++) {
    const cipher = data[i];

    out[i] = cipher ^ (r >> 8);
    r = ((cipher + r) * 52845 + 22719) & 0xffff;
  }

  return out.subarray(Math.max(0, skip));
}

/**
 * A negative lenIV marks unencrypted charstrings.
 */
function decryptCharString(bytes: Uint8Array, lenIV: number): Uint8Array {
  return lenIV < 0 ? bytes : decrypt(bytes, CHARSTRING_KEY, lenIV);
}

function readInteger(text: string, pattern: RegExp): number | undefined {
  const match = pattern.exec(text);

  return match ? Number.parseInt(match[1], 10) : undefined;
}

function parseFontMatrix(header: string): [number, number, number, number, number, number] {
  const match = /\/FontMatrix\s*[[{]([^\]}]*)[\]}]/.exec(header);
  const values = match?.[1].trim().split(/\s+/).map(Number) ?? [];

  if (values.length === 6 && values.every(Number.isFinite)) {
    return [values[0], values[1], values[2], values[3], values[4], values[5]];
  }

  return [0.001, 0, 0, 0.001, 0, 0];
}

/**
 * Built-in encoding: "standard" for `StandardEncoding`, otherwise the
 * code → glyph name entries from `dup <code> /<name> put`.
 */
function parseEncoding(header: string): Map<number, string> | "standard" {
  const start = header.indexOf("/Encoding");

  if (start < 0 || /^\/Encoding\s+StandardEncoding/.test(header.slice(start))) {
    return "standard";
  }

  const encoding = new Map<number, string>();
  const end = header.indexOf("readonly def", start);
  const body = header.slice(start, end < 0 ? undefined : end);
  const entry = /dup\s+(\d+)\s*\/([^\s/[\]{}()<>]+)\s+put/g;

  for (const match of body.matchAll(entry)) {
    encoding.set(Number.parseInt(match[1], 10), match[2]);
  }

  return encoding;
}

/**
 * Token reader over the decrypted private section. Binary charstrings
 * follow an `RD` / `-|` token and one separator byte.
 */
class PrivateReader {
  private readonly text: string;
  private pos = 0;

  constructor(private readonly data: Uint8Array) {
    this.text = bytesToLatin1(data);
  }

  readSubrs(lenIV: number): Uint8Array[] {
    const subrs: Uint8Array[] = [];
    const start = this.text.indexOf("/Subrs");

    if (start < 0) {
      return subrs;
    }

    this.pos = start + 6;
    this.token(); // count
    this.token(); // array

    while (this.peekToken() === "dup") {
      this.token();

      const index = Number.parseInt(this.token(), 10);
      const bytes = this.readBinary();

      if (!bytes) {
        break;
      }

      subrs[index] = decryptCharString(bytes, lenIV);
      this.token(); // NP, |, or "noaccess put"

      if (this.peekToken() === "put") {
        this.token();
      }
    }

    return subrs;
  }

  readCharStrings(lenIV: number): Map<string, Uint8Array> {
    const charStrings = new Map<string, Uint8Array>();
    const start = this.text.indexOf("/CharStrings");

    if (start < 0) {
      return charStrings;
    }

    this.pos = start + 12;

    while (this.pos < this.text.length) {
      const token = this.token();

      if (token === "end" || token === "") {
        break;
      }

      if (!token.startsWith("/")) {
        continue;
      }

      const bytes = this.readBinary();

      if (!bytes) {
        break;
      }

      charStrings.set(token.slice(1), decryptCharString(bytes, lenIV));
    }

    return charStrings;
  }

  /**
   * `<length> RD <bytes>`; returns null when the layout does not match.
   */
  private readBinary(): Uint8Array | null {
    const length = Number.parseInt(this.token(), 10);
    const marker = this.token();

    if (!Number.isInteger(length) || length < 0 || (marker !== "RD" && marker !== "-|")) {
      return null;
    }

    const start = this.pos + 1;
    const end = start + length;

    if (end > this.data.length) {
      return null;
    }

    this.pos = end;

    return this.data.subarray(start, end);
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) {
      this.pos++;
    }
  }

  private token(): string {
    this.skipWhitespace();

    const start = this.pos;

    while (this.pos < this.text.length && !/\s/.test(this.text[this.pos])) {
      this.pos++;
    }

    return this.text.slice(start, this.pos);
  }

  private peekToken(): string {
    const saved = this.pos;
    const token = this.token();

    this.pos = saved;

    return token;
  }
}
