/**
 * Byte classes of PDF and PostScript syntax.
 *
 * Every byte is whitespace, a delimiter or a regular character. The
 * content stream lexer and the file parser both ask per byte, so the
 * classes live in a 256-entry table.
 */

export const LF = 0x0a;
export const CR = 0x0d;

export const PARENTHESIS_OPEN = 0x28;
export const PARENTHESIS_CLOSE = 0x29;
export const PERCENT = 0x25;
export const BACKSLASH = 0x5c;

export const DIGIT_0 = 0x30;
export const DIGIT_9 = 0x39;

const WHITESPACE = 1;
const DELIMITER = 2;

const CLASSES = new Uint8Array(256);

// NUL, TAB, LF, FF, CR, SPACE
for (const byte of [0x00, 0x09, LF, 0x0c, CR, 0x20]) {
  CLASSES[byte] = WHITESPACE;
}

for (const char of "()<>[]{}/%") {
  CLASSES[char.charCodeAt(0)] = DELIMITER;
}

export function isWhitespace(byte: number): boolean {
  return CLASSES[byte & 0xff] === WHITESPACE;
}

export function isDelimiter(byte: number): boolean {
  return CLASSES[byte & 0xff] === DELIMITER;
}

/**
 * Neither whitespace nor a delimiter. -1 (end of input) is not regular.
 */
export function isRegularChar(byte: number): boolean {
  return byte >= 0 && CLASSES[byte & 0xff] === 0;
}

export function isDigit(byte: number): boolean {
  return byte >= DIGIT_0 && byte <= DIGIT_9;
}

/**
 * Value of a hex digit, or -1.
 */
export function hexValue(byte: number): number {
  if (isDigit(byte)) {
    return byte - DIGIT_0;
  }

  // Fold A-F onto a-f
  const lower = byte | 0x20;

  return lower >= 0x61 && lower <= 0x66 ? lower - 0x61 + 10 : -1;
}
