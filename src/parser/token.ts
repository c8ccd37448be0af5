/**
 * Lexical tokens of PDF object syntax, as produced by TokenReader. Every
 * token carries the byte offset it starts at.
 */

interface At {
  position: number;
}

export interface NumberToken extends At {
  type: "number";
  value: number;
  /** Written without a decimal point, so usable as an object number */
  isInteger: boolean;
}

/** Value is decoded (`#xx` escapes applied) and has no leading slash */
export interface NameToken extends At {
  type: "name";
  value: string;
}

export interface StringToken extends At {
  type: "string";
  value: Uint8Array;
  format: "literal" | "hex";
}

/** `obj`, `R`, `true`, `null`, content operators and the like */
export interface KeywordToken extends At {
  type: "keyword";
  value: string;
}

/** Braces occur only in type 4 calculator functions */
export interface DelimiterToken extends At {
  type: "delimiter";
  value: "[" | "]" | "<<" | ">>" | "{" | "}";
}

export interface EofToken extends At {
  type: "eof";
}

export type Token = NumberToken | NameToken | StringToken | KeywordToken | DelimiterToken | EofToken;
