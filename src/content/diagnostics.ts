/**
 * Problems found while running a page. None of these stop the render;
 * they are collected on the result.
 */

export type DiagnosticKind =
  /** Malformed content syntax, or an operator with bad operands */
  | "syntax"
  /** Operator the interpreter does not know */
  | "unknown-operator"
  /** Unbalanced save/restore, text operators outside BT/ET and similar */
  | "state"
  /** Undefined or unusable named resource */
  | "resource"
  | "font"
  | "glyph"
  | "image"
  /** Feature recognised but not rendered faithfully */
  | "unsupported"
  /** Form or glyph nesting too deep, or cyclic */
  | "recursion";

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  operator?: string;
  /** Byte offset of the operator in the content stream */
  position?: number;
}

export type DiagnosticCallback = (diagnostic: Diagnostic) => void;

/**
 * Collects diagnostics and forwards each one to an optional listener.
 */
export class DiagnosticLog {
  private readonly entries: Diagnostic[] = [];

  constructor(private readonly listener?: DiagnosticCallback) {}

  get diagnostics(): readonly Diagnostic[] {
    return this.entries;
  }

  report(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
    this.listener?.(diagnostic);
  }
}
