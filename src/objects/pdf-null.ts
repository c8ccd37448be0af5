/**
 * The `null` keyword. A dictionary entry whose value is null counts as
 * absent.
 */
export class PdfNull {
  static readonly instance = new PdfNull();

  private constructor() {}

  get type(): "null" {
    return "null";
  }
}
