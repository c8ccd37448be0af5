/**
 * `true` or `false`. There are only ever two instances.
 */
export class PdfBool {
  static readonly TRUE = new PdfBool(true);
  static readonly FALSE = new PdfBool(false);

  static of(value: boolean): PdfBool {
    return value ? PdfBool.TRUE : PdfBool.FALSE;
  }

  private constructor(readonly value: boolean) {}

  get type(): "bool" {
    return "bool";
  }
}
