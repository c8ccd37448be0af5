/**
 * Integer or real. PDF draws no distinction the renderer cares about, so
 * both are stored as a JS number.
 */
export class PdfNumber {
  static of(value: number): PdfNumber {
    return new PdfNumber(value);
  }

  constructor(readonly value: number) {}

  get type(): "number" {
    return "number";
  }
}
