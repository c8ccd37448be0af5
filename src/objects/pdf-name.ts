/**
 * Name object such as `/Type`, stored without the slash.
 *
 * Names are interned, so comparing two of them with `===` compares
 * their values.
 */
export class PdfName {
  private static readonly interned = new Map<string, PdfName>();

  static of(name: string): PdfName {
    const existing = PdfName.interned.get(name);

    if (existing) {
      return existing;
    }

    const created = new PdfName(name);

    PdfName.interned.set(name, created);

    return created;
  }

  static readonly Type = PdfName.of("Type");
  static readonly Page = PdfName.of("Page");
  static readonly Pages = PdfName.of("Pages");
  static readonly Catalog = PdfName.of("Catalog");

  private constructor(readonly value: string) {}

  get type(): "name" {
    return "name";
  }

  toString(): string {
    return `/${this.value}`;
  }
}
