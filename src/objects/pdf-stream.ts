import type { FilterSpec } from "#src/filters/filter";
import { decodeFilters } from "#src/filters/filter-pipeline";
import { PdfDict } from "./pdf-dict";
import type { PdfName } from "./pdf-name";
import type { PdfObject } from "./pdf-object";
import type { RefResolver } from "./pdf-ref";

/**
 * A dictionary followed by `stream ... endstream` data: page contents,
 * form XObjects, images, font programs.
 *
 * `data` holds the bytes exactly as stored in the file. Decoding is
 * lazy and memoised, since a font program or image may be shared by many
 * pages.
 */
export class PdfStream extends PdfDict {
  static fromDict(entries: Record<string, PdfObject>, data = new Uint8Array(0)): PdfStream {
    return new PdfStream(Object.entries(entries), data);
  }

  private decoded: Promise<Uint8Array> | null = null;

  constructor(
    dict?: PdfDict | Iterable<[PdfName | string, PdfObject]>,
    readonly data: Uint8Array = new Uint8Array(0),
  ) {
    super(dict);
  }

  override get type(): "stream" {
    return "stream";
  }

  /**
   * The data with every /Filter applied in order. A rejected decode is
   * forgotten, so the next call tries again.
   *
   * @throws {StreamDecodeError} if a filter fails or is unsupported
   */
  getDecodedData(resolver?: RefResolver): Promise<Uint8Array> {
    if (this.decoded) {
      return this.decoded;
    }

    const specs = this.filterSpecs(resolver);
    const decoded = specs.length === 0 ? Promise.resolve(this.data) : decodeFilters(this.data, specs);

    this.decoded = decoded;

    decoded.catch(() => {
      if (this.decoded === decoded) {
        this.decoded = null;
      }
    });

    return decoded;
  }

  /**
   * Pair each /Filter name with its /DecodeParms entry. Both may be a
   * single value or an array; a null parameter entry means defaults.
   */
  private filterSpecs(resolver?: RefResolver): FilterSpec[] {
    const filters = listOf(this.get("Filter", resolver), resolver);
    const params = listOf(this.get("DecodeParms", resolver) ?? this.get("DP", resolver), resolver);
    const specs: FilterSpec[] = [];

    filters.forEach((filter, i) => {
      if (filter?.type !== "name") {
        return;
      }

      const param = params[i];

      specs.push({ name: filter.value, params: param?.type === "dict" ? param : undefined });
    });

    return specs;
  }
}

function listOf(value: PdfObject | undefined, resolver?: RefResolver): Array<PdfObject | undefined> {
  if (value?.type !== "array") {
    return [value];
  }

  return Array.from({ length: value.length }, (_, i) => value.at(i, resolver));
}
