import type { PdfDict } from "#src/objects/pdf-dict";

/**
 * A stream decoding filter (PDF 1.7 spec 7.4).
 *
 * Filters are decode-only: the renderer never writes streams.
 */
export interface Filter {
  /** Filter name as it appears in /Filter, e.g. "FlateDecode" */
  readonly name: string;

  decode(data: Uint8Array, params?: PdfDict): Promise<Uint8Array>;
}

/**
 * One entry of a stream's filter chain.
 */
export interface FilterSpec {
  name: string;
  params?: PdfDict;
}
