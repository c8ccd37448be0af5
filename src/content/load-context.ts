import type { RefResolver } from "#src/objects/pdf-ref";
import type { PdfStream } from "#src/objects/pdf-stream";

/**
 * What resource loaders need from the document: reference resolution and
 * stream decoding.
 */
export interface LoadContext {
  resolver: RefResolver;
  decodeStream: (stream: PdfStream) => Promise<Uint8Array>;
}
