/**
 * The PDF object union.
 *
 * Discriminate on `type`, except for streams: a `PdfStream` is also a
 * `PdfDict`, and `PdfDict.type` admits "stream", so comparing `type`
 * does not narrow to `PdfStream`. Use {@link isPdfStream} for that.
 */
import type { PdfArray } from "./pdf-array";
import type { PdfBool } from "./pdf-bool";
import type { PdfDict } from "./pdf-dict";
import type { PdfName } from "./pdf-name";
import type { PdfNull } from "./pdf-null";
import type { PdfNumber } from "./pdf-number";
import type { PdfRef } from "./pdf-ref";
import type { PdfStream } from "./pdf-stream";
import type { PdfString } from "./pdf-string";

export type PdfObject =
  | PdfNull
  | PdfBool
  | PdfNumber
  | PdfName
  | PdfString
  | PdfRef
  | PdfArray
  | PdfDict
  | PdfStream;

type Maybe = PdfObject | null | undefined;

export function isPdfStream(obj: Maybe): obj is PdfStream {
  return obj?.type === "stream";
}

/**
 * A dictionary, or a stream read as its dictionary.
 */
export function isDictLike(obj: Maybe): obj is PdfDict {
  return obj?.type === "dict" || obj?.type === "stream";
}
