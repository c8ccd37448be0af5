import { Inflate } from "pako";
import { concatBytes } from "#src/helpers/buffer";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { Filter } from "./filter";
import { applyPredictor } from "./predictor";

/**
 * zlib inflate, followed by the PNG or TIFF predictor named in the
 * parameters.
 *
 * A stream that breaks off partway yields what was inflated before the
 * break; damaged content streams are usually still mostly drawable.
 */
export class FlateFilter implements Filter {
  readonly name = "FlateDecode";

  async decode(data: Uint8Array, params?: PdfDict): Promise<Uint8Array> {
    const decompressed = inflateLenient(data);

    if (params) {
      const predictor = params.getNumber("Predictor")?.value ?? 1;

      if (predictor > 1) {
        return applyPredictor(decompressed, params);
      }
    }

    return decompressed;
  }
}

function inflateLenient(data: Uint8Array): Uint8Array {
  if (data.length === 0) {
    return data;
  }

  const chunks: Uint8Array[] = [];
  const inflater = new Inflate();

  inflater.onData = chunk => {
    if (chunk instanceof Uint8Array) {
      chunks.push(chunk);
    }
  };

  inflater.push(data, true);

  if (inflater.err && chunks.length === 0) {
    throw new Error(`Flate decode failed: ${inflater.msg || `zlib error ${inflater.err}`}`);
  }

  return concatBytes(chunks);
}
