import { concatBytes } from "#src/helpers/buffer";
import { intersectRects, type Matrix, multiply, type Rect, scale } from "#src/helpers/matrix";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfStream } from "#src/objects/pdf-stream";
import type { PdfDocument } from "./pdf-document";

export type Rotation = 0 | 90 | 180 | 270;

/** US Letter, used when no MediaBox is found anywhere in the ancestry */
const DEFAULT_MEDIA_BOX: Rect = { x0: 0, y0: 0, x1: 612, y1: 792 };

const NEWLINE = new Uint8Array([0x0a]);

/**
 * One leaf of the page tree, with its inherited attributes resolved.
 */
export class PdfPage {
  constructor(
    readonly index: number,
    readonly dict: PdfDict,
    /** Intermediate page-tree nodes, nearest first */
    readonly ancestors: readonly PdfDict[],
    readonly document: PdfDocument,
  ) {}

  /**
   * The page's own /Resources followed by each ancestor's, nearest first.
   */
  get resourceChain(): PdfDict[] {
    const chain: PdfDict[] = [];

    for (const node of [this.dict, ...this.ancestors]) {
      const resources = node.getDict("Resources", this.document.resolver);

      if (resources) {
        chain.push(resources);
      }
    }

    return chain;
  }

  get mediaBox(): Rect {
    return this.inheritedRect("MediaBox") ?? DEFAULT_MEDIA_BOX;
  }

  /**
   * CropBox clipped to the MediaBox; the MediaBox when absent or disjoint.
   */
  get cropBox(): Rect {
    const media = this.mediaBox;
    const crop = this.inheritedRect("CropBox");

    return crop ? (intersectRects(crop, media) ?? media) : media;
  }

  /**
   * /Rotate normalised to a quarter turn; other angles count as 0.
   */
  get rotation(): Rotation {
    const value = this.inherited("Rotate");
    const degrees = value?.type === "number" ? value.value : 0;
    const normalized = ((Math.round(degrees) % 360) + 360) % 360;

    switch (normalized) {
      case 90:
        return 90;
      case 180:
        return 180;
      case 270:
        return 270;
      default:
        return 0;
    }
  }

  /**
   * Displayed size in points, after rotation.
   */
  get size(): { width: number; height: number } {
    const box = this.cropBox;
    const width = box.x1 - box.x0;
    const height = box.y1 - box.y0;

    return this.rotation % 180 === 0 ? { width, height } : { width: height, height: width };
  }

  /**
   * Map user space to device pixels: the crop box's top-left corner (after
   * rotation) lands on the origin and y grows downwards.
   */
  deviceTransform(factor: number): Matrix {
    const { x0, y0, x1, y1 } = this.cropBox;
    let base: Matrix;

    switch (this.rotation) {
      case 90:
        base = [0, 1, 1, 0, -y0, -x0];
        break;
      case 180:
        base = [-1, 0, 0, 1, x1, -y0];
        break;
      case 270:
        base = [0, -1, -1, 0, y1, x1];
        break;
      default:
        base = [1, 0, 0, -1, -x0, y1];
    }

    return multiply(base, scale(factor));
  }

  /**
   * Streams listed in /Contents, in order.
   */
  get contentStreams(): PdfStream[] {
    const contents = this.dict.get("Contents", this.document.resolver);

    if (contents instanceof PdfStream) {
      return [contents];
    }

    if (contents?.type !== "array") {
      return [];
    }

    const result: PdfStream[] = [];

    for (let i = 0; i < contents.length; i++) {
      const item = contents.at(i, this.document.resolver);

      if (item instanceof PdfStream) {
        result.push(item);
      }
    }

    return result;
  }

  /**
   * Decoded content bytes: all /Contents streams joined by newlines.
   * A stream that cannot be decoded is left out and reported to `onProblem`.
   */
  async readContents(onProblem?: (message: string) => void): Promise<Uint8Array> {
    const parts: Uint8Array[] = [];

    for (const stream of this.contentStreams) {
      try {
        const data = await this.document.decodeStream(stream);

        if (parts.length > 0) {
          parts.push(NEWLINE);
        }

        parts.push(data);
      } catch (error) {
        onProblem?.(error instanceof Error ? error.message : String(error));
      }
    }

    return concatBytes(parts);
  }

  private inherited(key: string): PdfObject | undefined {
    for (const node of [this.dict, ...this.ancestors]) {
      const value = node.get(key, this.document.resolver);

      if (value !== undefined && value.type !== "null") {
        return value;
      }
    }

    return undefined;
  }

  private inheritedRect(key: string): Rect | undefined {
    for (const node of [this.dict, ...this.ancestors]) {
      const rect = node.getRect(key, this.document.resolver);

      if (rect) {
        return rect;
      }
    }

    return undefined;
  }
}
