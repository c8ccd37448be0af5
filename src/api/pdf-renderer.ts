/**
 * Entry point for viewer shells: open documents by bytes and render
 * their pages through opaque handles.
 */

import { DocumentError } from "#src/document/errors";
import { type DocumentInfo, PdfDocument } from "#src/document/pdf-document";
import type { ParseOptions } from "#src/parser/document-parser";
import {
  PageRenderService,
  type RenderRequestOptions,
  type RenderResult,
  type RenderServiceOptions,
  resolveServiceConfig,
} from "./page-render-service";

/**
 * An open document. Only meaningful to the renderer that issued it.
 */
export interface DocumentHandle {
  readonly id: number;
  readonly fingerprint: string;
}

export interface PageSize {
  /** Points, after /Rotate */
  width: number;
  height: number;
}

interface OpenDocument {
  document: PdfDocument;
  service: PageRenderService;
}

/**
 * @example
 * ```typescript
 * const renderer = new PdfRenderer({ background: "#ffffff" });
 * const handle = await renderer.open(bytes);
 *
 * for (let i = 0; i < renderer.pageCount(handle); i++) {
 *   const { target } = await renderer.renderPage(handle, i, 1.5);
 * }
 *
 * renderer.close(handle);
 * ```
 */
export class PdfRenderer {
  private readonly documents = new Map<number, OpenDocument>();
  private nextId = 1;

  /**
   * @throws {ConfigError} when the options fail validation
   */
  constructor(private readonly options: RenderServiceOptions = {}) {
    resolveServiceConfig(options);
  }

  /**
   * Parse a document. Each open document gets its own render service,
   * so its caches are released by {@link close}.
   *
   * @throws {MalformedDocumentError} when the file cannot be parsed
   * @throws {DocumentError} for encrypted files and broken page trees
   */
  async open(bytes: Uint8Array, options: ParseOptions = {}): Promise<DocumentHandle> {
    const document = await PdfDocument.load(bytes, options);
    const service = new PageRenderService(this.options);
    const handle: DocumentHandle = { id: this.nextId++, fingerprint: document.fingerprint };

    service.setDocument(document);
    this.documents.set(handle.id, { document, service });

    return handle;
  }

  pageCount(handle: DocumentHandle): number {
    return this.lookup(handle).document.pageCount;
  }

  /**
   * Render a page at `scale` device pixels per point.
   *
   * @throws {RenderError} when the page cannot be rendered
   * @throws {RenderCancelledError} when the request is aborted or superseded
   */
  async renderPage(
    handle: DocumentHandle,
    pageIndex: number,
    scale: number,
    options: RenderRequestOptions = {},
  ): Promise<RenderResult> {
    const { document, service } = this.lookup(handle);

    return service.render(document, pageIndex, scale, options);
  }

  /**
   * @throws {PageIndexOutOfRangeError} for an index outside the document
   */
  pageSize(handle: DocumentHandle, pageIndex: number): PageSize {
    return this.lookup(handle).document.page(pageIndex).size;
  }

  metadata(handle: DocumentHandle): DocumentInfo {
    return this.lookup(handle).document.info;
  }

  /**
   * Release a document's caches and cancel its renders. Closing twice is
   * harmless.
   */
  close(handle: DocumentHandle): void {
    const open = this.documents.get(handle.id);

    if (open) {
      open.service.dispose();
      this.documents.delete(handle.id);
    }
  }

  private lookup(handle: DocumentHandle): OpenDocument {
    const open = this.documents.get(handle.id);

    if (!open || open.document.fingerprint !== handle.fingerprint) {
      throw new DocumentError(`Unknown or closed document handle ${handle.id}`);
    }

    return open;
  }
}
