/**
 * Page rendering with caching, request deduplication and cancellation.
 */

import type { Diagnostic } from "#src/content/diagnostics";
import { interpretPage, type PageRun } from "#src/content/interpreter";
import type { PdfDocument } from "#src/document/pdf-document";
import type { PdfPage } from "#src/document/pdf-page";
import { type RGBA, parseHexColor } from "#src/helpers/colors";
import { FontCache } from "#src/fonts/font-cache";
import { FontDirectory } from "#src/fonts/font-directory";
import { FontError } from "#src/fonts/errors";
import { GlyphCache } from "#src/fonts/glyph-cache";
import type { RasterBackend } from "#src/raster/backend";
import { CpuBackend } from "#src/raster/cpu-backend";
import { GpuBackend } from "#src/raster/gpu/gpu-backend";
import type { GpuDevice } from "#src/raster/gpu/gpu-device";
import type { RenderTarget } from "#src/raster/render-target";
import { RenderCancelledError, RenderError } from "./errors";
import { LruCache } from "./lru-cache";
import { parseConfig, type RenderServiceConfig, RenderServiceConfigSchema } from "./schemas";

export interface RenderServiceOptions {
  /** Rasterizer; default "cpu" */
  backend?: "cpu" | "gpu";
  /** Device for the GPU backend; default the in-process software device */
  gpuDevice?: GpuDevice;
  /** Rendered pages kept; default 8 */
  cacheSize?: number;
  /** Hex colour under every page; default opaque white */
  background?: string;
  /** Directory with a `fonts.json` manifest of substitute fonts */
  fontDirectory?: string;
  /** Cancel an in-flight render when its page is requested at another scale; default true */
  supersede?: boolean;
  /** Observe diagnostics as pages are interpreted */
  onDiagnostic?: (diagnostic: Diagnostic, pageIndex: number) => void;
}

export interface RenderRequestOptions {
  signal?: AbortSignal;
}

export interface RenderResult {
  target: RenderTarget;
  diagnostics: readonly Diagnostic[];
  /** Zero-based page index */
  page: number;
  scale: number;
  /** The target came from the cache without running the pipeline */
  fromCache: boolean;
}

interface RenderedPage {
  target: RenderTarget;
  diagnostics: readonly Diagnostic[];
}

/**
 * Validate the plain-data part of the options and apply defaults.
 *
 * @throws {ConfigError} when an option is invalid
 */
export function resolveServiceConfig(options: RenderServiceOptions): RenderServiceConfig {
  const { backend, cacheSize, background, fontDirectory, supersede } = options;

  return parseConfig(
    RenderServiceConfigSchema,
    { backend, cacheSize, background, fontDirectory, supersede },
    "render service options",
  );
}

/**
 * One pipeline run, shared by every caller asking for the same key.
 */
interface InFlightRender {
  document: PdfDocument;
  pageIndex: number;
  scale: number;
  controller: AbortController;
  promise: Promise<RenderedPage>;
  /** Callers still waiting; the run is aborted when this drops to 0 */
  waiters: number;
}

/**
 * Renders the pages of one document at a time.
 *
 * Font and glyph caches belong to the current document and are shared by
 * all of its renders; replacing the document drops them along with the
 * rendered-page cache.
 *
 * @example
 * ```typescript
 * const service = new PageRenderService({ cacheSize: 16 });
 * const { target, diagnostics } = await service.render(document, 0, 2);
 * ```
 */
export class PageRenderService {
  readonly config: RenderServiceConfig;

  private readonly backend: RasterBackend;
  private readonly background: RGBA;
  private readonly cache: LruCache<string, RenderedPage>;
  private readonly inFlight = new Map<string, InFlightRender>();
  private readonly onDiagnostic?: (diagnostic: Diagnostic, pageIndex: number) => void;

  private document: PdfDocument | null = null;
  private fontCache = new FontCache();
  private glyphCache = new GlyphCache();
  private fontDirectory: Promise<FontDirectory | null> | null = null;

  /**
   * @throws {ConfigError} when the options fail validation
   */
  constructor(options: RenderServiceOptions = {}) {
    this.config = resolveServiceConfig(options);
    this.background = parseHexColor(this.config.background);
    this.cache = new LruCache(this.config.cacheSize);
    this.backend = this.config.backend === "gpu" ? new GpuBackend(options.gpuDevice) : new CpuBackend();
    this.onDiagnostic = options.onDiagnostic;
  }

  get currentDocument(): PdfDocument | null {
    return this.document;
  }

  /** Pages currently held in the cache */
  get cachedPages(): number {
    return this.cache.size;
  }

  /**
   * Make `document` current. Replacing the document clears the page,
   * font and glyph caches and cancels renders of the old one.
   */
  setDocument(document: PdfDocument): void {
    if (document === this.document) {
      return;
    }

    this.document = document;
    this.cache.clear();
    this.fontCache = new FontCache();
    this.glyphCache = new GlyphCache();

    for (const [key, render] of this.inFlight) {
      render.controller.abort();
      this.inFlight.delete(key);
    }
  }

  /**
   * Render a page at `scale` device pixels per point.
   *
   * @throws {RenderCancelledError} when the signal aborts, or a request for
   * the same page at another scale supersedes this one
   * @throws {RenderError} when the page cannot be rendered
   * @throws {ConfigError} when the font directory cannot be opened
   */
  render(
    document: PdfDocument,
    pageIndex: number,
    scale: number,
    options: RenderRequestOptions = {},
  ): Promise<RenderResult> {
    if (!(scale > 0) || !Number.isFinite(scale)) {
      return Promise.reject(new RangeError(`Invalid render scale ${scale}`));
    }

    if (options.signal?.aborted) {
      return Promise.reject(new RenderCancelledError(pageIndex));
    }

    this.setDocument(document);

    const key = `${document.fingerprint}:${pageIndex}:${scale}`;
    const cached = this.cache.get(key);

    if (cached) {
      return Promise.resolve({ ...cached, page: pageIndex, scale, fromCache: true });
    }

    let render = this.inFlight.get(key);

    // A run whose last waiter gave up is still settling; start afresh
    if (!render || render.controller.signal.aborted) {
      if (this.config.supersede) {
        this.supersede(document, pageIndex, scale);
      }

      render = this.start(key, document, pageIndex, scale);
    }

    return this.join(render, options.signal);
  }

  /**
   * Cancel everything in flight and release caches and the backend.
   */
  dispose(): void {
    for (const render of this.inFlight.values()) {
      render.controller.abort();
    }

    this.inFlight.clear();
    this.cache.clear();
    this.fontCache.clear();
    this.glyphCache.clear();
    this.backend.dispose();
    this.document = null;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Pipeline
  // ───────────────────────────────────────────────────────────────────────────

  private supersede(document: PdfDocument, pageIndex: number, scale: number): void {
    for (const [key, render] of this.inFlight) {
      if (render.document === document && render.pageIndex === pageIndex && render.scale !== scale) {
        render.controller.abort();
        this.inFlight.delete(key);
      }
    }
  }

  private start(key: string, document: PdfDocument, pageIndex: number, scale: number): InFlightRender {
    const controller = new AbortController();
    const render: InFlightRender = {
      document,
      pageIndex,
      scale,
      controller,
      promise: this.pipeline(document, pageIndex, scale, controller.signal),
      waiters: 0,
    };

    this.inFlight.set(key, render);

    void render.promise.then(
      page => {
        if (this.inFlight.get(key) === render) {
          this.inFlight.delete(key);

          if (this.document === document) {
            this.cache.set(key, page);
          }
        }
      },
      () => {
        if (this.inFlight.get(key) === render) {
          this.inFlight.delete(key);
        }
      },
    );

    return render;
  }

  private async pipeline(
    document: PdfDocument,
    pageIndex: number,
    scale: number,
    signal: AbortSignal,
  ): Promise<RenderedPage> {
    const fontDirectory = await this.loadFontDirectory();
    let page: PdfPage;
    let run: PageRun;

    try {
      page = document.page(pageIndex);
      run = await interpretPage(page, {
        fontCache: this.fontCache,
        glyphCache: this.glyphCache,
        fontDirectory,
        resolution: scale,
        signal,
        onDiagnostic: diagnostic => this.onDiagnostic?.(diagnostic, pageIndex),
      });
    } catch (error) {
      throw this.failure(error, signal, pageIndex, error instanceof FontError ? "glyph" : "page");
    }

    try {
      const target = await this.backend.rasterize(run.scene, {
        scale,
        background: this.background,
        signal,
      });

      return { target, diagnostics: run.diagnostics };
    } catch (error) {
      throw this.failure(error, signal, pageIndex, "backend");
    }
  }

  private failure(
    error: unknown,
    signal: AbortSignal,
    pageIndex: number,
    kind: RenderError["kind"],
  ): Error {
    if (signal.aborted) {
      return new RenderCancelledError(pageIndex);
    }

    const message = error instanceof Error ? error.message : String(error);

    return new RenderError(kind, pageIndex, message, { cause: error });
  }

  private loadFontDirectory(): Promise<FontDirectory | null> {
    const directory = this.config.fontDirectory;

    if (directory === undefined) {
      return Promise.resolve(null);
    }

    this.fontDirectory ??= FontDirectory.open(directory);

    return this.fontDirectory;
  }

  /**
   * Wait for a shared run on behalf of one caller. The caller's signal
   * cancels only its own wait, unless it was the last one waiting.
   */
  private join(render: InFlightRender, signal: AbortSignal | undefined): Promise<RenderResult> {
    render.waiters++;

    return new Promise<RenderResult>((resolve, reject) => {
      let settled = false;

      const settle = () => {
        settled = true;
        signal?.removeEventListener("abort", onAbort);
      };

      const onAbort = () => {
        if (settled) {
          return;
        }

        settle();
        reject(new RenderCancelledError(render.pageIndex));

        if (--render.waiters === 0) {
          render.controller.abort();
        }
      };

      signal?.addEventListener("abort", onAbort, { once: true });

      render.promise.then(
        page => {
          if (!settled) {
            settle();
            resolve({ ...page, page: render.pageIndex, scale: render.scale, fromCache: false });
          }
        },
        (error: unknown) => {
          if (!settled) {
            settle();
            reject(error);
          }
        },
      );
    });
  }
}
