/**
 * pdf-raster
 *
 * Renders PDF pages into RGBA pixel buffers.
 */

export { version } from "../package.json";

// ─────────────────────────────────────────────────────────────────────────────
// High-level API
// ─────────────────────────────────────────────────────────────────────────────

export { type DocumentHandle, type PageSize, PdfRenderer } from "./api/pdf-renderer";
export {
  PageRenderService,
  type RenderRequestOptions,
  type RenderResult,
  type RenderServiceOptions,
} from "./api/page-render-service";
export { type FontManifest, FontManifestSchema, RenderServiceConfigSchema } from "./api/schemas";

// ─────────────────────────────────────────────────────────────────────────────
// Document model
// ─────────────────────────────────────────────────────────────────────────────

export { type DocumentInfo, PdfDocument, parsePdf } from "./document/pdf-document";
export { PdfPage, type Rotation } from "./document/pdf-page";
export type { ParseOptions } from "./parser/document-parser";

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline stages
// ─────────────────────────────────────────────────────────────────────────────

export type { Diagnostic, DiagnosticKind } from "./content/diagnostics";
export { type InterpreterOptions, interpretPage, type PageRun } from "./content/interpreter";
export { FontCache } from "./fonts/font-cache";
export { FontDirectory } from "./fonts/font-directory";
export { GlyphCache } from "./fonts/glyph-cache";
export { type FillRule, Path, PathBuilder } from "./scene/path";
export type { Scene, SceneImage, SceneItem, StrokeStyle } from "./scene/scene";
export type { RasterBackend, RasterizeOptions, Viewport } from "./raster/backend";
export { CpuBackend } from "./raster/cpu-backend";
export { GpuBackend } from "./raster/gpu/gpu-backend";
export type { GpuDevice } from "./raster/gpu/gpu-device";
export { SoftwareGpuDevice } from "./raster/gpu/software-gpu-device";
export { WebGl2Device } from "./raster/gpu/webgl2-device";
export type { RenderTarget } from "./raster/render-target";

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export { ConfigError, RenderCancelledError, RenderError, type RenderErrorKind } from "./api/errors";
export {
  CyclicPageTreeError,
  DanglingReferenceError,
  DocumentError,
  PageIndexOutOfRangeError,
  UndefinedResourceError,
  UnsupportedEncryptionError,
} from "./document/errors";
export { FontError, UndefinedGlyphError } from "./fonts/errors";
export { MalformedDocumentError } from "./parser/errors";
