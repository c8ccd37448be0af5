/**
 * Errors surfaced by the public rendering API.
 */

import type { z } from "zod";

export type RenderErrorKind = "page" | "glyph" | "backend";

/**
 * A page could not be rendered. `kind` tells the stage that failed:
 * building the page scene, resolving glyphs, or rasterising.
 */
export class RenderError extends Error {
  constructor(
    readonly kind: RenderErrorKind,
    readonly pageIndex: number,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Page ${pageIndex + 1}: ${message}`, options);
    this.name = "RenderError";
  }
}

/**
 * The render was aborted or superseded by a newer request.
 */
export class RenderCancelledError extends Error {
  constructor(readonly pageIndex: number) {
    super(`Rendering of page ${pageIndex + 1} was cancelled`);
    this.name = "RenderCancelledError";
  }
}

/**
 * Options or a font manifest failed validation.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: z.ZodIssue[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${formatIssues(issues)}` : message);
    this.name = "ConfigError";
  }
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
