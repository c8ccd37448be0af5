/**
 * Errors raised while loading the resources a content stream uses:
 * functions, colour spaces, shadings, patterns and images.
 *
 * The interpreter catches these and records a diagnostic.
 */

export class ContentError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ContentError";
  }
}

/**
 * A resource uses a feature that is recognised but not rendered.
 */
export class UnsupportedFeatureError extends ContentError {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedFeatureError";
  }
}
