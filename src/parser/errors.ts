/**
 * Errors raised while reading the file structure.
 *
 * A {@link RecoverableParseError} sends a lenient parse into brute-force
 * recovery; a {@link MalformedDocumentError} ends it.
 */

import { DocumentError } from "#src/document/errors";

/**
 * Called with recoverable problems and the byte offset they were found at.
 */
export type WarningCallback = (message: string, position: number) => void;

export class MalformedDocumentError extends DocumentError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MalformedDocumentError";
  }
}

/**
 * Recovery ran and found no catalog or no objects at all.
 */
export class UnrecoverableParseError extends MalformedDocumentError {
  constructor(message: string) {
    super(message);
    this.name = "UnrecoverableParseError";
  }
}

export type ParseStage = "xref" | "object" | "stream" | "structure";

export class RecoverableParseError extends Error {
  constructor(
    readonly stage: ParseStage,
    message: string,
  ) {
    super(message);
    this.name = "RecoverableParseError";
  }
}

export class XRefParseError extends RecoverableParseError {
  constructor(message: string) {
    super("xref", message);
    this.name = "XRefParseError";
  }
}

export class ObjectParseError extends RecoverableParseError {
  constructor(message: string) {
    super("object", message);
    this.name = "ObjectParseError";
  }
}

/**
 * A filter failed or is not implemented. Pages skip the affected
 * content or image.
 */
export class StreamDecodeError extends RecoverableParseError {
  constructor(message: string) {
    super("stream", message);
    this.name = "StreamDecodeError";
  }
}

/**
 * Header, trailer or catalog missing or invalid.
 */
export class StructureError extends RecoverableParseError {
  constructor(message: string) {
    super("structure", message);
    this.name = "StructureError";
  }
}
