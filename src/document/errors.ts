/**
 * Errors raised by the document model.
 *
 * All of them are fatal to the operation that raised them; none are
 * recovered internally.
 */

/**
 * Base class for failures opening or navigating a document.
 */
export class DocumentError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DocumentError";
  }
}

/**
 * A reference points at an object number absent from the object table.
 */
export class DanglingReferenceError extends DocumentError {
  constructor(
    readonly objectNumber: number,
    readonly generation: number,
  ) {
    super(`Dangling reference: ${objectNumber} ${generation} R`);
    this.name = "DanglingReferenceError";
  }
}

export class PageIndexOutOfRangeError extends DocumentError {
  constructor(
    readonly pageIndex: number,
    readonly pageCount: number,
  ) {
    super(`Page index ${pageIndex} is out of range (document has ${pageCount} pages)`);
    this.name = "PageIndexOutOfRangeError";
  }
}

/**
 * The page tree refers back to one of its own ancestors.
 */
export class CyclicPageTreeError extends DocumentError {
  constructor(readonly objectNumber: number) {
    super(`Page tree cycle through object ${objectNumber}`);
    this.name = "CyclicPageTreeError";
  }
}

/**
 * A content stream names a resource that no enclosing resource dictionary
 * defines.
 */
export class UndefinedResourceError extends DocumentError {
  constructor(
    readonly category: string,
    readonly resourceName: string,
  ) {
    super(`Undefined ${category} resource /${resourceName}`);
    this.name = "UndefinedResourceError";
  }
}

/**
 * The trailer carries /Encrypt. Decryption is not supported.
 */
export class UnsupportedEncryptionError extends DocumentError {
  constructor() {
    super("Encrypted documents are not supported");
    this.name = "UnsupportedEncryptionError";
  }
}
