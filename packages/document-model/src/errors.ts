export type DocumentProviderErrorCode =
  | 'FILE_READ_ERROR'
  | 'FILE_WRITE_ERROR'
  | 'INVALID_PACKAGE'
  | 'DOCUMENT_NOT_LOADED';

/**
 * Raised by document providers when a document cannot be loaded or saved.
 *
 * Unlike per-change failures, these are fatal to the pass over that document.
 * Consumers should prefer checking `error.code` over `instanceof`.
 */
export class DocumentProviderError extends Error {
  readonly code: DocumentProviderErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: DocumentProviderErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DocumentProviderError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, DocumentProviderError.prototype);
  }
}
