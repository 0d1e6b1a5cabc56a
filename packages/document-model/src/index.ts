export type { Document, DocumentProvider, Fragment, Paragraph } from './types.js';
export { DocumentProviderError, type DocumentProviderErrorCode } from './errors.js';
export { createDocument, getDocumentText, getParagraphText, type FragmentOrigin } from './text.js';
export { DocxDocumentProvider } from './docx/docx-provider.js';
export type { DocxRunFormat } from './docx/run-text.js';
