/**
 * A run of text carrying uniform formatting within a paragraph.
 *
 * `format` is an opaque token. Consumers copy it between fragments but never
 * look inside it; only the provider that produced it knows its shape.
 */
export interface Fragment<TFormat = unknown> {
  /** Stable for the lifetime of one apply pass. */
  id: string;
  /** May be empty once an edit has consumed the fragment. */
  text: string;
  format: TFormat;
}

/**
 * Ordered fragments whose concatenated text is the paragraph's logical text.
 * A paragraph is identified by its index in {@link Document.paragraphs}.
 */
export interface Paragraph<TFormat = unknown> {
  fragments: Fragment<TFormat>[];
}

export interface Document<TFormat = unknown> {
  paragraphs: Paragraph<TFormat>[];
}

/**
 * Loads and saves documents for an apply pass.
 *
 * Loading happens entirely before the pass and saving entirely after it.
 * Fragment ids must stay stable between `load` and `save` of one document.
 */
export interface DocumentProvider<TFormat = unknown> {
  load(path: string): Promise<Document<TFormat>>;
  save(document: Document<TFormat>, path: string): Promise<void>;
}
