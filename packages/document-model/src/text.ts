import type { Document, Fragment, Paragraph } from './types.js';

/** Default format of {@link createDocument}: where the fragment was created. */
export type FragmentOrigin = {
  paragraph: number;
  fragment: number;
};

export function getParagraphText(paragraph: Paragraph<unknown>): string {
  let text = '';
  for (const fragment of paragraph.fragments) {
    text += fragment.text;
  }
  return text;
}

/**
 * Plain text of the whole document, one line per paragraph.
 */
export function getDocumentText(document: Document<unknown>): string {
  return document.paragraphs.map(getParagraphText).join('\n');
}

/**
 * Builds an in-memory document from fragment texts.
 *
 * Fragment ids are `p{paragraph}r{fragment}`. Without `formatFor`, each
 * fragment's format records its original position.
 */
export function createDocument(paragraphs: readonly (readonly string[])[]): Document<FragmentOrigin>;
export function createDocument<TFormat>(
  paragraphs: readonly (readonly string[])[],
  formatFor: (paragraphIndex: number, fragmentIndex: number) => TFormat,
): Document<TFormat>;
export function createDocument<TFormat>(
  paragraphs: readonly (readonly string[])[],
  formatFor?: (paragraphIndex: number, fragmentIndex: number) => TFormat,
): Document<TFormat | FragmentOrigin> {
  return {
    paragraphs: paragraphs.map((texts, paragraphIndex) => ({
      fragments: texts.map(
        (text, fragmentIndex): Fragment<TFormat | FragmentOrigin> => ({
          id: `p${paragraphIndex}r${fragmentIndex}`,
          text,
          format: formatFor
            ? formatFor(paragraphIndex, fragmentIndex)
            : { paragraph: paragraphIndex, fragment: fragmentIndex },
        }),
      ),
    })),
  };
}
