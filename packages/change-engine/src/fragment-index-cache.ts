import type { Document } from '@docpatch/document-model';
import { buildFragmentIndex, type FragmentIndex } from './fragment-index.js';

/**
 * Per-pass cache of fragment indexes, keyed by paragraph index.
 *
 * Indexes are built lazily on first access. The cache cannot see mutations:
 * whoever edits a paragraph must call {@link invalidate} for it.
 */
export class FragmentIndexCache {
  private readonly entries = new Map<number, FragmentIndex>();

  constructor(private readonly document: Document<unknown>) {}

  get size(): number {
    return this.entries.size;
  }

  get(paragraphIndex: number): FragmentIndex {
    const existing = this.entries.get(paragraphIndex);
    if (existing) return existing;

    const paragraph = this.document.paragraphs[paragraphIndex];
    if (!paragraph) {
      throw new RangeError(`Paragraph ${paragraphIndex} is out of range (${this.document.paragraphs.length} paragraphs).`);
    }

    const next = buildFragmentIndex(paragraph);
    this.entries.set(paragraphIndex, next);
    return next;
  }

  invalidate(paragraphIndex: number): void {
    this.entries.delete(paragraphIndex);
  }
}
