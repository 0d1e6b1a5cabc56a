import type { Paragraph } from '@docpatch/document-model';
import type { FragmentSpan, LogicalRange } from './types.js';

export type FragmentPosition = {
  fragmentId: string;
  /** Offset inside the fragment's text. */
  offset: number;
};

/**
 * Snapshot of a paragraph's logical text and the fragment behind every
 * character of it. Never updated in place: rebuild after any mutation.
 */
export interface FragmentIndex {
  readonly text: string;
  /** One entry per logical offset. */
  readonly positions: readonly FragmentPosition[];
}

/**
 * Flattens a paragraph's fragments into one logical string.
 *
 * Zero-length fragments contribute no position, so no match
 * boundary can ever be anchored inside one.
 */
export function buildFragmentIndex(paragraph: Paragraph<unknown>): FragmentIndex {
  let text = '';
  const positions: FragmentPosition[] = [];

  for (const fragment of paragraph.fragments) {
    for (let offset = 0; offset < fragment.text.length; offset += 1) {
      positions.push({ fragmentId: fragment.id, offset });
    }
    text += fragment.text;
  }

  return Object.freeze({
    text,
    positions: Object.freeze(positions),
  });
}

export function positionAt(index: FragmentIndex, offset: number): FragmentPosition | null {
  return index.positions[offset] ?? null;
}

/**
 * Converts a non-empty logical range into fragment-local coordinates.
 *
 * The start is anchored in the fragment holding the first character of the
 * range (offset 0 of that fragment rather than the end of the previous one),
 * and the end in the fragment holding the last character (its final offset
 * rather than offset 0 of the next one). This touches the fewest fragments.
 *
 * Returns `null` for empty or out-of-bounds ranges.
 */
export function resolveFragmentSpan(index: FragmentIndex, range: LogicalRange): FragmentSpan | null {
  if (range.start < 0 || range.end > index.text.length || range.start >= range.end) return null;

  const first = positionAt(index, range.start);
  const last = positionAt(index, range.end - 1);
  if (!first || !last) return null;

  return {
    startFragmentId: first.fragmentId,
    startOffset: first.offset,
    endFragmentId: last.fragmentId,
    endOffset: last.offset + 1,
  };
}
