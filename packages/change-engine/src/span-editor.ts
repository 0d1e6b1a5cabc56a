import type { Fragment, Paragraph } from '@docpatch/document-model';
import type { ChangeOperation, FragmentSpan, StructuralErrorCode } from './types.js';

export type EditOutcome =
  | {
      status: 'applied';
      /** Existing fragments whose text changed, in paragraph order. */
      touchedFragmentIds: string[];
      createdFragmentIds: string[];
      /** Length of the text the edit put into the paragraph. */
      insertedLength: number;
    }
  | {
      status: 'structural_error';
      code: StructuralErrorCode;
      message: string;
      details?: Record<string, unknown>;
    };

export interface SpanEditOptions {
  createFragmentId: () => string;
}

type ResolvedSpan<TFormat> = {
  startIndex: number;
  endIndex: number;
  start: Fragment<TFormat>;
  end: Fragment<TFormat>;
};

function structuralError(
  code: StructuralErrorCode,
  message: string,
  details?: Record<string, unknown>,
): Extract<EditOutcome, { status: 'structural_error' }> {
  return { status: 'structural_error', code, message, details };
}

function resolveSpan<TFormat>(
  paragraph: Paragraph<TFormat>,
  span: FragmentSpan,
): ResolvedSpan<TFormat> | Extract<EditOutcome, { status: 'structural_error' }> {
  const startIndex = paragraph.fragments.findIndex((fragment) => fragment.id === span.startFragmentId);
  const endIndex = paragraph.fragments.findIndex((fragment) => fragment.id === span.endFragmentId);
  const start = paragraph.fragments[startIndex];
  const end = paragraph.fragments[endIndex];

  if (startIndex === -1 || !start) {
    return structuralError('STALE_FRAGMENT_REFERENCE', `Fragment "${span.startFragmentId}" is not in the paragraph.`, {
      fragmentId: span.startFragmentId,
    });
  }
  if (endIndex === -1 || !end) {
    return structuralError('STALE_FRAGMENT_REFERENCE', `Fragment "${span.endFragmentId}" is not in the paragraph.`, {
      fragmentId: span.endFragmentId,
    });
  }

  if (startIndex > endIndex) {
    return structuralError('INVALID_SPAN', 'Span starts after it ends.', { startIndex, endIndex });
  }
  if (span.startOffset < 0 || span.startOffset > start.text.length) {
    return structuralError('INVALID_SPAN', `Start offset ${span.startOffset} is outside fragment "${start.id}".`, {
      fragmentId: start.id,
      offset: span.startOffset,
      length: start.text.length,
    });
  }
  if (span.endOffset < 0 || span.endOffset > end.text.length) {
    return structuralError('INVALID_SPAN', `End offset ${span.endOffset} is outside fragment "${end.id}".`, {
      fragmentId: end.id,
      offset: span.endOffset,
      length: end.text.length,
    });
  }
  if (startIndex === endIndex && span.startOffset >= span.endOffset) {
    return structuralError('INVALID_SPAN', 'Span is empty.', {
      fragmentId: start.id,
      startOffset: span.startOffset,
      endOffset: span.endOffset,
    });
  }

  return { startIndex, endIndex, start, end };
}

function replaceSpan<TFormat>(
  paragraph: Paragraph<TFormat>,
  span: FragmentSpan,
  resolved: ResolvedSpan<TFormat>,
  text: string,
): EditOutcome {
  const { start, end, startIndex, endIndex } = resolved;

  if (startIndex === endIndex) {
    start.text = start.text.slice(0, span.startOffset) + text + start.text.slice(span.endOffset);
    return { status: 'applied', touchedFragmentIds: [start.id], createdFragmentIds: [], insertedLength: text.length };
  }

  const touched = paragraph.fragments.slice(startIndex, endIndex + 1);
  start.text = start.text.slice(0, span.startOffset) + text;
  for (const fragment of touched.slice(1, -1)) {
    fragment.text = '';
  }
  end.text = end.text.slice(span.endOffset);

  return {
    status: 'applied',
    touchedFragmentIds: touched.map((fragment) => fragment.id),
    createdFragmentIds: [],
    insertedLength: text.length,
  };
}

function insertAt<TFormat>(
  paragraph: Paragraph<TFormat>,
  anchor: Fragment<TFormat>,
  anchorIndex: number,
  offset: number,
  text: string,
  options: SpanEditOptions,
): EditOutcome {
  if (text.length === 0) {
    return { status: 'applied', touchedFragmentIds: [], createdFragmentIds: [], insertedLength: 0 };
  }

  if (offset === 0 || offset === anchor.text.length) {
    const created: Fragment<TFormat> = { id: options.createFragmentId(), text, format: anchor.format };
    paragraph.fragments.splice(offset === 0 ? anchorIndex : anchorIndex + 1, 0, created);
    return { status: 'applied', touchedFragmentIds: [], createdFragmentIds: [created.id], insertedLength: text.length };
  }

  anchor.text = anchor.text.slice(0, offset) + text + anchor.text.slice(offset);
  return { status: 'applied', touchedFragmentIds: [anchor.id], createdFragmentIds: [], insertedLength: text.length };
}

/**
 * Applies one operation to a resolved span, mutating the paragraph in place.
 *
 * Everything is validated before the first write, so a structural error
 * leaves the paragraph untouched. After an applied edit every fragment index
 * built for this paragraph is stale.
 *
 * Replaced text inherits the format of the span's first fragment. Inserts on
 * a fragment boundary create a fragment with the neighbour's format; inserts
 * inside a fragment are spliced into it.
 */
export function applySpanEdit<TFormat>(
  paragraph: Paragraph<TFormat>,
  span: FragmentSpan,
  operation: ChangeOperation,
  newText: string | undefined,
  options: SpanEditOptions,
): EditOutcome {
  if (operation !== 'DELETE' && newText === undefined) {
    return structuralError('MISSING_PAYLOAD', `${operation} requires payload.newText.`, { operation });
  }

  const resolved = resolveSpan(paragraph, span);
  if ('status' in resolved) return resolved;

  switch (operation) {
    case 'REPLACE':
      return replaceSpan(paragraph, span, resolved, newText ?? '');
    case 'DELETE':
      return replaceSpan(paragraph, span, resolved, '');
    case 'INSERT_BEFORE':
      return insertAt(paragraph, resolved.start, resolved.startIndex, span.startOffset, newText ?? '', options);
    case 'INSERT_AFTER':
      return insertAt(paragraph, resolved.end, resolved.endIndex, span.endOffset, newText ?? '', options);
  }
}

/**
 * Removes the listed fragments that are empty. Returns the removed ids.
 */
export function tidyParagraph<TFormat>(paragraph: Paragraph<TFormat>, fragmentIds: readonly string[]): string[] {
  const candidates = new Set(fragmentIds);
  const removed: string[] = [];

  for (let index = paragraph.fragments.length - 1; index >= 0; index -= 1) {
    const fragment = paragraph.fragments[index];
    if (!fragment || !candidates.has(fragment.id) || fragment.text.length > 0) continue;
    paragraph.fragments.splice(index, 1);
    removed.unshift(fragment.id);
  }

  return removed;
}
