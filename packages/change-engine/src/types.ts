export const CHANGE_OPERATIONS = ['REPLACE', 'INSERT_BEFORE', 'INSERT_AFTER', 'DELETE'] as const;

export type ChangeOperation = (typeof CHANGE_OPERATIONS)[number];

export interface ChangePayload {
  /** Required by REPLACE, INSERT_BEFORE and INSERT_AFTER. Ignored by DELETE. */
  newText?: string;
}

/**
 * A request to locate `targetText` in the document and mutate it.
 * Instructions are read-only to the engine.
 */
export interface ChangeInstruction {
  readonly changeId: string;
  readonly operation: ChangeOperation;
  readonly targetText: string;
  readonly payload: Readonly<ChangePayload>;
  readonly description: string;
  /** Overrides the pass-level `matchCase` option for this instruction. */
  readonly matchCase?: boolean;
  /** Edit every occurrence in every paragraph instead of the first one. */
  readonly replaceAll?: boolean;
}

export const MATCH_STRATEGIES = ['exact', 'normalize_whitespace', 'trim'] as const;

export type MatchStrategy = (typeof MATCH_STRATEGIES)[number];

/** Half-open `[start, end)` range over a paragraph's logical text. */
export type LogicalRange = {
  start: number;
  end: number;
};

/**
 * A span in fragment-local coordinates.
 *
 * `startOffset` is the offset of the first spanned character inside the start
 * fragment; `endOffset` is the exclusive end inside the end fragment. Unlike
 * logical offsets, these stay meaningful after edits to other fragments.
 */
export interface FragmentSpan {
  startFragmentId: string;
  startOffset: number;
  endFragmentId: string;
  endOffset: number;
}

export interface MatchResult extends FragmentSpan {
  paragraphIndex: number;
  /** True when the paragraph held more than one occurrence and the first was taken. */
  multipleMatches: boolean;
  occurrences: number;
  strategy: MatchStrategy;
  /** Logical range the span was resolved from. Valid only until the next edit. */
  range: LogicalRange;
}

export type StructuralErrorCode = 'STALE_FRAGMENT_REFERENCE' | 'INVALID_SPAN' | 'MISSING_PAYLOAD';

export type ChangeErrorKind = 'NOT_FOUND' | 'AMBIGUOUS' | 'STRUCTURAL_ERROR';

export type ChangeStatus = 'SUCCESS' | 'FAILURE';

export type ChangeWarning = {
  code: 'AMBIGUOUS';
  message: string;
};

export interface ChangeResultDetails {
  errorKind?: ChangeErrorKind;
  message?: string;
  /** Set with `errorKind: 'STRUCTURAL_ERROR'`. */
  structuralCode?: StructuralErrorCode;
  /** Paragraph of the (first) edit, or of the rejected match. */
  paragraphIndex?: number;
  multipleMatches?: boolean;
  occurrences?: number;
  strategy?: MatchStrategy;
  /** Number of edits made by a `replaceAll` instruction. */
  appliedCount?: number;
  warnings?: ChangeWarning[];
}

export interface ChangeResult {
  readonly changeId: string;
  readonly operation: ChangeOperation;
  readonly description: string;
  readonly status: ChangeStatus;
  readonly details: Readonly<ChangeResultDetails>;
}

export type SummaryStatus = 'COMPLETED' | 'CANCELLED';

export interface ApplySummary {
  status: SummaryStatus;
  totalChanges: number;
  successful: number;
  failed: number;
  /** One entry per processed instruction, in input order. */
  changes: readonly ChangeResult[];
}
