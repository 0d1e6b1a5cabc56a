import type { AmbiguityPolicy } from './options.js';
import type { LogicalRange, MatchStrategy } from './types.js';

export interface MatchPolicy {
  /** Tried in order; the first strategy with at least one occurrence wins. */
  strategies: readonly MatchStrategy[];
  matchCase: boolean;
  ambiguity: AmbiguityPolicy;
  /** Logical offset to start scanning from. Defaults to 0. */
  fromOffset?: number;
}

export type MatchOutcome =
  | {
      kind: 'found';
      range: LogicalRange;
      occurrences: number;
      multipleMatches: boolean;
      strategy: MatchStrategy;
    }
  | {
      kind: 'ambiguous';
      occurrences: number;
      strategy: MatchStrategy;
    }
  | { kind: 'not_found' };

/**
 * Lower-cases one UTF-16 unit at a time, keeping units whose lower-case form
 * has a different length. Offsets in the folded string equal the original's.
 */
export function foldCase(text: string): string {
  let folded = '';
  for (const unit of text.split('')) {
    const lower = unit.toLowerCase();
    folded += lower.length === 1 ? lower : unit;
  }
  return folded;
}

/**
 * Non-overlapping occurrences of `needle`, by scan order.
 */
function scan(haystack: string, needle: string, fromOffset: number): LogicalRange[] {
  if (needle.length === 0) return [];

  const ranges: LogicalRange[] = [];
  let at = haystack.indexOf(needle, fromOffset);
  while (at !== -1) {
    ranges.push({ start: at, end: at + needle.length });
    at = haystack.indexOf(needle, at + needle.length);
  }
  return ranges;
}

type NormalizedText = {
  text: string;
  /** Original offset of the first character behind each normalized character. */
  starts: number[];
  /** Original exclusive end behind each normalized character. */
  ends: number[];
};

const WHITESPACE = /\s/;

/**
 * Collapses every whitespace run to a single space, remembering which
 * original characters each normalized character stands for.
 */
export function normalizeWhitespace(text: string): NormalizedText {
  let normalized = '';
  const starts: number[] = [];
  const ends: number[] = [];

  let inWhitespace = false;

  for (let offset = 0; offset < text.length; offset += 1) {
    const char = text.charAt(offset);

    if (WHITESPACE.test(char)) {
      if (inWhitespace) {
        ends[ends.length - 1] = offset + 1;
        continue;
      }
      normalized += ' ';
      inWhitespace = true;
    } else {
      normalized += char;
      inWhitespace = false;
    }
    starts.push(offset);
    ends.push(offset + 1);
  }

  return { text: normalized, starts, ends };
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ');
}

function scanNormalized(haystack: string, needle: string, fromOffset: number): LogicalRange[] {
  const normalized = normalizeWhitespace(haystack);
  const target = collapseWhitespace(needle);

  let from = normalized.starts.findIndex((start) => start >= fromOffset);
  if (from === -1) from = normalized.text.length;

  return scan(normalized.text, target, from).map((range) => ({
    start: normalized.starts[range.start],
    end: normalized.ends[range.end - 1],
  }));
}

function findOccurrences(text: string, target: string, strategy: MatchStrategy, fromOffset: number): LogicalRange[] {
  switch (strategy) {
    case 'exact':
      return scan(text, target, fromOffset);
    case 'trim':
      return scan(text, target.trim(), fromOffset);
    case 'normalize_whitespace':
      return scanNormalized(text, target, fromOffset);
  }
}

/**
 * Finds `target` in a paragraph's logical text.
 *
 * Strategies are tried in policy order. Within the winning strategy the first
 * occurrence by scan order is returned; when there are more, the outcome is
 * flagged (`ambiguity: 'first'`) or reported as ambiguous (`'reject'`).
 */
export function findMatch(text: string, target: string, policy: MatchPolicy): MatchOutcome {
  const haystack = policy.matchCase ? text : foldCase(text);
  const needle = policy.matchCase ? target : foldCase(target);
  const fromOffset = Math.max(0, policy.fromOffset ?? 0);

  for (const strategy of policy.strategies) {
    const occurrences = findOccurrences(haystack, needle, strategy, fromOffset);
    if (occurrences.length === 0) continue;

    if (occurrences.length > 1 && policy.ambiguity === 'reject') {
      return { kind: 'ambiguous', occurrences: occurrences.length, strategy };
    }

    return {
      kind: 'found',
      range: occurrences[0],
      occurrences: occurrences.length,
      multipleMatches: occurrences.length > 1,
      strategy,
    };
  }

  return { kind: 'not_found' };
}
