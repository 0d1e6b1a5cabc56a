import type { Document } from '@docpatch/document-model';
import { FragmentIndexCache } from './fragment-index-cache.js';
import { resolveFragmentSpan } from './fragment-index.js';
import type { Logger } from './logger.js';
import { findMatch, type MatchPolicy } from './matcher.js';
import { normalizeApplyOptions, type ApplyOptions, type ResolvedApplyOptions } from './options.js';
import { finalizeReport } from './report-builder.js';
import { applySpanEdit, tidyParagraph, type EditOutcome } from './span-editor.js';
import type {
  ApplySummary,
  ChangeErrorKind,
  ChangeInstruction,
  ChangeOperation,
  ChangeResult,
  ChangeResultDetails,
  LogicalRange,
  MatchResult,
} from './types.js';

export type ApplyState = 'PENDING' | 'INDEXED' | 'MATCHED' | 'EDITED' | 'DONE';

type StructuralFailure = Extract<EditOutcome, { status: 'structural_error' }>;

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

function toResult(
  instruction: ChangeInstruction,
  status: ChangeResult['status'],
  details: ChangeResultDetails,
): ChangeResult {
  return Object.freeze({
    changeId: instruction.changeId,
    operation: instruction.operation,
    description: instruction.description,
    status,
    details: Object.freeze(details),
  });
}

function failure(
  instruction: ChangeInstruction,
  errorKind: ChangeErrorKind,
  message: string,
  details: ChangeResultDetails = {},
): ChangeResult {
  return toResult(instruction, 'FAILURE', { ...details, errorKind, message });
}

/**
 * Where scanning resumes in the edited paragraph so the next match starts
 * after the text this edit wrote.
 */
function nextScanOffset(operation: ChangeOperation, range: LogicalRange, insertedLength: number): number {
  switch (operation) {
    case 'REPLACE':
      return range.start + insertedLength;
    case 'DELETE':
      return range.start;
    case 'INSERT_BEFORE':
    case 'INSERT_AFTER':
      return range.end + insertedLength;
  }
}

// ---------------------------------------------------------------------------
// Applicator
// ---------------------------------------------------------------------------

/**
 * Applies change instructions to one document, in order, in place.
 *
 * Each instruction runs `PENDING -> INDEXED -> MATCHED -> EDITED -> DONE` and
 * may stop in `DONE` with a failure from any state. A failed instruction
 * never stops the pass. Later instructions see the edits of earlier ones.
 */
export class ChangeApplicator<TFormat = unknown> {
  private readonly options: ResolvedApplyOptions;
  private readonly indexes: FragmentIndexCache;
  private readonly logger: Logger;

  constructor(
    private readonly document: Document<TFormat>,
    options?: ApplyOptions,
  ) {
    this.options = normalizeApplyOptions(options);
    this.indexes = new FragmentIndexCache(document);
    this.logger = this.options.logger.child('apply');
  }

  /**
   * Applies every instruction and builds the summary. When the abort signal
   * fires, the pass stops before the next instruction and the summary is
   * marked `CANCELLED`.
   */
  applyAll(instructions: readonly ChangeInstruction[]): ApplySummary {
    this.logger.info(`Applying ${instructions.length} changes to ${this.document.paragraphs.length} paragraphs`);
    const results: ChangeResult[] = [];

    for (const instruction of instructions) {
      if (this.options.signal?.aborted) {
        this.logger.warn(`Pass cancelled after ${results.length} of ${instructions.length} changes`);
        return finalizeReport(results, 'cancelled');
      }
      results.push(this.apply(instruction));
    }

    const summary = finalizeReport(results);
    this.logger.info(`Pass completed: ${summary.successful} succeeded, ${summary.failed} failed`);
    return summary;
  }

  apply(instruction: ChangeInstruction): ChangeResult {
    const result = instruction.replaceAll ? this.applyEverywhere(instruction) : this.applyFirst(instruction);
    this.transition(instruction, 'DONE', { status: result.status, errorKind: result.details.errorKind });
    return result;
  }

  private policyFor(instruction: ChangeInstruction, fromOffset?: number): MatchPolicy {
    return {
      strategies: this.options.policy,
      matchCase: instruction.matchCase ?? this.options.matchCase,
      ambiguity: instruction.replaceAll ? 'first' : this.options.ambiguity,
      fromOffset,
    };
  }

  private transition(instruction: ChangeInstruction, state: ApplyState, context?: Record<string, unknown>): void {
    this.logger.debug(`${instruction.changeId} -> ${state}`, ...(context ? [context] : []));
  }

  private applyFirst(instruction: ChangeInstruction): ChangeResult {
    this.transition(instruction, 'PENDING', { operation: instruction.operation });
    const policy = this.policyFor(instruction);
    this.transition(instruction, 'INDEXED', { cached: this.indexes.size });

    for (let paragraphIndex = 0; paragraphIndex < this.document.paragraphs.length; paragraphIndex += 1) {
      const index = this.indexes.get(paragraphIndex);

      const outcome = findMatch(index.text, instruction.targetText, policy);
      if (outcome.kind === 'not_found') continue;

      if (outcome.kind === 'ambiguous') {
        return failure(
          instruction,
          'AMBIGUOUS',
          `Target text occurs ${outcome.occurrences} times in paragraph ${paragraphIndex}.`,
          { paragraphIndex, occurrences: outcome.occurrences, strategy: outcome.strategy },
        );
      }

      const match = this.toMatch(paragraphIndex, outcome.range, outcome);
      if ('status' in match) return this.structuralFailure(instruction, paragraphIndex, match);
      this.transition(instruction, 'MATCHED', { ...match });

      const edit = this.edit(instruction, match);
      if (edit.status === 'structural_error') return this.structuralFailure(instruction, paragraphIndex, edit, match);

      const details: ChangeResultDetails = {
        paragraphIndex,
        multipleMatches: match.multipleMatches,
        occurrences: match.occurrences,
        strategy: match.strategy,
      };
      if (match.multipleMatches) {
        details.warnings = [
          {
            code: 'AMBIGUOUS',
            message: `Target text occurs ${match.occurrences} times in paragraph ${paragraphIndex}; the first occurrence was changed.`,
          },
        ];
      }
      return toResult(instruction, 'SUCCESS', details);
    }

    return failure(instruction, 'NOT_FOUND', 'Target text was not found in any paragraph.');
  }

  private applyEverywhere(instruction: ChangeInstruction): ChangeResult {
    this.transition(instruction, 'PENDING', { operation: instruction.operation, replaceAll: true });
    let appliedCount = 0;
    let firstParagraph: number | undefined;
    this.transition(instruction, 'INDEXED', { cached: this.indexes.size });

    for (let paragraphIndex = 0; paragraphIndex < this.document.paragraphs.length; paragraphIndex += 1) {
      let fromOffset = 0;

      for (;;) {
        const index = this.indexes.get(paragraphIndex);
        const outcome = findMatch(index.text, instruction.targetText, this.policyFor(instruction, fromOffset));
        if (outcome.kind !== 'found') break;

        const match = this.toMatch(paragraphIndex, outcome.range, outcome);
        if ('status' in match) return this.structuralFailure(instruction, paragraphIndex, match, undefined, appliedCount);
        this.transition(instruction, 'MATCHED', { ...match });

        const edit = this.edit(instruction, match);
        if (edit.status === 'structural_error') {
          return this.structuralFailure(instruction, paragraphIndex, edit, match, appliedCount);
        }

        appliedCount += 1;
        firstParagraph ??= paragraphIndex;
        fromOffset = nextScanOffset(instruction.operation, match.range, edit.insertedLength);
      }
    }

    if (appliedCount === 0) {
      return failure(instruction, 'NOT_FOUND', 'Target text was not found in any paragraph.', { appliedCount });
    }
    return toResult(instruction, 'SUCCESS', { paragraphIndex: firstParagraph, appliedCount });
  }

  private toMatch(
    paragraphIndex: number,
    range: LogicalRange,
    found: Pick<MatchResult, 'multipleMatches' | 'occurrences' | 'strategy'>,
  ): MatchResult | StructuralFailure {
    const span = resolveFragmentSpan(this.indexes.get(paragraphIndex), range);
    if (!span) {
      return {
        status: 'structural_error',
        code: 'INVALID_SPAN',
        message: `Range [${range.start}, ${range.end}) does not resolve to fragments.`,
        details: { range },
      };
    }

    return {
      paragraphIndex,
      ...span,
      multipleMatches: found.multipleMatches,
      occurrences: found.occurrences,
      strategy: found.strategy,
      range,
    };
  }

  /**
   * Runs the span edit and keeps the index cache and tidy-up in step with it.
   */
  private edit(instruction: ChangeInstruction, match: MatchResult): EditOutcome {
    const paragraph = this.document.paragraphs[match.paragraphIndex];
    if (!paragraph) {
      return {
        status: 'structural_error',
        code: 'STALE_FRAGMENT_REFERENCE',
        message: `Paragraph ${match.paragraphIndex} no longer exists.`,
      };
    }

    const outcome = applySpanEdit(paragraph, match, instruction.operation, instruction.payload.newText, {
      createFragmentId: this.options.createFragmentId,
    });
    if (outcome.status === 'structural_error') return outcome;

    this.indexes.invalidate(match.paragraphIndex);
    this.transition(instruction, 'EDITED', {
      touched: outcome.touchedFragmentIds,
      created: outcome.createdFragmentIds,
    });

    if (this.options.tidyEmptyFragments) {
      const removed = tidyParagraph(paragraph, outcome.touchedFragmentIds);
      if (removed.length > 0) this.logger.debug(`${instruction.changeId} removed empty fragments`, removed);
    }

    return outcome;
  }

  private structuralFailure(
    instruction: ChangeInstruction,
    paragraphIndex: number,
    error: StructuralFailure,
    match?: MatchResult,
    appliedCount?: number,
  ): ChangeResult {
    this.logger.error(`${instruction.changeId} failed with ${error.code}: ${error.message}`, {
      instruction,
      paragraphIndex,
      match,
      details: error.details,
    });

    const details: ChangeResultDetails = { paragraphIndex, structuralCode: error.code };
    if (appliedCount !== undefined) details.appliedCount = appliedCount;
    return failure(instruction, 'STRUCTURAL_ERROR', error.message, details);
  }
}

/**
 * Applies `instructions` to `document` in one pass and returns the summary.
 */
export function applyChanges<TFormat>(
  document: Document<TFormat>,
  instructions: readonly ChangeInstruction[],
  options?: ApplyOptions,
): ApplySummary {
  return new ChangeApplicator(document, options).applyAll(instructions);
}
