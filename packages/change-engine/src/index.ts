export * from './types.js';
export { ChangeEngineError } from './errors.js';
export type { ChangeEngineErrorCode } from './errors.js';
export { Logger } from './logger.js';
export type { LogLevel, LogSink } from './logger.js';
export {
  DEFAULT_MATCH_POLICY,
  isMatchStrategy,
  normalizeApplyOptions,
  parseMatchPolicy,
  type AmbiguityPolicy,
  type ApplyOptions,
  type ResolvedApplyOptions,
} from './options.js';
export { buildFragmentIndex, positionAt, resolveFragmentSpan } from './fragment-index.js';
export type { FragmentIndex, FragmentPosition } from './fragment-index.js';
export { FragmentIndexCache } from './fragment-index-cache.js';
export { findMatch, foldCase, normalizeWhitespace } from './matcher.js';
export type { MatchOutcome, MatchPolicy } from './matcher.js';
export { applySpanEdit, tidyParagraph } from './span-editor.js';
export type { EditOutcome, SpanEditOptions } from './span-editor.js';
export { ChangeApplicator, applyChanges } from './change-applicator.js';
export type { ApplyState } from './change-applicator.js';
export { finalizeReport, formatReport } from './report-builder.js';
export type { PassOutcome } from './report-builder.js';
export { changeRecordSchema, parseChangeInstructions } from './instructions.js';
export type { ChangeRecord } from './instructions.js';
