import type { ApplySummary, ChangeResult } from './types.js';

export type PassOutcome = 'completed' | 'cancelled';

/**
 * Folds per-change results into the pass summary. Result order is kept.
 */
export function finalizeReport(results: readonly ChangeResult[], outcome: PassOutcome = 'completed'): ApplySummary {
  let successful = 0;
  let failed = 0;

  for (const result of results) {
    if (result.status === 'SUCCESS') successful += 1;
    else failed += 1;
  }

  return {
    status: outcome === 'cancelled' ? 'CANCELLED' : 'COMPLETED',
    totalChanges: results.length,
    successful,
    failed,
    changes: Object.freeze([...results]),
  };
}

function describeResult(result: ChangeResult): string {
  const { details } = result;

  if (result.status === 'SUCCESS') {
    const notes: string[] = [];
    if (details.appliedCount !== undefined) notes.push(`${details.appliedCount} edits`);
    if (details.paragraphIndex !== undefined) notes.push(`paragraph ${details.paragraphIndex}`);
    if (details.strategy && details.strategy !== 'exact') notes.push(`matched with ${details.strategy}`);
    return notes.length > 0 ? ` (${notes.join(', ')})` : '';
  }

  const kind = details.structuralCode ? `${details.errorKind}/${details.structuralCode}` : details.errorKind;
  return ` ${kind ?? 'FAILURE'}: ${details.message ?? 'no details'}`;
}

/**
 * Plain-text rendering of a summary, one line per change.
 */
export function formatReport(summary: ApplySummary): string {
  const lines = [
    `${summary.status}: ${summary.successful}/${summary.totalChanges} changes applied, ${summary.failed} failed`,
  ];

  for (const result of summary.changes) {
    const marker = result.status === 'SUCCESS' ? 'ok  ' : 'FAIL';
    lines.push(`  ${marker} ${result.changeId} ${result.operation}${describeResult(result)}`);
    for (const warning of result.details.warnings ?? []) {
      lines.push(`       warning: ${warning.message}`);
    }
  }

  return lines.join('\n');
}
