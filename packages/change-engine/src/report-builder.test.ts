import { describe, expect, it } from 'vitest';
import { finalizeReport, formatReport } from './report-builder.js';
import type { ChangeResult } from './types.js';

const results: ChangeResult[] = [
  {
    changeId: 'CHG-1',
    operation: 'REPLACE',
    description: 'Rename',
    status: 'SUCCESS',
    details: {
      paragraphIndex: 0,
      strategy: 'exact',
      multipleMatches: true,
      warnings: [{ code: 'AMBIGUOUS', message: 'Target text occurs 2 times in paragraph 0.' }],
    },
  },
  {
    changeId: 'CHG-2',
    operation: 'DELETE',
    description: 'Drop clause',
    status: 'FAILURE',
    details: { errorKind: 'NOT_FOUND', message: 'Target text was not found in any paragraph.' },
  },
  {
    changeId: 'CHG-3',
    operation: 'REPLACE',
    description: '',
    status: 'FAILURE',
    details: {
      errorKind: 'STRUCTURAL_ERROR',
      structuralCode: 'MISSING_PAYLOAD',
      message: 'REPLACE requires payload.newText.',
    },
  },
  {
    changeId: 'CHG-4',
    operation: 'REPLACE',
    description: '',
    status: 'SUCCESS',
    details: { paragraphIndex: 1, appliedCount: 3, strategy: 'normalize_whitespace' },
  },
];

describe('finalizeReport', () => {
  it('counts outcomes and keeps result order', () => {
    const summary = finalizeReport(results);

    expect(summary).toMatchObject({ status: 'COMPLETED', totalChanges: 4, successful: 2, failed: 2 });
    expect(summary.changes.map((result) => result.changeId)).toEqual(['CHG-1', 'CHG-2', 'CHG-3', 'CHG-4']);
    expect(summary.successful + summary.failed).toBe(summary.totalChanges);
  });

  it('marks cancelled passes', () => {
    expect(finalizeReport(results.slice(0, 1), 'cancelled')).toMatchObject({
      status: 'CANCELLED',
      totalChanges: 1,
      successful: 1,
      failed: 0,
    });
  });

  it('summarizes an empty pass', () => {
    expect(finalizeReport([])).toEqual({ status: 'COMPLETED', totalChanges: 0, successful: 0, failed: 0, changes: [] });
  });

  it('does not share the caller array', () => {
    const input = [...results];
    const summary = finalizeReport(input);
    input.pop();

    expect(summary.changes).toHaveLength(4);
  });
});

describe('formatReport', () => {
  it('renders one line per change with warnings and failure kinds', () => {
    expect(formatReport(finalizeReport(results))).toBe(
      [
        'COMPLETED: 2/4 changes applied, 2 failed',
        '  ok   CHG-1 REPLACE (paragraph 0)',
        '       warning: Target text occurs 2 times in paragraph 0.',
        '  FAIL CHG-2 DELETE NOT_FOUND: Target text was not found in any paragraph.',
        '  FAIL CHG-3 REPLACE STRUCTURAL_ERROR/MISSING_PAYLOAD: REPLACE requires payload.newText.',
        '  ok   CHG-4 REPLACE (3 edits, paragraph 1, matched with normalize_whitespace)',
      ].join('\n'),
    );
  });
});
