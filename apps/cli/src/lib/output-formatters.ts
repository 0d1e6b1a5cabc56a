import { formatReport } from '@docpatch/change-engine';
import type { ApplyResult } from '../commands/apply.js';

function indent(text: string, prefix: string): string {
  return text
    .split('\n')
    .map((line) => `${prefix}${line}`)
    .join('\n');
}

function describeOutput(path: string, output: string | null): string {
  if (output === null) return `${path} (dry run, not saved)`;
  if (output === path) return `${path} (updated in place)`;
  return `${path} -> ${output}`;
}

/**
 * Format apply results for human-readable output
 */
export function formatApplyPretty(result: ApplyResult): string {
  const lines: string[] = [];

  for (const file of result.files) {
    lines.push(describeOutput(file.path, file.output));
    lines.push(indent(formatReport(file.summary), '  '));
    lines.push('');
  }

  const { totals } = result;
  lines.push(
    `Applied ${totals.successful}/${totals.totalChanges} changes across ${totals.documents} documents (${totals.failed} failed)`,
  );

  return lines.join('\n');
}
