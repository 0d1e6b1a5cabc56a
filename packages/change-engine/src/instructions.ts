import { z } from 'zod';
import { ChangeEngineError } from './errors.js';
import type { ChangeInstruction, ChangeOperation } from './types.js';

const OPERATIONS = ['REPLACE', 'INSERT_BEFORE', 'INSERT_AFTER', 'DELETE', 'REPLACE_TEXT'] as const;

const targetSchema = z.object({
  text: z.string().min(1).describe('Text to locate in the document.'),
  match_case: z.boolean().optional().describe('Case-sensitive comparison. Defaults to the pass setting.'),
  replace_all: z.boolean().optional().describe('Change every occurrence instead of the first one.'),
});

export const changeRecordSchema = z
  .object({
    change_id: z.string().trim().min(1).describe('Unique id of the change, e.g. "CHG-001".'),
    operation: z.enum(OPERATIONS).describe('Edit to apply. REPLACE_TEXT is accepted as REPLACE.'),
    target_text: z.string().min(1).optional().describe('Text to locate. Shorthand for target.text.'),
    target: targetSchema.optional(),
    payload: z
      .object({
        new_text: z.string().optional().describe('Replacement or inserted text.'),
      })
      .default({}),
    description: z.string().default(''),
  })
  .refine((record) => record.target_text !== undefined || record.target !== undefined, {
    message: 'Either target_text or target.text is required.',
    path: ['target_text'],
  });

export type ChangeRecord = z.input<typeof changeRecordSchema>;

function toOperation(operation: (typeof OPERATIONS)[number]): ChangeOperation {
  return operation === 'REPLACE_TEXT' ? 'REPLACE' : operation;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates instruction records as read from JSON and converts them to
 * {@link ChangeInstruction}s, keeping their order.
 *
 * Accepts a bare array or an object with a `changes` array. Change ids must
 * be unique.
 */
export function parseChangeInstructions(input: unknown): ChangeInstruction[] {
  const records = isRecord(input) && 'changes' in input ? input.changes : input;
  const parsed = z.array(changeRecordSchema).safeParse(records);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
    throw new ChangeEngineError('INVALID_INSTRUCTIONS', `Invalid change instructions: ${summary}`, { issues });
  }

  const seen = new Map<string, number>();
  return parsed.data.map((record, index) => {
    const previous = seen.get(record.change_id);
    if (previous !== undefined) {
      throw new ChangeEngineError('DUPLICATE_CHANGE_ID', `Change id "${record.change_id}" is used more than once.`, {
        changeId: record.change_id,
        indexes: [previous, index],
      });
    }
    seen.set(record.change_id, index);

    const targetText = record.target?.text ?? record.target_text ?? '';
    const instruction: ChangeInstruction = {
      changeId: record.change_id,
      operation: toOperation(record.operation),
      targetText,
      payload: record.payload.new_text === undefined ? {} : { newText: record.payload.new_text },
      description: record.description,
      ...(record.target?.match_case === undefined ? {} : { matchCase: record.target.match_case }),
      ...(record.target?.replace_all === undefined ? {} : { replaceAll: record.target.replace_all }),
    };
    return instruction;
  });
}
