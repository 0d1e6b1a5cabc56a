import { readFile, mkdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import {
  applyChanges,
  parseChangeInstructions,
  parseMatchPolicy,
  type ApplyOptions,
  type ApplySummary,
  type ChangeInstruction,
} from '@docpatch/change-engine';
import { DocxDocumentProvider } from '@docpatch/document-model';
import { CliError } from '../lib/errors.js';
import { expandGlobs } from '../lib/files.js';
import { createCliLogger, isVerbose } from '../lib/logging.js';
import { formatApplyPretty } from '../lib/output-formatters.js';
import type { ApplyFlags, CommandContext, CommandExecution, ParsedArgs } from '../lib/types.js';

/** Exit code of a run that finished but left some changes unapplied. */
export const EXIT_CHANGES_FAILED = 2;

export interface ApplyFileResult {
  path: string;
  /** Where the document was written, or null for a dry run. */
  output: string | null;
  summary: ApplySummary;
}

export interface ApplyResult {
  instructions: string;
  files: ApplyFileResult[];
  totals: {
    documents: number;
    totalChanges: number;
    successful: number;
    failed: number;
  };
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read and validate an instruction file
 */
export async function readInstructions(path: string): Promise<ChangeInstruction[]> {
  let source: string;
  try {
    source = await readFile(path, 'utf8');
  } catch (error) {
    throw new CliError('FILE_READ_ERROR', `Unable to read instructions: ${path}`, { path, message: messageOf(error) });
  }

  let json: unknown;
  try {
    json = JSON.parse(source);
  } catch (error) {
    throw new CliError('JSON_PARSE_ERROR', `Instructions file is not valid JSON: ${path}`, {
      path,
      message: messageOf(error),
    });
  }

  return parseChangeInstructions(json);
}

/**
 * Output path per input file. `--out` names a file for a single document and
 * a directory for several; without it documents are updated in place.
 */
export function planOutputs(files: string[], flags: Pick<ApplyFlags, 'out' | 'dryRun'>): (string | null)[] {
  if (flags.dryRun) return files.map(() => null);
  const { out } = flags;
  if (out === undefined) return files;
  if (files.length === 1) return [out];

  const outputs = files.map((file) => join(out, basename(file)));
  const seen = new Set<string>();
  for (const output of outputs) {
    if (seen.has(output)) {
      throw new CliError('INVALID_ARGUMENT', `Several input documents would be written to ${output}.`, { output });
    }
    seen.add(output);
  }
  return outputs;
}

function toApplyOptions(flags: ApplyFlags): Omit<ApplyOptions, 'logger'> {
  return {
    policy: flags.policy === undefined ? undefined : parseMatchPolicy(flags.policy),
    matchCase: !flags.ignoreCase,
    ambiguity: flags.rejectAmbiguous ? 'reject' : 'first',
    tidyEmptyFragments: flags.tidy,
  };
}

/**
 * Apply an instruction file to one or more documents
 */
export async function runApply(args: ParsedArgs, context: CommandContext): Promise<CommandExecution> {
  const [instructionsPath, ...patterns] = args.positionals;
  if (instructionsPath === undefined || patterns.length === 0) {
    throw new CliError('MISSING_REQUIRED', 'Usage: docpatch apply <changes.json> <files...>');
  }

  const options = toApplyOptions(args.apply);
  const instructions = await readInstructions(instructionsPath);
  const files = await expandGlobs(patterns);
  if (files.length === 0) {
    throw new CliError('NO_FILES_MATCHED', 'No .docx files found matching the pattern', { patterns });
  }

  const outputs = planOutputs(files, args.apply);
  if (args.apply.out !== undefined && !args.apply.dryRun && files.length > 1) {
    await mkdir(args.apply.out, { recursive: true });
  }

  const logger = createCliLogger(context.io, isVerbose(context.global, context.env));
  const provider = new DocxDocumentProvider();

  const results = await Promise.all(
    files.map(async (file, index): Promise<ApplyFileResult> => {
      const document = await provider.load(file);
      const summary = applyChanges(document, instructions, { ...options, logger: logger.child(basename(file)) });
      const output = outputs[index] ?? null;
      if (output !== null) await provider.save(document, output);
      return { path: file, output, summary };
    }),
  );

  const result: ApplyResult = {
    instructions: instructionsPath,
    files: results,
    totals: {
      documents: results.length,
      totalChanges: results.reduce((sum, r) => sum + r.summary.totalChanges, 0),
      successful: results.reduce((sum, r) => sum + r.summary.successful, 0),
      failed: results.reduce((sum, r) => sum + r.summary.failed, 0),
    },
  };

  return {
    command: 'apply',
    data: result,
    pretty: formatApplyPretty(result),
    exitCode: result.totals.failed > 0 ? EXIT_CHANGES_FAILED : 0,
  };
}
