import { DocxDocumentProvider, getDocumentText } from '@docpatch/document-model';
import { CliError } from '../lib/errors.js';
import type { CommandExecution, ParsedArgs } from '../lib/types.js';

export interface ReadResult {
  path: string;
  paragraphs: number;
  content: string;
}

/**
 * Read a document and output its text content
 */
export async function runRead(args: ParsedArgs): Promise<CommandExecution> {
  const [filePath] = args.positionals;
  if (filePath === undefined) {
    throw new CliError('MISSING_REQUIRED', 'Usage: docpatch read <file>');
  }

  const document = await new DocxDocumentProvider().load(filePath);
  const content = getDocumentText(document);
  const result: ReadResult = { path: filePath, paragraphs: document.paragraphs.length, content };

  return { command: 'read', data: result, pretty: content };
}
