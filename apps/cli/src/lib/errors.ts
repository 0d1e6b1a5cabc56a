import { ChangeEngineError } from '@docpatch/change-engine';
import { DocumentProviderError } from '@docpatch/document-model';

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'UNKNOWN_COMMAND'
  | 'MISSING_REQUIRED'
  | 'JSON_PARSE_ERROR'
  | 'FILE_READ_ERROR'
  | 'FILE_WRITE_ERROR'
  | 'NO_FILES_MATCHED'
  | 'DOCUMENT_OPEN_FAILED'
  | 'INVALID_INSTRUCTIONS'
  | 'COMMAND_FAILED';

export class CliError extends Error {
  readonly code: CliErrorCode;
  readonly details?: unknown;
  readonly exitCode: number;

  constructor(code: CliErrorCode, message: string, details?: unknown, exitCode = 1) {
    super(message);
    Object.setPrototypeOf(this, CliError.prototype);
    this.name = 'CliError';
    this.code = code;
    this.details = details;
    this.exitCode = exitCode;
  }
}

function fromProviderError(error: DocumentProviderError): CliError {
  switch (error.code) {
    case 'FILE_READ_ERROR':
      return new CliError('FILE_READ_ERROR', error.message, error.details);
    case 'FILE_WRITE_ERROR':
      return new CliError('FILE_WRITE_ERROR', error.message, error.details);
    case 'INVALID_PACKAGE':
    case 'DOCUMENT_NOT_LOADED':
      return new CliError('DOCUMENT_OPEN_FAILED', error.message, error.details);
  }
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;

  if (error instanceof ChangeEngineError) {
    const code = error.code === 'INVALID_OPTIONS' ? 'INVALID_ARGUMENT' : 'INVALID_INSTRUCTIONS';
    return new CliError(code, error.message, { code: error.code, ...error.details });
  }

  if (error instanceof DocumentProviderError) return fromProviderError(error);

  if (error instanceof Error) {
    return new CliError('COMMAND_FAILED', error.message, {
      name: error.name,
    });
  }

  return new CliError('COMMAND_FAILED', 'Unknown error', {
    error,
  });
}
