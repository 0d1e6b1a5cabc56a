export type ChangeEngineErrorCode = 'INVALID_INSTRUCTIONS' | 'DUPLICATE_CHANGE_ID' | 'INVALID_OPTIONS';

/**
 * Thrown for input the engine cannot start a pass with: malformed instruction
 * records or options. Failures of individual changes are never thrown; they
 * are reported on the change's result.
 */
export class ChangeEngineError extends Error {
  readonly code: ChangeEngineErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ChangeEngineErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ChangeEngineError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, ChangeEngineError.prototype);
  }
}
