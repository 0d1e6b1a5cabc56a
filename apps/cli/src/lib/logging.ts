import { format } from 'node:util';
import { Logger, type LogSink } from '@docpatch/change-engine';
import type { CliEnv, CliIO, GlobalOptions } from './types.js';

export function isVerbose(global: GlobalOptions, env: CliEnv): boolean {
  return global.verbose || env.DOCPATCH_VERBOSE === '1';
}

/**
 * Engine logger writing to the CLI's stderr, so `--json` stdout stays clean.
 */
export function createCliLogger(io: CliIO, enabled: boolean): Logger {
  const write = (level: string) => (message: string, ...context: unknown[]) => {
    io.stderr(`${level} ${format(message, ...context)}\n`);
  };
  const sink: LogSink = {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
  return new Logger(enabled, 'docpatch', sink);
}
