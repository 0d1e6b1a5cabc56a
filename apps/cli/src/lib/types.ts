export type OutputMode = 'json' | 'pretty';

export interface CliIO {
  stdout(message: string): void;
  stderr(message: string): void;
}

export type CliEnv = Readonly<Record<string, string | undefined>>;

export interface GlobalOptions {
  output: OutputMode;
  verbose: boolean;
  help: boolean;
}

export interface ApplyFlags {
  /** Comma-separated match strategies, e.g. `exact,trim`. */
  policy?: string;
  ignoreCase: boolean;
  rejectAmbiguous: boolean;
  tidy: boolean;
  dryRun: boolean;
  out?: string;
}

export interface ParsedArgs {
  command?: string;
  positionals: string[];
  global: GlobalOptions;
  apply: ApplyFlags;
}

export interface CommandContext {
  io: CliIO;
  env: CliEnv;
  global: GlobalOptions;
}

export interface CommandExecution {
  command: string;
  data: unknown;
  pretty: string;
  /** Process exit code. Defaults to 0. */
  exitCode?: number;
}
