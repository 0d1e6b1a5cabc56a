export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = Record<LogLevel, (message: string, ...context: unknown[]) => void>;

/**
 * Scoped console logger. Silent unless enabled.
 */
export class Logger {
  constructor(
    private readonly enabled: boolean = false,
    private readonly scope: string = 'docpatch',
    private readonly sink: LogSink = console,
  ) {}

  get isEnabled(): boolean {
    return this.enabled;
  }

  child(scope: string): Logger {
    return new Logger(this.enabled, `${this.scope}:${scope}`, this.sink);
  }

  debug(message: string, ...context: unknown[]): void {
    this.write('debug', message, context);
  }

  info(message: string, ...context: unknown[]): void {
    this.write('info', message, context);
  }

  warn(message: string, ...context: unknown[]): void {
    this.write('warn', message, context);
  }

  error(message: string, ...context: unknown[]): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context: unknown[]): void {
    if (!this.enabled) return;
    this.sink[level](`[${this.scope}] ${message}`, ...context);
  }
}
