/**
 * Leveled console logger with bracketed context
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function isTestEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.NODE_ENV === 'test' || typeof env.VITEST === 'string';
}

export function resolveLogLevel(override?: LogLevel, env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (override) return override;
  if (isTestEnv(env)) return 'error';
  const fromEnv = env.LOG_LEVEL?.trim().toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

// control chars and `]` would break the bracketed format
function sanitizeValue(value: string): string {
  return value.replace(/[\x00-\x1f\x7f\]]/g, '_');
}

export function formatContext(ctx: Record<string, string>): string {
  const keys = Object.keys(ctx).sort();
  return keys.map((k) => `[${k}:${sanitizeValue(ctx[k])}]`).join('');
}

export class Logger {
  private readonly context: Record<string, string>;

  constructor(
    private readonly prefix: string,
    private level: LogLevel = resolveLogLevel(),
    context: Record<string, string> = {}
  ) {
    this.context = { ...context };
  }

  /**
   * Child logger sharing the level, with extra context merged over this one's
   */
  child(extra: Record<string, string>): Logger {
    return new Logger(this.prefix, this.level, { ...this.context, ...extra });
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isEnabled('debug')) console.debug(this.format(message), ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isEnabled('info')) console.info(this.format(message), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.isEnabled('warn')) console.warn(this.format(message), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.isEnabled('error')) console.error(this.format(message), ...args);
  }

  private format(message: string): string {
    const ctx = formatContext(this.context);
    return ctx ? `[${this.prefix}] ${ctx} ${message}` : `[${this.prefix}] ${message}`;
  }
}
