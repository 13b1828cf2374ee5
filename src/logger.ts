/**
 * Leveled logger writing one JSON object per line
 *
 * The threshold is taken from the `LOG_LEVEL` environment variable
 * (`debug`, `info`, `warn` or `error`, defaults to `info`) on every call,
 * so it can be changed at runtime.
 */

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function threshold(): LogLevel {
  const env = process.env.LOG_LEVEL?.toLowerCase();
  return LOG_LEVELS.find((level) => level === env) ?? 'info';
}

export function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold());
}

/**
 * Fields bound to every entry of a logger
 */
export type LogBindings = {
  /** Dialog key, `channelName:userId` */
  dialog?: string;
  [key: string]: unknown;
};

export type LogFields = LogBindings & {
  event: string;
  /** Title of the dialog node */
  node?: string;
  slot?: string;
  error?: string;
};

const write: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export class Logger {
  constructor(private readonly bindings: LogBindings = {}) {}

  /**
   * A logger adding the given fields to each entry
   *
   * @example
   * ```typescript
   * const log = logger.child({ dialog: 'telegram:42' });
   * log.warn({ event: 'not_ready' });
   * ```
   */
  child(bindings: LogBindings): Logger {
    return new Logger({ ...this.bindings, ...bindings });
  }

  log(level: LogLevel, fields: LogFields): void {
    if (!shouldLog(level)) return;
    write[level](
      JSON.stringify({
        level,
        timestamp: new Date().toISOString(),
        ...this.bindings,
        ...fields,
      })
    );
  }

  debug(fields: LogFields): void {
    this.log('debug', fields);
  }

  info(fields: LogFields): void {
    this.log('info', fields);
  }

  warn(fields: LogFields): void {
    this.log('warn', fields);
  }

  error(fields: LogFields): void {
    this.log('error', fields);
  }
}

export const logger = new Logger();
