export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Prefix added to every message, e.g. the component name. */
  scope?: string;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  child(scope: string): Logger {
    const joined = this.opts.scope ? `${this.opts.scope}:${scope}` : scope;
    return new Logger({ ...this.opts, scope: joined });
  }

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }
  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }
  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }
  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    const configured = this.opts.level ?? 'info';
    if (levelRank[level] < levelRank[configured]) return;

    const timestamp = new Date().toISOString();
    const scoped = this.opts.scope ? `[${this.opts.scope}] ${message}` : message;

    if (this.opts.json) {
      process.stderr.write(`${JSON.stringify({ timestamp, level, scope: this.opts.scope, message, data })}\n`);
      return;
    }

    const line = data === undefined ? `${timestamp} ${level} ${scoped}` : `${timestamp} ${level} ${scoped} ${safeJson(data)}`;
    process.stderr.write(`${line}\n`);
  }
}

/** Logger that drops everything below `error`; used as the default for library callers and tests. */
export function silentLogger(): Logger {
  return new Logger({ level: 'error' });
}

export function createLogger(opts: { verbose?: boolean; quiet?: boolean } = {}): Logger {
  return new Logger({ level: opts.verbose ? 'debug' : 'warn', json: opts.quiet });
}

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}
