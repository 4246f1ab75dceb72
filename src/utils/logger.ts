export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Extra fields stamped on every JSON line (e.g. runId). */
  bindings?: Record<string, unknown>;
  sink?: (line: string) => void;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  /** Derive a logger that carries additional bindings. */
  child(bindings: Record<string, unknown>): Logger {
    return new Logger({ ...this.opts, bindings: { ...this.opts.bindings, ...bindings } });
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
    const write = this.opts.sink ?? ((line: string) => process.stderr.write(`${line}\n`));

    if (this.opts.json) {
      write(JSON.stringify({ timestamp, level, message, ...this.opts.bindings, data }));
      return;
    }

    const bound = this.opts.bindings && Object.keys(this.opts.bindings).length > 0 ? ` ${safeJson(this.opts.bindings)}` : '';
    const line =
      data === undefined
        ? `${timestamp} ${level} ${message}${bound}`
        : `${timestamp} ${level} ${message}${bound} ${safeJson(data)}`;
    write(line);
  }
}

/** Logger that drops everything; the default when a caller does not pass one. */
export const silentLogger = new Logger({ level: 'error', sink: () => {} });

export function resolveLogLevel(): LogLevel {
  if (process.env.SHUTTLE_VERBOSE === '1') return 'debug';
  if (process.env.SHUTTLE_QUIET === '1') return 'warn';
  return 'info';
}

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}
