export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Tag prepended to every line (e.g. `relay`, `digest`). */
  scope?: string;
  /** Defaults to process.stderr; stdout is reserved for machine output. */
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

  child(scope: string): Logger {
    const parent = this.opts.scope;
    return new Logger({ ...this.opts, scope: parent ? `${parent}:${scope}` : scope });
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
    const scope = this.opts.scope;

    if (this.opts.json) {
      this.write(JSON.stringify({ timestamp, level, scope, message, data }));
      return;
    }

    const head = scope ? `${timestamp} ${level} [${scope}] ${message}` : `${timestamp} ${level} ${message}`;
    this.write(data === undefined ? head : `${head} ${safeJson(data)}`);
  }

  private write(line: string) {
    if (this.opts.sink) {
      this.opts.sink(line);
      return;
    }
    process.stderr.write(`${line}\n`);
  }
}

/**
 * Logger configured from the global CLI flags (mirrored into env by the `preAction` hook).
 */
export function createLogger(scope?: string, env: NodeJS.ProcessEnv = process.env): Logger {
  const verbose = env.STACKRELAY_VERBOSE === '1';
  const quiet = env.STACKRELAY_QUIET === '1';
  return new Logger({ level: verbose ? 'debug' : 'warn', json: quiet, scope });
}

/** Discards everything; the default for library calls that were given no logger. */
export const silentLogger = new Logger({ level: 'error', sink: () => {} });

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}
