type Level = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_WEIGHT: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/** Environment variable read by {@link resolveLogLevel}. */
export const LOG_LEVEL_ENV = 'MARKUP_LINT_LOG_LEVEL';

/** JSON-lines logger handed to the CLI; the analysis core never logs. */
export type Logger = {
  level: Level;
  log: (level: Level, message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export interface LoggerOptions {
  level?: Level;
  /** Receives one serialized entry per call, without a trailing newline. */
  sink: (line: string) => void;
  now?: () => Date;
}

/** Narrow an arbitrary string (e.g. from the environment) to a level. */
export function resolveLogLevel(raw: string | undefined, fallback: Level = 'warn'): Level {
  const normalized = String(raw ?? '').trim().toLowerCase();
  return normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error'
    ? normalized
    : fallback;
}

export function createLogger(options: LoggerOptions): Logger {
  const level = options.level ?? 'warn';
  const now = options.now ?? (() => new Date());

  function log(entryLevel: Level, message: string, meta?: Record<string, unknown>) {
    if (LEVEL_WEIGHT[entryLevel] < LEVEL_WEIGHT[level]) {
      return;
    }
    const entry = {
      t: now().toISOString(),
      level: entryLevel,
      msg: message,
      meta
    };
    options.sink(JSON.stringify(entry));
  }

  return {
    level,
    log,
    debug: (m, meta) => log('debug', m, meta),
    info: (m, meta) => log('info', m, meta),
    warn: (m, meta) => log('warn', m, meta),
    error: (m, meta) => log('error', m, meta)
  };
}
