export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

type LogWriter = (line: string) => void;

type CreateLoggerOptions = {
  level?: LogLevel;
  write?: LogWriter;
};

const writeStdout: LogWriter = (line) => {
  process.stdout.write(line);
};

export const createLogger = ({ level = 'info', write = writeStdout }: CreateLoggerOptions = {}): Logger => {
  const threshold = LOG_LEVEL_ORDER[level];

  const log = (entryLevel: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (LOG_LEVEL_ORDER[entryLevel] < threshold) {
      return;
    }

    const payload: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      message,
    };

    if (meta) {
      payload.meta = meta;
    }

    write(`${JSON.stringify(payload)}\n`);
  };

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
  };
};

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
