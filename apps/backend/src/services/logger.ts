import util from 'node:util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogContext = Record<string, unknown> | undefined;

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const consoleMethod: Record<LogLevel, (...data: unknown[]) => void> = {
  debug: console.debug.bind(console),
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
};

const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === 'string' && value in levelOrder;

const serialize = (context: LogContext): Record<string, unknown> | undefined => {
  if (!context) {
    return undefined;
  }

  return JSON.parse(
    JSON.stringify(
      context,
      (_key, value: unknown) => {
        if (value instanceof Error) {
          return {
            name: value.name,
            message: value.message,
            stack: value.stack,
          };
        }

        if (typeof value === 'bigint') {
          return value.toString();
        }

        return value;
      },
      2,
    ),
  );
};

export class Logger {
  private minLevel: LogLevel;

  constructor(level: LogLevel = 'info') {
    this.minLevel = level;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  isEnabled(level: LogLevel): boolean {
    return levelOrder[level] >= levelOrder[this.minLevel];
  }

  private format(level: LogLevel, message: string, context?: LogContext) {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...serialize(context),
    };
  }

  private log(level: LogLevel, message: string, context?: LogContext) {
    if (!this.isEnabled(level)) {
      return;
    }

    const payload = this.format(level, message, context);
    consoleMethod[level](util.inspect(payload, { depth: null, colors: false, compact: false }));
  }

  debug(message: string, context?: LogContext) {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext) {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext) {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext) {
    this.log('error', message, context);
  }
}

export const logger = new Logger(isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info');

export type AppLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export default logger;
