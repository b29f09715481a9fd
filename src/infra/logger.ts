import winston from 'winston';
import path from 'path';
import { fileURLToPath } from 'url';
import fs from 'fs';

export const SERVICE_NAME = 'storyflow-automation';

export type LogContext = Record<string, unknown>;

export interface ILogger {
  info(message: string, context?: LogContext): void;
  error(message: string, error?: unknown): void;
  warn(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  /** Logger whose entries all carry `context`, e.g. the scenario being run. */
  child(context: LogContext): ILogger;
}

export interface IWinstonLoggerOptions {
  level?: string;
  /** Defaults to logs/ under the package root. */
  logDir?: string;
  /** Replaces the console and file transports; the logger is then not shared. */
  transports?: winston.LoggerOptions['transports'];
}

function defaultLogDir(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (dir !== path.dirname(dir)) {
    if (fs.existsSync(path.join(dir, 'package.json'))) {
      return path.join(dir, 'logs');
    }
    dir = path.dirname(dir);
  }
  return path.resolve('logs');
}

function defaultTransports(logDir: string) {
  fs.mkdirSync(logDir, { recursive: true });
  return [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
          return `${timestamp} [${level}]: ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ''}`;
        })
      ),
    }),
    new winston.transports.File({
      filename: path.join(logDir, `${SERVICE_NAME}.log`),
      level: 'debug',
      options: { flags: 'a' },
    }),
  ];
}

function createWinston(options: IWinstonLoggerOptions): winston.Logger {
  const logger = winston.createLogger({
    level: options.level ?? 'info',
    defaultMeta: { service: SERVICE_NAME },
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    transports: options.transports ?? defaultTransports(options.logDir ?? defaultLogDir()),
  });

  logger.on('error', (err) => {
    console.error('Winston logger error:', err);
  });
  return logger;
}

class WinstonAdapter implements ILogger {
  constructor(protected logger: winston.Logger) {}

  info(message: string, context?: LogContext): void {
    this.logger.info(message, context);
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.logger.error(message, {
        errorName: error.name,
        errorMessage: error.message,
        stack: error.stack,
      });
    } else if (error !== undefined) {
      this.logger.error(message, { error });
    } else {
      this.logger.error(message);
    }
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(message, context);
  }

  child(context: LogContext): ILogger {
    return new WinstonAdapter(this.logger.child(context));
  }
}

/**
 * Console plus logs/storyflow-automation.log. Instances built without custom
 * transports share one winston logger so every entry lands in the same file.
 */
export class WinstonLogger extends WinstonAdapter {
  private static sharedLogger: winston.Logger | null = null;

  constructor(options: IWinstonLoggerOptions = {}) {
    super(options.transports ? createWinston(options) : WinstonLogger.shared(options));
  }

  private static shared(options: IWinstonLoggerOptions): winston.Logger {
    if (!WinstonLogger.sharedLogger) {
      WinstonLogger.sharedLogger = createWinston(options);
    } else if (options.level) {
      WinstonLogger.sharedLogger.level = options.level;
    }
    return WinstonLogger.sharedLogger;
  }
}

export class LoggerStub implements ILogger {
  info(_message: string, _context?: LogContext): void {}
  error(_message: string, _error?: unknown): void {}
  warn(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}

  child(_context: LogContext): ILogger {
    return this;
  }
}
