import winston from 'winston';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

export interface LogData {
  sessionId?: string;
  event?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  sessionId?: string;
  event?: string;
  message?: string;
  data?: Record<string, unknown>;
  error?: {
    code?: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerOptions {
  /** File that receives every JSON entry; empty string disables the file transport */
  logFile?: string;
  /** File for error entries only, used in production */
  errorLogFile?: string;
}

/**
 * The subset of the logger that components depend on.
 */
export type AppLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

class Logger {
  private winstonLogger: winston.Logger;

  constructor(logLevel: LogLevel = 'INFO', options: LoggerOptions = {}) {
    const { logFile = 'logs/combined.log', errorLogFile } = options;

    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(formatConsoleOutput)
        ),
      }),
    ];

    if (logFile) {
      transports.push(
        new winston.transports.File({
          filename: logFile,
          format: winston.format.json(),
        })
      );
    }

    if (errorLogFile) {
      transports.push(
        new winston.transports.File({
          filename: errorLogFile,
          level: 'error',
          format: winston.format.json(),
        })
      );
    }

    this.winstonLogger = winston.createLogger({
      level: mapLogLevel(logLevel),
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports,
    });
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    data?: LogData,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
    };

    if (data?.sessionId) {
      entry.sessionId = data.sessionId;
    }

    if (data?.event) {
      entry.event = data.event;
    }

    if (message) {
      entry.message = message;
    }

    if (data) {
      const { sessionId: _sessionId, event: _event, ...rest } = data;
      if (Object.keys(rest).length > 0) {
        entry.data = rest;
      }
    }

    if (error) {
      entry.error = {
        message: error.message,
        stack: error.stack,
      };

      if ('code' in error && typeof error.code === 'string') {
        entry.error.code = error.code;
      }
    }

    return entry;
  }

  debug(message: string, data?: LogData): void {
    this.winstonLogger.debug(this.createLogEntry('DEBUG', message, data));
  }

  info(message: string, data?: LogData): void {
    this.winstonLogger.info(this.createLogEntry('INFO', message, data));
  }

  warn(message: string, data?: LogData): void {
    this.winstonLogger.warn(this.createLogEntry('WARN', message, data));
  }

  error(message: string, dataOrError?: LogData | Error, error?: Error): void {
    let logData: LogData | undefined;
    let logError: Error | undefined;

    // Handle overloaded parameters
    if (dataOrError instanceof Error) {
      logError = dataOrError;
    } else {
      logData = dataOrError;
      logError = error;
    }

    this.winstonLogger.error(this.createLogEntry('ERROR', message, logData, logError));
  }

  /**
   * Flush and close all transports
   */
  close(): void {
    this.winstonLogger.close();
  }
}

function mapLogLevel(level: LogLevel): string {
  const levelMap: Record<LogLevel, string> = {
    DEBUG: 'debug',
    INFO: 'info',
    WARN: 'warn',
    ERROR: 'error',
  };
  return levelMap[level];
}

function formatConsoleOutput(info: winston.Logform.TransformableInfo): string {
  const { timestamp, level, message, sessionId, event, ...rest } = info;
  let output = `${String(timestamp)} [${level}]`;

  if (sessionId) {
    output += ` [${String(sessionId)}]`;
  }

  if (event) {
    output += ` ${String(event)}`;
  }

  if (message) {
    output += `: ${String(message)}`;
  }

  if (Object.keys(rest).length > 0) {
    output += ` ${JSON.stringify(rest)}`;
  }

  return output;
}

/**
 * Create a logger. The server entry point creates one and hands it to every
 * component it constructs.
 */
export function createLogger(logLevel?: LogLevel, options?: LoggerOptions): Logger {
  return new Logger(logLevel, options);
}

export { Logger };
export default Logger;
