import { injectable } from 'inversify';
import path from 'path';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import type { LogLevel } from '../config';

export interface LogContext {
  requestId?: string;
  operation?: string;
  duration?: number;
  metadata?: Record<string, unknown>;
}

export interface ILogger {
  error(message: string, error?: unknown, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  createChild(namespace: string): ILogger;
}

export interface LoggerOptions {
  readonly level: LogLevel;
  readonly directory?: string;
  readonly silent?: boolean;
}

@injectable()
export class Logger implements ILogger {
  private readonly logger: winston.Logger;
  private readonly namespace: string;

  constructor(
    private readonly options: LoggerOptions,
    namespace: string = 'Application',
    parent?: winston.Logger
  ) {
    this.namespace = namespace;
    this.logger = parent ?? this.createLogger(options);
  }

  private createLogger(options: LoggerOptions): winston.Logger {
    const logFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ timestamp, level, message, namespace, context, error }) => {
        const logEntry: Record<string, unknown> = {
          timestamp,
          level,
          namespace: namespace || this.namespace,
          message
        };

        if (context) {
          logEntry.context = context;
        }

        if (error) {
          logEntry.error = error;
        }

        return JSON.stringify(logEntry);
      })
    );

    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, namespace, context, error }) => {
            const details = context ? ` ${JSON.stringify(context)}` : '';
            const cause = isSerializedError(error) ? ` (${error.message})` : '';
            return `${timestamp} [${level}] [${namespace || this.namespace}] ${message}${cause}${details}`;
          })
        )
      })
    ];

    if (options.directory) {
      transports.push(
        new DailyRotateFile({
          filename: path.join(options.directory, 'application-%DATE%.log'),
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '14d',
          format: logFormat
        }),
        new DailyRotateFile({
          filename: path.join(options.directory, 'error-%DATE%.log'),
          datePattern: 'YYYY-MM-DD',
          level: 'error',
          maxSize: '20m',
          maxFiles: '30d',
          format: logFormat
        })
      );
    }

    return winston.createLogger({
      level: options.level,
      format: logFormat,
      transports,
      silent: options.silent ?? false,
      exitOnError: false
    });
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const logData: Record<string, unknown> = {
      namespace: this.namespace
    };

    if (context) {
      logData.context = context;
    }

    if (error !== undefined) {
      logData.error = serializeError(error);
    }

    this.logger.error(message, logData);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(message, this.buildLogData(context));
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(message, this.buildLogData(context));
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(message, this.buildLogData(context));
  }

  createChild(namespace: string): ILogger {
    return new Logger(this.options, `${this.namespace}:${namespace}`, this.logger);
  }

  async close(): Promise<void> {
    await new Promise<void>(resolve => {
      this.logger.on('finish', () => resolve());
      this.logger.end();
    });
  }

  private buildLogData(context?: LogContext): Record<string, unknown> {
    return context ? { namespace: this.namespace, context } : { namespace: this.namespace };
  }
}

interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  cause?: SerializedError | string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    const serialized: SerializedError = {
      name: error.name,
      message: error.message,
      stack: error.stack
    };

    if (error.cause !== undefined) {
      serialized.cause = error.cause instanceof Error ? serializeError(error.cause) : String(error.cause);
    }

    return serialized;
  }

  return { name: 'NonError', message: String(error) };
}

function isSerializedError(value: unknown): value is SerializedError {
  return typeof value === 'object' && value !== null && 'message' in value;
}
