/**
 * Winston-backed logger shared by the Pageline services
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { LogFormat, Logger, LoggerConfig, LogMetadata } from './types';

const { combine, timestamp, json, printf, colorize, errors } = winston.format;

function resolveFormat(format: LogFormat | undefined, environment: string): LogFormat {
  return format ?? (environment === 'production' ? 'json' : 'pretty');
}

const prettyLine = printf(({ timestamp: time, level, message, service, jobId, requestId, ...rest }) => {
  const scope = [service, jobId, requestId].filter((part) => part !== undefined).map(String).join(' ');
  const extra = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  return `${String(time)} ${level} [${scope}] ${String(message)}${extra}`;
});

function consoleFormat(format: LogFormat): ReturnType<typeof combine> {
  if (format === 'json') {
    return combine(errors({ stack: true }), timestamp(), json());
  }
  return combine(errors({ stack: true }), colorize(), timestamp({ format: 'HH:mm:ss.SSS' }), prettyLine);
}

function buildTransports(config: LoggerConfig): winston.transport[] {
  const transports: winston.transport[] = [];

  if (config.enableConsole ?? true) {
    transports.push(new winston.transports.Console());
  }

  if (config.enableDailyRotate) {
    transports.push(
      new DailyRotateFile({
        dirname: config.logDir ?? 'logs',
        filename: `${config.service}-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxFiles: config.retention ?? '14d',
        format: combine(errors({ stack: true }), timestamp(), json()),
      })
    );
  }

  return [...transports, ...(config.transports ?? [])];
}

/**
 * Errors passed as `error` metadata are logged as their message plus stack
 */
function expandError(metadata: LogMetadata | undefined): LogMetadata | undefined {
  const error = metadata?.error;
  // shape check: Node core errors fail instanceof when seen from another realm
  if (typeof error !== 'object' || error === null || !('message' in error) || typeof error.message !== 'string') {
    return metadata;
  }
  const stack = 'stack' in error && typeof error.stack === 'string' ? error.stack : undefined;
  return { ...metadata, error: error.message, stack };
}

class WinstonLogger implements Logger {
  constructor(private readonly target: winston.Logger) {}

  debug(message: string, metadata?: LogMetadata): void {
    this.target.debug(message, expandError(metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    this.target.info(message, expandError(metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.target.warn(message, expandError(metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    this.target.error(message, expandError(metadata));
  }

  child(metadata: LogMetadata): Logger {
    return new WinstonLogger(this.target.child(metadata));
  }
}

export function createLogger(config: LoggerConfig): Logger {
  const environment = config.environment ?? process.env.NODE_ENV ?? 'development';
  const transports = buildTransports(config);

  return new WinstonLogger(
    winston.createLogger({
      level: config.level ?? 'info',
      format: consoleFormat(resolveFormat(config.format, environment)),
      defaultMeta: {
        service: config.service,
        environment,
        version: config.version ?? process.env.SERVICE_VERSION ?? '1.0.0',
        ...config.metadata,
      },
      transports,
      // a logger with no transports warns on every write
      silent: transports.length === 0,
      exitOnError: false,
    })
  );
}

