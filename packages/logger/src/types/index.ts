import type winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** `json` for machines, `pretty` for a terminal */
export type LogFormat = 'json' | 'pretty';

export type LogMetadata = Record<string, unknown>;

export interface LoggerConfig {
  service: string;
  level?: LogLevel;
  /** Unset: json in production, pretty elsewhere */
  format?: LogFormat;
  /** Write to the console (default true) */
  enableConsole?: boolean;
  /** Appended after the console and rotation transports */
  transports?: winston.transport[];
  /** Also write JSON lines to `<logDir>/<service>-YYYY-MM-DD.log` */
  enableDailyRotate?: boolean;
  logDir?: string;
  /** Rotation retention, e.g. '14d' */
  retention?: string;
  environment?: string;
  version?: string;
  /** Merged into every entry */
  metadata?: LogMetadata;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
  /** Logger whose entries also carry `metadata` */
  child(metadata: LogMetadata): Logger;
}
