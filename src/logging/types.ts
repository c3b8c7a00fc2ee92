export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMeta {
  component?: string;
  [key: string]: unknown;
}

/**
 * Logger interface handed to every component.
 * winston loggers (and their children) satisfy it.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
