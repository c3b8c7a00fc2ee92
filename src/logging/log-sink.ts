/**
 * Log Sink
 * ========
 *
 * One winston logger for the whole process: console output plus a daily
 * file at <baseFolder>/logs/YYYY-MM-DD.log. Components get child loggers
 * tagged with their component name instead of writing to stdout directly.
 *
 * Rotation is not automatic. The scheduler calls rotateIfNeeded() between
 * cycles, which swaps the file transport when the day changes and removes
 * files older than the retention window.
 */

import * as fs from 'fs';
import * as path from 'path';
import winston from 'winston';
import { formatDate } from '../utils/dates';
import type { Logger, LogLevel } from './types';

const LOG_FILE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})\.log$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface LogSinkConfig {
  baseFolder: string;
  retentionDays: number;
  level: LogLevel;
  console?: boolean;
}

export class LogSink {
  private readonly logger: winston.Logger;
  private readonly logFolder: string;
  private fileTransport?: winston.transport;
  private currentDate?: string;

  constructor(private readonly config: LogSinkConfig) {
    this.logFolder = path.join(config.baseFolder, 'logs');

    const transports: winston.transport[] = [];
    if (config.console !== false) {
      transports.push(
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
              const scope = component ? ` [${String(component)}]` : '';
              const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
              return `${String(timestamp)} [${level.toUpperCase()}]${scope} ${String(message)}${metaStr}`;
            })
          ),
        })
      );
    }

    this.logger = winston.createLogger({
      level: config.level,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports,
      exitOnError: false,
    });
  }

  get logPath(): string | undefined {
    return this.currentDate ? path.join(this.logFolder, `${this.currentDate}.log`) : undefined;
  }

  forComponent(component: string): Logger {
    return this.logger.child({ component });
  }

  /**
   * Open today's log file if the date changed since the last call.
   * Returns true when a new file was opened.
   */
  rotateIfNeeded(now: Date = new Date()): boolean {
    const today = formatDate(now);
    if (today === this.currentDate) {
      return false;
    }

    fs.mkdirSync(this.logFolder, { recursive: true });

    if (this.fileTransport) {
      this.logger.remove(this.fileTransport);
      this.fileTransport.close?.();
    }

    this.fileTransport = new winston.transports.File({
      filename: path.join(this.logFolder, `${today}.log`),
    });
    this.logger.add(this.fileTransport);
    this.currentDate = today;

    const deleted = this.cleanupOldLogs(now);
    this.logger.info(`Logging to ${today}.log`, {
      component: 'LogSink',
      deletedOldLogs: deleted.length,
    });
    return true;
  }

  /**
   * Delete YYYY-MM-DD.log files dated before now - retentionDays.
   * Files not following that naming are left alone.
   */
  cleanupOldLogs(now: Date = new Date()): string[] {
    if (!fs.existsSync(this.logFolder)) {
      return [];
    }

    const cutoff = now.getTime() - this.config.retentionDays * DAY_MS;
    const deleted: string[] = [];

    for (const fileName of fs.readdirSync(this.logFolder)) {
      const match = LOG_FILE_PATTERN.exec(fileName);
      if (!match) {
        continue;
      }
      const fileDate = new Date(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
      if (fileDate.getTime() < cutoff) {
        fs.unlinkSync(path.join(this.logFolder, fileName));
        deleted.push(fileName);
      }
    }

    for (const fileName of deleted) {
      this.logger.info(`Deleted old log: ${fileName}`, { component: 'LogSink' });
    }
    return deleted;
  }

  /**
   * Flush and end the logger, including the current log file.
   */
  async close(): Promise<void> {
    const pending = [new Promise<void>((resolve) => this.logger.once('finish', () => resolve()))];
    const fileTransport = this.fileTransport;
    if (fileTransport) {
      pending.push(new Promise<void>((resolve) => fileTransport.once('finish', () => resolve())));
    }
    this.logger.end();
    await Promise.all(pending);
  }
}
