import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { logConfig } from '../connections/config/app.config';

interface LoggingSettings {
  level: string;
  dir: string;
  retention: string;
  maxSize: string;
  silent: boolean;
}

class LoggingConfig {
  private readonly logDir: string;

  constructor(private readonly settings: LoggingSettings) {
    this.logDir = path.resolve(settings.dir);
  }

  private formatLine(info: Record<string, unknown>, stackLabel: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const stackStr = stack ? `\n${stackLabel}${String(stack)}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} | ${String(level)} | ${String(message)}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.colorize({ all: true }),
      winston.format.printf(info => this.formatLine(info, ''))
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf(info => this.formatLine(info, 'Stack: '))
    );
  }

  private parseRetention(retention: string): string {
    // "30 days" -> "30d"
    const match = retention.match(/(\d+)\s*(day|days|d|hour|hours|h)/i);
    if (match) {
      const [, num, unit] = match;
      if (unit.toLowerCase().startsWith('h')) return `${num}h`;
      return `${num}d`;
    }
    return '30d';
  }

  private createRotatingFile(name: string, level: string): DailyRotateFile {
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${name}-%DATE%.log`),
      datePattern: 'YYYY-MM-DD',
      maxSize: this.settings.maxSize,
      maxFiles: this.parseRetention(this.settings.retention),
      zippedArchive: true,
      level,
      format: this.createFileFormat(),
    });
  }

  setupLogging(): winston.Logger {
    const level = this.settings.level.toLowerCase();

    const logger = winston.createLogger({
      level,
      format: this.createFileFormat(),
      transports: [],
      exitOnError: false,
    });

    if (this.settings.silent) {
      logger.add(new winston.transports.Console({ silent: true }));
      return logger;
    }

    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }

    logger.add(new winston.transports.Console({
      level,
      format: this.createConsoleFormat(),
    }));

    logger.add(this.createRotatingFile('sys', level));
    logger.add(this.createRotatingFile('error', 'error'));
    // combined log keeps every level
    logger.add(this.createRotatingFile('combined', 'silly'));

    return logger;
  }

  getLogger(name?: string): winston.Logger {
    const logger = this.setupLogging();
    if (name) {
      return logger.child({ name });
    }
    return logger;
  }
}

export const loggingConfig = new LoggingConfig(logConfig);

export const logger = loggingConfig.setupLogging();
