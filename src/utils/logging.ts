import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { appConfig } from '../connections/config/app.config';

class LoggingConfig {
  private logLevel: string;
  private rotation: string;
  private retention: string;
  private compression: boolean;
  private logDir: string;
  private fileOutput: boolean;
  private silent: boolean;

  constructor() {
    this.logLevel = appConfig.logLevel;
    this.rotation = '10MB';
    this.retention = '30 days';
    this.compression = true;
    this.logDir = path.resolve(appConfig.logDir);

    // Tests log nowhere
    this.silent = appConfig.nodeEnv === 'test';
    this.fileOutput = !this.silent;

    if (this.fileOutput && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackPrefix: string): string {
    const { timestamp, level, message, stack, name, ...meta } = info;
    const scope = typeof name === 'string' ? ` | ${name}` : '';
    const stackStr = typeof stack === 'string' ? `\n${stackPrefix}${stack}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} | ${level}${scope} | ${String(message)}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.colorize({ all: true }),
      winston.format.printf((info) => this.formatLine(info, ''))
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf((info) => this.formatLine(info, 'Stack: '))
    );
  }

  private parseRotation(rotation: string): { maxSize?: string; datePattern?: string } {
    if (rotation.includes('MB') || rotation.includes('KB') || rotation.includes('GB')) {
      return { maxSize: rotation };
    } else if (rotation.includes('day') || rotation.includes('hour')) {
      return { datePattern: 'YYYY-MM-DD' };
    }
    return { maxSize: '10MB' };
  }

  private parseRetention(retention: string): string {
    // "30 days" -> "30d"
    const match = retention.match(/(\d+)\s*(day|days|d|hour|hours|h)/i);
    if (match) {
      const num = match[1];
      const unit = match[2].toLowerCase();
      if (unit.startsWith('d')) return `${num}d`;
      if (unit.startsWith('h')) return `${num}h`;
    }
    return '30d';
  }

  private createFileTransport(fileName: string, level: string): DailyRotateFile {
    const rotationConfig = this.parseRotation(this.rotation);
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${fileName}-%DATE%.log`),
      datePattern: rotationConfig.datePattern || 'YYYY-MM-DD',
      maxSize: rotationConfig.maxSize,
      maxFiles: this.parseRetention(this.retention),
      zippedArchive: this.compression,
      level,
      format: this.createFileFormat(),
    });
  }

  setupLogging(): winston.Logger {
    const logger = winston.createLogger({
      level: this.logLevel,
      format: this.createFileFormat(),
      transports: [],
      exitOnError: false,
    });

    logger.add(new winston.transports.Console({
      level: this.logLevel,
      format: this.createConsoleFormat(),
      silent: this.silent,
    }));

    if (this.fileOutput) {
      logger.add(this.createFileTransport('sys', this.logLevel));
      logger.add(this.createFileTransport('error', 'error'));
      // combined keeps every level
      logger.add(this.createFileTransport('combined', 'silly'));
    }

    return logger;
  }
}

export const logger = new LoggingConfig().setupLogging();

/**
 * Child logger tagged with the module name, e.g. `getLogger('checkout')`.
 */
export const getLogger = (name: string): winston.Logger => logger.child({ name });
